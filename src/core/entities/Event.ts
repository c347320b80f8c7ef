export type CellValue = string | number | null;

export interface ClickstreamEvent {
  eventTime: string;
  eventDate: string;
  eventName: string;
  attributes: Readonly<Record<string, CellValue>>;
}

export const EVENT_TIME_COLUMN = "event_time";
export const EVENT_DATE_COLUMN = "event_date";
export const EVENT_NAME_COLUMN = "event_name";

export const REQUIRED_COLUMNS: readonly string[] = [EVENT_TIME_COLUMN, EVENT_NAME_COLUMN];

/** Read a source column by name; absent columns read as null. */
export function getColumn(event: ClickstreamEvent, column: string): CellValue {
  switch (column) {
    case EVENT_TIME_COLUMN:
      return event.eventTime;
    case EVENT_DATE_COLUMN:
      return event.eventDate;
    case EVENT_NAME_COLUMN:
      return event.eventName;
    default:
      return event.attributes[column] ?? null;
  }
}

export interface Dataset {
  readonly events: readonly ClickstreamEvent[];
  readonly columns: ReadonlySet<string>;
  readonly source: string;
  readonly loadedAt: string;
}
