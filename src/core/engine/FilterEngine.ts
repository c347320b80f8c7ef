import {
  ALL,
  ClickstreamEvent,
  Dataset,
  FilterCriteria,
  FilterOptions,
  Selection,
  getColumn,
} from "../entities";
import { isWithinRange } from "../../utils/time";

function matchesSelection(event: ClickstreamEvent, column: string, selection: Selection): boolean {
  return selection === ALL || getColumn(event, column) === selection;
}

/** Keep events inside the inclusive date range and matching the optional selections. */
export function applyFilters(
  events: readonly ClickstreamEvent[],
  criteria: FilterCriteria
): ClickstreamEvent[] {
  const { startDate, endDate, platform, userType } = criteria;

  return events.filter(
    (event) =>
      isWithinRange(event.eventDate, startDate, endDate) &&
      matchesSelection(event, "platform", platform) &&
      matchesSelection(event, "user_type", userType)
  );
}

function distinctValues(events: readonly ClickstreamEvent[], column: string): string[] {
  const values = new Set<string>();
  for (const event of events) {
    const value = getColumn(event, column);
    if (value !== null) values.add(String(value));
  }
  return [...values].sort((a, b) => a.localeCompare(b));
}

export function listFilterOptions(dataset: Dataset): FilterOptions {
  let minDate: string | null = null;
  let maxDate: string | null = null;

  for (const event of dataset.events) {
    if (minDate === null || event.eventDate < minDate) minDate = event.eventDate;
    if (maxDate === null || event.eventDate > maxDate) maxDate = event.eventDate;
  }

  return {
    minDate,
    maxDate,
    platforms: [ALL, ...distinctValues(dataset.events, "platform")],
    userTypes: [ALL, ...distinctValues(dataset.events, "user_type")],
  };
}
