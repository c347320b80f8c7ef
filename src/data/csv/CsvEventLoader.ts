import fs from "fs";
import { parse } from "csv-parse/sync";
import {
  CellValue,
  ClickstreamEvent,
  Dataset,
  EVENT_DATE_COLUMN,
  EVENT_NAME_COLUMN,
  EVENT_TIME_COLUMN,
  REQUIRED_COLUMNS,
} from "../../core/entities";
import { LoadError } from "../../core/errors";
import { now, toEventDate } from "../../utils/time";
import { DatasetLoader } from "../DatasetLoader";

const NUMERIC_COLUMNS = new Set(["pack_price"]);

function readFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new LoadError(`Cannot read dataset: ${filePath}`, filePath, { cause: err });
  }
}

function toCell(column: string, raw: string | undefined): CellValue {
  if (raw === undefined || raw === "") return null;
  if (NUMERIC_COLUMNS.has(column)) {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : raw;
  }
  return raw;
}

export function loadEventsFromCsv(filePath: string): Dataset {
  const content = readFile(filePath);
  let headers: string[] = [];

  let records: Record<string, string>[];
  try {
    records = parse(content, {
      columns: (header: string[]) => {
        headers = header;
        return header;
      },
      bom: true,
      skip_empty_lines: true,
      trim: true,
    }) as Record<string, string>[];
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoadError(`Malformed CSV in ${filePath}: ${reason}`, filePath, { cause: err });
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new LoadError(`Missing required column(s): ${missing.join(", ")}`, filePath);
  }

  const attributeColumns = headers.filter(
    (column) => column !== EVENT_TIME_COLUMN && column !== EVENT_NAME_COLUMN
  );
  const events: ClickstreamEvent[] = [];

  for (let i = 0; i < records.length; i++) {
    const row = records[i];
    const lineNum = i + 2;
    const eventTime = row[EVENT_TIME_COLUMN] ?? "";

    const eventDate = toEventDate(eventTime);
    if (eventDate === null) {
      throw new LoadError(`Line ${lineNum}: invalid ${EVENT_TIME_COLUMN}: "${eventTime}"`, filePath);
    }

    const attributes: Record<string, CellValue> = {};
    for (const column of attributeColumns) {
      attributes[column] = toCell(column, row[column]);
    }

    events.push({
      eventTime,
      eventDate,
      eventName: row[EVENT_NAME_COLUMN] ?? "",
      attributes,
    });
  }

  return {
    events,
    columns: new Set([...headers, EVENT_DATE_COLUMN]),
    source: filePath,
    loadedAt: now(),
  };
}

export class CsvDatasetLoader implements DatasetLoader {
  constructor(private readonly filePath: string) {}

  load(): Dataset {
    return loadEventsFromCsv(this.filePath);
  }
}
