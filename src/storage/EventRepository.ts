import Database from "better-sqlite3";
import { CellValue, ClickstreamEvent, Dataset, EVENT_DATE_COLUMN } from "../core/entities";
import { LoadError } from "../core/errors";
import { now, toEventDate } from "../utils/time";
import { DatasetLoader } from "../data/DatasetLoader";

interface EventRow {
  id: number;
  event_time: string;
  event_name: string;
  attributes: string;
}

interface ColumnRow {
  name: string;
}

interface MetaRow {
  value: string;
}

/** Stores raw source columns only; `event_date` is derived again on every load. */
export function createEventRepository(db: Database.Database): {
  replaceAll: Database.Transaction<(dataset: Dataset) => void>;
  findAll: () => ClickstreamEvent[];
  findColumns: () => string[];
  count: () => number;
  loadDataset: () => Dataset;
} {
  const insertEventStmt = db.prepare(`
    INSERT INTO clickstream_events (event_time, event_name, attributes)
    VALUES (@eventTime, @eventName, @attributes)
  `);
  const insertColumnStmt = db.prepare(`
    INSERT INTO dataset_columns (position, name) VALUES (?, ?)
  `);
  const upsertMetaStmt = db.prepare(`
    INSERT OR REPLACE INTO dataset_meta (key, value) VALUES (?, ?)
  `);
  const selectEventsStmt = db.prepare(`SELECT * FROM clickstream_events ORDER BY id`);
  const selectColumnsStmt = db.prepare(`SELECT name FROM dataset_columns ORDER BY position`);
  const selectSourceStmt = db.prepare(`SELECT value FROM dataset_meta WHERE key = 'source'`);
  const countStmt = db.prepare(`SELECT COUNT(*) AS total FROM clickstream_events`);

  /** Replace the stored events and schema with those of `dataset`. */
  const replaceAll = db.transaction((dataset: Dataset) => {
    db.exec(`DELETE FROM clickstream_events; DELETE FROM dataset_columns;`);

    [...dataset.columns]
      .filter((name) => name !== EVENT_DATE_COLUMN)
      .forEach((name, position) => insertColumnStmt.run(position, name));
    upsertMetaStmt.run("source", dataset.source);

    for (const evt of dataset.events) {
      insertEventStmt.run({
        eventTime: evt.eventTime,
        eventName: evt.eventName,
        attributes: JSON.stringify(evt.attributes),
      });
    }
  });

  function source(): string {
    const row = selectSourceStmt.get() as MetaRow | undefined;
    return row?.value ?? db.name;
  }

  /** Throws LoadError on a row whose event_time does not parse. */
  function findAll(): ClickstreamEvent[] {
    return mapRows(selectEventsStmt.all() as EventRow[], source());
  }

  function findColumns(): string[] {
    return (selectColumnsStmt.all() as ColumnRow[]).map((r) => r.name);
  }

  function count(): number {
    return (countStmt.get() as { total: number }).total;
  }

  function loadDataset(): Dataset {
    return {
      events: findAll(),
      columns: new Set([...findColumns(), EVENT_DATE_COLUMN]),
      source: source(),
      loadedAt: now(),
    };
  }

  return { replaceAll, findAll, findColumns, count, loadDataset };
}

function parseAttributes(raw: string): Record<string, CellValue> {
  const parsed: unknown = JSON.parse(raw);
  const attributes: Record<string, CellValue> = {};
  if (typeof parsed !== "object" || parsed === null) return attributes;

  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string" || typeof value === "number") {
      attributes[key] = value;
    } else {
      attributes[key] = null;
    }
  }
  return attributes;
}

function mapRows(rows: EventRow[], source: string): ClickstreamEvent[] {
  return rows.map((r) => {
    const eventDate = toEventDate(r.event_time);
    if (eventDate === null) {
      throw new LoadError(`Event ${r.id}: invalid event_time: "${r.event_time}"`, source);
    }
    return {
      eventTime: r.event_time,
      eventDate,
      eventName: r.event_name,
      attributes: parseAttributes(r.attributes),
    };
  });
}

export class SqliteDatasetLoader implements DatasetLoader {
  constructor(private readonly dbPath: string) {}

  load(): Dataset {
    let db: Database.Database;
    try {
      db = new Database(this.dbPath, { fileMustExist: true });
    } catch (err) {
      throw new LoadError(`Cannot open event store: ${this.dbPath}`, this.dbPath, { cause: err });
    }

    try {
      return createEventRepository(db).loadDataset();
    } catch (err) {
      if (err instanceof LoadError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new LoadError(`Cannot read event store ${this.dbPath}: ${reason}`, this.dbPath, {
        cause: err,
      });
    } finally {
      db.close();
    }
  }
}
