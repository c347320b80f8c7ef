import {
  CategoryAggregate,
  CategoryCount,
  CellValue,
  ClickstreamEvent,
  PairCount,
  getColumn,
} from "../entities";

export interface CountByOptions {
  /** Reindex to this category order, filling absent categories with 0. */
  order?: readonly string[];
  /** Only count events whose event name is in this list. */
  only?: readonly string[];
}

function toCategory(value: CellValue): string | null {
  if (value === null) return null;
  return String(value);
}

function toNumber(value: CellValue): number | null {
  if (value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function selectEvents(
  events: readonly ClickstreamEvent[],
  only?: readonly string[]
): readonly ClickstreamEvent[] {
  if (!only) return events;
  const names = new Set(only);
  return events.filter((event) => names.has(event.eventName));
}

/** Count events per value of one column. Nulls are dropped. */
export function countBy(
  events: readonly ClickstreamEvent[],
  column: string,
  options: CountByOptions = {}
): CategoryCount[] {
  const counts = new Map<string, number>();

  for (const event of selectEvents(events, options.only)) {
    const value = toCategory(getColumn(event, column));
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  if (options.order) {
    return options.order.map((value) => ({ value, count: counts.get(value) ?? 0 }));
  }

  // Array.prototype.sort is stable, so ties keep first-seen order.
  return [...counts]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}

export function topN(
  events: readonly ClickstreamEvent[],
  column: string,
  n: number
): CategoryCount[] {
  return countBy(events, column).slice(0, Math.max(0, Math.floor(n)));
}

/** Count events per (first, second) pair; rows with a null in either key are dropped. */
export function countByPair(
  events: readonly ClickstreamEvent[],
  columns: readonly [string, string]
): PairCount[] {
  const [firstColumn, secondColumn] = columns;
  const counts = new Map<string, PairCount>();

  for (const event of events) {
    const first = toCategory(getColumn(event, firstColumn));
    const second = toCategory(getColumn(event, secondColumn));
    if (first === null || second === null) continue;

    const key = JSON.stringify([first, second]);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { first, second, count: 1 });
    }
  }

  return [...counts.values()].sort(
    (a, b) => a.first.localeCompare(b.first) || a.second.localeCompare(b.second)
  );
}

/**
 * Per key, the count of numeric values and their mean. Keys whose values are
 * all missing are kept with count 0 and a null mean.
 */
export function aggregateBy(
  events: readonly ClickstreamEvent[],
  keyColumn: string,
  valueColumn: string
): CategoryAggregate[] {
  const groups = new Map<string, { count: number; sum: number }>();

  for (const event of events) {
    const key = toCategory(getColumn(event, keyColumn));
    if (key === null) continue;

    const group = groups.get(key) ?? { count: 0, sum: 0 };
    const value = toNumber(getColumn(event, valueColumn));
    if (value !== null) {
      group.count++;
      group.sum += value;
    }
    groups.set(key, group);
  }

  return [...groups]
    .map(([value, { count, sum }]) => ({
      value,
      count,
      mean: count > 0 ? sum / count : null,
    }))
    .sort((a, b) => b.count - a.count || a.value.localeCompare(b.value));
}
