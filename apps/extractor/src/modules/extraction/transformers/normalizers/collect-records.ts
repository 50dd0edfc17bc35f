import type { RawEventRow } from "@match-insights/types";
import type { MalformedRecordError, Result } from "../../../../common/errors";

export interface CollectedRecords<T> {
  records: T[];
  dropped: number;
  /** Missing field name -> number of rows that lacked it */
  missingFields: Record<string, number>;
}

/**
 * Normalize every row of a table, keeping the good records and counting the rest
 */
export function collectRecords<T>(
  rows: readonly RawEventRow[],
  normalize: (row: RawEventRow) => Result<T, MalformedRecordError>,
): CollectedRecords<T> {
  const records: T[] = [];
  const missingFields: Record<string, number> = {};
  let dropped = 0;

  for (const row of rows) {
    const result = normalize(row);
    if (result.success) {
      records.push(result.data);
      continue;
    }

    dropped++;
    for (const field of result.error.missingFields) {
      missingFields[field] = (missingFields[field] ?? 0) + 1;
    }
  }

  return { records, dropped, missingFields };
}

export function describeDrops(kind: string, collected: CollectedRecords<unknown>): string {
  const fields = Object.entries(collected.missingFields)
    .map(([field, count]) => `${field} x${count}`)
    .join(", ");
  return `Dropped ${collected.dropped} malformed ${kind} rows (${fields})`;
}

export function byTick<T extends { tick: number }>(a: T, b: T): number {
  return a.tick - b.tick;
}
