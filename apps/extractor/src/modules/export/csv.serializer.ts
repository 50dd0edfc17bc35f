/**
 * CSV serialization of flat record collections
 *
 * Columns are the union of the record keys in first-seen order, so records
 * of different variants (grenade types, bomb events) share one file. Null
 * and missing values are written as empty fields.
 */

import { stringify } from "csv-stringify/sync";

export type CsvRecord = Readonly<Record<string, unknown>>;

/**
 * Union of keys across records, in order of first appearance
 */
export function collectColumns(records: readonly CsvRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      columns.add(key);
    }
  }
  return [...columns];
}

/**
 * Serialize records to CSV with a header row; "" for an empty collection
 */
export function toCsv(records: readonly CsvRecord[]): string {
  if (records.length === 0) {
    return "";
  }

  return stringify([...records], {
    header: true,
    columns: collectColumns(records),
    cast: {
      boolean: (value) => (value ? "true" : "false"),
    },
  });
}
