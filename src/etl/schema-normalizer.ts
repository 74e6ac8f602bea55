import type { Cell, Row, Table, TaxiType } from '@domain/types';
import { parseTimestamp } from './timestamp';

// Yellow files use tpep_* names, green files lpep_*; zone columns share a name
// but differ in case between releases. Keys are lower-case.
export const COLUMN_RENAMES: ReadonlyMap<string, string> = new Map([
  ['tpep_pickup_datetime', 'pickup_datetime'],
  ['lpep_pickup_datetime', 'pickup_datetime'],
  ['tpep_dropoff_datetime', 'dropoff_datetime'],
  ['lpep_dropoff_datetime', 'dropoff_datetime'],
  ['pulocationid', 'pickup_location_id'],
  ['dolocationid', 'dropoff_location_id'],
]);

const TIMESTAMP_COLUMNS = ['pickup_datetime', 'dropoff_datetime'] as const;

export function canonicalColumnName(sourceColumn: string): string {
  const lower = sourceColumn.toLowerCase();
  return COLUMN_RENAMES.get(lower) ?? lower;
}

/**
 * Renames a raw monthly table into the canonical naming scheme and tags
 * every row with its taxi type. Columns the source lacks stay absent.
 */
export function normalizeTripSchema(table: Table, taxiType: TaxiType): Table {
  if (table.rows.length === 0) {
    return table;
  }

  const renames = table.columns.map(
    (source) => [source, canonicalColumnName(source)] as const
  );

  const columns: string[] = [];
  for (const [, target] of renames) {
    if (!columns.includes(target)) columns.push(target);
  }
  const timestampColumns = TIMESTAMP_COLUMNS.filter((c) => columns.includes(c));
  if (!columns.includes('taxi_type')) columns.push('taxi_type');

  const rows = table.rows.map((row: Row): Row => {
    const out: Record<string, Cell> = {};
    for (const [source, target] of renames) {
      // Two source names collapsing onto one target coalesce in column order
      const existing = out[target];
      if (existing === undefined || existing === null) {
        out[target] = row[source] ?? null;
      }
    }
    for (const column of timestampColumns) {
      out[column] = parseTimestamp(out[column] ?? null);
    }
    out['taxi_type'] = taxiType;
    return out;
  });

  return { columns, rows };
}
