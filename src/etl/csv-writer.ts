import { csvFormatRows } from 'd3-dsv';
import type { Cell, Table } from '@domain/types';

function formatCell(cell: Cell): string {
  if (cell === null) return '';
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
}

/**
 * RFC 4180 CSV via d3-dsv: header row, then one line per row. Nulls are
 * empty fields and timestamps ISO-8601 UTC.
 */
export function formatTripTableCsv(table: Table): string {
  const header = [...table.columns];
  const body = table.rows.map((row) =>
    table.columns.map((column) => formatCell(row[column] ?? null))
  );
  return csvFormatRows([header, ...body]);
}
