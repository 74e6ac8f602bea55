import type { FetchWindow, Table } from '@domain/types';

// Monthly files routinely contain a handful of trips dated outside their month.
export function filterToWindow(table: Table, window: FetchWindow): Table {
  if (!table.columns.includes('pickup_datetime')) {
    return table;
  }
  const startMs = window.start.getTime();
  const endMs = window.end.getTime();

  const rows = table.rows.filter((row) => {
    const pickup = row['pickup_datetime'];
    if (!(pickup instanceof Date)) return false;
    const pickupMs = pickup.getTime();
    return pickupMs >= startMs && pickupMs < endMs;
  });

  return { columns: table.columns, rows };
}
