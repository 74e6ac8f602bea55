import {
  type CanonicalTripRecord,
  type Cell,
  type Table,
  createTaxiType,
} from '@domain/types';
import { parseTimestamp } from './timestamp';

function toNumber(cell: Cell | undefined): number | null {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (typeof cell === 'string' && cell.trim() !== '') {
    const parsed = Number(cell);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

// Float-typed source columns (passenger_count is 1.0 in some releases)
function toInteger(cell: Cell | undefined): number | null {
  const value = toNumber(cell);
  return value !== null && Number.isInteger(value) ? value : null;
}

/**
 * Projects a materialized table onto typed records. Rows without a
 * taxi_type or extracted_at are not canonical and are rejected.
 */
export function toTripRecords(table: Table): CanonicalTripRecord[] {
  return table.rows.map((row, idx) => {
    const taxiType = row['taxi_type'];
    const extractedAt = parseTimestamp(row['extracted_at'] ?? null);
    if (typeof taxiType !== 'string' || extractedAt === null) {
      throw new Error(
        `Row ${idx + 1} is not canonical: taxi_type and extracted_at are required`
      );
    }
    return {
      taxi_type: createTaxiType(taxiType),
      pickup_datetime: parseTimestamp(row['pickup_datetime'] ?? null),
      dropoff_datetime: parseTimestamp(row['dropoff_datetime'] ?? null),
      pickup_location_id: toInteger(row['pickup_location_id']),
      dropoff_location_id: toInteger(row['dropoff_location_id']),
      passenger_count: toInteger(row['passenger_count']),
      trip_distance: toNumber(row['trip_distance']),
      fare_amount: toNumber(row['fare_amount']),
      total_amount: toNumber(row['total_amount']),
      payment_type: toInteger(row['payment_type']),
      extracted_at: extractedAt,
    };
  });
}
