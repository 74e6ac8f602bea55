// Centralized ETL configuration for trip-data locations & defaults.
// Tests and the ingestion runner rely on these for consistent URLs and paths.
import type { IsoDate, TaxiType } from '@domain/types';

export const TRIP_DATA_BASE_URL =
  'https://d37ci6vzurychx.cloudfront.net/trip-data';

export const DEFAULT_TAXI_TYPES: readonly string[] = ['yellow'];

// One attempt per month; no retry
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;
export const DEFAULT_CONCURRENCY = 1;

export const TRIPS_OUTPUT_DIR = 'data/trips';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatMonth(monthStart: Date): string {
  const year = pad(monthStart.getUTCFullYear(), 4);
  return `${year}-${pad(monthStart.getUTCMonth() + 1)}`;
}

export function formatIsoDate(date: Date): string {
  return `${formatMonth(date)}-${pad(date.getUTCDate())}`;
}

// Canonical monthly file URL: <base>/<type>_tripdata_<YYYY>-<MM>.parquet
export function tripDataUrl(
  taxiType: TaxiType,
  monthStart: Date,
  baseUrl: string = TRIP_DATA_BASE_URL
): string {
  return `${baseUrl}/${taxiType}_tripdata_${formatMonth(monthStart)}.parquet`;
}

export function tripsCsvFile(
  startDate: IsoDate,
  endDate: IsoDate,
  dir: string = TRIPS_OUTPUT_DIR
): string {
  return `${dir}/trips-${startDate}_${endDate}.csv`;
}
