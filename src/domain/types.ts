import { ConfigurationError } from './errors';

// Brand types for compile-time safety
export type IsoDate = string & { readonly __brand: 'IsoDate' };
export type TaxiType = string & { readonly __brand: 'TaxiType' };

// Tabular model shared by every pipeline stage
export type Cell = string | number | boolean | Date | null;
export type Row = Readonly<Record<string, Cell>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

// Half-open interval [start, end), both at UTC midnight
export interface FetchWindow {
  readonly start: Date;
  readonly end: Date;
}

// Canonical column order of the materialized trips table
export const CANONICAL_COLUMNS = [
  'taxi_type',
  'pickup_datetime',
  'dropoff_datetime',
  'pickup_location_id',
  'dropoff_location_id',
  'passenger_count',
  'trip_distance',
  'fare_amount',
  'total_amount',
  'payment_type',
  'extracted_at',
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

export interface CanonicalTripRecord {
  readonly taxi_type: TaxiType;
  readonly pickup_datetime: Date | null;
  readonly dropoff_datetime: Date | null;
  readonly pickup_location_id: number | null;
  readonly dropoff_location_id: number | null;
  readonly passenger_count: number | null;
  readonly trip_distance: number | null;
  readonly fare_amount: number | null;
  readonly total_amount: number | null;
  readonly payment_type: number | null; // joins to the payment type lookup
  readonly extracted_at: Date;
}

// Diagnostics sink; console satisfies it
export type Logger = Pick<Console, 'log' | 'warn'>;

// Validation functions
export function isValidIsoDate(input: string): input is IsoDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = utcDate(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isValidTaxiType(input: string): input is TaxiType {
  // Published file prefixes: yellow, green, fhv, fhvhv
  return /^[a-z][a-z0-9_]*$/.test(input);
}

// Factory functions with validation
export function createIsoDate(input: string): IsoDate {
  const trimmed = input.trim();
  if (!isValidIsoDate(trimmed)) {
    throw new ConfigurationError(
      `Invalid date: ${input}. Must be an ISO-8601 calendar date (YYYY-MM-DD).`
    );
  }
  return trimmed;
}

export function createTaxiType(input: string): TaxiType {
  const trimmed = input.trim();
  if (!isValidTaxiType(trimmed)) {
    throw new ConfigurationError(
      `Invalid taxi type: "${input}". Must be lowercase letters, digits or underscores (e.g., "yellow").`
    );
  }
  return trimmed;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear takes them literally
export function utcDate(
  year: number,
  monthIndex: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hours, minutes, seconds, millis);
  return date;
}

export function isoDateToUtc(date: IsoDate): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

export function createFetchWindow(start: IsoDate, end: IsoDate): FetchWindow {
  const window = { start: isoDateToUtc(start), end: isoDateToUtc(end) };
  if (window.start.getTime() > window.end.getTime()) {
    throw new ConfigurationError(
      `Invalid window: start date ${start} is after end date ${end}`
    );
  }
  return Object.freeze(window);
}

export function emptyTable(columns: readonly string[]): Table {
  return { columns: [...columns], rows: [] };
}
