import {
  type FetchWindow,
  type IsoDate,
  type TaxiType,
  createFetchWindow,
  createIsoDate,
  createTaxiType,
} from '@domain/types';
import { ConfigurationError } from '@domain/errors';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_TAXI_TYPES,
  TRIP_DATA_BASE_URL,
} from './config';

// Plain input record as handed over by a caller or an env adapter
export interface IngestionConfigInput {
  readonly startDate?: string;
  readonly endDate?: string;
  readonly taxiTypes?: readonly string[];
  readonly baseUrl?: string;
  readonly fetchTimeoutMs?: number;
  readonly concurrency?: number;
}

export interface IngestionConfig {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly window: FetchWindow;
  readonly taxiTypes: readonly TaxiType[];
  readonly baseUrl: string;
  readonly fetchTimeoutMs: number;
  readonly concurrency: number;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got ${value}`
    );
  }
  return value;
}

function normalizeBaseUrl(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigurationError(`Invalid base URL: ${raw}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Base URL must use http(s): ${raw}`);
  }
  return raw.replace(/\/+$/, '');
}

function resolveTaxiTypes(raw: readonly string[] | undefined): TaxiType[] {
  const requested = raw ?? DEFAULT_TAXI_TYPES;
  if (requested.length === 0) {
    throw new ConfigurationError('At least one taxi type is required');
  }
  const taxiTypes = requested.map(createTaxiType);
  const duplicates = taxiTypes.filter((t, i) => taxiTypes.indexOf(t) !== i);
  if (duplicates.length > 0) {
    throw new ConfigurationError(
      `Duplicate taxi types: ${[...new Set(duplicates)].join(', ')}`
    );
  }
  return taxiTypes;
}

/**
 * Validates a run configuration. Throws ConfigurationError before any
 * network work can start.
 */
export function createIngestionConfig(
  input: IngestionConfigInput
): IngestionConfig {
  const missing = (['startDate', 'endDate'] as const).filter(
    (field) => !input[field] || input[field]?.trim() === ''
  );
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required window configuration: ${missing.join(', ')}`
    );
  }

  const startDate = createIsoDate(input.startDate ?? '');
  const endDate = createIsoDate(input.endDate ?? '');

  return Object.freeze({
    startDate,
    endDate,
    window: createFetchWindow(startDate, endDate),
    taxiTypes: Object.freeze(resolveTaxiTypes(input.taxiTypes)),
    baseUrl: normalizeBaseUrl(input.baseUrl ?? TRIP_DATA_BASE_URL),
    fetchTimeoutMs: requirePositiveInteger(
      'fetchTimeoutMs',
      input.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    ),
    concurrency: requirePositiveInteger(
      'concurrency',
      input.concurrency ?? DEFAULT_CONCURRENCY
    ),
  });
}
