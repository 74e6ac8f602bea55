// Reads an ingestion run's configuration from environment variables.
// Values are only read and shaped here; createIngestionConfig validates them.
import { ConfigurationError } from '@domain/errors';
import type { IngestionConfigInput } from '@etl/ingestion-config';

export const ENV_KEYS = {
  startDate: 'TRIPS_START_DATE',
  endDate: 'TRIPS_END_DATE',
  taxiTypes: 'TRIPS_TAXI_TYPES',
  baseUrl: 'TRIPS_BASE_URL',
  fetchTimeoutMs: 'TRIPS_FETCH_TIMEOUT_MS',
  concurrency: 'TRIPS_CONCURRENCY',
} as const;

function readString(
  env: Record<string, unknown>,
  key: string
): string | undefined {
  const raw = env[key];
  return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : undefined;
}

function readInteger(
  env: Record<string, unknown>,
  key: string
): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Accepts a JSON array of strings (`["yellow","green"]`) or a comma
 * separated list (`yellow,green`).
 */
export function parseTaxiTypeList(raw: string): string[] {
  if (!raw.startsWith('[')) {
    return raw
      .split(',')
      .map((t) => t.trim())
      .filter((t) => t !== '');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(
      `${ENV_KEYS.taxiTypes} is not valid JSON: ${String(e)}`
    );
  }
  if (
    !Array.isArray(parsed) ||
    !parsed.every((t): t is string => typeof t === 'string')
  ) {
    throw new ConfigurationError(
      `${ENV_KEYS.taxiTypes} must be a JSON array of strings`
    );
  }
  return parsed;
}

export function resolveIngestionConfig(
  env: Record<string, unknown>
): IngestionConfigInput {
  const taxiTypesRaw = readString(env, ENV_KEYS.taxiTypes);
  return {
    startDate: readString(env, ENV_KEYS.startDate),
    endDate: readString(env, ENV_KEYS.endDate),
    taxiTypes:
      taxiTypesRaw === undefined ? undefined : parseTaxiTypeList(taxiTypesRaw),
    baseUrl: readString(env, ENV_KEYS.baseUrl),
    fetchTimeoutMs: readInteger(env, ENV_KEYS.fetchTimeoutMs),
    concurrency: readInteger(env, ENV_KEYS.concurrency),
  };
}
