import type { Logger, Table, TaxiType } from '@domain/types';
import { describeCause } from '@domain/errors';
import {
  readParquet,
  type ParquetDecoder,
} from '@infrastructure/parquet-reader';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  TRIP_DATA_BASE_URL,
  tripDataUrl,
} from './config';

export type FetchLike = (
  url: string,
  init: { readonly signal: AbortSignal }
) => Promise<Response>;

// Outcome of one month's retrieval; the caller decides skip vs abort
export type TripFetchOutcome =
  | {
      readonly kind: 'fetched';
      readonly url: string;
      readonly chunks: AsyncIterable<Table>;
    }
  | {
      readonly kind: 'not-found';
      readonly url: string;
      readonly status: number;
    }
  | {
      readonly kind: 'transport-error';
      readonly url: string;
      readonly cause: unknown;
    };

export interface TripFetcherOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly fetch?: FetchLike;
  readonly decode?: ParquetDecoder;
  readonly logger?: Logger;
}

// Releases the connection behind a response whose body is not read. The
// month is already reported as skipped, so a failure here is only logged.
async function discardBody(
  response: Response,
  url: string,
  logger: Logger
): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.warn(
      `Could not discard response body of ${url}: ${describeCause(error)}`
    );
  }
}

/**
 * Retrieves one monthly Parquet file. Any non-OK status means the month is
 * not available; network failures and timeouts are reported, never thrown.
 * Decoding is lazy: a payload that fails to decode throws ParquetDecodeError
 * while its chunks are read.
 */
export async function fetchTripMonth(
  taxiType: TaxiType,
  monthStart: Date,
  options: TripFetcherOptions = {}
): Promise<TripFetchOutcome> {
  const {
    baseUrl = TRIP_DATA_BASE_URL,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    fetch: fetchFn = fetch,
    decode = readParquet,
    logger = console,
  } = options;
  const url = tripDataUrl(taxiType, monthStart, baseUrl);

  logger.log(`Fetching ${url}`);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  let payload: Uint8Array;
  try {
    const response = await fetchFn(url, { signal: controller.signal });
    if (!response.ok) {
      logger.warn(`Skipping ${url} (status=${response.status})`);
      await discardBody(response, url, logger);
      return { kind: 'not-found', url, status: response.status };
    }
    payload = new Uint8Array(await response.arrayBuffer());
  } catch (cause) {
    return { kind: 'transport-error', url, cause };
  } finally {
    clearTimeout(timeout);
  }

  return { kind: 'fetched', url, chunks: decode(payload) };
}
