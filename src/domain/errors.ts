export type IngestionErrorType =
  | 'CONFIGURATION'
  | 'TRANSPORT'
  | 'PARQUET_DECODE'
  | 'PARQUET_ENGINE';

/**
 * Base class for failures that abort an ingestion run.
 * Missing months are not errors: the fetcher reports them as an outcome.
 */
export class IngestionError extends Error {
  readonly type: IngestionErrorType;

  constructor(type: IngestionErrorType, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
  }
}

export class ConfigurationError extends IngestionError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class TransportError extends IngestionError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super('TRANSPORT', `Request to ${url} failed: ${describeCause(cause)}`, {
      cause,
    });
    this.url = url;
  }
}

export class ParquetDecodeError extends IngestionError {
  constructor(message: string, cause: unknown) {
    super('PARQUET_DECODE', message, { cause });
  }
}

// DuckDB itself could not be loaded or opened; no payload is at fault
export class ParquetEngineError extends IngestionError {
  constructor(cause: unknown) {
    super(
      'PARQUET_ENGINE',
      `Failed to start the DuckDB Parquet engine: ${describeCause(cause)}`,
      { cause }
    );
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.name === 'AbortError' ? 'request timed out' : cause.message;
  }
  return String(cause);
}
