import {
  CANONICAL_COLUMNS,
  type Cell,
  type Logger,
  type Row,
  type Table,
  type TaxiType,
  emptyTable,
} from '@domain/types';
import { TransportError } from '@domain/errors';
import type { ParquetDecoder } from '@infrastructure/parquet-reader';
import { tripDataUrl } from './config';
import {
  type IngestionConfig,
  type IngestionConfigInput,
  createIngestionConfig,
} from './ingestion-config';
import { monthStarts } from './month-window';
import { normalizeTripSchema } from './schema-normalizer';
import { type FetchLike, fetchTripMonth } from './trip-fetcher';
import { filterToWindow } from './window-filter';

// Collaborators; every field defaults to the real implementation
export interface MaterializeDependencies {
  readonly fetch?: FetchLike;
  readonly decode?: ParquetDecoder;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

// One (taxi type, month) fetch unit
export interface FetchUnit {
  readonly taxiType: TaxiType;
  readonly monthStart: Date;
  readonly url: string;
}

// Run statistics for observability
export interface IngestionStats {
  readonly monthsAttempted: number;
  readonly monthsFetched: number;
  readonly monthsSkipped: number;
  readonly monthsEmpty: number;
  readonly rowsFetched: number;
  readonly rowsKept: number;
}

export interface IngestionRunResult {
  readonly config: IngestionConfig;
  readonly table: Table;
  readonly extractedAt: Date;
  readonly stats: IngestionStats;
}

interface UnitResult {
  readonly fetched: boolean;
  readonly rowsFetched: number;
  readonly table: Table | null;
}

/**
 * Units in encounter order: taxi-type major, then chronological months.
 */
export function planFetchUnits(config: IngestionConfig): FetchUnit[] {
  const { start, end } = config.window;
  return config.taxiTypes.flatMap((taxiType) =>
    Array.from(monthStarts(start, end), (monthStart) => ({
      taxiType,
      monthStart,
      url: tripDataUrl(taxiType, monthStart, config.baseUrl),
    }))
  );
}

async function processUnit(
  unit: FetchUnit,
  config: IngestionConfig,
  deps: MaterializeDependencies
): Promise<UnitResult> {
  const outcome = await fetchTripMonth(unit.taxiType, unit.monthStart, {
    baseUrl: config.baseUrl,
    timeoutMs: config.fetchTimeoutMs,
    fetch: deps.fetch,
    decode: deps.decode,
    logger: deps.logger,
  });

  switch (outcome.kind) {
    case 'not-found':
      return { fetched: false, rowsFetched: 0, table: null };
    case 'transport-error':
      throw new TransportError(outcome.url, outcome.cause);
    case 'fetched': {
      // Chunks are normalized and filtered as they arrive so only kept rows
      // accumulate; a raw month never sits in memory as a whole.
      let rowsFetched = 0;
      let columns: readonly string[] | null = null;
      const rows: Row[] = [];
      for await (const chunk of outcome.chunks) {
        rowsFetched += chunk.rows.length;
        if (chunk.rows.length === 0) continue;
        const kept = filterToWindow(
          normalizeTripSchema(chunk, unit.taxiType),
          config.window
        );
        if (!columns) columns = kept.columns;
        for (const row of kept.rows) rows.push(row);
      }
      return {
        fetched: true,
        rowsFetched,
        table: columns && rows.length > 0 ? { columns, rows } : null,
      };
    }
  }
}

/**
 * Concatenates per-month tables in the given order, stamping every row with
 * extractedAt. The canonical columns come first (null where a source lacks
 * one), followed by any extra source columns in first-seen order.
 */
export function concatenateTripTables(
  tables: readonly Table[],
  extractedAt: Date
): Table {
  if (tables.length === 0) {
    return emptyTable(CANONICAL_COLUMNS);
  }

  const columns: string[] = [...CANONICAL_COLUMNS];
  const seen = new Set<string>(columns);
  for (const table of tables) {
    for (const column of table.columns) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }

  const rows = tables.flatMap((table) =>
    table.rows.map((row): Row => {
      const out: Record<string, Cell> = {};
      for (const column of columns) {
        out[column] = row[column] ?? null;
      }
      out['extracted_at'] = extractedAt;
      return out;
    })
  );

  return { columns, rows };
}

/**
 * Fetches, normalizes and filters every (taxi type, month) unit of the
 * window. Missing months are skipped; a transport failure aborts the run.
 * Units are processed in batches of config.concurrency, but results are
 * collected per slot so the output order never depends on timing.
 */
export async function runTripIngestion(
  input: IngestionConfigInput,
  deps: MaterializeDependencies = {}
): Promise<IngestionRunResult> {
  const config = createIngestionConfig(input);
  const units = planFetchUnits(config);

  const results: UnitResult[] = [];
  for (let i = 0; i < units.length; i += config.concurrency) {
    const batch = units.slice(i, i + config.concurrency);
    results.push(
      ...(await Promise.all(
        batch.map((unit) => processUnit(unit, config, deps))
      ))
    );
  }

  const tables = results.flatMap((r) => (r.table ? [r.table] : []));
  const extractedAt = (deps.now ?? (() => new Date()))();
  const table = concatenateTripTables(tables, extractedAt);

  const monthsFetched = results.filter((r) => r.fetched).length;
  return {
    config,
    table,
    extractedAt,
    stats: {
      monthsAttempted: units.length,
      monthsFetched,
      monthsSkipped: units.length - monthsFetched,
      monthsEmpty: results.filter((r) => r.fetched && !r.table)
        .length,
      rowsFetched: results.reduce((sum, r) => sum + r.rowsFetched, 0),
      rowsKept: table.rows.length,
    },
  };
}

/**
 * Materializes the canonical trips table for one window.
 */
export async function materializeTrips(
  input: IngestionConfigInput,
  deps: MaterializeDependencies = {}
): Promise<Table> {
  const { table } = await runTripIngestion(input, deps);
  return table;
}
