import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { resolveIngestionConfig } from '@infrastructure/env-config';
import { TRIPS_OUTPUT_DIR, tripsCsvFile } from './config';
import { formatTripTableCsv } from './csv-writer';
import type { IngestionConfigInput } from './ingestion-config';
import {
  type IngestionStats,
  type MaterializeDependencies,
  runTripIngestion,
} from './materialize';

export interface RunIngestTripsOptions {
  readonly config: IngestionConfigInput;
  readonly outputDir?: string; // defaults to data/trips
  readonly deps?: MaterializeDependencies;
}

export interface RunIngestTripsResult {
  readonly outputPath: string;
  readonly rowCount: number;
  readonly extractedAt: string;
  readonly stats: IngestionStats;
}

/**
 * Materializes one window and writes it as CSV. The file is written even
 * when no month had data, so the schema is always present downstream.
 */
export async function runIngestTrips(
  options: RunIngestTripsOptions
): Promise<RunIngestTripsResult> {
  const outDir = options.outputDir || TRIPS_OUTPUT_DIR;
  const result = await runTripIngestion(options.config, options.deps);

  fs.mkdirSync(outDir, { recursive: true });
  const outputPath = path.join(
    outDir,
    path.basename(tripsCsvFile(result.config.startDate, result.config.endDate))
  );
  fs.writeFileSync(outputPath, formatTripTableCsv(result.table));

  return {
    outputPath,
    rowCount: result.table.rows.length,
    extractedAt: result.extractedAt.toISOString(),
    stats: result.stats,
  };
}

// CLI support when executed directly with tsx / node
const isMainModule =
  process.argv[1] && process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  Promise.resolve()
    .then(() => runIngestTrips({ config: resolveIngestionConfig(process.env) }))
    .then((r) => {
      console.log(
        `✅ Wrote ${r.outputPath} (${r.rowCount} rows; ${r.stats.monthsFetched}/${r.stats.monthsAttempted} months fetched, ${r.stats.monthsSkipped} skipped)`
      );
    })
    .catch((err) => {
      console.error('❌ Trip ingestion failed:', err);
      process.exit(1);
    });
}
