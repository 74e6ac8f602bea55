#!/usr/bin/env tsx
// Dry run: prints the monthly file URLs a configured window would fetch.
// Use relative imports because scripts are outside src/ rootDir.
import { resolveIngestionConfig } from '../src/infrastructure/env-config';
import { createIngestionConfig } from '../src/etl/ingestion-config';
import { planFetchUnits } from '../src/etl/materialize';

try {
  const config = createIngestionConfig(resolveIngestionConfig(process.env));
  const units = planFetchUnits(config);
  for (const unit of units) {
    console.log(unit.url);
  }
  console.log(
    `${units.length} file(s) for [${config.startDate}, ${config.endDate}) across ${config.taxiTypes.join(', ')}`
  );
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
