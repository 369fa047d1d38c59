/**
 * Factor Run Script
 * Computes factors for a run date and prints the quality report.
 *
 * Usage:
 *   npx tsx scripts/run_factors.ts [records.json] [--run-date=YYYY-MM-DD]
 *     [--frequency=daily|weekly|monthly|quarterly|annual] [--backfill-years=N]
 *     [--dry-run] [--save-atomics]
 *
 * Without a records file the atomics already stored in the factor database
 * are used.
 */

import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';

dotenv.config();

import { closeDatabase, initializeDatabase } from '../src/data/db';
import { loadAtomicObservations, saveAtomicObservations } from '../src/data/repositories/atomic_repo';
import { getFactorEngineConfig } from '../src/core/config';
import { errorMessage } from '../src/core/errors';
import { formatDate } from '../src/core/time';
import { runFactorPipeline } from '../src/transform/engine';
import { resolveOutputWindow } from '../src/transform/factors';
import { normalizeAtomicRecords } from '../src/transform/normalize';
import { createChildLogger } from '../src/utils/logger';
import type { GridFrequency, RawRecord, RunContext } from '../src/types/factors';

const logger = createChildLogger('run_factors');

const FREQUENCIES: readonly GridFrequency[] = ['daily', 'weekly', 'monthly', 'quarterly', 'annual'];

interface FactorRunCliArgs {
  recordsPath: string | null;
  context: RunContext;
  dryRun: boolean;
  saveAtomics: boolean;
}

function flagValue(name: string): string | undefined {
  const eq = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (eq) return eq.slice(name.length + 1);
  const idx = process.argv.indexOf(name);
  return idx >= 0 ? process.argv[idx + 1] : undefined;
}

function parseCliArgs(): FactorRunCliArgs {
  const positional = process.argv.slice(2).find((arg) => !arg.startsWith('--'));
  const frequencyRaw = flagValue('--frequency') ?? 'daily';
  const frequency = FREQUENCIES.find((f) => f === frequencyRaw);
  if (!frequency) {
    throw new Error(`Unknown --frequency: ${frequencyRaw}`);
  }
  const backfillYears = Number.parseInt(flagValue('--backfill-years') ?? '0', 10);

  return {
    recordsPath: positional ? resolve(process.cwd(), positional) : null,
    context: {
      runDate: flagValue('--run-date') ?? formatDate(new Date()),
      frequency,
      backfillYears: Number.isFinite(backfillYears) ? backfillYears : 0,
    },
    dryRun: process.argv.includes('--dry-run'),
    saveAtomics: process.argv.includes('--save-atomics'),
  };
}

function readRecords(path: string): RawRecord[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array of records in ${path}`);
  }
  return parsed.filter(
    (item): item is RawRecord => typeof item === 'object' && item !== null && !Array.isArray(item)
  );
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  const config = getFactorEngineConfig();
  initializeDatabase();

  let records: RawRecord[];
  if (args.recordsPath) {
    records = readRecords(args.recordsPath);
    if (args.saveAtomics) {
      const saved = saveAtomicObservations(normalizeAtomicRecords(records).observations);
      logger.info(saved, 'Atomic observations stored');
    }
  } else {
    records = loadAtomicObservations(resolveOutputWindow(args.context), {
      warmupDays: config.pipeline.warmupDays,
    });
  }

  const result = await runFactorPipeline(records, args.context, { config, dryRun: args.dryRun });
  console.log(JSON.stringify(result.report, null, 2));
}

main()
  .catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Factor run failed');
    process.exitCode = 1;
  })
  .finally(() => {
    closeDatabase();
  });
