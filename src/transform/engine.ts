/**
 * Factor pipeline orchestrator
 *
 * normalize → per-entity fan-out → barrier → cross-sectional caps →
 * quality report → upsert → audit. Entity failures are isolated; only
 * persistence errors and cancellation escape, after the audit row is final.
 */

import { randomUUID } from 'crypto';
import { setImmediate as nextTick } from 'timers/promises';
import { getFactorEngineConfig, type FactorEngineConfig } from '@/core/config';
import {
  PersistenceError,
  RunCancelledError,
  RunContextError,
  errorMessage,
  errorStack,
} from '@/core/errors';
import { getRunId, parseDate } from '@/core/time';
import { applyCrossSectionalCaps } from '@/data/quality/capping';
import { checkOutputContract } from '@/data/quality/contract';
import {
  buildQualityReport,
  mergeTallies,
  summarizeReport,
  type EntityError,
  type FactorTallies,
  type QualityReport,
} from '@/data/quality/report';
import { FACTOR_RULES, type RuleRegistry } from '@/data/quality/rules';
import { AuditRecorder } from '@/run/audit';
import { sqliteFactorStore, writeFactorObservations, type FactorStore } from '@/run/writer';
import { createChildLogger } from '@/utils/logger';
import { validateRunContext } from '@/validation/ajv_instance';
import type { AtomicObservation, FactorObservation, RawRecord, RunContext } from '@/types/factors';
import { buildFactorPlan, computeEntityFactors } from './factors';
import { normalizeAtomicRecords } from './normalize';

const logger = createChildLogger('factor_engine');

export interface FactorPipelineOptions {
  config?: FactorEngineConfig;
  store?: FactorStore;
  audit?: AuditRecorder;
  registry?: RuleRegistry;
  dryRun?: boolean;
  signal?: AbortSignal;
  maxConcurrency?: number;
}

export interface FactorPipelineResult {
  runId: string;
  context: RunContext;
  rows: FactorObservation[];
  report: QualityReport;
  rowsWritten: number;
  dryRun: boolean;
}

/** Run-scoped state handed to every stage; nothing here lives at module level. */
interface RunState {
  runId: string;
  context: RunContext;
  config: FactorEngineConfig;
  tallies: FactorTallies;
  candidates: FactorObservation[];
  entityErrors: EntityError[];
  invalidPricePoints: number;
  entitiesProcessed: number;
}

/** A caller-supplied id wins; otherwise every run gets its own audit identity. */
export function deriveRunId(context: RunContext): string {
  if (context.runId) return context.runId;
  return getRunId(parseDate(context.runDate), randomUUID());
}

function validateContext(context: RunContext): RunContext {
  const result = validateRunContext(context);
  if (!result.valid) {
    throw new RunContextError('Invalid run context', result.errors);
  }
  return result.data;
}

function groupByEntity(observations: readonly AtomicObservation[]): Map<string, AtomicObservation[]> {
  const groups = new Map<string, AtomicObservation[]>();
  for (const obs of observations) {
    const bucket = groups.get(obs.entityId);
    if (bucket) {
      bucket.push(obs);
    } else {
      groups.set(obs.entityId, [obs]);
    }
  }
  return groups;
}

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T) => Promise<void>,
  concurrency: number,
  shouldStop: () => boolean = () => false
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: Math.max(1, concurrency) }, async () => {
    while (index < items.length && !shouldStop()) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}

export async function runFactorPipeline(
  records: Iterable<RawRecord>,
  context: RunContext,
  options: FactorPipelineOptions = {}
): Promise<FactorPipelineResult> {
  const validated = validateContext(context);
  const config = options.config ?? getFactorEngineConfig();
  const store = options.store ?? sqliteFactorStore;
  const audit = options.audit ?? new AuditRecorder();
  const dryRun = options.dryRun ?? false;
  const signal = options.signal;

  const state: RunState = {
    runId: deriveRunId(validated),
    context: validated,
    config,
    tallies: {},
    candidates: [],
    entityErrors: [],
    invalidPricePoints: 0,
    entitiesProcessed: 0,
  };
  const runLogger = logger.child({ runId: state.runId });

  audit.start({
    runId: state.runId,
    runDate: validated.runDate,
    frequency: validated.frequency,
    backfillYears: validated.backfillYears,
  });
  runLogger.info(
    { runDate: validated.runDate, frequency: validated.frequency, backfillYears: validated.backfillYears, dryRun },
    'Factor run started'
  );

  let rowsWritten = 0;
  let report: QualityReport | null = null;
  let failure: unknown = null;

  try {
    const { observations, stats } = normalizeAtomicRecords(records);
    const universe = validated.universe ? new Set(validated.universe.map((e) => e.trim().toUpperCase())) : null;
    const inUniverse = universe ? observations.filter((o) => universe.has(o.entityId)) : observations;
    const outOfUniverse = observations.length - inUniverse.length;

    const groups = groupByEntity(inUniverse);
    const entityIds = Array.from(groups.keys()).sort();
    const { window, plan } = buildFactorPlan(validated, config, options.registry ?? FACTOR_RULES);
    runLogger.debug({ window, entities: entityIds.length, factors: plan.length }, 'Factor plan built');

    const concurrency = Math.min(
      options.maxConcurrency ?? config.pipeline.maxConcurrency,
      Math.max(1, entityIds.length)
    );

    await runWithConcurrency(
      entityIds,
      async (entityId) => {
        // Let abort signals and other I/O through between entities
        await nextTick();
        if (signal?.aborted) return;
        try {
          const result = computeEntityFactors(entityId, groups.get(entityId) ?? [], window, { plan, config });
          // Fan-in: merge per-entity results into run state
          state.candidates.push(...result.candidates);
          mergeTallies(state.tallies, result.tallies);
          state.invalidPricePoints += result.invalidPricePoints;
          runLogger.debug({ entityId, rows: result.candidates.length }, 'Entity factors computed');
        } catch (error) {
          const message = errorMessage(error);
          state.entityErrors.push({ entityId, message });
          runLogger.error({ entityId, error: message }, 'Entity factor computation failed');
        } finally {
          state.entitiesProcessed += 1;
        }
      },
      concurrency,
      () => signal?.aborted ?? false
    );

    if (signal?.aborted) {
      throw new RunCancelledError(state.runId);
    }

    const { rows, caps } = applyCrossSectionalCaps(state.candidates, config.capping);
    rows.sort(
      (a, b) =>
        a.entityId.localeCompare(b.entityId) ||
        a.factorName.localeCompare(b.factorName) ||
        a.observationDate.localeCompare(b.observationDate)
    );
    const contract = checkOutputContract(rows);

    report = buildQualityReport({
      runId: state.runId,
      runDate: validated.runDate,
      entityCount: entityIds.length,
      rows,
      tallies: state.tallies,
      caps,
      contract,
      normalization: stats,
      outOfUniverse,
      invalidPricePoints: state.invalidPricePoints,
      entityErrors: state.entityErrors,
    });

    if (!contract.passed) {
      runLogger.warn({ contract }, 'Output contract check failed');
    }

    if (!dryRun) {
      rowsWritten = writeFactorObservations(rows, state.runId, store);
    }

    runLogger.info(
      { rows: rows.length, rowsWritten, dropped: report.droppedCount, entityFailures: report.entityFailures },
      'Factor run finished'
    );

    return { runId: state.runId, context: validated, rows, report, rowsWritten, dryRun };
  } catch (error) {
    failure = error;
    if (error instanceof RunCancelledError) {
      runLogger.warn({ processed: state.entitiesProcessed }, 'Factor run cancelled');
    } else if (error instanceof PersistenceError) {
      runLogger.error({ error: error.message }, 'Factor run aborted by writer failure');
    } else {
      runLogger.error({ error: errorMessage(error) }, 'Factor run failed');
    }
    throw error;
  } finally {
    const entityMessage =
      state.entityErrors.length > 0
        ? state.entityErrors.map((e) => `${e.entityId}: ${e.message}`).join('; ')
        : null;
    audit.finish({
      status: failure === null ? 'success' : 'failed',
      entityCount: state.entitiesProcessed,
      rowsWritten,
      errorMessage: failure === null ? entityMessage : errorMessage(failure),
      errorStack: failure === null ? null : errorStack(failure),
      notes: report ? summarizeReport(report) : undefined,
    });
  }
}
