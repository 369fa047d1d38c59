/**
 * Atomic observation persistence
 *
 * Market and alternative atomics share the long factor table; financial
 * atomics live in financial_observations keyed by their report date.
 */

import { getDatabase } from '../db';
import { upsertLongRows, type StoredFactorObservation } from './factor_repo';
import { createChildLogger } from '@/utils/logger';
import type { DateWindow } from '@/core/time';
import { shiftDays } from '@/core/time';
import {
  ALTERNATIVE_METRICS,
  FINANCIAL_METRICS,
  MARKET_METRICS,
  type AtomicObservation,
  type RawRecord,
} from '@/types/factors';

const logger = createChildLogger('atomic_repo');

const DEFAULT_WARMUP_DAYS = 370;

const LONG_TABLE_METRICS: readonly string[] = [...MARKET_METRICS, ...ALTERNATIVE_METRICS];

function isFinancialMetric(metricName: string): boolean {
  return FINANCIAL_METRICS.some((m) => m === metricName);
}

interface FinancialRow {
  entity_id: string;
  report_date: string;
  metric_name: string;
  metric_value: number | null;
  period_type: string;
  as_of: string;
  source: string;
}

interface LongRow {
  entity_id: string;
  observation_date: string;
  factor_name: string;
  factor_value: number | null;
  source: string;
  metric_frequency: string;
  source_report_date: string | null;
}

export interface SaveAtomicResult {
  longRows: number;
  financialRows: number;
  skipped: number;
}

export function saveAtomicObservations(
  observations: readonly AtomicObservation[],
  updatedAt: string = new Date().toISOString()
): SaveAtomicResult {
  const longRows: StoredFactorObservation[] = [];
  const financial: AtomicObservation[] = [];
  let skipped = 0;

  for (const obs of observations) {
    if (isFinancialMetric(obs.metricName)) {
      financial.push(obs);
    } else if (LONG_TABLE_METRICS.includes(obs.metricName)) {
      longRows.push({
        entityId: obs.entityId,
        observationDate: obs.observationDate,
        factorName: obs.metricName,
        factorValue: obs.value,
        source: obs.source,
        metricFrequency: obs.metricFrequency,
        sourceReportDate: obs.reportReferenceDate,
        qualityFlags: [],
        runId: null,
        updatedAt,
      });
    } else {
      skipped += 1;
    }
  }

  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO financial_observations (
      entity_id, report_date, metric_name, metric_value, period_type, as_of, source, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(entity_id, report_date, metric_name) DO UPDATE SET
      metric_value = excluded.metric_value,
      period_type = excluded.period_type,
      as_of = excluded.as_of,
      source = excluded.source,
      updated_at = excluded.updated_at
  `);
  const saveFinancial = db.transaction((batch: readonly AtomicObservation[]) => {
    for (const obs of batch) {
      stmt.run(
        obs.entityId,
        obs.reportReferenceDate ?? obs.observationDate,
        obs.metricName,
        obs.value,
        obs.metricFrequency,
        obs.observationDate,
        obs.source,
        updatedAt
      );
    }
    return batch.length;
  });

  const result: SaveAtomicResult = {
    longRows: upsertLongRows(longRows),
    financialRows: saveFinancial(financial),
    skipped,
  };
  if (skipped > 0) {
    logger.warn({ skipped }, 'Skipped atomics with unknown metric names');
  }
  return result;
}

export interface LoadAtomicOptions {
  entityIds?: string[];
  warmupDays?: number;
}

/**
 * Atomic records for a run window, starting `warmupDays` before the window
 * so trailing windows and carry-forward have history.
 */
export function loadAtomicObservations(window: DateWindow, options: LoadAtomicOptions = {}): RawRecord[] {
  const db = getDatabase();
  const warmStart = shiftDays(window.start, -(options.warmupDays ?? DEFAULT_WARMUP_DAYS));
  const entityIds = options.entityIds ?? [];
  const entityClause =
    entityIds.length > 0 ? `AND entity_id IN (${entityIds.map(() => '?').join(', ')})` : '';

  const longRows = db
    .prepare(
      `SELECT entity_id, observation_date, factor_name, factor_value, source, metric_frequency, source_report_date
       FROM factor_observations
       WHERE factor_name IN (${LONG_TABLE_METRICS.map(() => '?').join(', ')})
         AND observation_date >= ? AND observation_date <= ? ${entityClause}
       ORDER BY entity_id, factor_name, observation_date`
    )
    .all(...LONG_TABLE_METRICS, warmStart, window.end, ...entityIds) as LongRow[];

  const financialRows = db
    .prepare(
      `SELECT entity_id, report_date, metric_name, metric_value, period_type, as_of, source
       FROM financial_observations
       WHERE report_date >= ? AND report_date <= ? ${entityClause}
       ORDER BY entity_id, metric_name, report_date`
    )
    .all(warmStart, window.end, ...entityIds) as FinancialRow[];

  const records: RawRecord[] = [
    ...longRows.map((row) => ({
      entity_id: row.entity_id,
      observation_date: row.observation_date,
      metric_name: row.factor_name,
      value: row.factor_value,
      source: row.source,
      metric_frequency: row.metric_frequency,
      report_reference_date: row.source_report_date,
    })),
    ...financialRows.map((row) => ({
      entity_id: row.entity_id,
      observation_date: row.as_of,
      metric_name: row.metric_name,
      value: row.metric_value,
      source: row.source,
      metric_frequency: row.period_type,
      report_reference_date: row.report_date,
    })),
  ];

  logger.debug(
    { warmStart, end: window.end, long: longRows.length, financial: financialRows.length },
    'Loaded atomic observations'
  );
  return records;
}
