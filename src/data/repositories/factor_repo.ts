/**
 * Factor observation repository (long table keyed by entity, date, factor)
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';
import type { FactorObservation } from '@/types/factors';

const logger = createChildLogger('factor_repo');

interface FactorObservationRow {
  entity_id: string;
  observation_date: string;
  factor_name: string;
  factor_value: number | null;
  source: string;
  metric_frequency: string;
  source_report_date: string | null;
  quality_flags: string;
  run_id: string | null;
  updated_at: string;
}

export interface StoredFactorObservation {
  entityId: string;
  observationDate: string;
  factorName: string;
  factorValue: number | null;
  source: string;
  metricFrequency: string;
  sourceReportDate: string | null;
  qualityFlags: string[];
  runId: string | null;
  updatedAt: string;
}

export interface FactorQuery {
  entityIds?: string[];
  factorNames?: string[];
  startDate?: string;
  endDate?: string;
}

const UPSERT_SQL = `
  INSERT INTO factor_observations (
    entity_id, observation_date, factor_name, factor_value, source,
    metric_frequency, source_report_date, quality_flags, run_id, updated_at
  ) VALUES (
    @entity_id, @observation_date, @factor_name, @factor_value, @source,
    @metric_frequency, @source_report_date, @quality_flags, @run_id, @updated_at
  )
  ON CONFLICT(entity_id, observation_date, factor_name) DO UPDATE SET
    factor_value = excluded.factor_value,
    source = excluded.source,
    metric_frequency = excluded.metric_frequency,
    source_report_date = excluded.source_report_date,
    quality_flags = excluded.quality_flags,
    run_id = excluded.run_id,
    updated_at = excluded.updated_at
`;

function parseFlags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((f): f is string => typeof f === 'string') : [];
  } catch (error) {
    logger.warn({ raw, error: String(error) }, 'Unparseable quality_flags column');
    return [];
  }
}

function toStored(row: FactorObservationRow): StoredFactorObservation {
  return {
    entityId: row.entity_id,
    observationDate: row.observation_date,
    factorName: row.factor_name,
    factorValue: row.factor_value,
    source: row.source,
    metricFrequency: row.metric_frequency,
    sourceReportDate: row.source_report_date,
    qualityFlags: parseFlags(row.quality_flags),
    runId: row.run_id,
    updatedAt: row.updated_at,
  };
}

/** Upsert all rows in one transaction; returns the number of statements applied. */
export function upsertFactorObservations(
  rows: readonly FactorObservation[],
  runId: string | null,
  updatedAt: string = new Date().toISOString()
): number {
  if (rows.length === 0) return 0;
  const db = getDatabase();
  const stmt = db.prepare(UPSERT_SQL);

  const tx = db.transaction((batch: readonly FactorObservation[]) => {
    for (const row of batch) {
      stmt.run({
        entity_id: row.entityId,
        observation_date: row.observationDate,
        factor_name: row.factorName,
        factor_value: row.factorValue,
        source: row.source,
        metric_frequency: row.metricFrequency,
        source_report_date: row.sourceReportDate,
        quality_flags: JSON.stringify([...row.qualityFlags].sort()),
        run_id: runId,
        updated_at: updatedAt,
      });
    }
    return batch.length;
  });

  const written = tx(rows);
  logger.debug({ written, runId }, 'Upserted factor observations');
  return written;
}

/** Raw upsert used for atomic market/alternative metrics sharing the long table. */
export function upsertLongRows(rows: readonly StoredFactorObservation[]): number {
  if (rows.length === 0) return 0;
  const db = getDatabase();
  const stmt = db.prepare(UPSERT_SQL);
  const tx = db.transaction((batch: readonly StoredFactorObservation[]) => {
    for (const row of batch) {
      stmt.run({
        entity_id: row.entityId,
        observation_date: row.observationDate,
        factor_name: row.factorName,
        factor_value: row.factorValue,
        source: row.source,
        metric_frequency: row.metricFrequency,
        source_report_date: row.sourceReportDate,
        quality_flags: JSON.stringify(row.qualityFlags),
        run_id: row.runId,
        updated_at: row.updatedAt,
      });
    }
    return batch.length;
  });
  return tx(rows);
}

function placeholders(values: readonly string[]): string {
  return values.map(() => '?').join(', ');
}

export function getFactorObservations(query: FactorQuery = {}): StoredFactorObservation[] {
  const db = getDatabase();
  const clauses: string[] = [];
  const params: string[] = [];

  if (query.entityIds && query.entityIds.length > 0) {
    clauses.push(`entity_id IN (${placeholders(query.entityIds)})`);
    params.push(...query.entityIds);
  }
  if (query.factorNames && query.factorNames.length > 0) {
    clauses.push(`factor_name IN (${placeholders(query.factorNames)})`);
    params.push(...query.factorNames);
  }
  if (query.startDate) {
    clauses.push('observation_date >= ?');
    params.push(query.startDate);
  }
  if (query.endDate) {
    clauses.push('observation_date <= ?');
    params.push(query.endDate);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  const rows = db
    .prepare(
      `SELECT entity_id, observation_date, factor_name, factor_value, source, metric_frequency,
              source_report_date, quality_flags, run_id, updated_at
       FROM factor_observations ${where}
       ORDER BY entity_id, factor_name, observation_date`
    )
    .all(...params) as FactorObservationRow[];

  return rows.map(toStored);
}

export function countFactorObservations(factorNames?: readonly string[]): number {
  const db = getDatabase();
  if (factorNames && factorNames.length > 0) {
    const row = db
      .prepare(
        `SELECT COUNT(*) AS count FROM factor_observations WHERE factor_name IN (${placeholders(factorNames)})`
      )
      .get(...factorNames) as { count: number };
    return row.count;
  }
  const row = db.prepare('SELECT COUNT(*) AS count FROM factor_observations').get() as {
    count: number;
  };
  return row.count;
}
