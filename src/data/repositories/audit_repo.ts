/**
 * Pipeline run audit rows
 */

import { getDatabase } from '../db';
import type { AuditRecord, RunStatus } from '@/types/factors';

interface PipelineRunRow {
  run_id: string;
  run_date: string;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  frequency: string;
  backfill_years: number;
  entity_count: number;
  rows_written: number;
  error_message: string | null;
  error_stack: string | null;
  notes: string | null;
}

function toRecord(row: PipelineRunRow): AuditRecord {
  return {
    runId: row.run_id,
    runDate: row.run_date,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    frequency: row.frequency,
    backfillYears: row.backfill_years,
    entityCount: row.entity_count,
    rowsWritten: row.rows_written,
    errorMessage: row.error_message,
    errorStack: row.error_stack,
    notes: row.notes,
  };
}

function toParams(record: AuditRecord): PipelineRunRow {
  return {
    run_id: record.runId,
    run_date: record.runDate,
    status: record.status,
    started_at: record.startedAt,
    finished_at: record.finishedAt,
    frequency: record.frequency,
    backfill_years: record.backfillYears,
    entity_count: record.entityCount,
    rows_written: record.rowsWritten,
    error_message: record.errorMessage,
    error_stack: record.errorStack,
    notes: record.notes,
  };
}

const INSERT_SQL = `
  INSERT INTO pipeline_runs (
    run_id, run_date, status, started_at, finished_at, frequency, backfill_years,
    entity_count, rows_written, error_message, error_stack, notes
  ) VALUES (
    @run_id, @run_date, @status, @started_at, @finished_at, @frequency, @backfill_years,
    @entity_count, @rows_written, @error_message, @error_stack, @notes
  )
  ON CONFLICT(run_id) DO UPDATE SET
    run_date = excluded.run_date,
    status = excluded.status,
    started_at = excluded.started_at,
    finished_at = excluded.finished_at,
    frequency = excluded.frequency,
    backfill_years = excluded.backfill_years,
    entity_count = excluded.entity_count,
    rows_written = excluded.rows_written,
    error_message = excluded.error_message,
    error_stack = excluded.error_stack,
    notes = excluded.notes
`;

export function insertPipelineRun(record: AuditRecord): void {
  getDatabase().prepare(INSERT_SQL).run(toParams(record));
}

/** Returns false when no start row exists for the run. */
export function updatePipelineRun(record: AuditRecord): boolean {
  const result = getDatabase()
    .prepare(
      `UPDATE pipeline_runs
       SET status = @status,
           finished_at = @finished_at,
           entity_count = @entity_count,
           rows_written = @rows_written,
           error_message = @error_message,
           error_stack = @error_stack,
           notes = @notes
       WHERE run_id = @run_id`
    )
    .run(toParams(record));
  return result.changes > 0;
}

export function getPipelineRun(runId: string): AuditRecord | null {
  const row = getDatabase()
    .prepare('SELECT * FROM pipeline_runs WHERE run_id = ?')
    .get(runId) as PipelineRunRow | undefined;
  return row ? toRecord(row) : null;
}

export function listPipelineRuns(limit: number = 20): AuditRecord[] {
  const rows = getDatabase()
    .prepare('SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT ?')
    .all(limit) as PipelineRunRow[];
  return rows.map(toRecord);
}
