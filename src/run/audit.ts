/**
 * Audit Recorder
 * One pipeline_runs row per run: written as `running`, then finalized.
 */

import { errorMessage } from '@/core/errors';
import {
  insertPipelineRun,
  updatePipelineRun,
} from '@/data/repositories/audit_repo';
import { createChildLogger } from '@/utils/logger';
import type { AuditRecord, RunStatus } from '@/types/factors';

const logger = createChildLogger('audit');

export interface AuditStore {
  insert(record: AuditRecord): void;
  /** Returns false when there is no row to update. */
  update(record: AuditRecord): boolean;
}

export const sqliteAuditStore: AuditStore = {
  insert: insertPipelineRun,
  update: updatePipelineRun,
};

export interface AuditStart {
  runId: string;
  runDate: string;
  frequency: string;
  backfillYears: number;
}

export interface AuditFinish {
  status: Exclude<RunStatus, 'running'>;
  entityCount: number;
  rowsWritten: number;
  errorMessage?: string | null;
  errorStack?: string | null;
  notes?: unknown;
}

export class AuditRecorder {
  private record: AuditRecord | null = null;

  constructor(
    private readonly store: AuditStore = sqliteAuditStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(params: AuditStart): AuditRecord {
    const record: AuditRecord = {
      ...params,
      status: 'running',
      startedAt: this.now().toISOString(),
      finishedAt: null,
      entityCount: 0,
      rowsWritten: 0,
      errorMessage: null,
      errorStack: null,
      notes: null,
    };
    this.record = record;
    try {
      this.store.insert(record);
    } catch (error) {
      logger.error({ runId: params.runId, error: errorMessage(error) }, 'Audit start write failed');
    }
    return record;
  }

  finish(params: AuditFinish): AuditRecord | null {
    if (!this.record) {
      logger.warn('Audit finish called before start');
      return null;
    }

    const record: AuditRecord = {
      ...this.record,
      status: params.status,
      finishedAt: this.now().toISOString(),
      entityCount: params.entityCount,
      rowsWritten: params.rowsWritten,
      errorMessage: params.errorMessage ?? null,
      errorStack: params.errorStack ?? null,
      notes: params.notes === undefined ? null : JSON.stringify(params.notes),
    };
    this.record = record;

    try {
      if (!this.store.update(record)) {
        this.store.insert(record);
      }
    } catch (error) {
      logger.error({ runId: record.runId, error: errorMessage(error) }, 'Audit finish write failed');
    }
    return record;
  }
}
