/**
 * Idempotent writer for factor rows
 */

import { PersistenceError, errorMessage } from '@/core/errors';
import { upsertFactorObservations } from '@/data/repositories/factor_repo';
import { createChildLogger } from '@/utils/logger';
import { factorKey, type FactorObservation } from '@/types/factors';

const logger = createChildLogger('writer');

export interface FactorStore {
  upsert(rows: readonly FactorObservation[], runId: string): number;
}

export const sqliteFactorStore: FactorStore = {
  upsert: (rows, runId) => upsertFactorObservations(rows, runId),
};

/** Keep one row per natural key; a later row replaces an earlier one. */
export function dedupeFactorRows(rows: readonly FactorObservation[]): FactorObservation[] {
  const byKey = new Map<string, FactorObservation>();
  for (const row of rows) {
    const key = factorKey(row);
    // Re-insert so iteration order follows the last occurrence
    byKey.delete(key);
    byKey.set(key, row);
  }
  return Array.from(byKey.values());
}

export function writeFactorObservations(
  rows: readonly FactorObservation[],
  runId: string,
  store: FactorStore = sqliteFactorStore
): number {
  const unique = dedupeFactorRows(rows);
  if (unique.length < rows.length) {
    logger.debug({ dropped: rows.length - unique.length }, 'Collapsed duplicate factor rows');
  }

  try {
    const written = store.upsert(unique, runId);
    logger.info({ runId, written }, 'Factor rows written');
    return written;
  } catch (error) {
    throw new PersistenceError(`Failed to write factor rows: ${errorMessage(error)}`, error);
  }
}
