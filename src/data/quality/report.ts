/**
 * Run quality report: per-rule tallies merged at fan-in plus row-level counts
 */

import type { NormalizationStats } from '@/transform/normalize';
import {
  DROP_REASONS,
  FACTOR_NAMES,
  QUALITY_FLAGS,
  type DropReason,
  type FactorName,
  type FactorObservation,
  type QualityFlag,
  type QualityVerdict,
} from '@/types/factors';
import type { CapSummary } from './capping';
import type { ContractReport } from './contract';

export interface RuleTally {
  evaluated: number;
  kept: number;
  dropped: number;
  dropReasons: Partial<Record<DropReason, number>>;
  flags: Partial<Record<QualityFlag, number>>;
}

export type FactorTallies = Partial<Record<FactorName, RuleTally>>;

export interface EntityError {
  entityId: string;
  message: string;
}

export interface QualityReport {
  runId: string;
  runDate: string;
  entityCount: number;
  entityFailures: number;
  rowCount: number;
  staleCount: number;
  expiredCount: number;
  droppedCount: number;
  cappedCount: number;
  invalidPricePoints: number;
  outOfUniverse: number;
  normalization: NormalizationStats;
  byFactor: FactorTallies;
  caps: CapSummary[];
  contract: ContractReport;
  entityErrors: EntityError[];
}

export function emptyTally(): RuleTally {
  return { evaluated: 0, kept: 0, dropped: 0, dropReasons: {}, flags: {} };
}

function bump<K extends string>(counts: Partial<Record<K, number>>, key: K, by: number = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

export function recordVerdict(tallies: FactorTallies, factor: FactorName, verdict: QualityVerdict): void {
  let tally = tallies[factor];
  if (!tally) {
    tally = emptyTally();
    tallies[factor] = tally;
  }
  tally.evaluated += 1;
  if (verdict.keep) {
    tally.kept += 1;
  } else {
    tally.dropped += 1;
    if (verdict.reason) bump(tally.dropReasons, verdict.reason);
  }
  for (const flag of verdict.flags) {
    bump(tally.flags, flag);
  }
}

export function mergeTallies(target: FactorTallies, source: FactorTallies): FactorTallies {
  for (const name of FACTOR_NAMES) {
    const tally = source[name];
    if (!tally) continue;
    const into = target[name] ?? emptyTally();
    into.evaluated += tally.evaluated;
    into.kept += tally.kept;
    into.dropped += tally.dropped;
    for (const reason of DROP_REASONS) {
      const count = tally.dropReasons[reason];
      if (count) bump(into.dropReasons, reason, count);
    }
    for (const flag of QUALITY_FLAGS) {
      const count = tally.flags[flag];
      if (count) bump(into.flags, flag, count);
    }
    target[name] = into;
  }
  return target;
}

export interface QualityReportInput {
  runId: string;
  runDate: string;
  entityCount: number;
  rows: readonly FactorObservation[];
  tallies: FactorTallies;
  caps: CapSummary[];
  contract: ContractReport;
  normalization: NormalizationStats;
  outOfUniverse: number;
  invalidPricePoints: number;
  entityErrors: EntityError[];
}

export function buildQualityReport(input: QualityReportInput): QualityReport {
  let droppedCount = 0;
  let expiredCount = 0;
  for (const tally of Object.values(input.tallies)) {
    if (!tally) continue;
    droppedCount += tally.dropped;
    expiredCount += tally.dropReasons.data_expired ?? 0;
  }

  const hasFlag = (row: FactorObservation, flag: QualityFlag): boolean => row.qualityFlags.includes(flag);

  return {
    runId: input.runId,
    runDate: input.runDate,
    entityCount: input.entityCount,
    entityFailures: input.entityErrors.length,
    rowCount: input.rows.length,
    staleCount: input.rows.filter((r) => hasFlag(r, 'financial_stale') || hasFlag(r, 'stale_price')).length,
    expiredCount,
    droppedCount,
    cappedCount: input.rows.filter((r) => hasFlag(r, 'capped')).length,
    invalidPricePoints: input.invalidPricePoints,
    outOfUniverse: input.outOfUniverse,
    normalization: input.normalization,
    byFactor: input.tallies,
    caps: input.caps,
    contract: input.contract,
    entityErrors: input.entityErrors,
  };
}

/** Compact form stored in the audit row's notes column. */
export function summarizeReport(report: QualityReport): Record<string, number | boolean> {
  return {
    row_count: report.rowCount,
    stale_count: report.staleCount,
    expired_count: report.expiredCount,
    dropped_count: report.droppedCount,
    capped_count: report.cappedCount,
    entity_failures: report.entityFailures,
    invalid_price_points: report.invalidPricePoints,
    rejected_records: report.normalization.rejected,
    out_of_universe: report.outOfUniverse,
    contract_passed: report.contract.passed,
  };
}
