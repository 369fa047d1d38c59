/**
 * Output contract check for factor rows about to be written
 */

import { METRIC_FREQUENCIES, factorKey, type FactorObservation } from '@/types/factors';

export const ALLOWED_SOURCES = ['factor_transform'] as const;

export interface ContractReport {
  rowCount: number;
  nullValues: number;
  duplicates: number;
  missingRequired: number;
  invalidFrequency: number;
  nonFinite: number;
  unknownSource: number;
  passed: boolean;
}

function isMissingRequired(row: FactorObservation): boolean {
  return !row.entityId || !row.observationDate || !row.factorName || !row.source || !row.metricFrequency;
}

export function checkOutputContract(rows: readonly FactorObservation[]): ContractReport {
  const seen = new Set<string>();
  const report: ContractReport = {
    rowCount: rows.length,
    nullValues: 0,
    duplicates: 0,
    missingRequired: 0,
    invalidFrequency: 0,
    nonFinite: 0,
    unknownSource: 0,
    passed: false,
  };

  for (const row of rows) {
    const value: number | null = row.factorValue;
    if (value === null) {
      report.nullValues += 1;
    } else if (!Number.isFinite(value)) {
      report.nonFinite += 1;
    }
    if (isMissingRequired(row)) report.missingRequired += 1;
    if (!METRIC_FREQUENCIES.some((f) => f === row.metricFrequency)) report.invalidFrequency += 1;
    if (!ALLOWED_SOURCES.some((s) => s === row.source)) report.unknownSource += 1;

    const key = factorKey(row);
    if (seen.has(key)) {
      report.duplicates += 1;
    } else {
      seen.add(key);
    }
  }

  report.passed =
    report.missingRequired === 0 &&
    report.invalidFrequency === 0 &&
    report.nullValues === 0 &&
    report.nonFinite === 0;
  return report;
}
