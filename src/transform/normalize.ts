/**
 * Atomic normalizer: provider-shaped records -> canonical AtomicObservation
 */

import { formatDate, isIsoDate } from '@/core/time';
import {
  METRIC_FREQUENCIES,
  type AtomicObservation,
  type MetricFrequency,
  type RawRecord,
} from '@/types/factors';

export type MalformedReason = 'missing_entity' | 'missing_date' | 'missing_metric';

export interface NormalizationStats {
  received: number;
  accepted: number;
  rejected: number;
  rejectedByReason: Record<MalformedReason, number>;
  nullValues: number;
  invalidFrequency: number;
}

export interface NormalizationResult {
  observations: AtomicObservation[];
  stats: NormalizationStats;
}

const NULL_TOKENS = new Set(['', 'nan', 'nat', 'none', 'null']);

function firstPresent(record: RawRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }
  return undefined;
}

function toTrimmedString(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const trimmed = String(value).trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function toIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatDate(value);
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (NULL_TOKENS.has(trimmed.toLowerCase())) return null;
  // Timestamps such as 2025-01-31T16:00:00Z keep their calendar date
  const candidate = trimmed.substring(0, 10);
  return isIsoDate(candidate) ? candidate : null;
}

export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (NULL_TOKENS.has(trimmed.toLowerCase())) return null;
    const parsed = Number(trimmed.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toFrequency(value: unknown): { frequency: MetricFrequency; valid: boolean } {
  const raw = toTrimmedString(value);
  if (raw === null) return { frequency: 'unknown', valid: true };
  const lowered = raw.toLowerCase();
  const match = METRIC_FREQUENCIES.find((freq) => freq === lowered);
  return match ? { frequency: match, valid: true } : { frequency: 'unknown', valid: false };
}

function pickValue(record: RawRecord): unknown {
  if ('value' in record) return record.value;
  if ('factor_value' in record) return record.factor_value;
  return record.metric_value;
}

export function normalizeAtomicRecord(
  record: RawRecord
): { observation: AtomicObservation; invalidFrequency: boolean } | { rejected: MalformedReason } {
  const entity = toTrimmedString(firstPresent(record, ['entity_id', 'symbol', 'ticker']));
  if (!entity) return { rejected: 'missing_entity' };

  const observationDate = toIsoDate(firstPresent(record, ['observation_date', 'date', 'as_of']));
  if (!observationDate) return { rejected: 'missing_date' };

  const metricName = toTrimmedString(firstPresent(record, ['metric_name', 'factor_name', 'metric']));
  if (!metricName) return { rejected: 'missing_metric' };

  const { frequency, valid } = toFrequency(
    firstPresent(record, ['metric_frequency', 'frequency', 'period_type'])
  );

  const observation: AtomicObservation = Object.freeze({
    entityId: entity.toUpperCase(),
    observationDate,
    metricName,
    value: toNullableNumber(pickValue(record)),
    source: toTrimmedString(record.source) ?? 'unknown',
    metricFrequency: frequency,
    reportReferenceDate: toIsoDate(
      firstPresent(record, ['report_reference_date', 'source_report_date', 'report_date'])
    ),
  });

  return { observation, invalidFrequency: !valid };
}

export function normalizeAtomicRecords(records: Iterable<RawRecord>): NormalizationResult {
  const observations: AtomicObservation[] = [];
  const stats: NormalizationStats = {
    received: 0,
    accepted: 0,
    rejected: 0,
    rejectedByReason: { missing_entity: 0, missing_date: 0, missing_metric: 0 },
    nullValues: 0,
    invalidFrequency: 0,
  };

  for (const record of records) {
    stats.received += 1;
    const result = normalizeAtomicRecord(record);
    if ('rejected' in result) {
      stats.rejected += 1;
      stats.rejectedByReason[result.rejected] += 1;
      continue;
    }
    if (result.observation.value === null) stats.nullValues += 1;
    if (result.invalidFrequency) stats.invalidFrequency += 1;
    observations.push(result.observation);
  }

  stats.accepted = observations.length;
  return { observations, stats };
}
