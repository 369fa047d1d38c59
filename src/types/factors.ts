/**
 * Shared types for atomic inputs, factor rows and run bookkeeping
 */

export const METRIC_FREQUENCIES = [
  'daily',
  'weekly',
  'monthly',
  'quarterly',
  'annual',
  'unknown',
] as const;

export type MetricFrequency = (typeof METRIC_FREQUENCIES)[number];

export type GridFrequency = Exclude<MetricFrequency, 'unknown'>;

export const MARKET_METRICS = ['adjusted_close_price', 'dividend_per_share'] as const;

export const ALTERNATIVE_METRICS = ['news_sentiment_daily', 'news_article_count_daily'] as const;

export const FINANCIAL_METRICS = [
  'total_debt',
  'short_term_debt',
  'long_term_debt',
  'book_value',
  'shares_outstanding',
  'enterprise_ebitda',
  'enterprise_revenue',
] as const;

export type MarketMetric = (typeof MARKET_METRICS)[number];
export type AlternativeMetric = (typeof ALTERNATIVE_METRICS)[number];
export type FinancialMetric = (typeof FINANCIAL_METRICS)[number];

export const FACTOR_NAMES = [
  'dividend_yield',
  'ebitda_margin',
  'debt_to_equity',
  'pb_ratio',
  'sentiment_30d_avg',
  'article_count_30d',
  'momentum_1m',
  'volatility_20d',
] as const;

export type FactorName = (typeof FACTOR_NAMES)[number];

export const QUALITY_FLAGS = ['stale_price', 'financial_stale', 'data_expired', 'capped'] as const;

export type QualityFlag = (typeof QUALITY_FLAGS)[number];

export const DROP_REASONS = [
  'price_missing',
  'price_unusable',
  'missing_input',
  'non_positive_denominator',
  'non_positive_input',
  'data_expired',
  'insufficient_history',
] as const;

export type DropReason = (typeof DROP_REASONS)[number];

export type RawRecord = Record<string, unknown>;

export interface AtomicObservation {
  readonly entityId: string;
  readonly observationDate: string;
  readonly metricName: string;
  readonly value: number | null;
  readonly source: string;
  readonly metricFrequency: MetricFrequency;
  readonly reportReferenceDate: string | null;
}

export interface FactorObservation {
  entityId: string;
  observationDate: string;
  factorName: FactorName;
  factorValue: number;
  source: string;
  metricFrequency: MetricFrequency;
  sourceReportDate: string | null;
  qualityFlags: QualityFlag[];
}

export interface QualityVerdict {
  keep: boolean;
  flags: Set<QualityFlag>;
  reason?: DropReason;
}

/** Last-known value of one metric for one entity at an as-of date; never persisted. */
export interface AlignmentState {
  entityId: string;
  metricName: string;
  value: number | null;
  referenceDate: string;
  ageDays: number;
}

export interface RunContext {
  runDate: string;
  frequency: GridFrequency;
  backfillYears: number;
  universe?: string[];
  runId?: string;
  factorFrequencies?: Partial<Record<FactorName, GridFrequency>>;
}

export type RunStatus = 'running' | 'success' | 'failed';

export interface AuditRecord {
  runId: string;
  runDate: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  frequency: string;
  backfillYears: number;
  entityCount: number;
  rowsWritten: number;
  errorMessage: string | null;
  errorStack: string | null;
  notes: string | null;
}

export function factorKey(row: Pick<FactorObservation, 'entityId' | 'observationDate' | 'factorName'>): string {
  return `${row.entityId}|${row.observationDate}|${row.factorName}`;
}
