/**
 * Quality rule registry
 *
 * One entry per factor. `align` reads the entity timeline as of a date;
 * `evaluate` is a pure function of those aligned inputs and the config and
 * returns the candidate value together with its keep/drop verdict.
 * New factors are added by registering another rule.
 */

import type { FactorEngineConfig } from '@/core/config';
import type { AlignedPrice, AlignedValue, EntityTimeline, WindowSum } from '@/transform/alignment';
import {
  clamp,
  momentum,
  pointIndexAtOrBefore,
  volatility,
  type PricePoint,
  type PriceSeries,
  type SentimentWindowStats,
} from '@/transform/rolling';
import { tradingDaysBetween } from '@/core/time';
import type {
  DropReason,
  FactorName,
  GridFrequency,
  QualityFlag,
  QualityVerdict,
} from '@/types/factors';
import { financialFlags, isStalePrice, latestReferenceDate } from './staleness';

export interface RuleContext {
  readonly entityId: string;
  readonly timeline: EntityTimeline;
  readonly config: FactorEngineConfig;
  priceSeries(): PriceSeries;
  sentimentAt(asOfDate: string): SentimentWindowStats | null;
}

export interface RuleEvaluation {
  value: number | null;
  verdict: QualityVerdict;
  sourceReportDate: string | null;
}

export interface FactorRule<TInputs> {
  factor: FactorName;
  defaultFrequency: GridFrequency;
  /** On a daily grid, evaluate only on the entity's own price dates. */
  tradingDayGrid: boolean;
  align(ctx: RuleContext, asOfDate: string): TInputs;
  evaluate(inputs: TInputs, config: FactorEngineConfig): RuleEvaluation;
}

export interface RegisteredRule {
  factor: FactorName;
  defaultFrequency: GridFrequency;
  tradingDayGrid: boolean;
  run(ctx: RuleContext, asOfDate: string): RuleEvaluation;
}

export type RuleRegistry = Partial<Record<FactorName, RegisteredRule>>;

export function defineRule<TInputs>(rule: FactorRule<TInputs>): RegisteredRule {
  return {
    factor: rule.factor,
    defaultFrequency: rule.defaultFrequency,
    tradingDayGrid: rule.tradingDayGrid,
    run: (ctx, asOfDate) => rule.evaluate(rule.align(ctx, asOfDate), ctx.config),
  };
}

function keep(value: number, sourceReportDate: string | null, flags: QualityFlag[] = []): RuleEvaluation {
  return { value, sourceReportDate, verdict: { keep: true, flags: new Set(flags) } };
}

function drop(reason: DropReason, flags: QualityFlag[] = []): RuleEvaluation {
  return { value: null, sourceReportDate: null, verdict: { keep: false, flags: new Set(flags), reason } };
}

function fundamental(ctx: RuleContext, metric: string, asOfDate: string): AlignedValue | null {
  return ctx.timeline.metric(metric).asOf(asOfDate, {
    lagDays: ctx.config.alignment.publicationLagDays[metric] ?? 0,
    maxLookbackDays: ctx.config.alignment.fundamentalLookbackDays,
  });
}

function price(ctx: RuleContext, asOfDate: string): AlignedPrice | null {
  return ctx.timeline
    .metric('adjusted_close_price')
    .priceAsOf(asOfDate, ctx.config.alignment.priceFallbackTradingDays);
}

function usable(input: AlignedValue | null): input is AlignedValue & { value: number } {
  return input !== null && input.value !== null;
}

/** Shared price checks: missing → drop, non-positive → drop, old → stale_price. */
function checkPrice(
  input: AlignedPrice | null,
  config: FactorEngineConfig
): { ok: true; price: number; flags: QualityFlag[] } | { ok: false; result: RuleEvaluation } {
  if (!input) return { ok: false, result: drop('price_missing') };
  if (input.value === null || input.value <= 0) return { ok: false, result: drop('price_unusable') };
  const flags: QualityFlag[] = isStalePrice(input, config.alignment.stalePriceTradingDays)
    ? ['stale_price']
    : [];
  return { ok: true, price: input.value, flags };
}

export interface DividendYieldInputs {
  price: AlignedPrice | null;
  dividends: WindowSum;
}

export const dividendYieldRule: FactorRule<DividendYieldInputs> = {
  factor: 'dividend_yield',
  defaultFrequency: 'monthly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => {
    const aligned = price(ctx, asOfDate);
    // Trailing dividends end at the price date, not the as-of date
    return {
      price: aligned,
      dividends: ctx.timeline
        .metric('dividend_per_share')
        .windowSum(aligned?.referenceDate ?? asOfDate, ctx.config.dividends.trailingDays),
    };
  },
  evaluate: (inputs, config) => {
    const checked = checkPrice(inputs.price, config);
    if (!checked.ok) return checked.result;
    // No dividends in the trailing window is a genuine zero yield
    const trailing = inputs.dividends.count === 0 ? 0 : inputs.dividends.total;
    return keep(trailing / checked.price, inputs.price?.referenceDate ?? null, checked.flags);
  },
};

export interface EbitdaMarginInputs {
  ebitda: AlignedValue | null;
  revenue: AlignedValue | null;
}

export const ebitdaMarginRule: FactorRule<EbitdaMarginInputs> = {
  factor: 'ebitda_margin',
  defaultFrequency: 'quarterly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => ({
    ebitda: fundamental(ctx, 'enterprise_ebitda', asOfDate),
    revenue: fundamental(ctx, 'enterprise_revenue', asOfDate),
  }),
  evaluate: ({ ebitda, revenue }, config) => {
    if (!usable(ebitda) || !usable(revenue)) return drop('missing_input');
    const { tier, flags } = financialFlags([ebitda, revenue], config.staleness);
    if (tier === 'expired') return drop('data_expired', flags);
    if (revenue.value <= 0) return drop('non_positive_denominator', flags);
    return keep(ebitda.value / revenue.value, latestReferenceDate([ebitda, revenue]), flags);
  },
};

export interface DebtToEquityInputs {
  totalDebt: AlignedValue | null;
  shortTermDebt: AlignedValue | null;
  longTermDebt: AlignedValue | null;
  equity: AlignedValue | null;
}

/** Total debt, or the sum of whichever debt components are reported. */
export function resolveDebt(
  inputs: Pick<DebtToEquityInputs, 'totalDebt' | 'shortTermDebt' | 'longTermDebt'>
): { value: number; used: AlignedValue[] } | null {
  if (usable(inputs.totalDebt)) {
    return { value: inputs.totalDebt.value, used: [inputs.totalDebt] };
  }
  const components = [inputs.shortTermDebt, inputs.longTermDebt].filter(usable);
  if (components.length === 0) return null;
  return {
    value: components.reduce((sum, c) => sum + c.value, 0),
    used: components,
  };
}

export const debtToEquityRule: FactorRule<DebtToEquityInputs> = {
  factor: 'debt_to_equity',
  defaultFrequency: 'quarterly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => ({
    totalDebt: fundamental(ctx, 'total_debt', asOfDate),
    shortTermDebt: fundamental(ctx, 'short_term_debt', asOfDate),
    longTermDebt: fundamental(ctx, 'long_term_debt', asOfDate),
    equity: fundamental(ctx, 'book_value', asOfDate),
  }),
  evaluate: (inputs, config) => {
    const debt = resolveDebt(inputs);
    const { equity } = inputs;
    if (!debt || !usable(equity)) return drop('missing_input');
    const used = [...debt.used, equity];
    const { tier, flags } = financialFlags(used, config.staleness);
    if (tier === 'expired') return drop('data_expired', flags);
    if (equity.value <= 0) return drop('non_positive_denominator', flags);
    return keep(debt.value / equity.value, latestReferenceDate(used), flags);
  },
};

export interface PbRatioInputs {
  price: AlignedPrice | null;
  shares: AlignedValue | null;
  equity: AlignedValue | null;
}

export const pbRatioRule: FactorRule<PbRatioInputs> = {
  factor: 'pb_ratio',
  defaultFrequency: 'monthly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => ({
    price: price(ctx, asOfDate),
    shares: fundamental(ctx, 'shares_outstanding', asOfDate),
    equity: fundamental(ctx, 'book_value', asOfDate),
  }),
  evaluate: (inputs, config) => {
    const checked = checkPrice(inputs.price, config);
    if (!checked.ok) return checked.result;
    const { shares, equity } = inputs;
    if (!usable(shares) || !usable(equity)) return drop('missing_input', checked.flags);

    const { tier, flags: financial } = financialFlags([shares, equity], config.staleness);
    const flags = [...checked.flags, ...financial];
    if (tier === 'expired') return drop('data_expired', flags);
    if (shares.value <= 0) return drop('non_positive_input', flags);
    if (equity.value <= 0) return drop('non_positive_denominator', flags);

    const marketCap = checked.price * shares.value;
    return keep(marketCap / equity.value, inputs.price?.referenceDate ?? null, flags);
  },
};

export interface SentimentInputs {
  window: SentimentWindowStats | null;
}

export const sentimentAverageRule: FactorRule<SentimentInputs> = {
  factor: 'sentiment_30d_avg',
  defaultFrequency: 'monthly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => ({ window: ctx.sentimentAt(asOfDate) }),
  evaluate: ({ window }, config) => {
    if (!window || window.articleCount === 0) return keep(0, null);
    return keep(
      clamp(window.mean, config.sentiment.clampMin, config.sentiment.clampMax),
      window.latestArticleDate
    );
  },
};

export const articleCountRule: FactorRule<SentimentInputs> = {
  factor: 'article_count_30d',
  defaultFrequency: 'monthly',
  tradingDayGrid: false,
  align: (ctx, asOfDate) => ({ window: ctx.sentimentAt(asOfDate) }),
  evaluate: ({ window }) => {
    if (!window) return keep(0, null);
    return keep(window.articleCount, window.latestArticleDate);
  },
};

export interface PriceHistoryInputs {
  /** Prices up to and including the anchor, oldest first. */
  history: PricePoint[];
  anchorFound: boolean;
}

function priceHistory(ctx: RuleContext, asOfDate: string, depth: number): PriceHistoryInputs {
  const { points } = ctx.priceSeries();
  const idx = pointIndexAtOrBefore(points, asOfDate);
  if (idx < 0) return { history: [], anchorFound: false };
  const anchor = points[idx];
  if (tradingDaysBetween(anchor.date, asOfDate) > ctx.config.alignment.priceFallbackTradingDays) {
    return { history: [], anchorFound: false };
  }
  return { history: points.slice(Math.max(0, idx - depth), idx + 1), anchorFound: true };
}

export const momentumRule: FactorRule<PriceHistoryInputs> = {
  factor: 'momentum_1m',
  defaultFrequency: 'daily',
  tradingDayGrid: true,
  align: (ctx, asOfDate) => priceHistory(ctx, asOfDate, ctx.config.momentum.lookbackTradingDays),
  evaluate: ({ history, anchorFound }, config) => {
    if (!anchorFound) return drop('price_missing');
    const value = momentum(history, config.momentum.lookbackTradingDays);
    if (value === null) return drop('insufficient_history');
    return keep(value, history[history.length - 1].date);
  },
};

export const volatilityRule: FactorRule<PriceHistoryInputs> = {
  factor: 'volatility_20d',
  defaultFrequency: 'daily',
  tradingDayGrid: true,
  align: (ctx, asOfDate) => priceHistory(ctx, asOfDate, ctx.config.volatility.windowTradingDays),
  evaluate: ({ history, anchorFound }, config) => {
    if (!anchorFound) return drop('price_missing');
    const value = volatility(history, config.volatility.windowTradingDays);
    if (value === null) return drop('insufficient_history');
    return keep(value, history[history.length - 1].date);
  },
};

export const FACTOR_RULES: RuleRegistry = {
  dividend_yield: defineRule(dividendYieldRule),
  ebitda_margin: defineRule(ebitdaMarginRule),
  debt_to_equity: defineRule(debtToEquityRule),
  pb_ratio: defineRule(pbRatioRule),
  sentiment_30d_avg: defineRule(sentimentAverageRule),
  article_count_30d: defineRule(articleCountRule),
  momentum_1m: defineRule(momentumRule),
  volatility_20d: defineRule(volatilityRule),
};
