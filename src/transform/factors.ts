/**
 * Factor computation for a single entity
 *
 * Builds the output grid per factor, runs each registered rule on every grid
 * date and keeps the rows the rules accept. Cross-sectional work happens in
 * the orchestrator after every entity is done.
 */

import type { FactorEngineConfig } from '@/core/config';
import {
  backfillWindow,
  periodEnds,
  type DateWindow,
} from '@/core/time';
import { recordVerdict, type FactorTallies } from '@/data/quality/report';
import { FACTOR_RULES, type RegisteredRule, type RuleContext, type RuleRegistry } from '@/data/quality/rules';
import type {
  AtomicObservation,
  FactorName,
  FactorObservation,
  GridFrequency,
  RunContext,
} from '@/types/factors';
import { EntityTimeline } from './alignment';
import { buildPriceSeries, sentimentWindows, type PriceSeries, type SentimentWindowStats } from './rolling';

export const FACTOR_SOURCE = 'factor_transform';

export interface FactorPlanEntry {
  factor: FactorName;
  rule: RegisteredRule;
  frequency: GridFrequency;
  /** Calendar grid; replaced per entity by its price dates for trading-day factors on a daily grid. */
  dates: string[];
  useTradingDays: boolean;
}

export interface EntityFactorResult {
  entityId: string;
  candidates: FactorObservation[];
  tallies: FactorTallies;
  invalidPricePoints: number;
}

export function resolveOutputWindow(context: Pick<RunContext, 'runDate' | 'frequency' | 'backfillYears'>): DateWindow {
  if (context.backfillYears > 0) {
    return backfillWindow(context.runDate, context.backfillYears);
  }
  if (context.frequency === 'daily') {
    return { start: context.runDate, end: context.runDate };
  }
  // Periodic runs without a backfill still cover the last year of period ends
  return backfillWindow(context.runDate, 1);
}

export function resolveGridFrequency(
  factor: FactorName,
  rule: RegisteredRule,
  context: Pick<RunContext, 'frequency' | 'factorFrequencies'>
): GridFrequency {
  const override = context.factorFrequencies?.[factor];
  if (override) return override;
  if (context.frequency === 'daily') return 'daily';
  return rule.defaultFrequency;
}

export function buildFactorPlan(
  context: RunContext,
  config: FactorEngineConfig,
  registry: RuleRegistry = FACTOR_RULES
): { window: DateWindow; plan: FactorPlanEntry[] } {
  const window = resolveOutputWindow(context);
  const plan: FactorPlanEntry[] = [];

  for (const factor of config.enabledFactors) {
    const rule = registry[factor];
    if (!rule) continue;
    const frequency = resolveGridFrequency(factor, rule, context);
    plan.push({
      factor,
      rule,
      frequency,
      dates: periodEnds(frequency, window),
      useTradingDays: rule.tradingDayGrid && frequency === 'daily',
    });
  }

  return { window, plan };
}

function sentimentDates(plan: readonly FactorPlanEntry[]): string[] {
  const dates = new Set<string>();
  for (const entry of plan) {
    if (entry.factor === 'sentiment_30d_avg' || entry.factor === 'article_count_30d') {
      entry.dates.forEach((d) => dates.add(d));
    }
  }
  return Array.from(dates);
}

export function createRuleContext(
  timeline: EntityTimeline,
  plan: readonly FactorPlanEntry[],
  config: FactorEngineConfig
): RuleContext {
  let prices: PriceSeries | null = null;
  let sentiment: Map<string, SentimentWindowStats> | null = null;

  return {
    entityId: timeline.entityId,
    timeline,
    config,
    priceSeries: () => {
      if (!prices) prices = buildPriceSeries(timeline.metric('adjusted_close_price'));
      return prices;
    },
    sentimentAt: (asOfDate) => {
      if (!sentiment) {
        sentiment = sentimentWindows(
          timeline.observations('news_sentiment_daily'),
          timeline.observations('news_article_count_daily'),
          sentimentDates(plan),
          config.sentiment.windowDays
        );
      }
      return sentiment.get(asOfDate) ?? null;
    },
  };
}

/**
 * Evaluate every planned factor for one entity. Pure apart from the lazily
 * built series it caches for the duration of the call.
 */
export function computeEntityFactors(
  entityId: string,
  observations: readonly AtomicObservation[],
  window: DateWindow,
  options: { plan: readonly FactorPlanEntry[]; config: FactorEngineConfig }
): EntityFactorResult {
  const timeline = new EntityTimeline(entityId, observations);
  const ctx = createRuleContext(timeline, options.plan, options.config);
  const candidates: FactorObservation[] = [];
  const tallies: FactorTallies = {};

  for (const entry of options.plan) {
    let dates = entry.dates;
    if (entry.useTradingDays) {
      dates = ctx
        .priceSeries()
        .points.map((p) => p.date)
        .filter((d) => d >= window.start && d <= window.end);
    }

    for (const asOfDate of dates) {
      const evaluation = entry.rule.run(ctx, asOfDate);
      recordVerdict(tallies, entry.factor, evaluation.verdict);
      if (!evaluation.verdict.keep || evaluation.value === null) continue;

      candidates.push({
        entityId,
        observationDate: asOfDate,
        factorName: entry.factor,
        factorValue: evaluation.value,
        source: FACTOR_SOURCE,
        metricFrequency: entry.frequency,
        sourceReportDate: evaluation.sourceReportDate,
        qualityFlags: Array.from(evaluation.verdict.flags).sort(),
      });
    }
  }

  return {
    entityId,
    candidates,
    tallies,
    invalidPricePoints: timeline.hasMetric('adjusted_close_price') ? ctx.priceSeries().invalidPoints : 0,
  };
}
