/**
 * Rolling aggregator: calendar-time sentiment windows and trading-day
 * momentum/volatility over per-entity price series.
 */

import { eachDay, shiftDays } from '@/core/time';
import type { AtomicObservation } from '@/types/factors';
import type { MetricSeries } from './alignment';

export interface DailySentiment {
  date: string;
  /** Mean of same-day scores; 0.0 on days without articles. */
  score: number;
  articleCount: number;
  padded: boolean;
}

export interface SentimentWindowStats {
  asOfDate: string;
  mean: number;
  articleCount: number;
  activeDays: number;
  latestArticleDate: string | null;
}

export interface PricePoint {
  date: string;
  price: number;
}

export interface PriceSeries {
  points: PricePoint[];
  invalidPoints: number;
}

interface DayBucket {
  sum: number;
  scored: number;
  reportedCount: number | null;
}

function bucketFor(buckets: Map<string, DayBucket>, date: string): DayBucket {
  let bucket = buckets.get(date);
  if (!bucket) {
    bucket = { sum: 0, scored: 0, reportedCount: null };
    buckets.set(date, bucket);
  }
  return bucket;
}

/**
 * Dense daily sentiment series over [start, end]. Days without articles are
 * filled with 0.0 here, before any window is applied.
 */
export function buildDailySentimentSeries(
  sentiment: readonly AtomicObservation[],
  articleCounts: readonly AtomicObservation[],
  start: string,
  end: string
): DailySentiment[] {
  const buckets = new Map<string, DayBucket>();

  for (const obs of sentiment) {
    if (obs.value === null) continue;
    if (obs.observationDate < start || obs.observationDate > end) continue;
    const bucket = bucketFor(buckets, obs.observationDate);
    bucket.sum += obs.value;
    bucket.scored += 1;
  }

  for (const obs of articleCounts) {
    if (obs.value === null) continue;
    if (obs.observationDate < start || obs.observationDate > end) continue;
    const bucket = bucketFor(buckets, obs.observationDate);
    bucket.reportedCount = (bucket.reportedCount ?? 0) + obs.value;
  }

  return eachDay(start, end).map((date) => {
    const bucket = buckets.get(date);
    if (!bucket) {
      return { date, score: 0, articleCount: 0, padded: true };
    }
    return {
      date,
      score: bucket.scored > 0 ? bucket.sum / bucket.scored : 0,
      articleCount: bucket.reportedCount ?? bucket.scored,
      padded: bucket.scored === 0,
    };
  });
}

/**
 * Trailing `windowDays` calendar-day mean and article-count sum for every day
 * of a dense daily series. The denominator is always `windowDays`.
 */
export function rollSentiment(
  daily: readonly DailySentiment[],
  windowDays: number
): Map<string, SentimentWindowStats> {
  const out = new Map<string, SentimentWindowStats>();

  for (let i = 0; i < daily.length; i += 1) {
    let scoreSum = 0;
    let articleCount = 0;
    let activeDays = 0;
    let latestArticleDate: string | null = null;

    for (let j = i; j > i - windowDays && j >= 0; j -= 1) {
      const day = daily[j];
      scoreSum += day.score;
      articleCount += day.articleCount;
      if (!day.padded) activeDays += 1;
      if (latestArticleDate === null && (!day.padded || day.articleCount > 0)) {
        latestArticleDate = day.date;
      }
    }

    out.set(daily[i].date, {
      asOfDate: daily[i].date,
      mean: scoreSum / windowDays,
      articleCount,
      activeDays,
      latestArticleDate,
    });
  }

  return out;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Sentiment window stats for each requested as-of date. */
export function sentimentWindows(
  sentiment: readonly AtomicObservation[],
  articleCounts: readonly AtomicObservation[],
  asOfDates: readonly string[],
  windowDays: number
): Map<string, SentimentWindowStats> {
  if (asOfDates.length === 0) return new Map();
  const sorted = [...asOfDates].sort();
  const start = shiftDays(sorted[0], -(windowDays - 1));
  const end = sorted[sorted.length - 1];
  const daily = buildDailySentimentSeries(sentiment, articleCounts, start, end);
  return rollSentiment(daily, windowDays);
}

/** Positive, finite prices in date order; anything else is counted and skipped. */
export function buildPriceSeries(series: MetricSeries): PriceSeries {
  const points: PricePoint[] = [];
  let invalidPoints = 0;
  for (const entry of series.entries) {
    if (entry.value === null || !Number.isFinite(entry.value) || entry.value <= 0) {
      invalidPoints += 1;
      continue;
    }
    points.push({ date: entry.referenceDate, price: entry.value });
  }
  return { points, invalidPoints };
}

/** Index of the last point dated on or before `date`, or -1. */
export function pointIndexAtOrBefore(points: readonly PricePoint[], date: string): number {
  let lo = 0;
  let hi = points.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (points[mid].date <= date) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

/** price[t] / price[t - lookback] - 1, or null without enough history. */
export function momentum(history: readonly PricePoint[], lookback: number): number | null {
  if (history.length < lookback + 1) return null;
  const latest = history[history.length - 1].price;
  const base = history[history.length - 1 - lookback].price;
  return latest / base - 1;
}

export function simpleReturns(history: readonly PricePoint[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < history.length; i += 1) {
    returns.push(history[i].price / history[i - 1].price - 1);
  }
  return returns;
}

export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance =
    values.reduce((acc, v) => acc + (v - mean) * (v - mean), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Sample standard deviation of the trailing `window` simple daily returns. */
export function volatility(history: readonly PricePoint[], window: number): number | null {
  if (history.length < window + 1) return null;
  const returns = simpleReturns(history.slice(history.length - 1 - window));
  return sampleStdDev(returns);
}
