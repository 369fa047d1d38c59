import { describe, it, expect } from 'vitest';
import { EntityTimeline, MetricSeries } from '@/transform/alignment';
import type { AtomicObservation } from '@/types/factors';

function obs(
  metricName: string,
  observationDate: string,
  value: number | null,
  reportReferenceDate: string | null = null
): AtomicObservation {
  return {
    entityId: 'ACME',
    observationDate,
    metricName,
    value,
    source: 'test',
    metricFrequency: 'quarterly',
    reportReferenceDate,
  };
}

const equity = [
  obs('book_value', '2024-05-02', 100, '2024-03-31'),
  obs('book_value', '2024-08-01', 120, '2024-06-30'),
];

describe('MetricSeries', () => {
  it('collapses duplicates on a reference date to the latest observation', () => {
    const series = new MetricSeries('ACME', 'book_value', [
      obs('book_value', '2025-03-01', 2, '2024-12-31'),
      obs('book_value', '2025-02-01', 1, '2024-12-31'),
    ]);
    expect(series.length).toBe(1);
    expect(series.entries[0].value).toBe(2);
  });

  it('uses arrival order when observation dates tie', () => {
    const series = new MetricSeries('ACME', 'book_value', [
      obs('book_value', '2025-02-01', 1, '2024-12-31'),
      obs('book_value', '2025-02-01', 3, '2024-12-31'),
    ]);
    expect(series.entries[0].value).toBe(3);
  });

  describe('asOf', () => {
    const series = new MetricSeries('ACME', 'book_value', equity);

    it('returns null before the first reference date', () => {
      expect(series.asOf('2024-03-30')).toBeNull();
    });

    it('carries the last value forward as a step function', () => {
      expect(series.asOf('2024-06-29')).toMatchObject({ value: 100, referenceDate: '2024-03-31', ageDays: 90 });
      expect(series.asOf('2024-06-30')).toMatchObject({ value: 120, referenceDate: '2024-06-30', ageDays: 0 });
    });

    it('reports values older than the lookback as unavailable', () => {
      expect(series.asOf('2024-12-31', { maxLookbackDays: 100 })).toBeNull();
      expect(series.asOf('2024-12-31', { maxLookbackDays: 200 })).toMatchObject({ value: 120, ageDays: 184 });
    });

    it('applies the publication lag to the cutoff but not to the age', () => {
      expect(series.asOf('2024-07-10', { lagDays: 15 })).toMatchObject({
        value: 100,
        referenceDate: '2024-03-31',
        ageDays: 101,
      });
    });

    it('never returns a reference date after the as-of date', () => {
      const withFuture = new MetricSeries('ACME', 'book_value', [
        ...equity,
        obs('book_value', '2024-11-01', 999, '2024-09-30'),
      ]);
      for (const date of ['2024-04-15', '2024-07-01', '2024-09-29']) {
        expect(withFuture.asOf(date)).toEqual(series.asOf(date));
        const aligned = withFuture.asOf(date);
        expect(aligned === null || aligned.referenceDate <= date).toBe(true);
      }
    });
  });

  describe('priceAsOf', () => {
    // 2025-01-03 is a Friday
    const prices = new MetricSeries('ACME', 'adjusted_close_price', [
      obs('adjusted_close_price', '2025-01-03', 100),
    ]);

    it('prefers the exact date', () => {
      expect(prices.priceAsOf('2025-01-03', 3)).toMatchObject({ value: 100, tradingDayAge: 0, ageDays: 0 });
    });

    it('falls back across the weekend', () => {
      expect(prices.priceAsOf('2025-01-06', 3)).toMatchObject({ tradingDayAge: 1, ageDays: 3 });
    });

    it('accepts prices up to the trading-day limit', () => {
      expect(prices.priceAsOf('2025-01-08', 3)).toMatchObject({ tradingDayAge: 3 });
      expect(prices.priceAsOf('2025-01-09', 3)).toBeNull();
    });

    it('never looks forward', () => {
      expect(prices.priceAsOf('2025-01-02', 3)).toBeNull();
    });
  });

  describe('windowSum', () => {
    const dividends = new MetricSeries('ACME', 'dividend_per_share', [
      obs('dividend_per_share', '2024-03-15', 0.5),
      obs('dividend_per_share', '2024-06-14', 0.5),
      obs('dividend_per_share', '2024-09-13', null),
      obs('dividend_per_share', '2024-12-13', 0.5),
      obs('dividend_per_share', '2025-03-14', 0.6),
    ]);

    it('sums non-null values in the half-open trailing window', () => {
      const sum = dividends.windowSum('2025-03-14', 365);
      expect(sum.count).toBe(4);
      expect(sum.total).toBeCloseTo(2.1, 10);
      expect(sum.latestReferenceDate).toBe('2025-03-14');
    });

    it('excludes the entry exactly one window length back', () => {
      const sum = dividends.windowSum('2025-03-15', 365);
      expect(sum.count).toBe(3);
      expect(sum.total).toBeCloseTo(1.6, 10);
    });

    it('is empty when nothing falls in the window', () => {
      expect(dividends.windowSum('2024-03-14', 365)).toEqual({ total: 0, count: 0, latestReferenceDate: null });
    });
  });
});

describe('EntityTimeline', () => {
  const timeline = new EntityTimeline('ACME', [
    ...equity,
    obs('adjusted_close_price', '2024-07-01', 50),
  ]);

  it('groups observations by metric', () => {
    expect(timeline.hasMetric('book_value')).toBe(true);
    expect(timeline.hasMetric('total_debt')).toBe(false);
    expect(timeline.metric('total_debt').length).toBe(0);
  });

  it('reports the alignment state of a metric at an as-of date', () => {
    expect(timeline.metric('book_value').asOf('2024-07-30')).toEqual({
      entityId: 'ACME',
      metricName: 'book_value',
      value: 120,
      referenceDate: '2024-06-30',
      observationDate: '2024-08-01',
      source: 'test',
      ageDays: 30,
    });
    expect(timeline.metric('book_value').asOf('2024-01-01')).toBeNull();
  });
});
