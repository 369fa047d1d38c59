import { describe, it, expect } from 'vitest';
import { MetricSeries } from '@/transform/alignment';
import {
  buildDailySentimentSeries,
  buildPriceSeries,
  momentum,
  pointIndexAtOrBefore,
  sampleStdDev,
  sentimentWindows,
  volatility,
  type PricePoint,
} from '@/transform/rolling';
import { eachDay } from '@/core/time';
import type { AtomicObservation } from '@/types/factors';

function atom(metricName: string, observationDate: string, value: number | null): AtomicObservation {
  return {
    entityId: 'ACME',
    observationDate,
    metricName,
    value,
    source: 'test',
    metricFrequency: 'daily',
    reportReferenceDate: null,
  };
}

function priceHistory(prices: number[], start = '2025-01-01'): PricePoint[] {
  const dates = eachDay(start, '2026-12-31');
  return prices.map((price, i) => ({ date: dates[i], price }));
}

describe('rolling', () => {
  describe('buildDailySentimentSeries', () => {
    it('averages same-day scores and pads missing days with zero', () => {
      const daily = buildDailySentimentSeries(
        [atom('news_sentiment_daily', '2025-01-02', 0.4), atom('news_sentiment_daily', '2025-01-02', 0.2)],
        [],
        '2025-01-01',
        '2025-01-03'
      );

      expect(daily.map((d) => d.date)).toEqual(['2025-01-01', '2025-01-02', '2025-01-03']);
      expect(daily[0]).toEqual({ date: '2025-01-01', score: 0, articleCount: 0, padded: true });
      expect(daily[1].score).toBeCloseTo(0.3, 12);
      expect(daily[1].articleCount).toBe(2);
      expect(daily[1].padded).toBe(false);
      expect(daily[2]).toEqual({ date: '2025-01-03', score: 0, articleCount: 0, padded: true });
    });

    it('prefers reported article counts over the number of scores', () => {
      const daily = buildDailySentimentSeries(
        [atom('news_sentiment_daily', '2025-01-02', 0.5)],
        [atom('news_article_count_daily', '2025-01-02', 5), atom('news_article_count_daily', '2025-01-03', 3)],
        '2025-01-02',
        '2025-01-03'
      );
      expect(daily[0].articleCount).toBe(5);
      expect(daily[1]).toEqual({ date: '2025-01-03', score: 0, articleCount: 3, padded: true });
    });
  });

  describe('sentimentWindows', () => {
    const sentiment = [atom('news_sentiment_daily', '2025-01-15', 0.9)];

    it('divides by the full window length', () => {
      const stats = sentimentWindows(sentiment, [], ['2025-01-31'], 30).get('2025-01-31');
      expect(stats?.mean).toBeCloseTo(0.03, 12);
      expect(stats?.articleCount).toBe(1);
      expect(stats?.activeDays).toBe(1);
      expect(stats?.latestArticleDate).toBe('2025-01-15');
    });

    it('drops the article once it leaves the trailing window', () => {
      const windows = sentimentWindows(sentiment, [], ['2025-02-13', '2025-02-14'], 30);
      expect(windows.get('2025-02-13')?.articleCount).toBe(1);
      expect(windows.get('2025-02-14')).toEqual({
        asOfDate: '2025-02-14',
        mean: 0,
        articleCount: 0,
        activeDays: 0,
        latestArticleDate: null,
      });
    });

    it('yields exact zeros when there are no articles at all', () => {
      const stats = sentimentWindows([], [], ['2025-01-31'], 30).get('2025-01-31');
      expect(stats?.mean).toBe(0);
      expect(stats?.articleCount).toBe(0);
    });

    it('returns nothing for no dates', () => {
      expect(sentimentWindows(sentiment, [], [], 30).size).toBe(0);
    });
  });

  describe('buildPriceSeries', () => {
    it('keeps positive finite prices and counts the rest', () => {
      const series = new MetricSeries('ACME', 'adjusted_close_price', [
        atom('adjusted_close_price', '2025-01-02', 0),
        atom('adjusted_close_price', '2025-01-03', -1),
        atom('adjusted_close_price', '2025-01-06', null),
        atom('adjusted_close_price', '2025-01-07', 10),
      ]);
      expect(buildPriceSeries(series)).toEqual({
        points: [{ date: '2025-01-07', price: 10 }],
        invalidPoints: 3,
      });
    });
  });

  describe('pointIndexAtOrBefore', () => {
    const points = priceHistory([1, 2, 3]);

    it('finds the last point on or before the date', () => {
      expect(pointIndexAtOrBefore(points, '2025-01-02')).toBe(1);
      expect(pointIndexAtOrBefore(points, '2025-02-01')).toBe(2);
      expect(pointIndexAtOrBefore(points, '2024-12-31')).toBe(-1);
    });
  });

  describe('momentum', () => {
    it('compares the latest price with the one lookback points earlier', () => {
      const history = priceHistory(Array.from({ length: 21 }, (_, i) => 100 + i));
      expect(momentum(history, 20)).toBeCloseTo(0.2, 12);
    });

    it('needs lookback + 1 prices', () => {
      const history = priceHistory(Array.from({ length: 20 }, (_, i) => 100 + i));
      expect(momentum(history, 20)).toBeNull();
    });
  });

  describe('volatility', () => {
    it('is zero for a flat series', () => {
      expect(volatility(priceHistory(new Array<number>(21).fill(100)), 20)).toBe(0);
    });

    it('uses the sample standard deviation of simple returns', () => {
      expect(volatility(priceHistory([100, 110, 99]), 2)).toBeCloseTo(Math.sqrt(0.02), 6);
    });

    it('needs window + 1 prices', () => {
      expect(volatility(priceHistory(new Array<number>(20).fill(100)), 20)).toBeNull();
    });
  });

  describe('sampleStdDev', () => {
    it('divides by n - 1', () => {
      expect(sampleStdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12);
      expect(sampleStdDev([1])).toBeNull();
    });
  });
});
