import { describe, it, expect } from 'vitest';
import { DEFAULT_FACTOR_ENGINE_CONFIG } from '@/core/config';
import { eachDay } from '@/core/time';
import {
  FACTOR_RULES,
  articleCountRule,
  debtToEquityRule,
  defineRule,
  dividendYieldRule,
  ebitdaMarginRule,
  momentumRule,
  pbRatioRule,
  resolveDebt,
  sentimentAverageRule,
  volatilityRule,
} from '@/data/quality/rules';
import { stalenessTier } from '@/data/quality/staleness';
import { EntityTimeline, type AlignedPrice, type AlignedValue } from '@/transform/alignment';
import { createRuleContext } from '@/transform/factors';
import type { AtomicObservation } from '@/types/factors';

const config = DEFAULT_FACTOR_ENGINE_CONFIG;

function aligned(value: number | null, ageDays = 30, referenceDate = '2025-03-31'): AlignedValue {
  return {
    entityId: 'ACME',
    metricName: 'test_metric',
    value,
    referenceDate,
    observationDate: referenceDate,
    source: 'test',
    ageDays,
  };
}

function price(value: number | null, tradingDayAge = 0, referenceDate = '2025-06-30'): AlignedPrice {
  return { ...aligned(value, tradingDayAge, referenceDate), tradingDayAge };
}

function atom(
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
    metricFrequency: 'daily',
    reportReferenceDate,
  };
}

function contextFor(observations: AtomicObservation[]) {
  return createRuleContext(new EntityTimeline('ACME', observations), [], config);
}

describe('staleness tiers', () => {
  it('splits ages at the soft and hard thresholds', () => {
    expect(stalenessTier(270, config.staleness)).toBe('fresh');
    expect(stalenessTier(271, config.staleness)).toBe('stale');
    expect(stalenessTier(365, config.staleness)).toBe('stale');
    expect(stalenessTier(366, config.staleness)).toBe('expired');
  });
});

describe('ebitda_margin', () => {
  it('drops a zero revenue', () => {
    const result = ebitdaMarginRule.evaluate({ ebitda: aligned(5), revenue: aligned(0) }, config);
    expect(result.verdict).toEqual({ keep: false, flags: new Set(), reason: 'non_positive_denominator' });
  });

  it('keeps a tiny positive revenue', () => {
    const result = ebitdaMarginRule.evaluate({ ebitda: aligned(5e-10), revenue: aligned(1e-9) }, config);
    expect(result.verdict.keep).toBe(true);
    expect(result.value).toBeCloseTo(0.5, 12);
    expect(result.sourceReportDate).toBe('2025-03-31');
  });

  it('drops when either input is missing', () => {
    expect(ebitdaMarginRule.evaluate({ ebitda: null, revenue: aligned(10) }, config).verdict.reason).toBe(
      'missing_input'
    );
    expect(ebitdaMarginRule.evaluate({ ebitda: aligned(1), revenue: aligned(null) }, config).verdict.reason).toBe(
      'missing_input'
    );
  });

  it('flags stale inputs and drops expired ones', () => {
    const stale = ebitdaMarginRule.evaluate({ ebitda: aligned(2, 300), revenue: aligned(10, 30) }, config);
    expect(stale.verdict.keep).toBe(true);
    expect(Array.from(stale.verdict.flags)).toEqual(['financial_stale']);

    const expired = ebitdaMarginRule.evaluate({ ebitda: aligned(2, 30), revenue: aligned(10, 366) }, config);
    expect(expired.verdict).toEqual({ keep: false, flags: new Set(['data_expired']), reason: 'data_expired' });
  });
});

describe('debt_to_equity', () => {
  it('prefers total debt', () => {
    expect(resolveDebt({ totalDebt: aligned(90), shortTermDebt: aligned(30), longTermDebt: aligned(50) })?.value).toBe(
      90
    );
  });

  it('falls back to the sum of debt components', () => {
    expect(resolveDebt({ totalDebt: aligned(null), shortTermDebt: aligned(30), longTermDebt: aligned(50) })?.value).toBe(
      80
    );
    expect(resolveDebt({ totalDebt: null, shortTermDebt: null, longTermDebt: aligned(50) })?.value).toBe(50);
    expect(resolveDebt({ totalDebt: null, shortTermDebt: null, longTermDebt: null })).toBeNull();
  });

  it('computes the ratio from the fallback debt', () => {
    const result = debtToEquityRule.evaluate(
      { totalDebt: null, shortTermDebt: aligned(30), longTermDebt: aligned(50), equity: aligned(100) },
      config
    );
    expect(result.value).toBeCloseTo(0.8, 12);
    expect(result.verdict.keep).toBe(true);
  });

  it('drops non-positive equity and missing debt', () => {
    const noEquity = debtToEquityRule.evaluate(
      { totalDebt: aligned(10), shortTermDebt: null, longTermDebt: null, equity: aligned(0) },
      config
    );
    expect(noEquity.verdict.reason).toBe('non_positive_denominator');

    const noDebt = debtToEquityRule.evaluate(
      { totalDebt: null, shortTermDebt: null, longTermDebt: null, equity: aligned(100) },
      config
    );
    expect(noDebt.verdict.reason).toBe('missing_input');
  });

  it('never turns a dropped row back into a kept one as the as-of date moves on', () => {
    const ctx = contextFor([
      atom('total_debt', '2025-02-15', 120, '2025-01-01'),
      atom('book_value', '2025-02-15', 100, '2025-01-01'),
    ]);
    const rule = defineRule(debtToEquityRule);
    let droppedOnce = false;
    for (const date of eachDay('2025-01-01', '2027-06-30')) {
      const kept = rule.run(ctx, date).verdict.keep;
      if (droppedOnce) expect(kept).toBe(false);
      if (!kept) droppedOnce = true;
    }
    expect(droppedOnce).toBe(true);
  });

  it('uses the latest input reference date as the source report date', () => {
    const result = debtToEquityRule.evaluate(
      {
        totalDebt: aligned(50, 90, '2025-03-31'),
        shortTermDebt: null,
        longTermDebt: null,
        equity: aligned(100, 0, '2025-06-30'),
      },
      config
    );
    expect(result.sourceReportDate).toBe('2025-06-30');
  });
});

describe('pb_ratio', () => {
  it('divides market cap by equity', () => {
    const result = pbRatioRule.evaluate({ price: price(50), shares: aligned(10), equity: aligned(250) }, config);
    expect(result.value).toBe(2);
    expect(result.sourceReportDate).toBe('2025-06-30');
    expect(result.verdict.flags.size).toBe(0);
  });

  it('flags stale prices and stale fundamentals independently', () => {
    const result = pbRatioRule.evaluate(
      { price: price(50, 2), shares: aligned(10, 300), equity: aligned(250, 10) },
      config
    );
    expect(result.verdict.keep).toBe(true);
    expect(Array.from(result.verdict.flags).sort()).toEqual(['financial_stale', 'stale_price']);
  });

  it('drops unusable inputs with distinct reasons', () => {
    expect(pbRatioRule.evaluate({ price: null, shares: aligned(10), equity: aligned(250) }, config).verdict.reason).toBe(
      'price_missing'
    );
    expect(
      pbRatioRule.evaluate({ price: price(0), shares: aligned(10), equity: aligned(250) }, config).verdict.reason
    ).toBe('price_unusable');
    expect(pbRatioRule.evaluate({ price: price(50), shares: null, equity: aligned(250) }, config).verdict.reason).toBe(
      'missing_input'
    );
    expect(
      pbRatioRule.evaluate({ price: price(50), shares: aligned(0), equity: aligned(250) }, config).verdict.reason
    ).toBe('non_positive_input');
    expect(
      pbRatioRule.evaluate({ price: price(50), shares: aligned(10), equity: aligned(-5) }, config).verdict.reason
    ).toBe('non_positive_denominator');
    expect(
      pbRatioRule.evaluate({ price: price(50), shares: aligned(10, 400), equity: aligned(250) }, config).verdict.reason
    ).toBe('data_expired');
  });
});

describe('dividend_yield', () => {
  it('divides trailing dividends by price', () => {
    const result = dividendYieldRule.evaluate(
      { price: price(50), dividends: { total: 2, count: 4, latestReferenceDate: '2025-06-13' } },
      config
    );
    expect(result.value).toBe(0.04);
    expect(result.sourceReportDate).toBe('2025-06-30');
  });

  it('reports a zero yield without dividends', () => {
    const result = dividendYieldRule.evaluate(
      { price: price(50), dividends: { total: 0, count: 0, latestReferenceDate: null } },
      config
    );
    expect(result.value).toBe(0);
    expect(result.verdict.keep).toBe(true);
  });

  it('uses the bounded price lookup through the timeline', () => {
    const ctx = contextFor([
      atom('adjusted_close_price', '2025-01-03', 40),
      atom('dividend_per_share', '2024-12-13', 0.4),
    ]);
    const rule = defineRule(dividendYieldRule);

    // Friday price seen on the following Monday
    const monday = rule.run(ctx, '2025-01-06');
    expect(monday.value).toBeCloseTo(0.01, 12);
    expect(Array.from(monday.verdict.flags)).toEqual([]);

    const wednesday = rule.run(ctx, '2025-01-08');
    expect(Array.from(wednesday.verdict.flags)).toEqual(['stale_price']);

    expect(rule.run(ctx, '2025-01-09').verdict.reason).toBe('price_missing');
  });

  it('ends the trailing dividend window at the price date', () => {
    const ctx = contextFor([
      atom('dividend_per_share', '2024-01-04', 1),
      atom('dividend_per_share', '2024-12-13', 0.4),
      atom('adjusted_close_price', '2025-01-03', 40),
      atom('dividend_per_share', '2025-01-06', 0.8),
    ]);

    // Tuesday run falls back to Friday's price; Monday's dividend is after it
    const result = defineRule(dividendYieldRule).run(ctx, '2025-01-07');
    expect(result.value).toBeCloseTo(0.01, 12);
    expect(result.sourceReportDate).toBe('2025-01-03');
    expect(Array.from(result.verdict.flags)).toEqual(['stale_price']);
  });
});

describe('sentiment', () => {
  it('falls back to zero without articles', () => {
    expect(sentimentAverageRule.evaluate({ window: null }, config)).toEqual({
      value: 0,
      sourceReportDate: null,
      verdict: { keep: true, flags: new Set() },
    });
    expect(articleCountRule.evaluate({ window: null }, config).value).toBe(0);
  });

  it('clamps the mean to the configured range', () => {
    const window = { asOfDate: '2025-01-31', mean: 1.5, articleCount: 40, activeDays: 30, latestArticleDate: '2025-01-31' };
    expect(sentimentAverageRule.evaluate({ window }, config).value).toBe(1);
    expect(articleCountRule.evaluate({ window }, config).value).toBe(40);
  });
});

describe('momentum and volatility', () => {
  const dates = eachDay('2025-01-01', '2025-01-21');
  const prices = dates.map((d, i) => atom('adjusted_close_price', d, 100 + i));

  it('computes momentum over the trailing trading-day lookback', () => {
    const result = defineRule(momentumRule).run(contextFor(prices), '2025-01-21');
    expect(result.verdict.keep).toBe(true);
    expect(result.value).toBeCloseTo(0.2, 12);
    expect(result.sourceReportDate).toBe('2025-01-21');
  });

  it('drops for insufficient history', () => {
    const ctx = contextFor(prices.slice(1));
    expect(defineRule(momentumRule).run(ctx, '2025-01-21').verdict.reason).toBe('insufficient_history');
    expect(defineRule(volatilityRule).run(ctx, '2025-01-21').verdict.reason).toBe('insufficient_history');
  });

  it('drops when no recent price anchors the window', () => {
    expect(defineRule(momentumRule).run(contextFor(prices), '2025-02-10').verdict.reason).toBe('price_missing');
  });

  it('computes volatility from the same price series', () => {
    const flat = dates.map((d) => atom('adjusted_close_price', d, 100));
    expect(defineRule(volatilityRule).run(contextFor(flat), '2025-01-21').value).toBe(0);
  });
});

describe('registry', () => {
  it('registers every factor under its own name', () => {
    for (const [name, rule] of Object.entries(FACTOR_RULES)) {
      expect(rule?.factor).toBe(name);
    }
    expect(Object.keys(FACTOR_RULES)).toHaveLength(8);
  });
});
