import type { StalenessTiers } from '@/core/config';
import type { AlignedPrice } from '@/transform/alignment';
import type { AlignmentState, QualityFlag } from '@/types/factors';

export type StalenessTier = 'fresh' | 'stale' | 'expired';

/** Soft tier is (softDays, hardDays]; anything older than hardDays is expired. */
export function stalenessTier(ageDays: number, tiers: StalenessTiers): StalenessTier {
  if (ageDays > tiers.hardDays) return 'expired';
  if (ageDays > tiers.softDays) return 'stale';
  return 'fresh';
}

export function oldestAge(inputs: ReadonlyArray<AlignmentState>): number {
  return inputs.reduce((max, input) => Math.max(max, input.ageDays), 0);
}

export function latestReferenceDate(inputs: ReadonlyArray<AlignmentState>): string | null {
  let latest: string | null = null;
  for (const input of inputs) {
    if (latest === null || input.referenceDate > latest) {
      latest = input.referenceDate;
    }
  }
  return latest;
}

export function financialFlags(inputs: ReadonlyArray<AlignmentState>, tiers: StalenessTiers): {
  tier: StalenessTier;
  flags: QualityFlag[];
} {
  const tier = stalenessTier(oldestAge(inputs), tiers);
  if (tier === 'expired') return { tier, flags: ['data_expired'] };
  if (tier === 'stale') return { tier, flags: ['financial_stale'] };
  return { tier, flags: [] };
}

export function isStalePrice(price: AlignedPrice, maxFreshTradingDays: number): boolean {
  return price.tradingDayAge > maxFreshTradingDays;
}
