/**
 * Cross-sectional capping of kept factor values
 *
 * Runs after every entity has been evaluated. Values are clamped from above
 * per (factor, observation date); nothing is dropped here.
 */

import type { CapConfig } from '@/core/config';
import type { FactorName, FactorObservation } from '@/types/factors';

export interface CapSummary {
  factorName: FactorName;
  observationDate: string;
  sampleSize: number;
  cap: number;
  method: 'percentile' | 'fixed';
  cappedCount: number;
}

/** Linear-interpolated percentile of already sorted values; p in [0, 1]. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return Number.NaN;
  if (sorted.length === 1) return sorted[0];
  const h = (sorted.length - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, sorted.length - 1);
  return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

export function resolveCap(values: readonly number[], config: CapConfig): {
  cap: number;
  method: CapSummary['method'];
} {
  if (values.length < config.minSampleSize) {
    return { cap: config.fixedCap, method: 'fixed' };
  }
  const sorted = [...values].sort((a, b) => a - b);
  return { cap: percentile(sorted, config.percentile), method: 'percentile' };
}

export function applyCrossSectionalCaps(
  rows: readonly FactorObservation[],
  capping: Partial<Record<FactorName, CapConfig>>
): { rows: FactorObservation[]; caps: CapSummary[] } {
  const groups = new Map<string, number[]>();
  rows.forEach((row, index) => {
    if (!capping[row.factorName]) return;
    const key = `${row.factorName}|${row.observationDate}`;
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  const out = rows.map((row) => ({ ...row, qualityFlags: [...row.qualityFlags] }));
  const caps: CapSummary[] = [];

  for (const indices of groups.values()) {
    const first = out[indices[0]];
    const config = capping[first.factorName];
    if (!config) continue;

    const { cap, method } = resolveCap(
      indices.map((i) => out[i].factorValue),
      config
    );
    let cappedCount = 0;
    for (const i of indices) {
      const row = out[i];
      if (row.factorValue > cap) {
        row.factorValue = cap;
        if (!row.qualityFlags.includes('capped')) row.qualityFlags.push('capped');
        cappedCount += 1;
      }
    }
    caps.push({
      factorName: first.factorName,
      observationDate: first.observationDate,
      sampleSize: indices.length,
      cap,
      method,
      cappedCount,
    });
  }

  caps.sort(
    (a, b) =>
      a.factorName.localeCompare(b.factorName) || a.observationDate.localeCompare(b.observationDate)
  );
  return { rows: out, caps };
}
