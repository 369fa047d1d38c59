/**
 * Temporal alignment engine
 *
 * Resolves observations of different natural frequency onto an as-of date.
 * Every lookup is a binary search over the entries whose reference date is on
 * or before the cutoff, so later entries are never visited. Values are carried
 * forward as a step function; nothing is interpolated.
 */

import { daysBetween, shiftDays, tradingDaysBetween } from '@/core/time';
import type { AlignmentState, AtomicObservation } from '@/types/factors';

export interface SeriesEntry {
  referenceDate: string;
  observationDate: string;
  value: number | null;
  source: string;
}

/** Alignment state of one (entity, metric) at an as-of date, plus the entry it came from. */
export interface AlignedValue extends AlignmentState {
  observationDate: string;
  source: string;
}

export interface AlignedPrice extends AlignedValue {
  tradingDayAge: number;
}

export interface AsOfOptions {
  /** Publication lag subtracted from the as-of date before searching. */
  lagDays?: number;
  /** Older effective values are reported as unavailable. */
  maxLookbackDays?: number;
}

export interface WindowSum {
  total: number;
  count: number;
  latestReferenceDate: string | null;
}

export function referenceDateOf(observation: AtomicObservation): string {
  return observation.reportReferenceDate ?? observation.observationDate;
}

export class MetricSeries {
  readonly entries: readonly SeriesEntry[];

  constructor(
    readonly entityId: string,
    readonly metricName: string,
    observations: readonly AtomicObservation[]
  ) {
    const sorted = observations
      .map((obs, arrival) => ({
        entry: {
          referenceDate: referenceDateOf(obs),
          observationDate: obs.observationDate,
          value: obs.value,
          source: obs.source,
        },
        arrival,
      }))
      .sort(
        (a, b) =>
          a.entry.referenceDate.localeCompare(b.entry.referenceDate) ||
          a.entry.observationDate.localeCompare(b.entry.observationDate) ||
          a.arrival - b.arrival
      );

    // One entry per reference date: the latest observation/arrival wins
    const collapsed: SeriesEntry[] = [];
    for (const { entry } of sorted) {
      const last = collapsed[collapsed.length - 1];
      if (last && last.referenceDate === entry.referenceDate) {
        collapsed[collapsed.length - 1] = entry;
      } else {
        collapsed.push(entry);
      }
    }
    this.entries = collapsed;
  }

  get length(): number {
    return this.entries.length;
  }

  /** Index of the last entry with referenceDate <= cutoff, or -1. */
  indexAtOrBefore(cutoff: string): number {
    let lo = 0;
    let hi = this.entries.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.entries[mid].referenceDate <= cutoff) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }

  asOf(asOfDate: string, options: AsOfOptions = {}): AlignedValue | null {
    const lagDays = options.lagDays ?? 0;
    const cutoff = lagDays > 0 ? shiftDays(asOfDate, -lagDays) : asOfDate;
    const idx = this.indexAtOrBefore(cutoff);
    if (idx < 0) return null;

    const entry = this.entries[idx];
    const ageDays = daysBetween(entry.referenceDate, asOfDate);
    if (options.maxLookbackDays !== undefined && ageDays > options.maxLookbackDays) {
      return null;
    }
    return { ...entry, entityId: this.entityId, metricName: this.metricName, ageDays };
  }

  /**
   * Strict backward price lookup: the exact date when present, otherwise the
   * latest earlier entry at most `maxTradingDays` weekdays old.
   */
  priceAsOf(asOfDate: string, maxTradingDays: number): AlignedPrice | null {
    const idx = this.indexAtOrBefore(asOfDate);
    if (idx < 0) return null;

    const entry = this.entries[idx];
    const tradingDayAge = tradingDaysBetween(entry.referenceDate, asOfDate);
    if (tradingDayAge > maxTradingDays) return null;
    return {
      ...entry,
      entityId: this.entityId,
      metricName: this.metricName,
      ageDays: daysBetween(entry.referenceDate, asOfDate),
      tradingDayAge,
    };
  }

  /** Sum of non-null values with reference date in (asOfDate - days, asOfDate]. */
  windowSum(asOfDate: string, days: number): WindowSum {
    const windowStart = shiftDays(asOfDate, -days);
    let total = 0;
    let count = 0;
    let latestReferenceDate: string | null = null;
    for (let i = this.indexAtOrBefore(asOfDate); i >= 0; i -= 1) {
      const entry = this.entries[i];
      if (entry.referenceDate <= windowStart) break;
      if (entry.value === null) continue;
      total += entry.value;
      count += 1;
      if (latestReferenceDate === null) latestReferenceDate = entry.referenceDate;
    }
    return { total, count, latestReferenceDate };
  }
}

const EMPTY_OBSERVATIONS: readonly AtomicObservation[] = [];

/** All metric series of one entity for the duration of a run. */
export class EntityTimeline {
  private readonly series = new Map<string, MetricSeries>();
  private readonly grouped = new Map<string, AtomicObservation[]>();

  constructor(
    readonly entityId: string,
    observations: readonly AtomicObservation[]
  ) {
    for (const obs of observations) {
      const bucket = this.grouped.get(obs.metricName);
      if (bucket) {
        bucket.push(obs);
      } else {
        this.grouped.set(obs.metricName, [obs]);
      }
    }
  }

  metric(metricName: string): MetricSeries {
    let series = this.series.get(metricName);
    if (!series) {
      series = new MetricSeries(
        this.entityId,
        metricName,
        this.grouped.get(metricName) ?? EMPTY_OBSERVATIONS
      );
      this.series.set(metricName, series);
    }
    return series;
  }

  observations(metricName: string): readonly AtomicObservation[] {
    return this.grouped.get(metricName) ?? EMPTY_OBSERVATIONS;
  }

  hasMetric(metricName: string): boolean {
    return this.grouped.has(metricName);
  }
}
