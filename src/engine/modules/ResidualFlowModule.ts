/**
 * ResidualFlowModule: residual flow dV_res from a historical flow series.
 *
 * The last ten years of history are folded into a mean annual profile (one
 * mean per day of year).  Its 0.05 quantile is Q347, the flow reached on 347
 * days of an average year, which is mapped to dV_res through the fixed
 * schedule of the Swiss small-hydropower guideline.
 *
 * Reference: Bundesamt für Konjunkturfragen, "Wahl, Dimensionierung und
 * Abnahme einer Kleinturbine", 1995.
 */

import { Q347_QUANTILE, RESIDUAL_FLOW_HISTORY_YEARS } from '../constants';
import type { FlowSeries } from '../schema/TimeSeriesV1';
import { mean, quantile } from '../utils/interpolation';

export interface ResidualFlowResultV1 {
  /** Residual flow (m³/s). */
  dV_res: number;
  /** 0.05 quantile of the mean annual profile (m³/s). */
  q347: number;
  /** First timestamp included in the profile. */
  windowStart: Date;
  /** Number of distinct days of year in the profile (≤ 366). */
  profileDays: number;
  notes: string[];
}

const MS_PER_DAY = 86_400_000;

/**
 * Residual-flow schedule.  Breakpoints and slopes are regulatory constants;
 * adjacent segments are not forced to meet.
 *
 *   q ≤ 0.06        → 0.05
 *   0.06 < q ≤ 0.16 → 0.05  + (q − 0.06) · 0.8
 *   0.16 < q ≤ 0.5  → 0.130 + (q − 0.16) · 0.44
 *   0.5  < q ≤ 2.5  → 0.28  + (q − 0.5)  · 0.31
 *   2.5  < q ≤ 10   → 0.9   + (q − 2.5)  · 0.213
 *   10   < q ≤ 60   → 2.5   + (q − 10)   · 0.15
 *   q > 60          → 10
 */
export function residualFlowFromQ347(q: number): number {
  if (q <= 0.06) return 0.05;
  if (q <= 0.16) return 0.05 + (q - 0.06) * 8 / 10;
  if (q <= 0.5) return 0.130 + (q - 0.16) * 4.4 / 10;
  if (q <= 2.5) return 0.28 + (q - 0.5) * 31 / 100;
  if (q <= 10) return 0.9 + (q - 2.5) * 21.3 / 100;
  if (q <= 60) return 2.5 + (q - 10) * 150 / 1000;
  return 10;
}

/**
 * Calendar offset: same month/day/time `years` earlier (UTC).  A day that does
 * not exist in the target month is clamped to its last day (29 Feb → 28 Feb).
 */
export function subtractYearsUtc(date: Date, years: number): Date {
  const year = date.getUTCFullYear() - years;
  const month = date.getUTCMonth();
  const daysInMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(date.getUTCDate(), daysInMonth);
  return new Date(Date.UTC(
    year,
    month,
    day,
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    date.getUTCMilliseconds(),
  ));
}

/** 1-based day of year in UTC (1–366). */
export function dayOfYearUtc(date: Date): number {
  const startOfDay = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.round((startOfDay - startOfYear) / MS_PER_DAY) + 1;
}

/**
 * Restrict a series to its most recent `years` years: everything from
 * max(first timestamp, last timestamp − years) onwards, inclusive.
 */
export function clipToRecentYears(series: FlowSeries, years: number): FlowSeries {
  if (series.length === 0) return series;
  const first = series[0].timestamp.getTime();
  const cutoff = subtractYearsUtc(series[series.length - 1].timestamp, years).getTime();
  const start = Math.max(first, cutoff);
  return series.filter((p) => p.timestamp.getTime() >= start);
}

/**
 * Mean flow per day of year across all years in the series, ordered by day.
 */
export function meanAnnualProfile(series: FlowSeries): number[] {
  const byDay = new Map<number, number[]>();
  for (const point of series) {
    const day = dayOfYearUtc(point.timestamp);
    const bucket = byDay.get(day);
    if (bucket) bucket.push(point.value);
    else byDay.set(day, [point.value]);
  }
  return [...byDay.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, values]) => mean(values));
}

export function estimateResidualFlowV1(history: FlowSeries): ResidualFlowResultV1 {
  const window = clipToRecentYears(history, RESIDUAL_FLOW_HISTORY_YEARS);
  const profile = meanAnnualProfile(window);
  const q347 = quantile(profile, Q347_QUANTILE);
  const dV_res = residualFlowFromQ347(q347);

  return {
    dV_res,
    q347,
    windowStart: window[0].timestamp,
    profileDays: profile.length,
    notes: [
      `Q347 of the mean annual profile since ${window[0].timestamp.toISOString().slice(0, 10)}: ${q347.toFixed(3)} m³/s.`,
      `Residual flow set to ${dV_res.toFixed(3)} m³/s.`,
    ],
  };
}
