/**
 * TimeSeriesV1: time-indexed scalar series used for river flow (m³/s) and
 * plant power output (W).
 *
 * Timestamps are absolute instants; calendar arithmetic (day-of-year, year
 * offsets) is done in UTC.
 */

import { InvalidTimeSeriesError } from '../errors';
import { POWER_OUTPUT_LABEL } from '../constants';

export interface TimeSeriesPoint {
  readonly timestamp: Date;
  readonly value: number;
}

/** Water flow samples in m³/s, strictly increasing timestamps. */
export type FlowSeries = readonly TimeSeriesPoint[];

export interface PowerOutputSeries {
  readonly label: typeof POWER_OUTPUT_LABEL;
  readonly unit: 'W';
  readonly points: readonly TimeSeriesPoint[];
}

/**
 * Build a series from parallel timestamp / value arrays.
 */
export function toFlowSeries(timestamps: readonly Date[], values: readonly number[]): FlowSeries {
  if (timestamps.length !== values.length) {
    throw new InvalidTimeSeriesError(
      `Series length mismatch: ${timestamps.length} timestamps, ${values.length} values`,
    );
  }
  return timestamps.map((timestamp, i) => ({ timestamp, value: values[i] }));
}

/**
 * Check timestamps are valid and strictly increasing and values are finite.
 *
 * `requireNonEmpty` is set for history series, whose quantiles are undefined
 * when empty.
 */
export function validateFlowSeries(
  series: FlowSeries,
  name: string,
  { requireNonEmpty = false }: { requireNonEmpty?: boolean } = {},
): void {
  if (requireNonEmpty && series.length === 0) {
    throw new InvalidTimeSeriesError(`Series ${name} is empty`);
  }

  let previous = Number.NEGATIVE_INFINITY;
  series.forEach((point, i) => {
    const t = point.timestamp.getTime();
    if (Number.isNaN(t)) {
      throw new InvalidTimeSeriesError(`Series ${name} has an invalid timestamp at index ${i}`);
    }
    if (t <= previous) {
      throw new InvalidTimeSeriesError(
        `Series ${name} timestamps must be strictly increasing (index ${i}: ${point.timestamp.toISOString()})`,
      );
    }
    if (!Number.isFinite(point.value)) {
      throw new InvalidTimeSeriesError(`Series ${name} has a non-finite value at index ${i}`);
    }
    previous = t;
  });
}
