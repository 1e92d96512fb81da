import { NOMINAL_FLOW_QUANTILE } from '../constants';
import type { FlowSeries } from '../schema/TimeSeriesV1';
import { quantile } from '../utils/interpolation';

export interface NominalFlowResultV1 {
  /** Nominal turbine flow (m³/s). */
  dV_n: number;
  notes: string[];
}

/**
 * Nominal flow dV_n from the flow-duration curve of the full history.
 *
 * The residual flow is removed from every sample first; dV_n is the usable
 * flow reached or exceeded 20 % of the time (0.8 quantile).
 */
export function estimateNominalFlowV1(history: FlowSeries, dV_res: number): NominalFlowResultV1 {
  const usable = history.map((p) => p.value - dV_res);
  const dV_n = quantile(usable, NOMINAL_FLOW_QUANTILE);
  return {
    dV_n,
    notes: [`Nominal flow ${dV_n.toFixed(3)} m³/s (usable flow exceeded 20 % of the time over ${history.length} samples).`],
  };
}
