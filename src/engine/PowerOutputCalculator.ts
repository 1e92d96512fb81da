/**
 * PowerOutputCalculator: electrical output of a resolved plant over a flow
 * series.
 *
 *   P = η_t · η_g · g · ρ · dV_eff · h_n      while dV_pu < 1
 *   P = P_n                                  at or above nominal flow
 *
 * dV_eff = max(dV − dV_res, 0) and dV_pu = dV_eff / dV_n.  Water above the
 * nominal flow is spilled, so output is capped at exactly P_n.
 *
 * Reference: Quaschning, "Regenerative Energiesysteme", 9th ed., 2015, p. 333.
 */

import { GRAVITY_M_S2, POWER_OUTPUT_LABEL, WATER_DENSITY_KG_M3 } from './constants';
import { turbineEfficiency } from './modules/TurbineEfficiencyModule';
import type { PlantModel } from './schema/PlantSpecV1';
import type { FlowSeries, PowerOutputSeries } from './schema/TimeSeriesV1';
import { partLoadGeneratorEfficiency } from './utils/efficiency';

/** Power output in W for a single flow sample in m³/s. */
export function powerAtFlow(plant: PlantModel, flow: number): number {
  const dV_eff = Math.max(flow - plant.dV_res, 0);
  const dV_pu = dV_eff / plant.dV_n;
  if (dV_pu >= 1) return plant.P_n;
  if (dV_eff === 0) return 0;

  const eta_g = partLoadGeneratorEfficiency(dV_pu, plant.eta_g_n);
  const eta_t = turbineEfficiency(dV_pu, plant.turb_params);
  return eta_t * eta_g * GRAVITY_M_S2 * WATER_DENSITY_KG_M3 * dV_eff * plant.h_n;
}

export function computePowerOutput(plant: PlantModel, flow: FlowSeries): PowerOutputSeries {
  return {
    label: POWER_OUTPUT_LABEL,
    unit: 'W',
    points: flow.map((p) => ({ timestamp: p.timestamp, value: powerAtFlow(plant, p.value) })),
  };
}
