/**
 * Generator efficiency helpers.
 *
 * These are the single source of truth for the nominal generator efficiency
 * schedule and its part-load correction.  Both the estimator (which stores
 * `eta_g_n` on the plant) and the power-output calculator use them.
 *
 * Reference: Bundesamt für Konjunkturfragen, "Wahl, Dimensionierung und
 * Abnahme einer Kleinturbine", 1995.
 */

import { interpolateLinear } from './interpolation';

/**
 * Part-load correction control points: per-unit flow → fraction of `eta_g_n`.
 * Below 0.1 pu the factor holds at 0.85; above 0.5 pu it holds at 1.0.
 */
export const PART_LOAD_FLOW_PU = [0.1, 0.25, 0.5] as const;
export const PART_LOAD_FACTOR = [0.85, 0.95, 1.0] as const;

/**
 * Nominal generator efficiency (percentage points) from nominal power in W.
 *
 *   P_n < 1 kW         → 80
 *   1 kW  ≤ P_n < 5 kW   → 80 + 1.25 per kW above 1 kW
 *   5 kW  ≤ P_n < 20 kW  → 85 + 1/3 per kW above 5 kW
 *   20 kW ≤ P_n < 100 kW → 90 + 0.0625 per kW above 20 kW
 *   P_n ≥ 100 kW         → 95
 */
export function nominalGeneratorEfficiencyPct(P_n: number): number {
  if (P_n < 1000) return 80;
  if (P_n < 5000) return 80 + (P_n - 1000) / 1000 * 5 / 4;
  if (P_n < 20000) return 85 + (P_n - 5000) / 1000 * 5 / 15;
  if (P_n < 100000) return 90 + (P_n - 20000) / 1000 * 5 / 80;
  return 95;
}

/** Nominal generator efficiency as a fraction (0–1). */
export function nominalGeneratorEfficiency(P_n: number): number {
  return nominalGeneratorEfficiencyPct(P_n) / 100;
}

/**
 * Generator efficiency at a given per-unit flow.
 *
 * `eta_g_n` scaled by the part-load factor interpolated over
 * PART_LOAD_FLOW_PU / PART_LOAD_FACTOR.
 */
export function partLoadGeneratorEfficiency(dV_pu: number, eta_g_n: number): number {
  return interpolateLinear(dV_pu, PART_LOAD_FLOW_PU, PART_LOAD_FACTOR) * eta_g_n;
}
