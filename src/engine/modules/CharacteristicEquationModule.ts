/**
 * CharacteristicEquationModule: relation between head, flow and power at the
 * nominal operating point:
 *
 *   P_n = h_n · dV_n · g · ρ · η_g · η_t
 *
 * with g = 9.81 m/s², ρ = 1000 kg/m³, η_g = 0.95 and η_t = 0.9 (full load,
 * same for every turbine type).
 */

import {
  ASSUMED_NOMINAL_GENERATOR_EFFICIENCY,
  ASSUMED_NOMINAL_TURBINE_EFFICIENCY,
  GRAVITY_M_S2,
  WATER_DENSITY_KG_M3,
} from '../constants';
import { PlantSpecInvariantError } from '../errors';

export interface OperatingPoint {
  P_n: number | null;
  h_n: number | null;
  dV_n: number | null;
}

export interface SolvedOperatingPoint {
  P_n: number;
  h_n: number;
  dV_n: number;
  /** Which quantity was solved for. */
  solved: 'P_n' | 'h_n' | 'dV_n';
}

export function nominalPower(h_n: number, dV_n: number): number {
  return h_n * dV_n * GRAVITY_M_S2 * WATER_DENSITY_KG_M3 *
    ASSUMED_NOMINAL_GENERATOR_EFFICIENCY * ASSUMED_NOMINAL_TURBINE_EFFICIENCY;
}

export function nominalHead(P_n: number, dV_n: number): number {
  return P_n / (dV_n * GRAVITY_M_S2 * WATER_DENSITY_KG_M3 *
    ASSUMED_NOMINAL_GENERATOR_EFFICIENCY * ASSUMED_NOMINAL_TURBINE_EFFICIENCY);
}

export function nominalFlow(P_n: number, h_n: number): number {
  return P_n / (h_n * GRAVITY_M_S2 * WATER_DENSITY_KG_M3 *
    ASSUMED_NOMINAL_GENERATOR_EFFICIENCY * ASSUMED_NOMINAL_TURBINE_EFFICIENCY);
}

/**
 * Solve for the single unknown of {P_n, h_n, dV_n}.  Exactly two must be known.
 */
export function solveCharacteristicEquation(point: OperatingPoint): SolvedOperatingPoint {
  const { P_n, h_n, dV_n } = point;

  if (P_n === null && h_n !== null && dV_n !== null) {
    return { P_n: nominalPower(h_n, dV_n), h_n, dV_n, solved: 'P_n' };
  }
  if (h_n === null && P_n !== null && dV_n !== null) {
    return { P_n, h_n: nominalHead(P_n, dV_n), dV_n, solved: 'h_n' };
  }
  if (dV_n === null && P_n !== null && h_n !== null) {
    return { P_n, h_n, dV_n: nominalFlow(P_n, h_n), solved: 'dV_n' };
  }

  const known = (['P_n', 'h_n', 'dV_n'] as const).filter((key) => point[key] !== null);
  throw new PlantSpecInvariantError(
    `Characteristic equation needs exactly two of P_n, h_n, dV_n (known: ${known.join(', ') || 'none'})`,
  );
}
