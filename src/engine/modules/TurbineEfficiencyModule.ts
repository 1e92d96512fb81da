import { UnknownTurbineTypeError } from '../errors';
import type { TurbineParams } from '../schema/PlantSpecV1';
import type { TurbineEfficiencyTable } from '../schema/ReferenceTablesV1';

/**
 * Efficiency-curve coefficients for a turbine type.
 * Throws UnknownTurbineTypeError, listing the valid types, when absent.
 */
export function resolveEfficiencyCoefficients(
  turbType: string,
  table: TurbineEfficiencyTable,
): TurbineParams {
  const params = table.get(turbType);
  if (!params) {
    throw new UnknownTurbineTypeError(turbType, [...table.keys()]);
  }
  return params;
}

/**
 * Turbine efficiency at per-unit flow x:
 *   η_t = x / (a1 + a2·x + a3·x²)
 */
export function turbineEfficiency(dV_pu: number, { a1, a2, a3 }: TurbineParams): number {
  return dV_pu / (a1 + a2 * dV_pu + a3 * dV_pu ** 2);
}
