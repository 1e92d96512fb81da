/**
 * PlantSpecV1: description of one run-of-the-river hydropower plant.
 *
 * Field names follow the usual hydropower notation:
 *   P_n    nominal electrical power (W), plant total across all turbines
 *   dV_n   nominal water flow through the turbines (m³/s), plant total
 *   h_n    nominal head (m)
 *   dV_res residual flow that cannot be used by the turbines (m³/s)
 *
 * Lifecycle:
 *   PlantSpecInput: what the caller knows (validated with zod)
 *   PartialPlantSpec: readonly record threaded through each estimation step
 *   ResolvedPlantSpec: every estimable field filled in
 *   PlantModel: resolved spec plus cached turbine efficiency coefficients
 */

import { z } from 'zod';
import { InvalidPlantSpecError, PlantSpecInvariantError } from '../errors';

const positiveFinite = z.number().finite().positive();

export const PlantSpecInputSchema = z.object({
  name: z.string().min(1),
  P_n: positiveFinite.nullish(),
  dV_n: positiveFinite.nullish(),
  h_n: positiveFinite.nullish(),
  dV_res: z.number().finite().nonnegative().nullish(),
  turb_type: z.string().min(1).nullish(),
  turb_num: z.number().int().min(1).default(1),
});

export type PlantSpecInput = z.input<typeof PlantSpecInputSchema>;

export interface PartialPlantSpec {
  readonly name: string;
  readonly P_n: number | null;
  readonly dV_n: number | null;
  readonly h_n: number | null;
  readonly dV_res: number | null;
  readonly turb_type: string | null;
  readonly turb_num: number;
  /** Derived from P_n during estimation; never supplied by the caller. */
  readonly eta_g_n: number | null;
}

export interface ResolvedPlantSpec {
  readonly name: string;
  readonly P_n: number;
  readonly dV_n: number;
  readonly h_n: number;
  readonly dV_res: number;
  readonly turb_type: string;
  readonly turb_num: number;
  readonly eta_g_n: number;
}

/** Coefficients of the turbine efficiency curve η_t = x / (a1 + a2·x + a3·x²). */
export interface TurbineParams {
  readonly a1: number;
  readonly a2: number;
  readonly a3: number;
}

export interface PlantModel extends ResolvedPlantSpec {
  readonly turb_params: TurbineParams;
}

/** Fields the estimator may fill in. */
export type EstimatedField = 'dV_res' | 'dV_n' | 'P_n' | 'h_n' | 'turb_type' | 'eta_g_n';

/**
 * Validate caller input and convert it to the estimator's working record.
 * Absent optional values become `null`.
 */
export function toPartialPlantSpec(input: PlantSpecInput): PartialPlantSpec {
  const parsed = PlantSpecInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidPlantSpecError(`Invalid plant spec field '${field}': ${issue.message}`, field);
  }

  const spec = parsed.data;
  return {
    name: spec.name,
    P_n: spec.P_n ?? null,
    dV_n: spec.dV_n ?? null,
    h_n: spec.h_n ?? null,
    dV_res: spec.dV_res ?? null,
    turb_type: spec.turb_type ?? null,
    turb_num: spec.turb_num,
    eta_g_n: null,
  };
}

/**
 * Check that every estimable field is present and return the narrowed record.
 * A failure here means an estimation step was skipped, which is a programming error.
 */
export function assertResolved(spec: PartialPlantSpec): ResolvedPlantSpec {
  const { P_n, dV_n, h_n, dV_res, turb_type, eta_g_n } = spec;
  if (P_n === null || dV_n === null || h_n === null || dV_res === null || turb_type === null || eta_g_n === null) {
    const missing = (['P_n', 'dV_n', 'h_n', 'dV_res', 'turb_type', 'eta_g_n'] as const)
      .filter((key) => spec[key] === null);
    throw new PlantSpecInvariantError(
      `Plant ${spec.name} is not fully resolved after estimation (missing: ${missing.join(', ')})`,
    );
  }
  return {
    name: spec.name,
    P_n,
    dV_n,
    h_n,
    dV_res,
    turb_type,
    turb_num: spec.turb_num,
    eta_g_n,
  };
}
