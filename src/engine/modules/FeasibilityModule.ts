import type { PartialPlantSpec } from '../schema/PlantSpecV1';

/**
 * Whether the plant can be estimated from what is known.
 *
 * The characteristic equation links h_n, dV_n and P_n, so two of the three
 * are needed.  dV_n may be supplied directly or derived from a flow history:
 *
 *   (h_n ∧ P_n) ∨ ((h_n ∨ P_n) ∧ (history ∨ dV_n))
 */
export function canEstimate(
  spec: Pick<PartialPlantSpec, 'P_n' | 'h_n' | 'dV_n'>,
  histFlowPresent: boolean,
): boolean {
  const hasHead = spec.h_n !== null;
  const hasPower = spec.P_n !== null;
  const hasFlow = spec.dV_n !== null;
  return (hasHead && hasPower) || ((hasHead || hasPower) && (histFlowPresent || hasFlow));
}
