import type { AssumptionId } from '../contracts/assumptions.ids';

export interface AssumptionEntry {
  title: string;
  detail: string;
  improveBy?: string;
}

export interface AssumptionV1 extends AssumptionEntry {
  id: AssumptionId;
}

export const ASSUMPTION_CATALOG: Record<AssumptionId, AssumptionEntry> = {
  'residual.no_history': {
    title: 'Residual flow set to zero',
    detail: 'No historical flow series was supplied, so no water is reserved for residual flow. Every sample of the operating flow is treated as usable by the turbines.',
    improveBy: 'Provide the permitted residual flow, or a multi-year flow history.',
  },
  'residual.from_q347': {
    title: 'Residual flow from the Q347 schedule',
    detail: 'Residual flow is derived from the flow reached 347 days a year in the mean annual profile of the last ten years, using the Swiss small-hydropower schedule.',
    improveBy: 'Enter the residual flow stated in the plant licence.',
  },
  'nominal.flow_from_history': {
    title: 'Nominal flow from the flow-duration curve',
    detail: 'Nominal turbine flow is taken as the usable flow reached or exceeded 20 % of the time over the full history.',
    improveBy: 'Enter the rated flow from the turbine data plate.',
  },
  'nominal.characteristic_equation': {
    title: 'Operating point from the characteristic equation',
    detail: 'The missing nominal quantity is solved from P = h·Q·g·ρ·η_g·η_t with η_g = 0.95 and η_t = 0.9 at full load.',
    improveBy: 'Provide nominal power, head and flow together.',
  },
  'turbine.from_diagram': {
    title: 'Turbine type from the application diagram',
    detail: 'The turbine type is the first region of the flow/head application diagram that contains the nominal operating point.',
    improveBy: 'Enter the installed turbine type.',
  },
  'turbine.dummy': {
    title: 'Generic turbine efficiency curve',
    detail: 'The nominal operating point lies outside every region of the application diagram. A generic constant-efficiency turbine is used.',
    improveBy: 'Enter the installed turbine type.',
  },
  'generator.efficiency_from_power': {
    title: 'Generator efficiency from nominal power',
    detail: 'Nominal generator efficiency follows a size-dependent schedule from 80 % below 1 kW to 95 % at 100 kW and above.',
  },
};

/** Expands assumption ids into catalogue entries, in order, without repeats. */
export function describeAssumptions(ids: readonly AssumptionId[]): AssumptionV1[] {
  return [...new Set(ids)].map((id) => ({ id, ...ASSUMPTION_CATALOG[id] }));
}
