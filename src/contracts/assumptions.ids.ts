export const ASSUMPTION_IDS = {
  // Residual flow
  RESIDUAL_FLOW_NO_HISTORY: 'residual.no_history',
  RESIDUAL_FLOW_FROM_Q347: 'residual.from_q347',

  // Nominal operating point
  NOMINAL_FLOW_FROM_HISTORY: 'nominal.flow_from_history',
  CHARACTERISTIC_EQUATION: 'nominal.characteristic_equation',

  // Turbine
  TURBINE_FROM_DIAGRAM: 'turbine.from_diagram',
  TURBINE_DUMMY: 'turbine.dummy',

  // Generator
  GENERATOR_EFFICIENCY_FROM_POWER: 'generator.efficiency_from_power',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
