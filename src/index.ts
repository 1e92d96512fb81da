export { ModelChain, runModelChain, type ModelChainOptions } from './engine/ModelChain';
export {
  fillMissingParameters,
  type EstimationResultV1,
  type EstimatorDependencies,
} from './engine/ParameterEstimator';
export { computePowerOutput, powerAtFlow } from './engine/PowerOutputCalculator';
export { canEstimate } from './engine/modules/FeasibilityModule';
export { estimateResidualFlowV1, residualFlowFromQ347 } from './engine/modules/ResidualFlowModule';
export { estimateNominalFlowV1 } from './engine/modules/NominalFlowModule';
export { solveCharacteristicEquation } from './engine/modules/CharacteristicEquationModule';
export { classifyTurbineTypeV1 } from './engine/modules/TurbineClassificationModule';
export { resolveEfficiencyCoefficients, turbineEfficiency } from './engine/modules/TurbineEfficiencyModule';
export {
  loadTurbineClassificationTable,
  loadTurbineEfficiencyTable,
  parseTurbineEfficiencyCsv,
  parseTurbineGraph,
} from './engine/reference/ReferenceTableLoader';
export {
  nominalGeneratorEfficiency,
  partLoadGeneratorEfficiency,
} from './engine/utils/efficiency';
export { consoleLogger, createConsoleLogger, silentLogger, type EngineLogger } from './engine/utils/logger';
export * from './engine/errors';
export { ASSUMPTION_IDS, type AssumptionId } from './contracts/assumptions.ids';
export { ASSUMPTION_CATALOG, describeAssumptions } from './engine/assumptions.catalog';
export type { AssumptionEntry, AssumptionV1 } from './engine/assumptions.catalog';
export type {
  EstimatedField,
  PartialPlantSpec,
  PlantModel,
  PlantSpecInput,
  ResolvedPlantSpec,
  TurbineParams,
} from './engine/schema/PlantSpecV1';
export {
  toFlowSeries,
  validateFlowSeries,
  type FlowSeries,
  type PowerOutputSeries,
  type TimeSeriesPoint,
} from './engine/schema/TimeSeriesV1';
export type {
  TurbineClassificationTable,
  TurbineEfficiencyTable,
  TurbineRegion,
} from './engine/schema/ReferenceTablesV1';
