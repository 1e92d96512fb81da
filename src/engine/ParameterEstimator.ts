/**
 * ParameterEstimator: fills in every missing parameter of a plant.
 *
 * Steps run in a fixed order, each taking the current PartialPlantSpec and
 * returning a new one:
 *
 *   1. feasibility check (DataInsufficientError when it fails)
 *   2. dV_res  ← Q347 schedule over the last 10 years of history, or 0
 *   3. dV_n    ← 0.8 quantile of (history − dV_res)
 *   4. P_n/h_n ← characteristic equation (dV_n when both are known)
 *   5. turb_type ← application diagram, or 'dummy'
 *   6. eta_g_n ← nominal generator efficiency schedule on the final P_n
 *
 * The caller's input is never modified.
 */

import { ASSUMPTION_IDS, type AssumptionId } from '../contracts/assumptions.ids';
import { DataInsufficientError, PlantSpecInvariantError } from './errors';
import { canEstimate } from './modules/FeasibilityModule';
import { estimateResidualFlowV1 } from './modules/ResidualFlowModule';
import { estimateNominalFlowV1 } from './modules/NominalFlowModule';
import { solveCharacteristicEquation } from './modules/CharacteristicEquationModule';
import { classifyTurbineTypeV1 } from './modules/TurbineClassificationModule';
import {
  assertResolved,
  toPartialPlantSpec,
  type EstimatedField,
  type PartialPlantSpec,
  type PlantSpecInput,
  type ResolvedPlantSpec,
} from './schema/PlantSpecV1';
import type { TurbineClassificationTable } from './schema/ReferenceTablesV1';
import { validateFlowSeries, type FlowSeries } from './schema/TimeSeriesV1';
import { nominalGeneratorEfficiency } from './utils/efficiency';
import { consoleLogger, type EngineLogger } from './utils/logger';

export interface EstimatorDependencies {
  /** Needed only when the plant has no turb_type. */
  classificationTable?: TurbineClassificationTable;
  /** Called instead, and only once the turbine type has to be derived. */
  loadClassificationTable?: () => TurbineClassificationTable;
  logger?: EngineLogger;
}

export interface EstimationResultV1 {
  plant: ResolvedPlantSpec;
  /** Fields filled in by the estimator, in the order they were resolved. */
  estimated: EstimatedField[];
  assumptions: AssumptionId[];
  notes: string[];
}

interface EstimationState {
  spec: PartialPlantSpec;
  estimated: EstimatedField[];
  assumptions: AssumptionId[];
  notes: string[];
}

function apply(
  state: EstimationState,
  patch: Partial<PartialPlantSpec>,
  fields: EstimatedField[],
  assumption: AssumptionId,
  notes: string[],
): EstimationState {
  return {
    spec: { ...state.spec, ...patch },
    estimated: [...state.estimated, ...fields],
    assumptions: state.assumptions.includes(assumption) ? state.assumptions : [...state.assumptions, assumption],
    notes: [...state.notes, ...notes],
  };
}

// ── Steps ────────────────────────────────────────────────────────────────────

function resolveResidualFlow(state: EstimationState, history: FlowSeries | undefined): EstimationState {
  if (state.spec.dV_res !== null) return state;

  if (!history) {
    return apply(state, { dV_res: 0 }, ['dV_res'], ASSUMPTION_IDS.RESIDUAL_FLOW_NO_HISTORY,
      ['No flow history, residual flow set to 0 m³/s.']);
  }

  const result = estimateResidualFlowV1(history);
  return apply(state, { dV_res: result.dV_res }, ['dV_res'], ASSUMPTION_IDS.RESIDUAL_FLOW_FROM_Q347, result.notes);
}

function resolveNominalFlow(state: EstimationState, history: FlowSeries | undefined): EstimationState {
  const { dV_n, dV_res, name } = state.spec;
  if (dV_n !== null || !history) return state;
  if (dV_res === null) {
    throw new PlantSpecInvariantError(`Plant ${name}: dV_res must be resolved before dV_n`);
  }

  const result = estimateNominalFlowV1(history, dV_res);
  if (result.dV_n <= 0) {
    // Residual flow consumes the whole flow-duration curve.
    throw new DataInsufficientError(name);
  }
  return apply(state, { dV_n: result.dV_n }, ['dV_n'], ASSUMPTION_IDS.NOMINAL_FLOW_FROM_HISTORY, result.notes);
}

function resolveOperatingPoint(state: EstimationState): EstimationState {
  const { P_n, h_n, dV_n } = state.spec;
  const exactlyOneOfPowerHead = (P_n === null) !== (h_n === null);
  const onlyFlowMissing = dV_n === null && P_n !== null && h_n !== null;
  if (!exactlyOneOfPowerHead && !onlyFlowMissing) return state;

  const solved = solveCharacteristicEquation({ P_n, h_n, dV_n });
  const value = solved[solved.solved];
  return apply(
    state,
    { P_n: solved.P_n, h_n: solved.h_n, dV_n: solved.dV_n },
    [solved.solved],
    ASSUMPTION_IDS.CHARACTERISTIC_EQUATION,
    [`${solved.solved} = ${value.toFixed(3)} from the characteristic equation.`],
  );
}

function resolveTurbineType(
  state: EstimationState,
  deps: EstimatorDependencies,
  logger: EngineLogger,
): EstimationState {
  const { turb_type, dV_n, h_n, name } = state.spec;
  if (turb_type !== null) return state;
  if (dV_n === null || h_n === null) {
    throw new PlantSpecInvariantError(`Plant ${name}: dV_n and h_n must be resolved before the turbine type`);
  }
  const table = deps.classificationTable ?? deps.loadClassificationTable?.();
  if (!table) {
    throw new PlantSpecInvariantError(`Plant ${name}: a turbine classification table is required to derive turb_type`);
  }

  const result = classifyTurbineTypeV1(dV_n, h_n, table);
  if (result.source === 'dummy') {
    logger.warn(`Turbine type could not be defined for plant ${name}. Dummy type used`);
  }
  return apply(
    state,
    { turb_type: result.turbType },
    ['turb_type'],
    result.source === 'dummy' ? ASSUMPTION_IDS.TURBINE_DUMMY : ASSUMPTION_IDS.TURBINE_FROM_DIAGRAM,
    result.notes,
  );
}

function resolveGeneratorEfficiency(state: EstimationState): EstimationState {
  const { P_n, name } = state.spec;
  if (P_n === null) {
    throw new PlantSpecInvariantError(`Plant ${name}: P_n must be resolved before eta_g_n`);
  }
  const eta_g_n = nominalGeneratorEfficiency(P_n);
  return apply(state, { eta_g_n }, ['eta_g_n'], ASSUMPTION_IDS.GENERATOR_EFFICIENCY_FROM_POWER,
    [`Nominal generator efficiency ${(eta_g_n * 100).toFixed(1)} %.`]);
}

// ── Entry point ──────────────────────────────────────────────────────────────

export function fillMissingParameters(
  input: PlantSpecInput,
  history?: FlowSeries,
  deps: EstimatorDependencies = {},
): EstimationResultV1 {
  const logger = deps.logger ?? consoleLogger;
  const spec = toPartialPlantSpec(input);

  if (!canEstimate(spec, history !== undefined)) {
    logger.error(`The input data is not sufficient for plant ${spec.name}`);
    throw new DataInsufficientError(spec.name);
  }
  if (history) {
    validateFlowSeries(history, 'dV_hist', { requireNonEmpty: true });
  }

  let state: EstimationState = { spec, estimated: [], assumptions: [], notes: [] };
  state = resolveResidualFlow(state, history);
  state = resolveNominalFlow(state, history);
  state = resolveOperatingPoint(state);
  state = resolveTurbineType(state, deps, logger);
  state = resolveGeneratorEfficiency(state);

  const plant = assertResolved(state.spec);
  logger.debug([
    `Plant ${plant.name}`,
    `  Nominal water flow  : ${plant.dV_n} m3/s`,
    `  Nominal head        : ${plant.h_n} m`,
    `  Nominal power       : ${plant.P_n} W`,
    `  Residual water flow : ${plant.dV_res} m3/s`,
    `  Turbine type        : ${plant.turb_type}`,
  ].join('\n'));

  return {
    plant,
    estimated: state.estimated,
    assumptions: state.assumptions,
    notes: state.notes,
  };
}
