/**
 * ModelChain: runs estimation, coefficient resolution and power output for
 * one plant.
 *
 * Reference tables come from the options: pre-loaded tables are used as
 * given, otherwise the named sources (or the bundled defaults) are read.  The
 * classification diagram is only read once estimation needs a turbine type.
 */

import { fillMissingParameters, type EstimationResultV1 } from './ParameterEstimator';
import { computePowerOutput } from './PowerOutputCalculator';
import { resolveEfficiencyCoefficients } from './modules/TurbineEfficiencyModule';
import {
  loadTurbineClassificationTable,
  loadTurbineEfficiencyTable,
} from './reference/ReferenceTableLoader';
import type { PlantModel, PlantSpecInput } from './schema/PlantSpecV1';
import type { TurbineClassificationTable, TurbineEfficiencyTable } from './schema/ReferenceTablesV1';
import { validateFlowSeries, type FlowSeries, type PowerOutputSeries } from './schema/TimeSeriesV1';
import { consoleLogger, type EngineLogger } from './utils/logger';

export interface ModelChainOptions {
  /** File name in the bundled data directory, or an absolute path. */
  turbineGraphSource?: string;
  /** File name in the bundled data directory, or an absolute path. */
  turbineEfficiencySource?: string;
  /** Takes precedence over turbineGraphSource. */
  classificationTable?: TurbineClassificationTable;
  /** Takes precedence over turbineEfficiencySource. */
  efficiencyTable?: TurbineEfficiencyTable;
  logger?: EngineLogger;
}

export class ModelChain {
  private _estimation: EstimationResultV1 | null = null;
  private _plant: PlantModel | null = null;
  private _powerOutput: PowerOutputSeries | null = null;

  constructor(
    readonly plantInput: PlantSpecInput,
    readonly dV: FlowSeries,
    readonly dV_hist?: FlowSeries,
    readonly options: ModelChainOptions = {},
  ) {}

  /** Result of the last run, or null before run(). */
  get powerOutput(): PowerOutputSeries | null {
    return this._powerOutput;
  }

  /** Fully resolved plant with its efficiency coefficients, or null before run(). */
  get plant(): PlantModel | null {
    return this._plant;
  }

  get estimation(): EstimationResultV1 | null {
    return this._estimation;
  }

  run(): PowerOutputSeries {
    const logger = this.options.logger ?? consoleLogger;
    validateFlowSeries(this.dV, 'dV');

    const estimation = fillMissingParameters(this.plantInput, this.dV_hist, {
      classificationTable: this.options.classificationTable,
      loadClassificationTable: () => loadTurbineClassificationTable(this.options.turbineGraphSource, logger),
      logger,
    });

    const efficiencyTable = this.options.efficiencyTable
      ?? loadTurbineEfficiencyTable(this.options.turbineEfficiencySource, logger);
    const plant: PlantModel = {
      ...estimation.plant,
      turb_params: resolveEfficiencyCoefficients(estimation.plant.turb_type, efficiencyTable),
    };

    const powerOutput = computePowerOutput(plant, this.dV);

    this._estimation = estimation;
    this._plant = plant;
    this._powerOutput = powerOutput;
    return powerOutput;
  }
}

/** One-shot convenience wrapper around ModelChain. */
export function runModelChain(
  plantInput: PlantSpecInput,
  dV: FlowSeries,
  dV_hist?: FlowSeries,
  options: ModelChainOptions = {},
): PowerOutputSeries {
  return new ModelChain(plantInput, dV, dV_hist, options).run();
}
