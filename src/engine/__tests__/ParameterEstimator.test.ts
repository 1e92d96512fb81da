import { describe, it, expect, vi } from 'vitest';
import { fillMissingParameters } from '../ParameterEstimator';
import { nominalPower } from '../modules/CharacteristicEquationModule';
import { loadTurbineClassificationTable } from '../reference/ReferenceTableLoader';
import {
  DataInsufficientError,
  InvalidPlantSpecError,
  InvalidTimeSeriesError,
  PlantSpecInvariantError,
} from '../errors';
import type { PlantSpecInput } from '../schema/PlantSpecV1';
import { silentLogger, type EngineLogger } from '../utils/logger';
import { dailySeries } from './fixtures/series';

const classificationTable = loadTurbineClassificationTable(undefined, silentLogger);
const deps = { classificationTable, logger: silentLogger };

describe('ParameterEstimator: feasibility', () => {
  it('throws DataInsufficientError naming the plant and leaves the input untouched', () => {
    const input: PlantSpecInput = { name: 'Upper Mill', P_n: 50000 };
    const snapshot = structuredClone(input);
    const error = vi.fn();
    const logger: EngineLogger = { ...silentLogger, error };

    expect(() => fillMissingParameters(input, undefined, { classificationTable, logger })).toThrow(
      'The input data is not sufficient for plant Upper Mill',
    );
    expect(error).toHaveBeenCalledWith('The input data is not sufficient for plant Upper Mill');
    expect(input).toEqual(snapshot);
  });

  it('error carries the plant name and code', () => {
    try {
      fillMissingParameters({ name: 'Weir', dV_n: 3 }, dailySeries('2020-01-01', 10, () => 1), deps);
      expect.unreachable('estimation should fail without head or power');
    } catch (err) {
      expect(err).toBeInstanceOf(DataInsufficientError);
      if (err instanceof DataInsufficientError) {
        expect(err.plantName).toBe('Weir');
        expect(err.code).toBe('DATA_INSUFFICIENT');
      }
    }
  });
});

describe('ParameterEstimator: without history', () => {
  it('head + flow → residual flow 0, power from the characteristic equation', () => {
    const result = fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12, turb_type: 'Kaplan' }, undefined, deps);

    expect(result.plant).toEqual({
      name: 'Raon',
      P_n: nominalPower(4.23, 12),
      dV_n: 12,
      h_n: 4.23,
      dV_res: 0,
      turb_type: 'Kaplan',
      turb_num: 1,
      eta_g_n: 0.95,
    });
    expect(result.estimated).toEqual(['dV_res', 'P_n', 'eta_g_n']);
    expect(result.assumptions).toEqual([
      'residual.no_history',
      'nominal.characteristic_equation',
      'generator.efficiency_from_power',
    ]);
  });

  it('power + flow → head', () => {
    const result = fillMissingParameters({ name: 'Raon', P_n: 425752.038, dV_n: 12, turb_type: 'Kaplan' }, undefined, deps);
    expect(result.plant.h_n).toBeCloseTo(4.23, 6);
    expect(result.estimated).toContain('h_n');
  });

  it('power + head without flow or history → flow solved from the characteristic equation', () => {
    const result = fillMissingParameters({ name: 'Raon', P_n: 425752.038, h_n: 4.23 }, undefined, deps);
    expect(result.plant.dV_n).toBeCloseTo(12, 6);
    expect(result.plant.turb_type).toBe('Kaplan');
    expect(result.estimated).toEqual(['dV_res', 'dV_n', 'turb_type', 'eta_g_n']);
  });

  it('keeps every supplied value and still recomputes eta_g_n', () => {
    const result = fillMissingParameters(
      { name: 'Small', P_n: 3000, h_n: 20, dV_n: 0.02, dV_res: 0.001, turb_type: 'Crossflow', turb_num: 2 },
      undefined,
      deps,
    );
    expect(result.plant).toMatchObject({ P_n: 3000, h_n: 20, dV_n: 0.02, dV_res: 0.001, turb_type: 'Crossflow', turb_num: 2 });
    expect(result.plant.eta_g_n).toBe(0.825);
    expect(result.estimated).toEqual(['eta_g_n']);
  });
});

describe('ParameterEstimator: turbine type', () => {
  it('classifies from the diagram when the type is missing', () => {
    const result = fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12 }, undefined, deps);
    expect(result.plant.turb_type).toBe('Kaplan');
    expect(result.assumptions).toContain('turbine.from_diagram');
  });

  it('falls back to dummy with a warning naming the plant', () => {
    const warn = vi.fn();
    const logger: EngineLogger = { ...silentLogger, warn };

    const result = fillMissingParameters({ name: 'Brook', h_n: 1, dV_n: 0.01 }, undefined, { classificationTable, logger });

    expect(result.plant.turb_type).toBe('dummy');
    expect(result.assumptions).toContain('turbine.dummy');
    expect(warn).toHaveBeenCalledWith('Turbine type could not be defined for plant Brook. Dummy type used');
  });

  it('needs a classification table only when the type is missing', () => {
    expect(() => fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12 }, undefined, { logger: silentLogger }))
      .toThrow(PlantSpecInvariantError);
    expect(() => fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12, turb_type: 'Kaplan' }, undefined, { logger: silentLogger }))
      .not.toThrow();
  });

  it('calls the table loader only when the type has to be derived', () => {
    const loadClassificationTable = vi.fn(() => classificationTable);

    fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12, turb_type: 'Kaplan' }, undefined, {
      loadClassificationTable,
      logger: silentLogger,
    });
    expect(loadClassificationTable).not.toHaveBeenCalled();

    const result = fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12 }, undefined, {
      loadClassificationTable,
      logger: silentLogger,
    });
    expect(loadClassificationTable).toHaveBeenCalledTimes(1);
    expect(result.plant.turb_type).toBe('Kaplan');
  });

  it('checks feasibility before loading the table', () => {
    const loadClassificationTable = vi.fn(() => classificationTable);
    expect(() => fillMissingParameters({ name: 'Lone', P_n: 5000 }, undefined, {
      loadClassificationTable,
      logger: silentLogger,
    })).toThrow(DataInsufficientError);
    expect(loadClassificationTable).not.toHaveBeenCalled();
  });
});

describe('ParameterEstimator: with history', () => {
  // Two years of a constant 5 m³/s: Q347 = 5 → dV_res = 0.9 + 2.5 · 0.213 = 1.4325
  const history = dailySeries('2021-01-01', 730, () => 5);

  it('derives residual flow, nominal flow and power', () => {
    const result = fillMissingParameters({ name: 'Gorge', h_n: 10, turb_type: 'Francis' }, history, deps);

    expect(result.plant.dV_res).toBeCloseTo(1.4325, 10);
    expect(result.plant.dV_n).toBeCloseTo(3.5675, 10);
    expect(result.plant.P_n).toBeCloseTo(nominalPower(10, 3.5675), 4);
    expect(result.estimated).toEqual(['dV_res', 'dV_n', 'P_n', 'eta_g_n']);
    expect(result.assumptions).toEqual([
      'residual.from_q347',
      'nominal.flow_from_history',
      'nominal.characteristic_equation',
      'generator.efficiency_from_power',
    ]);
  });

  it('uses a supplied residual flow instead of the schedule', () => {
    const result = fillMissingParameters({ name: 'Gorge', h_n: 10, dV_res: 1, turb_type: 'Francis' }, history, deps);
    expect(result.plant.dV_res).toBe(1);
    expect(result.plant.dV_n).toBe(4);
  });

  it('uses a supplied nominal flow instead of the history', () => {
    const result = fillMissingParameters({ name: 'Gorge', h_n: 10, dV_n: 2, turb_type: 'Francis' }, history, deps);
    expect(result.plant.dV_n).toBe(2);
    expect(result.plant.dV_res).toBeCloseTo(1.4325, 10);
  });

  it('rejects a history whose residual flow leaves no usable flow', () => {
    // Q347 = 0.01 → dV_res = 0.05 > every sample
    const trickle = dailySeries('2021-01-01', 365, () => 0.01);
    expect(() => fillMissingParameters({ name: 'Trickle', h_n: 10 }, trickle, deps)).toThrow(DataInsufficientError);
  });

  it('rejects non-increasing history timestamps', () => {
    const broken = [...history.slice(0, 3), history[1]];
    expect(() => fillMissingParameters({ name: 'Gorge', h_n: 10 }, broken, deps)).toThrow(InvalidTimeSeriesError);
  });

  it('rejects an empty history', () => {
    expect(() => fillMissingParameters({ name: 'Gorge', h_n: 10 }, [], deps)).toThrow('Series dV_hist is empty');
  });
});

describe('ParameterEstimator: input validation', () => {
  it('rejects a turbine count below one', () => {
    expect(() => fillMissingParameters({ name: 'Raon', h_n: 4.23, dV_n: 12, turb_num: 0 }, undefined, deps))
      .toThrow(InvalidPlantSpecError);
  });

  it('rejects a negative head', () => {
    try {
      fillMissingParameters({ name: 'Raon', h_n: -4, dV_n: 12 }, undefined, deps);
      expect.unreachable('negative head should be rejected');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPlantSpecError);
      if (err instanceof InvalidPlantSpecError) {
        expect(err.field).toBe('h_n');
      }
    }
  });
});
