import { describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import {
  DATA_DIR,
  loadTurbineClassificationTable,
  loadTurbineEfficiencyTable,
  parseTurbineEfficiencyCsv,
  parseTurbineGraph,
  resolveReferenceSource,
} from '../reference/ReferenceTableLoader';
import {
  InvalidReferenceTableError,
  ReferenceSourceUnavailableError,
} from '../errors';
import { silentLogger, type EngineLogger } from '../utils/logger';

describe('resolveReferenceSource', () => {
  it('uses the bundled default when no source is given', () => {
    expect(resolveReferenceSource(undefined, 'turbines.geojson')).toBe(join(DATA_DIR, 'turbines.geojson'));
  });

  it('resolves bare names in the data directory', () => {
    expect(resolveReferenceSource('custom.csv', 'turbine_types.csv')).toBe(join(DATA_DIR, 'custom.csv'));
  });

  it('passes absolute paths through', () => {
    expect(resolveReferenceSource('/srv/tables/custom.csv', 'turbine_types.csv')).toBe('/srv/tables/custom.csv');
  });
});

describe('bundled efficiency table', () => {
  const table = loadTurbineEfficiencyTable(undefined, silentLogger);

  it('lists every turbine type in file order', () => {
    expect([...table.keys()]).toEqual(['Kaplan', 'Francis', 'Pelton', 'Crossflow', 'dummy']);
  });

  it('reads the Kaplan coefficients', () => {
    expect(table.get('Kaplan')).toEqual({ a1: 0.0495, a2: 0.9875, a3: 0.0741 });
  });

  it('every curve gives about 90 % efficiency at nominal flow', () => {
    for (const { a1, a2, a3 } of table.values()) {
      expect(1 / (a1 + a2 + a3)).toBeCloseTo(0.9, 3);
    }
  });
});

describe('parseTurbineEfficiencyCsv', () => {
  it('accepts Windows line endings, quotes and extra columns', () => {
    const csv = 'type,a1,a2,a3,comment\r\n"Kaplan",0.1,0.9,0.2,low head\r\n\r\n';
    expect(parseTurbineEfficiencyCsv(csv).get('Kaplan')).toEqual({ a1: 0.1, a2: 0.9, a3: 0.2 });
  });

  it('rejects a missing coefficient column', () => {
    expect(() => parseTurbineEfficiencyCsv('type,a1,a2\nKaplan,1,2\n', 'bad.csv')).toThrow(
      'Reference source bad.csv is malformed: missing column a3',
    );
  });

  it('rejects non-numeric cells', () => {
    expect(() => parseTurbineEfficiencyCsv('type,a1,a2,a3\nKaplan,x,2,3\n')).toThrow(InvalidReferenceTableError);
  });

  it('rejects empty cells', () => {
    expect(() => parseTurbineEfficiencyCsv('type,a1,a2,a3\nKaplan,,2,3\n')).toThrow(InvalidReferenceTableError);
  });

  it('rejects duplicate turbine types', () => {
    expect(() => parseTurbineEfficiencyCsv('type,a1,a2,a3\nA,1,2,3\nA,1,2,3\n', 'dup.csv')).toThrow(
      'Reference source dup.csv is malformed: duplicate turbine type A',
    );
  });
});

describe('parseTurbineGraph', () => {
  const polygon = { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]] };

  it('takes the type from properties.id', () => {
    const json = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: { id: 'Kaplan', source: 'diagram' }, geometry: polygon }],
    });
    expect(parseTurbineGraph(json)).toEqual([{ turbType: 'Kaplan', polygons: [polygon.coordinates] }]);
  });

  it('falls back to the feature id', () => {
    const json = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', id: 7, properties: null, geometry: polygon }],
    });
    expect(parseTurbineGraph(json)[0].turbType).toBe('7');
  });

  it('rejects a feature without any id', () => {
    const json = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: {}, geometry: polygon }],
    });
    expect(() => parseTurbineGraph(json, 'noid.geojson')).toThrow(
      'Reference source noid.geojson is malformed: feature 0 has no turbine type id',
    );
  });

  it('rejects invalid JSON and unsupported geometries', () => {
    expect(() => parseTurbineGraph('{not json')).toThrow(InvalidReferenceTableError);
    const point = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: { id: 'x' }, geometry: { type: 'Point', coordinates: [0, 0] } }],
    });
    expect(() => parseTurbineGraph(point)).toThrow(InvalidReferenceTableError);
  });
});

describe('missing sources', () => {
  it('logs and throws ReferenceSourceUnavailableError for a missing efficiency file', () => {
    const info = vi.fn();
    const logger: EngineLogger = { ...silentLogger, info };
    const expectedPath = join(DATA_DIR, 'missing_types.csv');

    expect(() => loadTurbineEfficiencyTable('missing_types.csv', logger)).toThrow(ReferenceSourceUnavailableError);
    expect(info).toHaveBeenCalledWith(`No file ${expectedPath} in data folder`);
  });

  it('carries the source path on the error', () => {
    try {
      loadTurbineClassificationTable('missing.geojson', silentLogger);
      expect.unreachable('loading a missing file should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ReferenceSourceUnavailableError);
      if (err instanceof ReferenceSourceUnavailableError) {
        expect(err.source).toBe(join(DATA_DIR, 'missing.geojson'));
        expect(err.code).toBe('REFERENCE_SOURCE_UNAVAILABLE');
      }
    }
  });
});
