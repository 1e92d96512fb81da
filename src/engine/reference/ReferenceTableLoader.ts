/**
 * ReferenceTableLoader: reads the turbine classification diagram (GeoJSON)
 * and the turbine efficiency coefficients (CSV).
 *
 * Data source: src/data/turbines.geojson and src/data/turbine_types.csv
 * (bundled defaults).  A bare file name is looked up in the same data
 * directory; an absolute path is used as given.
 *
 * Parsing is separated from file access so tests and callers can build tables
 * from in-memory content.
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  InvalidReferenceTableError,
  ReferenceSourceUnavailableError,
} from '../errors';
import {
  TurbineEfficiencyRowSchema,
  TurbineGraphSchema,
  type PolygonRings,
  type TurbineClassificationTable,
  type TurbineEfficiencyTable,
  type TurbineRegion,
} from '../schema/ReferenceTablesV1';
import type { TurbineParams } from '../schema/PlantSpecV1';
import { consoleLogger, type EngineLogger } from '../utils/logger';

export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const DEFAULT_TURBINE_GRAPH_FILE = 'turbines.geojson';
export const DEFAULT_TURBINE_EFFICIENCY_FILE = 'turbine_types.csv';

/** Map a source name to a file path: absolute paths pass through, names resolve in DATA_DIR. */
export function resolveReferenceSource(source: string | undefined, defaultFile: string): string {
  const name = source ?? defaultFile;
  return isAbsolute(name) ? name : join(DATA_DIR, name);
}

function readSource(path: string, logger: EngineLogger): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.info(`No file ${path} in data folder`);
    }
    throw new ReferenceSourceUnavailableError(path, err);
  }
}

// ── Classification diagram ───────────────────────────────────────────────────

export function parseTurbineGraph(content: string, source = 'inline'): TurbineClassificationTable {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new InvalidReferenceTableError(source, err instanceof Error ? err.message : String(err));
  }

  const parsed = TurbineGraphSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidReferenceTableError(source, `${issue.path.join('.')}: ${issue.message}`);
  }

  return parsed.data.features.map((feature, i): TurbineRegion => {
    const id = feature.properties?.id ?? (feature.id !== undefined ? String(feature.id) : undefined);
    if (id === undefined) {
      throw new InvalidReferenceTableError(source, `feature ${i} has no turbine type id`);
    }
    const polygons: readonly PolygonRings[] =
      feature.geometry.type === 'Polygon' ? [feature.geometry.coordinates] : feature.geometry.coordinates;
    return { turbType: id, polygons };
  });
}

export function loadTurbineClassificationTable(
  source?: string,
  logger: EngineLogger = consoleLogger,
): TurbineClassificationTable {
  const path = resolveReferenceSource(source, DEFAULT_TURBINE_GRAPH_FILE);
  return parseTurbineGraph(readSource(path, logger), path);
}

// ── Efficiency coefficients ──────────────────────────────────────────────────

function splitCsvLine(line: string): string[] {
  return line.split(',').map(v => v.trim().replace(/^"|"$/g, ''));
}

/**
 * Parse the coefficient CSV.  The first column is the turbine type; columns
 * named a1, a2 and a3 hold the coefficients (any further columns are ignored).
 */
export function parseTurbineEfficiencyCsv(content: string, source = 'inline'): TurbineEfficiencyTable {
  const lines = content
    .replace(/^\uFEFF/, '') // strip UTF-8 BOM
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n')
    .filter(l => l.trim() && !l.split(',').every(v => !v.trim()));

  if (lines.length === 0) {
    throw new InvalidReferenceTableError(source, 'no header row');
  }

  const headers = splitCsvLine(lines[0]);
  const columnIndex = (name: string): number => {
    const idx = headers.indexOf(name);
    if (idx === -1) throw new InvalidReferenceTableError(source, `missing column ${name}`);
    return idx;
  };
  const a1Idx = columnIndex('a1');
  const a2Idx = columnIndex('a2');
  const a3Idx = columnIndex('a3');

  const table = new Map<string, TurbineParams>();
  lines.slice(1).forEach((line, i) => {
    const vals = splitCsvLine(line);
    const parsed = TurbineEfficiencyRowSchema.safeParse({
      turb_type: vals[0] ?? '',
      a1: vals[a1Idx] ?? '',
      a2: vals[a2Idx] ?? '',
      a3: vals[a3Idx] ?? '',
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidReferenceTableError(source, `row ${i + 2}, ${issue.path.join('.')}: ${issue.message}`);
    }
    const { turb_type, a1, a2, a3 } = parsed.data;
    if (table.has(turb_type)) {
      throw new InvalidReferenceTableError(source, `duplicate turbine type ${turb_type}`);
    }
    table.set(turb_type, { a1, a2, a3 });
  });

  return table;
}

export function loadTurbineEfficiencyTable(
  source?: string,
  logger: EngineLogger = consoleLogger,
): TurbineEfficiencyTable {
  const path = resolveReferenceSource(source, DEFAULT_TURBINE_EFFICIENCY_FILE);
  return parseTurbineEfficiencyCsv(readSource(path, logger), path);
}
