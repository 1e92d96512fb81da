/**
 * TurbineClassificationModule: turbine type from the flow/head application
 * diagram.
 *
 * Each turbine family occupies a polygonal zone of the (dV_n, h_n) plane.  The
 * plant's nominal operating point is located on the diagram and the first
 * containing zone (table order) gives the type.  Outside every zone the plant
 * gets the generic 'dummy' type; this is a degraded result, not an error.
 */

import { DUMMY_TURBINE_TYPE } from '../constants';
import { polygonContains } from '../reference/geometry';
import type { TurbineClassificationTable } from '../schema/ReferenceTablesV1';

export interface TurbineClassificationResultV1 {
  turbType: string;
  source: 'diagram' | 'dummy';
  /** Every zone containing the point, in table order. */
  matches: string[];
  notes: string[];
}

/** Turbine types of every region containing (dV_n, h_n), in table order. */
export function findContainingRegions(
  dV_n: number,
  h_n: number,
  table: TurbineClassificationTable,
): string[] {
  return table
    .filter((region) => region.polygons.some((polygon) => polygonContains(polygon, dV_n, h_n)))
    .map((region) => region.turbType);
}

export function classifyTurbineTypeV1(
  dV_n: number,
  h_n: number,
  table: TurbineClassificationTable,
): TurbineClassificationResultV1 {
  const matches = findContainingRegions(dV_n, h_n, table);

  if (matches.length === 0) {
    return {
      turbType: DUMMY_TURBINE_TYPE,
      source: 'dummy',
      matches,
      notes: [`No turbine zone contains dV_n = ${dV_n} m³/s, h_n = ${h_n} m; generic turbine curve used.`],
    };
  }

  const notes = [`Turbine type ${matches[0]} from the application diagram.`];
  if (matches.length > 1) {
    notes.push(`Operating point also lies in: ${matches.slice(1).join(', ')}.`);
  }
  return { turbType: matches[0], source: 'diagram', matches, notes };
}
