/**
 * ReferenceTablesV1: shapes of the two reference datasets the engine queries.
 *
 *   TurbineClassificationTable  ordered regions in the (dV_n [m³/s], h_n [m])
 *                               plane, each naming one turbine type
 *   TurbineEfficiencyTable      turbine type → efficiency-curve coefficients
 *
 * The zod schemas validate the raw file content (GeoJSON / CSV rows) before it
 * is converted to these in-memory tables.
 */

import { z } from 'zod';
import type { TurbineParams } from './PlantSpecV1';

// ── Classification (GeoJSON) ─────────────────────────────────────────────────

const PositionSchema = z.array(z.number().finite()).min(2);
const LinearRingSchema = z.array(PositionSchema).min(4);
const PolygonCoordinatesSchema = z.array(LinearRingSchema).min(1);

const GeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: PolygonCoordinatesSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(PolygonCoordinatesSchema).min(1) }),
]);

const FeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  properties: z.object({ id: z.string().min(1).optional() }).passthrough().nullable(),
  geometry: GeometrySchema,
});

export const TurbineGraphSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema),
});

/** [x, y] = [flow m³/s, head m]; extra ordinates are ignored. */
export type Position = readonly number[];
export type LinearRing = readonly Position[];
/** Outer ring first, then holes. */
export type PolygonRings = readonly LinearRing[];

export interface TurbineRegion {
  readonly turbType: string;
  readonly polygons: readonly PolygonRings[];
}

/** Regions in source order; the first containing region wins. */
export type TurbineClassificationTable = readonly TurbineRegion[];

// ── Efficiency coefficients (CSV) ────────────────────────────────────────────

const NumericCellSchema = z.string().trim().min(1).pipe(z.coerce.number().finite());

export const TurbineEfficiencyRowSchema = z.object({
  turb_type: z.string().trim().min(1),
  a1: NumericCellSchema,
  a2: NumericCellSchema,
  a3: NumericCellSchema,
});

/** Insertion order follows the source file. */
export type TurbineEfficiencyTable = ReadonlyMap<string, TurbineParams>;
