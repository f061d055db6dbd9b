import { z } from 'zod';

import { AU_TO_MM, DEG_TO_RAD, G_KM3_PER_S2_KG, isValidBodyId } from '../config/bodies';
import type { PhysicalParameters, SourceBatch } from '../catalog/types';
import type { OsculatingElementSet, StateVector } from '../orbit/types';

const finite = z.number().finite();

/** Elements as extracted: `a` in AU, angles in degrees, `p` in days. */
export const RawElementSetSchema = z.object({
  epoch: finite,
  refId: z.string().min(1),
  e: finite.nonnegative(),
  a: finite,
  i: finite,
  O: finite,
  w: finite,
  M: finite,
  p: finite
});

/** Cartesian state as extracted: km and km/s. */
export const RawStateVectorSchema = z.object({
  epoch: finite,
  x: finite,
  y: finite,
  z: finite,
  vx: finite,
  vy: finite,
  vz: finite
});

export const RawPhysicalSchema = z
  .object({
    massKg: finite.nonnegative().optional(),
    gm: finite.nonnegative().optional(),
    radiusKm: finite.nonnegative().optional(),
    albedo: finite.optional(),
    magnitude: finite.optional(),
    rotationPeriodHours: finite.optional(),
    rotationAxis: z.tuple([finite, finite, finite]).optional()
  })
  .refine((value) => value.massKg === undefined || value.gm === undefined, {
    message: 'give either massKg or gm, not both'
  });

export const RawBatchSchema = z.object({
  bodyId: z.string().refine(isValidBodyId, { message: 'unexpected body id' }),
  name: z.string().min(1).optional(),
  elements: z.array(RawElementSetSchema).optional(),
  vectors: z.array(RawStateVectorSchema).optional(),
  physical: RawPhysicalSchema.optional(),
  physicalMode: z.enum(['overwrite', 'fill']).optional()
});

export const SourceFileSchema = z.object({
  source: z.string().min(1),
  batches: z.array(RawBatchSchema)
});

export const SourceManifestSchema = z.object({
  sources: z.array(SourceFileSchema)
});

export type RawElementSet = z.infer<typeof RawElementSetSchema>;
export type RawStateVector = z.infer<typeof RawStateVectorSchema>;
export type RawPhysical = z.infer<typeof RawPhysicalSchema>;
export type RawBatch = z.infer<typeof RawBatchSchema>;
export type SourceFile = z.infer<typeof SourceFileSchema>;

export function normalizeElementSet(raw: RawElementSet): OsculatingElementSet {
  return {
    epoch: raw.epoch,
    refId: raw.refId,
    e: raw.e,
    a: raw.a * AU_TO_MM,
    i: raw.i * DEG_TO_RAD,
    O: raw.O * DEG_TO_RAD,
    w: raw.w * DEG_TO_RAD,
    M: raw.M * DEG_TO_RAD,
    p: raw.p
  };
}

export function normalizeStateVector(raw: RawStateVector): StateVector {
  return {
    epoch: raw.epoch,
    x: raw.x / 1000,
    y: raw.y / 1000,
    z: raw.z / 1000,
    vx: raw.vx / 1000,
    vy: raw.vy / 1000,
    vz: raw.vz / 1000
  };
}

export function normalizePhysical(raw: RawPhysical): PhysicalParameters {
  const physical: PhysicalParameters = {};
  if (raw.massKg !== undefined) physical.mass = raw.massKg;
  if (raw.gm !== undefined) physical.mass = raw.gm / G_KM3_PER_S2_KG;
  if (raw.radiusKm !== undefined) physical.radius = raw.radiusKm / 1000;
  if (raw.albedo !== undefined) physical.albedo = raw.albedo;
  if (raw.magnitude !== undefined) physical.magnitude = raw.magnitude;
  if (raw.rotationPeriodHours !== undefined) physical.rotationPeriod = raw.rotationPeriodHours / 24;
  if (raw.rotationAxis !== undefined) physical.rotationAxis = raw.rotationAxis;
  return physical;
}

export function toSourceBatches(file: SourceFile): SourceBatch[] {
  return file.batches.map((raw) => ({
    source: file.source,
    bodyId: raw.bodyId,
    name: raw.name,
    elements: raw.elements?.map(normalizeElementSet),
    vectors: raw.vectors?.map(normalizeStateVector),
    physical: raw.physical ? normalizePhysical(raw.physical) : undefined,
    physicalMode: raw.physicalMode
  }));
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
