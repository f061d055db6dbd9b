import type { BodyCollection, BodyType } from '../config/bodies';
import type { OsculatingElementSet, StateVector } from '../orbit/types';

export type Vec3 = [number, number, number];

export interface PhysicalParameters {
  /** kg */
  mass?: number;
  /** Mm */
  radius?: number;
  albedo?: number;
  magnitude?: number;
  /** days */
  rotationPeriod?: number;
  rotationAxis?: Vec3;
}

export interface Body extends PhysicalParameters {
  id: string;
  name: string;
  type: BodyType;
  oscElements: OsculatingElementSet[];
  /** Absent when the body has never been observed as a state vector. */
  stateVectors?: StateVector[];
}

export type PhysicalMode = 'overwrite' | 'fill';

/** One body's contribution from one source, already in catalog units. */
export interface SourceBatch {
  source: string;
  bodyId: string;
  name?: string;
  elements?: OsculatingElementSet[];
  vectors?: StateVector[];
  physical?: PhysicalParameters;
  physicalMode?: PhysicalMode;
}

export interface BodyIdentity {
  id: string;
  name: string;
  type: BodyType;
  collection: BodyCollection;
}
