/** Osculating elements: `a` in Mm, angles in radians, `epoch` as Julian Date, `p` in days. */
export interface OsculatingElementSet {
  epoch: number;
  refId: string;
  e: number;
  a: number;
  i: number;
  O: number;
  w: number;
  M: number;
  p: number;
}

/** Position in Mm, velocity in Mm/s unless stated otherwise by the producer. */
export interface StateVector {
  epoch: number;
  x: number;
  y: number;
  z: number;
  vx: number;
  vy: number;
  vz: number;
}

export type VelocityUnit = 'Mm/s' | 'Mm/day';

export type ReferenceFrame = 'heliocentric-ecliptic' | 'ssb-ecliptic';

/**
 * How the solver stamps the emitted state:
 * - `'query'` echoes the requested instant as passed by the caller
 * - `{ label }` stamps a fixed canonical label (single-instant snapshots)
 */
export type EpochTag = 'query' | { label: number };

export interface SolveOptions {
  epochTag: EpochTag;
  velocityUnit?: VelocityUnit;
}

export interface SolvedState extends StateVector {
  frame: 'heliocentric-ecliptic';
  velocityUnit: VelocityUnit;
  converged: boolean;
  iterations: number;
  residual: number;
}
