import { SECONDS_PER_DAY, SUN_ID } from '../config/bodies';
import { NonPositivePeriodError, UnsupportedCenterError, UnsupportedOrbitError } from '../errors';
import { logWarn } from '../observability/logger';
import { recordKeplerNonConvergence } from '../observability/metrics';
import { OsculatingElementSet, SolvedState, SolveOptions } from './types';

export const NEWTON_RAPHSON_MAX_ITERATIONS = 30;
export const NEWTON_RAPHSON_TOLERANCE = 1e-10;

export interface EccentricAnomaly {
  E: number;
  residual: number;
  iterations: number;
  converged: boolean;
}

/** Newton-Raphson on `E - e·sin(E) = M`, starting from `E = M`. */
export function solveEccentricAnomaly(M: number, e: number): EccentricAnomaly {
  let E = M;
  let residual = E - e * Math.sin(E) - M;
  let iterations = 0;

  while (Math.abs(residual) > NEWTON_RAPHSON_TOLERANCE && iterations < NEWTON_RAPHSON_MAX_ITERATIONS) {
    E -= residual / (1 - e * Math.cos(E));
    residual = E - e * Math.sin(E) - M;
    iterations += 1;
  }

  return {
    E,
    residual,
    iterations,
    converged: Math.abs(residual) <= NEWTON_RAPHSON_TOLERANCE
  };
}

function assertSolvable(elements: OsculatingElementSet): void {
  if (elements.refId !== SUN_ID) {
    throw new UnsupportedCenterError(elements.refId);
  }
  if (!Number.isFinite(elements.p) || elements.p <= 0) {
    throw new NonPositivePeriodError(elements.p);
  }
  if (!(elements.e >= 0 && elements.e < 1)) {
    throw new UnsupportedOrbitError(elements.e);
  }
}

/**
 * State vector at instant `t` (Julian Date) for a heliocentric osculating
 * element set, expressed in the Sun-centered ecliptic frame.
 */
export function solveKepler(
  elements: OsculatingElementSet,
  t: number,
  options: SolveOptions
): SolvedState {
  assertSolvable(elements);

  const { a, e, i: inc, O, w, M: M0, p, epoch } = elements;
  const velocityUnit = options.velocityUnit ?? 'Mm/s';

  // Earlier instants move forward by whole periods, in one step.
  let instant = t;
  if (instant < epoch) {
    instant += Math.ceil((epoch - instant) / p) * p;
  }

  const n = (2 * Math.PI) / p;
  const u = n * n * a ** 3;
  const M = M0 + n * (instant - epoch);

  const anomaly = solveEccentricAnomaly(M, e);
  if (!anomaly.converged) {
    recordKeplerNonConvergence();
    logWarn('kepler_not_converged', {
      refId: elements.refId,
      epoch,
      instant,
      eccentricity: e,
      residual: anomaly.residual,
      iterations: anomaly.iterations
    });
  }
  const E = anomaly.E;

  const v = 2 * Math.atan2(Math.sqrt(1 + e) * Math.sin(E / 2), Math.sqrt(1 - e) * Math.cos(E / 2));
  const r = a * (1 - e * Math.cos(E));

  const px = r * Math.cos(v);
  const py = r * Math.sin(v);

  const scalar = Math.sqrt(u * a) / r;
  const pvx = -scalar * Math.sin(E);
  const pvy = scalar * Math.sqrt(1 - e * e) * Math.cos(E);

  const cosw = Math.cos(w);
  const sinw = Math.sin(w);
  const coso = Math.cos(O);
  const sino = Math.sin(O);
  const cosi = Math.cos(inc);
  const sini = Math.sin(inc);

  // argument of periapsis -> inclination -> ascending node
  const xx = cosw * coso - sinw * cosi * sino;
  const xy = sinw * coso + cosw * cosi * sino;
  const yx = cosw * sino + sinw * cosi * coso;
  const yy = cosw * cosi * coso - sinw * sino;
  const zx = sinw * sini;
  const zy = cosw * sini;

  const velocityScale = velocityUnit === 'Mm/s' ? 1 / SECONDS_PER_DAY : 1;

  return {
    epoch: options.epochTag === 'query' ? t : options.epochTag.label,
    x: px * xx - py * xy,
    y: px * yx + py * yy,
    z: px * zx + py * zy,
    vx: (pvx * xx - pvy * xy) * velocityScale,
    vy: (pvx * yx + pvy * yy) * velocityScale,
    vz: (pvx * zx + pvy * zy) * velocityScale,
    frame: 'heliocentric-ecliptic',
    velocityUnit,
    converged: anomaly.converged,
    iterations: anomaly.iterations,
    residual: anomaly.residual
  };
}
