import { describe, expect, it } from 'vitest';

import { J2000, SUN_SSB_OFFSET_J2000 } from '../config/bodies';
import { FrameShiftError } from '../errors';
import { toBarycentric } from './frameShift';
import { SolvedState } from './types';

function heliocentric(overrides: Partial<SolvedState> = {}): SolvedState {
  return {
    epoch: J2000,
    x: 100,
    y: 200,
    z: 300,
    vx: 0.1,
    vy: 0.2,
    vz: 0.3,
    frame: 'heliocentric-ecliptic',
    velocityUnit: 'Mm/s',
    converged: true,
    iterations: 3,
    residual: 0,
    ...overrides
  };
}

describe('toBarycentric', () => {
  it('adds the Sun offset to every component', () => {
    const shifted = toBarycentric(heliocentric());

    expect(shifted).toEqual({
      epoch: J2000,
      x: 100 + SUN_SSB_OFFSET_J2000.x,
      y: 200 + SUN_SSB_OFFSET_J2000.y,
      z: 300 + SUN_SSB_OFFSET_J2000.z,
      vx: 0.1 + SUN_SSB_OFFSET_J2000.vx,
      vy: 0.2 + SUN_SSB_OFFSET_J2000.vy,
      vz: 0.3 + SUN_SSB_OFFSET_J2000.vz
    });
  });

  it('only accepts states tagged with the canonical epoch', () => {
    expect(() => toBarycentric(heliocentric({ epoch: J2000 + 1 }))).toThrow(FrameShiftError);
  });

  it('only accepts per-second velocities', () => {
    expect(() => toBarycentric(heliocentric({ velocityUnit: 'Mm/day' }))).toThrow(FrameShiftError);
  });
});
