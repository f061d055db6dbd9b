import { J2000, SUN_SSB_OFFSET_J2000 } from '../config/bodies';
import { FrameShiftError } from '../errors';
import { SolvedState, StateVector } from './types';

/**
 * Moves a heliocentric J2000 state to the solar-system barycenter by adding
 * the Sun's barycentric offset at J2000. The offset is only valid at that
 * instant, so any other epoch tag is rejected.
 */
export function toBarycentric(state: SolvedState): StateVector {
  if (state.epoch !== J2000) {
    throw new FrameShiftError(`Barycentric offset is only known at J2000 (${J2000}), got epoch ${state.epoch}`);
  }
  if (state.velocityUnit !== 'Mm/s') {
    throw new FrameShiftError(`Barycentric offset velocities are in Mm/s, got ${state.velocityUnit}`);
  }

  const offset = SUN_SSB_OFFSET_J2000;
  return {
    epoch: state.epoch,
    x: state.x + offset.x,
    y: state.y + offset.y,
    z: state.z + offset.z,
    vx: state.vx + offset.vx,
    vy: state.vy + offset.vy,
    vz: state.vz + offset.vz
  };
}
