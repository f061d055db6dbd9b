import { InvalidBodyIdError } from '../errors';

export type BodyType = 'star' | 'planet' | 'barycenter' | 'satellite' | 'asteroid' | 'comet';

export type BodyCollection =
  | 'major_bodies'
  | 'jovian_satellites'
  | 'saturnian_satellites'
  | 'other_satellites'
  | 'asteroids'
  | 'comets';

export const BODY_COLLECTIONS: readonly BodyCollection[] = [
  'asteroids',
  'comets',
  'jovian_satellites',
  'saturnian_satellites',
  'other_satellites',
  'major_bodies'
];

export const SUN_ID = '10';

/** Julian Date of the J2000 epoch, the catalog's canonical snapshot instant. */
export const J2000 = 2451545.0;

export const AU_TO_MM = 149_597.8707;
export const DEG_TO_RAD = Math.PI / 180;
export const SECONDS_PER_DAY = 86_400;
/** Gravitational constant in km³/(s²·kg), used to turn GM values into masses. */
export const G_KM3_PER_S2_KG = 6.67259e-20;

/**
 * Sun position (Mm) and velocity (Mm/s) relative to the solar-system
 * barycenter at J2000, ecliptic frame.
 */
export const SUN_SSB_OFFSET_J2000 = {
  x: -1.067598502264559e3,
  y: -4.182343932742174e2,
  z: 3.083761810502339e1,
  vx: 9.312570119052345e-6,
  vy: -1.282474958274199e-5,
  vz: -1.633335103087856e-7
} as const;

export interface BarycenterSplit {
  bodyId: string;
  barycenterId: string;
  bodyName: string;
}

// Bodies without moons whose ephemeris and physical data arrive under a single id.
export const BARYCENTER_SPLITS: readonly BarycenterSplit[] = [
  { bodyId: '199', barycenterId: '1', bodyName: 'Mercury' },
  { bodyId: '299', barycenterId: '2', bodyName: 'Venus' }
];

const IRREGULAR_JOVIAN_IDS = new Set([55060, 55061, 55062, 55064, 55065, 55066, 55068, 55070, 55071, 55074]);
const IRREGULAR_SATURNIAN_IDS = new Set([
  65035, 65040, 65041, 65045, 65048, 65050, 65055, 65056, 65065, 65066, 65067, 65068, 65069, 65070, 65071,
  65073, 65074, 65075, 65076, 65077, 65078
]);
const INNER_SATELLITE_IDS = new Set([301, 401, 402]);

function numericId(id: string): number | null {
  return /^\d+$/.test(id) ? Number(id) : null;
}

function typeOf(id: string): BodyType | null {
  const n = numericId(id);
  if (n !== null) {
    if (n < 10) return 'barycenter';
    if (n === 10) return 'star';
    if (n > 100 && (n + 1) % 100 === 0) return 'planet';
    if (n > 100) return 'satellite';
    return null;
  }
  if (id.startsWith('a')) return 'asteroid';
  if (id.startsWith('c')) return 'comet';
  return null;
}

function collectionOf(id: string): BodyCollection | null {
  const n = numericId(id);
  if (n !== null) {
    if (n <= 10 || (n > 100 && (n + 1) % 100 === 0)) return 'major_bodies';
    if ((n > 500 && n < 599) || (n > 55500 && n < 55510) || IRREGULAR_JOVIAN_IDS.has(n)) {
      return 'jovian_satellites';
    }
    if ((n > 600 && n < 700) || IRREGULAR_SATURNIAN_IDS.has(n)) return 'saturnian_satellites';
    if ((n > 700 && n < 999) || INNER_SATELLITE_IDS.has(n)) return 'other_satellites';
    return null;
  }
  if (id.startsWith('a')) return 'asteroids';
  if (id.startsWith('c')) return 'comets';
  return null;
}

export function isValidBodyId(id: string): boolean {
  return typeOf(id) !== null && collectionOf(id) !== null;
}

export function getBodyType(id: string): BodyType {
  const type = typeOf(id);
  if (!type) {
    throw new InvalidBodyIdError(id);
  }
  return type;
}

export function getBodyCollection(id: string): BodyCollection {
  const collection = collectionOf(id);
  if (!collection) {
    throw new InvalidBodyIdError(id);
  }
  return collection;
}

/** Numeric ids ascending first, then prefixed ids in string order. */
export function compareBodyIds(a: string, b: string): number {
  const na = numericId(a);
  const nb = numericId(b);
  if (na !== null && nb !== null) return na - nb;
  if (na !== null) return -1;
  if (nb !== null) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
