import { describe, expect, it } from 'vitest';

import { J2000, SUN_ID } from '../config/bodies';
import { OsculatingElementSet } from '../orbit/types';
import { Catalog } from './catalog';
import { degenerateElements, injectSunElements, reconcileIdentities, splitBarycenter } from './reconciliation';

const mercuryOrbit: OsculatingElementSet = {
  epoch: J2000,
  refId: SUN_ID,
  e: 0.2056,
  a: 57_909,
  i: 0.1222,
  O: 0.8435,
  w: 0.5083,
  M: 3.0507,
  p: 87.969
};

function catalogWithMercury(): Catalog {
  const catalog = new Catalog();
  catalog.set({
    id: '199',
    name: 'Mercury Barycenter',
    type: 'planet',
    mass: 3.302e23,
    radius: 2.44,
    albedo: 0.106,
    magnitude: -0.42,
    rotationPeriod: 58.6463,
    rotationAxis: [0.1, 0.2, 0.97],
    oscElements: [mercuryOrbit],
    stateVectors: [{ epoch: J2000, x: -2.1e4, y: -6.6e4, z: -3.5e3, vx: 3.6e-2, vy: -1.2e-2, vz: -4.3e-3 }]
  });
  return catalog;
}

const mercurySplit = { bodyId: '199', barycenterId: '1', bodyName: 'Mercury' };

describe('splitBarycenter', () => {
  it('moves the orbit to a barycenter and keeps the physical data on the body', () => {
    const catalog = catalogWithMercury();

    expect(splitBarycenter(catalog, mercurySplit)).toBe(true);

    const barycenter = catalog.get('1');
    expect(barycenter).toEqual({
      id: '1',
      name: 'Mercury Barycenter',
      type: 'barycenter',
      mass: 0,
      radius: 0,
      albedo: 0,
      magnitude: 0,
      rotationPeriod: 0,
      rotationAxis: [0, 0, 0],
      oscElements: [mercuryOrbit]
    });
    expect(barycenter && 'stateVectors' in barycenter).toBe(false);

    const mercury = catalog.get('199');
    expect(mercury?.name).toBe('Mercury');
    expect(mercury?.type).toBe('planet');
    expect(mercury?.mass).toBe(3.302e23);
    expect(mercury?.radius).toBe(2.44);
    expect(mercury?.oscElements).toEqual([degenerateElements('1', J2000)]);
    expect(mercury?.stateVectors).toHaveLength(1);
  });

  it('gives the barycenter its own copy of the series', () => {
    const catalog = catalogWithMercury();
    splitBarycenter(catalog, mercurySplit);

    catalog.get('1')?.oscElements.push({ ...mercuryOrbit, epoch: J2000 + 1 });
    expect(catalog.get('199')?.oscElements).toHaveLength(1);
    expect(catalog.get('1')?.oscElements[0]).not.toBe(mercuryOrbit);
  });

  it('skips a body that is missing or already split', () => {
    const empty = new Catalog();
    expect(splitBarycenter(empty, mercurySplit)).toBe(false);
    expect(empty.has('1')).toBe(false);

    const catalog = catalogWithMercury();
    splitBarycenter(catalog, mercurySplit);
    const barycenter = catalog.get('1');
    expect(splitBarycenter(catalog, mercurySplit)).toBe(false);
    expect(catalog.get('1')).toBe(barycenter);
  });

  it('merges the orbit into a barycenter the sources already reported', () => {
    const catalog = catalogWithMercury();
    const earlierOrbit = { ...mercuryOrbit, epoch: J2000 - 100 };
    catalog.set({ id: '1', name: 'Mercury Barycenter', type: 'barycenter', oscElements: [earlierOrbit] });

    expect(splitBarycenter(catalog, mercurySplit)).toBe(true);

    expect(catalog.get('1')?.oscElements).toEqual([earlierOrbit, mercuryOrbit]);
    expect(catalog.get('1')?.mass).toBeUndefined();
    expect(catalog.get('199')?.oscElements).toEqual([degenerateElements('1', J2000)]);
  });

  it('moves orbit sets that reach an already split body', () => {
    const catalog = catalogWithMercury();
    splitBarycenter(catalog, mercurySplit);
    const laterOrbit = { ...mercuryOrbit, epoch: J2000 + 30 };
    catalog.applyBatch({ source: 'horizons', bodyId: '199', elements: [laterOrbit] });

    expect(splitBarycenter(catalog, mercurySplit)).toBe(true);

    expect(catalog.get('1')?.oscElements).toEqual([mercuryOrbit, laterOrbit]);
    expect(catalog.get('1')?.mass).toBe(0);
    expect(catalog.get('199')?.oscElements).toEqual([degenerateElements('1', J2000)]);
  });
});

describe('injectSunElements', () => {
  it('adds one degenerate self-referencing element set to the Sun', () => {
    const catalog = new Catalog();
    catalog.ensureBody(SUN_ID, 'Sun');

    expect(injectSunElements(catalog)).toBe(true);
    expect(injectSunElements(catalog)).toBe(true);
    expect(catalog.get(SUN_ID)?.oscElements).toEqual([
      { epoch: J2000, refId: SUN_ID, e: 1, a: 0, i: 0, O: 0, w: 0, M: 0, p: 0 }
    ]);
  });

  it('does nothing without a Sun', () => {
    const catalog = new Catalog();
    expect(injectSunElements(catalog)).toBe(false);
    expect(catalog.size).toBe(0);
  });
});

describe('reconcileIdentities', () => {
  it('reports the Sun injection and each split it performed', () => {
    const catalog = catalogWithMercury();
    catalog.ensureBody(SUN_ID, 'Sun');

    expect(reconcileIdentities(catalog)).toEqual({
      sunElementsInjected: true,
      splits: [{ bodyId: '199', barycenterId: '1' }]
    });
    expect(catalog.has('2')).toBe(false);
  });
});
