import { BARYCENTER_SPLITS, BarycenterSplit, J2000, SUN_ID } from '../config/bodies';
import { logInfo } from '../observability/logger';
import { OsculatingElementSet } from '../orbit/types';
import { Catalog } from './catalog';
import { mergeElementSeries } from './timeSeries';
import { Body } from './types';

export interface ReconciliationOptions {
  epoch?: number;
  splits?: readonly BarycenterSplit[];
}

export interface ReconciliationReport {
  sunElementsInjected: boolean;
  splits: Array<{ bodyId: string; barycenterId: string }>;
}

/**
 * Element set for a body that sits at its reference point. `e = 1` marks
 * it as not dynamically solvable.
 */
export function degenerateElements(refId: string, epoch: number): OsculatingElementSet {
  return { epoch, refId, e: 1, a: 0, i: 0, O: 0, w: 0, M: 0, p: 0 };
}

export function injectSunElements(catalog: Catalog, epoch: number = J2000): boolean {
  const sun = catalog.get(SUN_ID);
  if (!sun) {
    return false;
  }
  mergeElementSeries(sun.oscElements, [degenerateElements(SUN_ID, epoch)]);
  return true;
}

function zeroedBarycenter(body: Body, split: BarycenterSplit): Body {
  // Copy first: both entries are derived from the same combined record.
  const barycenter: Body = structuredClone(body);
  barycenter.id = split.barycenterId;
  barycenter.name = `${split.bodyName} Barycenter`;
  barycenter.type = 'barycenter';
  barycenter.oscElements = [];
  barycenter.mass = 0;
  barycenter.radius = 0;
  barycenter.albedo = 0;
  barycenter.magnitude = 0;
  barycenter.rotationPeriod = 0;
  barycenter.rotationAxis = [0, 0, 0];
  delete barycenter.stateVectors;
  return barycenter;
}

/**
 * Separates a body reported under one id together with its barycenter: the
 * barycenter keeps the orbit, the body keeps the physical data. Orbit sets
 * that reach an already split body later are moved the same way, and a
 * barycenter that already exists receives them through the merge engine.
 */
export function splitBarycenter(catalog: Catalog, split: BarycenterSplit, epoch: number = J2000): boolean {
  const body = catalog.get(split.bodyId);
  if (!body) {
    return false;
  }

  const placeholders = body.oscElements.filter((el) => el.refId === split.barycenterId);
  const orbit = body.oscElements.filter((el) => el.refId !== split.barycenterId);
  if (placeholders.length > 0 && orbit.length === 0) {
    return false;
  }

  const barycenter = catalog.get(split.barycenterId) ?? zeroedBarycenter(body, split);
  mergeElementSeries(barycenter.oscElements, structuredClone(orbit));
  catalog.set(barycenter);

  mergeElementSeries(placeholders, [degenerateElements(split.barycenterId, epoch)]);
  body.name = split.bodyName;
  body.oscElements = placeholders;
  return true;
}

export function reconcileIdentities(catalog: Catalog, options: ReconciliationOptions = {}): ReconciliationReport {
  const epoch = options.epoch ?? J2000;
  const report: ReconciliationReport = {
    sunElementsInjected: injectSunElements(catalog, epoch),
    splits: []
  };

  for (const split of options.splits ?? BARYCENTER_SPLITS) {
    if (splitBarycenter(catalog, split, epoch)) {
      report.splits.push({ bodyId: split.bodyId, barycenterId: split.barycenterId });
    }
  }

  logInfo('identities_reconciled', {
    sunElementsInjected: report.sunElementsInjected,
    splits: report.splits.map((s) => `${s.bodyId}->${s.barycenterId}`)
  });
  return report;
}
