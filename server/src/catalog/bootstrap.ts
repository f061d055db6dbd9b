import { SUN_ID } from '../config/bodies';
import { errorMessage, logInfo, logWarn } from '../observability/logger';
import { BootstrapMetricOutcome, recordBootstrapOutcome } from '../observability/metrics';
import { toBarycentric } from '../orbit/frameShift';
import { solveKepler } from '../orbit/keplerSolver';
import { OsculatingElementSet } from '../orbit/types';
import { Catalog } from './catalog';
import { mergeStateVectorSeries } from './timeSeries';
import { Body } from './types';

export type BootstrapOutcome = BootstrapMetricOutcome;

export type BootstrapCounts = Record<BootstrapOutcome, number>;

/**
 * Heliocentric element set whose epoch is closest to `targetEpoch`; the
 * first one wins a tie. Degenerate sets (e >= 1) are never candidates.
 */
export function selectClosestHeliocentric(
  elements: readonly OsculatingElementSet[],
  targetEpoch: number
): OsculatingElementSet | undefined {
  let best: OsculatingElementSet | undefined;
  for (const candidate of elements) {
    if (candidate.refId !== SUN_ID || candidate.e >= 1) {
      continue;
    }
    if (!best || Math.abs(candidate.epoch - targetEpoch) < Math.abs(best.epoch - targetEpoch)) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Ensures `body` has a barycentric state vector at `targetEpoch`, solving it
 * from the closest heliocentric element set when missing.
 */
export function bootstrapStateVector(body: Body, targetEpoch: number): BootstrapOutcome {
  if (body.stateVectors?.some((vec) => vec.epoch === targetEpoch)) {
    return 'present';
  }

  const elements = selectClosestHeliocentric(body.oscElements, targetEpoch);
  if (!elements) {
    return 'no-anchor';
  }

  try {
    const state = toBarycentric(solveKepler(elements, targetEpoch, { epochTag: { label: targetEpoch } }));
    body.stateVectors = mergeStateVectorSeries(body.stateVectors ?? [], [state]);
    logInfo('state_vector_computed', {
      bodyId: body.id,
      name: body.name,
      elementsEpoch: elements.epoch,
      targetEpoch
    });
    return 'computed';
  } catch (err) {
    logWarn('state_vector_bootstrap_failed', {
      bodyId: body.id,
      name: body.name,
      elementsEpoch: elements.epoch,
      targetEpoch,
      error: errorMessage(err)
    });
    return 'failed';
  }
}

export function bootstrapCatalog(catalog: Catalog, targetEpoch: number): BootstrapCounts {
  const counts: BootstrapCounts = { present: 0, computed: 0, 'no-anchor': 0, failed: 0 };
  for (const body of catalog.bodies()) {
    const outcome = bootstrapStateVector(body, targetEpoch);
    counts[outcome] += 1;
    recordBootstrapOutcome(outcome);
  }
  return counts;
}
