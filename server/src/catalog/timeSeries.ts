import type { OsculatingElementSet, StateVector } from '../orbit/types';

/** Total order over the records of one series; 0 means "same key". */
export type KeyComparator<T> = (a: T, b: T) => number;

export const elementSetKey: KeyComparator<OsculatingElementSet> = (a, b) => {
  if (a.epoch !== b.epoch) return a.epoch - b.epoch;
  if (a.refId === b.refId) return 0;
  return a.refId < b.refId ? -1 : 1;
};

export const stateVectorKey: KeyComparator<StateVector> = (a, b) => a.epoch - b.epoch;

/**
 * Folds `incoming` into `existing` in place and returns it.
 *
 * Equal keys replace the existing slot (the record processed last wins),
 * new keys are inserted before the first greater key, so entries that are
 * not touched keep their relative positions. `existing` must already be
 * strictly ascending; it stays so afterwards.
 */
export function mergeSeries<T>(existing: T[], incoming: readonly T[], compare: KeyComparator<T>): T[] {
  const sorted = [...incoming].sort(compare);

  for (const record of sorted) {
    let index = 0;
    while (index < existing.length) {
      const order = compare(existing[index], record);
      if (order === 0) {
        existing[index] = record;
        break;
      }
      if (order > 0) {
        existing.splice(index, 0, record);
        break;
      }
      index += 1;
    }
    if (index === existing.length) {
      existing.push(record);
    }
  }

  return existing;
}

export function mergeElementSeries(
  existing: OsculatingElementSet[],
  incoming: readonly OsculatingElementSet[]
): OsculatingElementSet[] {
  return mergeSeries(existing, incoming, elementSetKey);
}

export function mergeStateVectorSeries(existing: StateVector[], incoming: readonly StateVector[]): StateVector[] {
  return mergeSeries(existing, incoming, stateVectorKey);
}

export function isStrictlyAscending<T>(series: readonly T[], compare: KeyComparator<T>): boolean {
  for (let index = 1; index < series.length; index += 1) {
    if (compare(series[index - 1], series[index]) >= 0) {
      return false;
    }
  }
  return true;
}
