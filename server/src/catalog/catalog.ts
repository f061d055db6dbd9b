import { compareBodyIds, getBodyCollection, getBodyType, isValidBodyId } from '../config/bodies';
import { InvalidBodyIdError } from '../errors';
import { logDebug, logWarn } from '../observability/logger';
import { Body, BodyIdentity, PhysicalParameters, SourceBatch } from './types';
import { mergeElementSeries, mergeStateVectorSeries } from './timeSeries';

const PHYSICAL_KEYS = ['mass', 'radius', 'albedo', 'magnitude', 'rotationPeriod', 'rotationAxis'] as const;
const MASS_DIVERGENCE_PCT = 20;

export interface IngestSummary {
  batches: number;
  sources: string[];
  bodiesCreated: number;
  elementSets: number;
  stateVectors: number;
}

/** Orders batches by source identifier; batches of one source keep their order. */
export function orderBatches(batches: readonly SourceBatch[]): SourceBatch[] {
  return batches
    .map((batch, position) => ({ batch, position }))
    .sort((a, b) => {
      if (a.batch.source !== b.batch.source) {
        return a.batch.source < b.batch.source ? -1 : 1;
      }
      return a.position - b.position;
    })
    .map(({ batch }) => batch);
}

/**
 * Every body of one build, keyed by id. Each pipeline stage receives the
 * catalog explicitly and mutates only the series it owns.
 */
export class Catalog {
  private readonly byId = new Map<string, Body>();

  get size(): number {
    return this.byId.size;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): Body | undefined {
    return this.byId.get(id);
  }

  set(body: Body): void {
    this.byId.set(body.id, body);
  }

  /**
   * Returns the body, creating an empty one typed from its id when first
   * mentioned. Ids without both a type and a collection are rejected.
   */
  ensureBody(id: string, name?: string): Body {
    const existing = this.byId.get(id);
    if (existing) {
      return existing;
    }
    if (!isValidBodyId(id)) {
      throw new InvalidBodyIdError(id);
    }
    const body: Body = {
      id,
      name: name ?? id,
      type: getBodyType(id),
      oscElements: []
    };
    this.byId.set(id, body);
    return body;
  }

  bodies(): Body[] {
    return [...this.byId.values()].sort((a, b) => compareBodyIds(a.id, b.id));
  }

  identities(): Map<string, BodyIdentity> {
    return new Map(
      this.bodies().map((body) => [
        body.id,
        { id: body.id, name: body.name, type: body.type, collection: getBodyCollection(body.id) }
      ])
    );
  }

  applyBatch(batch: SourceBatch): Body {
    const body = this.ensureBody(batch.bodyId, batch.name);
    if (batch.name) {
      body.name = batch.name;
    }

    if (batch.elements?.length) {
      mergeElementSeries(body.oscElements, batch.elements);
    }

    if (batch.vectors?.length) {
      body.stateVectors = mergeStateVectorSeries(body.stateVectors ?? [], batch.vectors);
    }

    if (batch.physical) {
      if (batch.physicalMode === 'fill') {
        fillPhysical(body, batch.physical, batch.source);
      } else {
        overwritePhysical(body, batch.physical);
      }
    }

    return body;
  }

  /**
   * Applies every batch in a deterministic order. Conflicting records are
   * resolved last-writer-wins, so the order decides the outcome.
   */
  ingest(batches: readonly SourceBatch[]): IngestSummary {
    const summary: IngestSummary = {
      batches: batches.length,
      sources: [],
      bodiesCreated: 0,
      elementSets: 0,
      stateVectors: 0
    };

    for (const batch of orderBatches(batches)) {
      if (!summary.sources.includes(batch.source)) {
        summary.sources.push(batch.source);
      }
      if (!this.has(batch.bodyId)) {
        summary.bodiesCreated += 1;
      }
      this.applyBatch(batch);
      summary.elementSets += batch.elements?.length ?? 0;
      summary.stateVectors += batch.vectors?.length ?? 0;
      logDebug('catalog_batch_applied', { source: batch.source, bodyId: batch.bodyId });
    }

    return summary;
  }
}

function overwritePhysical(body: Body, physical: PhysicalParameters): void {
  for (const key of PHYSICAL_KEYS) {
    const value = physical[key];
    if (value !== undefined) {
      assignPhysical(body, key, value);
    }
  }
}

function fillPhysical(body: Body, physical: PhysicalParameters, source: string): void {
  if (body.mass !== undefined && physical.mass !== undefined && body.mass !== 0) {
    const divergencePct = (100 * Math.abs(body.mass - physical.mass)) / body.mass;
    if (divergencePct > MASS_DIVERGENCE_PCT) {
      logWarn('physical_mass_divergence', {
        bodyId: body.id,
        name: body.name,
        source,
        catalogMassKg: body.mass,
        sourceMassKg: physical.mass,
        divergencePct: Number(divergencePct.toFixed(2))
      });
    }
  }

  for (const key of PHYSICAL_KEYS) {
    const value = physical[key];
    if (value !== undefined && body[key] === undefined) {
      assignPhysical(body, key, value);
    }
  }
}

function assignPhysical<K extends keyof PhysicalParameters>(
  target: PhysicalParameters,
  key: K,
  value: PhysicalParameters[K]
): void {
  target[key] = value;
}
