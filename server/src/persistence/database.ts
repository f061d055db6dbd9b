import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { Catalog } from '../catalog/catalog';
import { elementSetKey, isStrictlyAscending, stateVectorKey } from '../catalog/timeSeries';
import { Body } from '../catalog/types';
import { BODY_COLLECTIONS, BodyCollection, compareBodyIds, getBodyCollection, isValidBodyId } from '../config/bodies';
import { SeriesInvariantError, SourceValidationError, isMissingFileError } from '../errors';
import { errorMessage, logInfo } from '../observability/logger';
import { formatIssues } from '../sources/schema';

const finite = z.number().finite();

/** `[epoch, x, y, z, vx, vy, vz]` */
type StoredStateVector = [number, number, number, number, number, number, number];

const StoredElementSetSchema = z.object({
  epoch: finite,
  ref_id: z.string(),
  e: finite,
  a: finite,
  i: finite,
  O: finite,
  w: finite,
  M: finite,
  p: finite
});

const StoredBodySchema = z.object({
  name: z.string(),
  type: z.enum(['star', 'planet', 'barycenter', 'satellite', 'asteroid', 'comet']),
  mass: finite.optional(),
  radius: finite.optional(),
  albedo: finite.optional(),
  magnitude: finite.optional(),
  rotation_period: finite.optional(),
  rotation_axis: z.tuple([finite, finite, finite]).optional(),
  osc_elements: z.array(StoredElementSetSchema),
  state_vectors: z.array(z.tuple([finite, finite, finite, finite, finite, finite, finite])).optional()
});

const StoredCollectionSchema = z.record(StoredBodySchema);

type StoredBody = z.infer<typeof StoredBodySchema>;

function collectionPath(dir: string, collection: BodyCollection): string {
  return path.join(dir, `${collection}.json`);
}

function toStoredBody(body: Body): StoredBody {
  return {
    name: body.name,
    type: body.type,
    mass: body.mass,
    radius: body.radius,
    albedo: body.albedo,
    magnitude: body.magnitude,
    rotation_period: body.rotationPeriod,
    rotation_axis: body.rotationAxis,
    osc_elements: body.oscElements.map(({ refId, ...rest }) => ({ ...rest, ref_id: refId })),
    state_vectors: body.stateVectors?.map(
      (vec): StoredStateVector => [vec.epoch, vec.x, vec.y, vec.z, vec.vx, vec.vy, vec.vz]
    )
  };
}

function fromStoredBody(id: string, stored: StoredBody): Body {
  const body: Body = {
    id,
    name: stored.name,
    type: stored.type,
    oscElements: stored.osc_elements.map(({ ref_id, ...rest }) => ({ ...rest, refId: ref_id }))
  };
  if (stored.mass !== undefined) body.mass = stored.mass;
  if (stored.radius !== undefined) body.radius = stored.radius;
  if (stored.albedo !== undefined) body.albedo = stored.albedo;
  if (stored.magnitude !== undefined) body.magnitude = stored.magnitude;
  if (stored.rotation_period !== undefined) body.rotationPeriod = stored.rotation_period;
  if (stored.rotation_axis !== undefined) body.rotationAxis = stored.rotation_axis;
  if (stored.state_vectors !== undefined) {
    body.stateVectors = stored.state_vectors.map(([epoch, x, y, z, vx, vy, vz]) => ({ epoch, x, y, z, vx, vy, vz }));
  }
  return body;
}

export function assertSeriesInvariants(body: Body): void {
  if (!isStrictlyAscending(body.oscElements, elementSetKey)) {
    throw new SeriesInvariantError(body.id, 'oscElements');
  }
  if (body.stateVectors && !isStrictlyAscending(body.stateVectors, stateVectorKey)) {
    throw new SeriesInvariantError(body.id, 'stateVectors');
  }
}

/** Groups bodies per collection file, ids sorted numerically first. */
export function toCollections(catalog: Catalog): Record<BodyCollection, Record<string, StoredBody>> {
  const collections: Record<BodyCollection, Record<string, StoredBody>> = {
    asteroids: {},
    comets: {},
    jovian_satellites: {},
    saturnian_satellites: {},
    other_satellites: {},
    major_bodies: {}
  };

  for (const body of catalog.bodies()) {
    assertSeriesInvariants(body);
    collections[getBodyCollection(body.id)][body.id] = toStoredBody(body);
  }
  return collections;
}

export async function saveDatabase(catalog: Catalog, dir: string): Promise<void> {
  const collections = toCollections(catalog);
  await fs.mkdir(dir, { recursive: true });

  for (const collection of BODY_COLLECTIONS) {
    await fs.writeFile(collectionPath(dir, collection), JSON.stringify(collections[collection]), 'utf8');
  }

  logInfo('database_saved', { dir, bodies: catalog.size });
}

export async function loadDatabase(dir: string): Promise<Catalog> {
  const catalog = new Catalog();

  for (const collection of BODY_COLLECTIONS) {
    const filePath = collectionPath(dir, collection);
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      // A collection that was never written is empty.
      if (isMissingFileError(err)) continue;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SourceValidationError(filePath, [`malformed JSON: ${errorMessage(err)}`]);
    }

    const parsed = StoredCollectionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceValidationError(filePath, formatIssues(parsed.error));
    }

    const ids = Object.keys(parsed.data).sort(compareBodyIds);
    for (const id of ids) {
      if (!isValidBodyId(id)) {
        throw new SourceValidationError(filePath, [`${id}: unexpected body id`]);
      }
      const body = fromStoredBody(id, parsed.data[id]);
      assertSeriesInvariants(body);
      catalog.set(body);
    }
  }

  logInfo('database_loaded', { dir, bodies: catalog.size });
  return catalog;
}
