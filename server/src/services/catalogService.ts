import { bootstrapCatalog, BootstrapCounts } from '../catalog/bootstrap';
import { Catalog, IngestSummary } from '../catalog/catalog';
import { reconcileIdentities, ReconciliationReport } from '../catalog/reconciliation';
import { Body, SourceBatch } from '../catalog/types';
import { getBodyCollection, BodyCollection } from '../config/bodies';
import {
  CANONICAL_EPOCH,
  CATALOG_DATABASE_DIR,
  CATALOG_REMOTE_SOURCES_URL,
  CATALOG_SOURCES_DIR
} from '../config/pipeline';
import { errorMessage, logError, logInfo } from '../observability/logger';
import { recordCatalogBuild } from '../observability/metrics';
import { loadDatabase, saveDatabase } from '../persistence/database';
import { fetchRemoteSources, loadSourceDirectory } from '../sources/loadSources';

export interface BuildOptions {
  /** Database the build starts from; every source batch is merged on top of it. */
  databaseDir?: string;
  sourcesDir?: string;
  remoteSourcesUrl?: string;
  /** Extra batches, applied together with the loaded ones. */
  batches?: readonly SourceBatch[];
  targetEpoch?: number;
  requestId?: string;
}

export interface BuildSummary {
  persistedBodies: number;
  ingest: IngestSummary;
  bootstrap: BootstrapCounts;
  reconciliation: ReconciliationReport;
  targetEpoch: number;
  durationMs: number;
}

export interface BuildResult {
  catalog: Catalog;
  summary: BuildSummary;
}

export type CatalogBody = Body & { collection: BodyCollection };

export type CatalogPayload = {
  source: string;
  updatedAt: string;
  canonicalEpoch: number;
  bodies: CatalogBody[];
  metadata: {
    sources: string[];
    summary?: BuildSummary;
    cacheStatus?: 'HIT' | 'MISS' | 'FROZEN';
    cacheBackend?: 'redis' | 'memory';
    cacheAgeMs?: number;
    cacheExpiresInMs?: number;
    generatedAt?: string;
    frozenSnapshot?: boolean;
    freezeReason?: string;
    requestId?: string;
  };
};

async function collectBatches(options: BuildOptions): Promise<SourceBatch[]> {
  const batches: SourceBatch[] = [];
  const sourcesDir = options.sourcesDir ?? CATALOG_SOURCES_DIR;
  batches.push(...(await loadSourceDirectory(sourcesDir)));

  const remoteUrl = options.remoteSourcesUrl ?? CATALOG_REMOTE_SOURCES_URL;
  if (remoteUrl) {
    batches.push(...(await fetchRemoteSources(remoteUrl, options.requestId)));
  }

  batches.push(...(options.batches ?? []));
  return batches;
}

/**
 * One build pass: load the persisted catalog, fold every source batch into
 * it, backfill the canonical-epoch state vectors, then reconcile identities.
 */
export async function buildCatalog(options: BuildOptions = {}): Promise<BuildResult> {
  const started = Date.now();
  const targetEpoch = options.targetEpoch ?? CANONICAL_EPOCH;
  logInfo('catalog_build_started', { requestId: options.requestId, targetEpoch });

  try {
    const catalog = await loadDatabase(options.databaseDir ?? CATALOG_DATABASE_DIR);
    const persistedBodies = catalog.size;
    const batches = await collectBatches(options);
    const ingest = catalog.ingest(batches);
    const bootstrap = bootstrapCatalog(catalog, targetEpoch);
    const reconciliation = reconcileIdentities(catalog, { epoch: targetEpoch });

    const durationMs = Date.now() - started;
    recordCatalogBuild(durationMs, catalog.size);
    logInfo('catalog_built', {
      requestId: options.requestId,
      bodies: catalog.size,
      persistedBodies,
      sources: ingest.sources,
      bootstrap,
      durationMs
    });

    return {
      catalog,
      summary: { persistedBodies, ingest, bootstrap, reconciliation, targetEpoch, durationMs }
    };
  } catch (err) {
    logError('catalog_build_failed', { requestId: options.requestId, error: errorMessage(err) });
    throw err;
  }
}

export function toCatalogPayload(catalog: Catalog, summary?: BuildSummary): CatalogPayload {
  const sources = summary?.ingest.sources ?? ['database'];
  return {
    source: sources.join('+'),
    updatedAt: new Date().toISOString(),
    canonicalEpoch: summary?.targetEpoch ?? CANONICAL_EPOCH,
    bodies: catalog.bodies().map((body) => ({ ...body, collection: getBodyCollection(body.id) })),
    metadata: { sources, summary }
  };
}

/** Runs a build pass over the persisted catalog and saves the result back. */
export async function rebuildAndSave(options: BuildOptions = {}): Promise<CatalogPayload> {
  const { catalog, summary } = await buildCatalog(options);
  await saveDatabase(catalog, options.databaseDir ?? CATALOG_DATABASE_DIR);
  return toCatalogPayload(catalog, summary);
}

/**
 * Catalog as last persisted; rebuilt from the sources when nothing has been
 * persisted yet.
 */
export async function loadCatalogPayload(options: BuildOptions = {}): Promise<CatalogPayload> {
  const persisted = await loadDatabase(options.databaseDir ?? CATALOG_DATABASE_DIR);
  if (persisted.size > 0) {
    return toCatalogPayload(persisted);
  }
  return rebuildAndSave(options);
}
