import { createClient } from 'redis';

import { CacheBackend, recordCacheHit, recordCacheMiss } from '../observability/metrics';
import { errorMessage, logError, logInfo, logWarn } from '../observability/logger';
import { CatalogPayload, loadCatalogPayload, rebuildAndSave } from '../services/catalogService';

type RedisClient = ReturnType<typeof createClient>;

interface CacheRecord {
  payload: CatalogPayload;
  cachedAt: number;
  expiresAt: number;
}

export interface SnapshotResult {
  payload: CatalogPayload;
  cacheState: 'HIT' | 'MISS' | 'FROZEN';
  cacheBackend: CacheBackend;
  cacheAgeMs: number;
}

const CACHE_KEY = 'orbit-catalog:snapshot:v1';
export const CATALOG_CACHE_TTL_MS = Number(process.env.CATALOG_CACHE_TTL_MS ?? 6 * 60 * 60 * 1000);

let redisClient: RedisClient | null = null;
let redisReady: Promise<RedisClient | null> | null = null;

// Copie mémoire du dernier snapshot (repli si Redis est indisponible)
let memoryCache: CacheRecord | null = null;
let inflight: Promise<SnapshotResult> | null = null;

function initRedisClient(): void {
  if (!process.env.REDIS_URL) {
    return;
  }

  const client = createClient({ url: process.env.REDIS_URL });
  redisClient = client;

  client.on('error', (err: unknown) => {
    logWarn('redis_error', { error: errorMessage(err) });
  });

  redisReady = client
    .connect()
    .then(() => {
      logInfo('redis_connected', { url: process.env.REDIS_URL });
      return client;
    })
    .catch((err: unknown) => {
      logWarn('redis_connect_failed', { error: errorMessage(err) });
      redisClient = null;
      return null;
    });
}

initRedisClient();

async function getRedisClient(): Promise<RedisClient | null> {
  if (!redisReady) {
    return null;
  }
  const client = await redisReady;
  return client && redisClient ? client : null;
}

async function readCache(): Promise<CacheRecord | null> {
  const client = await getRedisClient();
  if (client) {
    try {
      const raw = await client.get(CACHE_KEY);
      if (raw) {
        const parsed: CacheRecord = JSON.parse(raw);
        memoryCache = parsed;
        return parsed;
      }
    } catch (err) {
      logWarn('redis_read_failed', { error: errorMessage(err) });
    }
  }

  return memoryCache;
}

async function writeCache(record: CacheRecord, backend: CacheBackend): Promise<void> {
  memoryCache = record;

  const client = await getRedisClient();
  if (client && backend === 'redis') {
    try {
      await client.set(CACHE_KEY, JSON.stringify(record), {
        PX: Math.max(1, record.expiresAt - record.cachedAt)
      });
    } catch (err) {
      logWarn('redis_write_failed', { error: errorMessage(err) });
    }
  }
}

function decoratePayload(
  payload: CatalogPayload,
  cacheState: SnapshotResult['cacheState'],
  backend: CacheBackend,
  cacheAgeMs: number,
  requestId?: string
): CatalogPayload {
  return {
    ...payload,
    metadata: {
      ...payload.metadata,
      cacheStatus: cacheState,
      cacheBackend: backend,
      cacheAgeMs,
      cacheExpiresInMs: cacheState === 'FROZEN' ? 0 : Math.max(0, CATALOG_CACHE_TTL_MS - cacheAgeMs),
      generatedAt: payload.metadata.generatedAt ?? new Date(Date.now() - cacheAgeMs).toISOString(),
      requestId: requestId ?? payload.metadata.requestId
    }
  };
}

async function refreshSnapshot(reason: 'miss' | 'manual-refresh', requestId?: string): Promise<SnapshotResult> {
  const backend: CacheBackend = (await getRedisClient()) ? 'redis' : 'memory';
  const payload =
    reason === 'manual-refresh' ? await rebuildAndSave({ requestId }) : await loadCatalogPayload({ requestId });
  const now = Date.now();

  await writeCache(
    {
      payload: { ...payload, metadata: { ...payload.metadata, generatedAt: new Date(now).toISOString() } },
      cachedAt: now,
      expiresAt: now + CATALOG_CACHE_TTL_MS
    },
    backend
  );
  recordCacheMiss(backend, reason);
  logInfo('catalog_snapshot_refresh', { backend, reason, requestId, bodies: payload.bodies.length });

  return {
    payload: decoratePayload(payload, 'MISS', backend, 0, requestId),
    cacheState: 'MISS',
    cacheBackend: backend,
    cacheAgeMs: 0
  };
}

export async function getCatalogSnapshot(options?: {
  forceRefresh?: boolean;
  requestId?: string;
}): Promise<SnapshotResult> {
  const backend: CacheBackend = (await getRedisClient()) ? 'redis' : 'memory';
  const now = Date.now();

  if (!options?.forceRefresh) {
    const cached = await readCache();
    if (cached && now < cached.expiresAt) {
      const cacheAgeMs = now - cached.cachedAt;
      recordCacheHit(backend, 'fresh', cacheAgeMs);
      return {
        payload: decoratePayload(cached.payload, 'HIT', backend, cacheAgeMs, options?.requestId),
        cacheState: 'HIT',
        cacheBackend: backend,
        cacheAgeMs
      };
    }
  }

  if (!inflight) {
    const pending = refreshSnapshot(options?.forceRefresh ? 'manual-refresh' : 'miss', options?.requestId);
    inflight = pending;
    pending
      .finally(() => {
        if (inflight === pending) {
          inflight = null;
        }
      })
      // rejection is surfaced to callers through `await inflight`
      .catch(() => undefined);
  }

  try {
    return await inflight;
  } catch (err) {
    const cached = memoryCache ?? (await readCache());
    if (cached) {
      const cacheAgeMs = now - cached.cachedAt;
      const reason = errorMessage(err);
      logWarn('catalog_snapshot_frozen', { backend, cacheAgeMs, requestId: options?.requestId, error: reason });
      const payload = decoratePayload(cached.payload, 'FROZEN', backend, cacheAgeMs, options?.requestId);
      payload.metadata = { ...payload.metadata, frozenSnapshot: true, freezeReason: reason };
      return { payload, cacheState: 'FROZEN', cacheBackend: backend, cacheAgeMs };
    }

    logError('catalog_snapshot_failed', { backend, requestId: options?.requestId, error: errorMessage(err) });
    throw err;
  }
}

/** Drops the in-memory snapshot; the next read reloads it. */
export function resetCatalogCache(): void {
  memoryCache = null;
  inflight = null;
}
