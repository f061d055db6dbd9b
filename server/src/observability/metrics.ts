import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type CacheBackend = 'redis' | 'memory';
export type CacheState = 'fresh' | 'stale';
export type BootstrapMetricOutcome = 'present' | 'computed' | 'no-anchor' | 'failed';

const registry = new Registry();

if (process.env.METRICS_DEFAULTS !== '0') {
  collectDefaultMetrics({ register: registry, prefix: 'orbit_catalog_' });
}

const cacheHits = new Counter({
  name: 'orbit_catalog_cache_hits_total',
  help: 'Catalog snapshot cache hits',
  labelNames: ['backend', 'state'] as const,
  registers: [registry]
});

const cacheMisses = new Counter({
  name: 'orbit_catalog_cache_misses_total',
  help: 'Catalog snapshot cache misses (rebuilds)',
  labelNames: ['backend', 'reason'] as const,
  registers: [registry]
});

const cacheAge = new Histogram({
  name: 'orbit_catalog_cache_age_ms',
  help: 'Age of the catalog snapshot served from cache',
  buckets: [1_000, 10_000, 60_000, 600_000, 3_600_000, 21_600_000],
  registers: [registry]
});

const buildDuration = new Histogram({
  name: 'orbit_catalog_build_duration_ms',
  help: 'Duration of a full catalog build',
  buckets: [10, 50, 100, 500, 1_000, 5_000, 30_000],
  registers: [registry]
});

const bodiesGauge = new Gauge({
  name: 'orbit_catalog_bodies',
  help: 'Number of bodies in the last built catalog',
  registers: [registry]
});

const bootstrapOutcomes = new Counter({
  name: 'orbit_catalog_bootstrap_outcomes_total',
  help: 'State vector bootstrap outcomes per body',
  labelNames: ['outcome'] as const,
  registers: [registry]
});

const keplerNonConvergence = new Counter({
  name: 'orbit_catalog_kepler_nonconvergence_total',
  help: 'Kepler equation solves that did not reach the residual tolerance',
  registers: [registry]
});

export const metricsContentType = registry.contentType;

export function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}

export function recordCacheHit(backend: CacheBackend, state: CacheState, ageMs: number): void {
  cacheHits.inc({ backend, state });
  cacheAge.observe(ageMs);
}

export function recordCacheMiss(backend: CacheBackend, reason: string): void {
  cacheMisses.inc({ backend, reason });
}

export function recordCatalogBuild(durationMs: number, bodies: number): void {
  buildDuration.observe(durationMs);
  bodiesGauge.set(bodies);
}

export function recordBootstrapOutcome(outcome: BootstrapMetricOutcome): void {
  bootstrapOutcomes.inc({ outcome });
}

export function recordKeplerNonConvergence(): void {
  keplerNonConvergence.inc();
}
