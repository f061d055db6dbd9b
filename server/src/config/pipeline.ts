import path from 'path';

import { J2000 } from './bodies';

export const CATALOG_SOURCES_DIR =
  process.env.CATALOG_SOURCES_DIR ?? path.resolve(process.cwd(), 'data', 'sources');
export const CATALOG_DATABASE_DIR =
  process.env.CATALOG_DATABASE_DIR ?? path.resolve(process.cwd(), 'data', 'database');
export const CATALOG_REMOTE_SOURCES_URL = process.env.CATALOG_REMOTE_SOURCES_URL || undefined;

/** Instant every body gets a state vector for. */
export const CANONICAL_EPOCH = J2000;
