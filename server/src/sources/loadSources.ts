import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';

import type { SourceBatch } from '../catalog/types';
import { SourceValidationError, isMissingFileError } from '../errors';
import { errorMessage, logInfo, logWarn } from '../observability/logger';
import { SourceFileSchema, SourceManifestSchema, formatIssues, toSourceBatches } from './schema';

const REMOTE_TIMEOUT_MS = Number(process.env.CATALOG_REMOTE_TIMEOUT_MS ?? 15_000);

export function parseSourceFile(raw: unknown, origin: string): SourceBatch[] {
  const parsed = SourceFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceValidationError(origin, formatIssues(parsed.error));
  }
  return toSourceBatches(parsed.data);
}

/**
 * Reads every `*.json` source file in `dir`, in file-name order. A missing
 * directory yields no batches.
 */
export async function loadSourceDirectory(dir: string): Promise<SourceBatch[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (!isMissingFileError(err)) {
      throw err;
    }
    logWarn('sources_directory_missing', { dir });
    return [];
  }

  const files = entries.filter((name) => name.endsWith('.json')).sort();
  const batches: SourceBatch[] = [];
  for (const name of files) {
    const filePath = path.join(dir, name);
    const text = await fs.readFile(filePath, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SourceValidationError(filePath, [`malformed JSON: ${errorMessage(err)}`]);
    }
    batches.push(...parseSourceFile(raw, filePath));
  }

  logInfo('sources_loaded', { dir, files: files.length, batches: batches.length });
  return batches;
}

export async function fetchRemoteSources(url: string, correlationId?: string): Promise<SourceBatch[]> {
  const started = Date.now();
  const res = await axios.get<unknown>(url, {
    timeout: REMOTE_TIMEOUT_MS,
    headers: {
      Accept: 'application/json',
      ...(correlationId ? { 'X-Request-Id': correlationId } : {})
    }
  });

  const parsed = SourceManifestSchema.safeParse(res.data);
  if (!parsed.success) {
    throw new SourceValidationError(url, formatIssues(parsed.error));
  }

  const batches = parsed.data.sources.flatMap(toSourceBatches);
  logInfo('remote_sources_loaded', {
    url,
    sources: parsed.data.sources.length,
    batches: batches.length,
    responseTimeMs: Date.now() - started,
    requestId: correlationId
  });
  return batches;
}
