import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const getMock = vi.hoisted(() => vi.fn());

vi.mock('axios', () => ({
  default: { get: getMock }
}));

import { SourceValidationError } from '../errors';
import { fetchRemoteSources, loadSourceDirectory, parseSourceFile } from './loadSources';

const venusFile = {
  source: 'horizons',
  batches: [
    {
      bodyId: '299',
      name: 'Venus',
      vectors: [{ epoch: 2451545, x: 1000, y: 2000, z: 3000, vx: 1, vy: 2, vz: 3 }]
    }
  ]
};

describe('parseSourceFile', () => {
  it('names the origin and the failing path when validation fails', () => {
    expect(() => parseSourceFile({ source: 'broken', batches: [{ bodyId: '299', elements: [{}] }] }, 'broken.json')).toThrow(
      /Invalid source broken\.json: batches\.0\.elements\.0\.epoch/
    );
  });
});

describe('loadSourceDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'orbit-sources-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads JSON files in file-name order and ignores other files', async () => {
    await fs.writeFile(path.join(dir, 'b.json'), JSON.stringify({ ...venusFile, source: 'second' }));
    await fs.writeFile(path.join(dir, 'a.json'), JSON.stringify({ ...venusFile, source: 'first' }));
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a source');

    const batches = await loadSourceDirectory(dir);

    expect(batches.map((b) => b.source)).toEqual(['first', 'second']);
    expect(batches[0].vectors).toEqual([{ epoch: 2451545, x: 1, y: 2, z: 3, vx: 0.001, vy: 0.002, vz: 0.003 }]);
  });

  it('returns no batches when the directory does not exist', async () => {
    await expect(loadSourceDirectory(path.join(dir, 'missing'))).resolves.toEqual([]);
  });

  it('fails on malformed JSON', async () => {
    await fs.writeFile(path.join(dir, 'bad.json'), '{ nope');
    await expect(loadSourceDirectory(dir)).rejects.toBeInstanceOf(SourceValidationError);
  });
});

describe('fetchRemoteSources', () => {
  beforeEach(() => {
    getMock.mockReset();
  });

  it('flattens every source of the manifest into batches', async () => {
    getMock.mockResolvedValue({ data: { sources: [venusFile, { source: 'sbdb', batches: [] }] } });

    const batches = await fetchRemoteSources('http://sources.test/manifest.json', 'req-1');

    expect(batches).toHaveLength(1);
    expect(batches[0].bodyId).toBe('299');
    expect(getMock).toHaveBeenCalledWith(
      'http://sources.test/manifest.json',
      expect.objectContaining({ headers: expect.objectContaining({ 'X-Request-Id': 'req-1' }) })
    );
  });

  it('rejects a manifest that does not match the schema', async () => {
    getMock.mockResolvedValue({ data: { sources: 'nope' } });

    await expect(fetchRemoteSources('http://sources.test/manifest.json')).rejects.toBeInstanceOf(
      SourceValidationError
    );
  });
});
