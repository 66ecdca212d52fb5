import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { InvalidFormatError, join, NotFoundError, NoopLogger } from '@adapterlab/shared';
import { ManifestStore } from './manifest-store';
import type { RunManifest } from './manifest';

const manifest: RunManifest = {
  schemaVersion: '2.0',
  runId: 'security-lora-20250101_120000',
  timestamp: '2025-01-01T12:00:00.000Z',
  baseModel: 'OLMo-2-1B-mlx-q4',
  stage1: {
    adaptersPath: './stage1/adapters',
    trainingDataPath: './stage1/training-data',
    trainingParams: { iters: 100 },
    datasetStats: {},
  },
};

describe('ManifestStore', () => {
  let tmpDir: string;
  let store: ManifestStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'adapterlab-manifest-'));
    store = new ManifestStore();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('round-trips a manifest through save and load', async () => {
    const path = join(tmpDir, 'nested', 'run-manifest.json');
    await store.save(manifest, path);
    expect(await store.load(path)).toEqual(manifest);
  });

  it('writes sorted keys with two-space indentation and no temp files', async () => {
    const path = join(tmpDir, 'run-manifest.json');
    await store.save(manifest, path);

    const text = await fs.readFile(path, 'utf8');
    expect(text.split('\n').slice(0, 3)).toEqual([
      '{',
      '  "baseModel": "OLMo-2-1B-mlx-q4",',
      '  "runId": "security-lora-20250101_120000",',
    ]);
    expect(text.endsWith('}\n')).toBe(true);
    expect(await fs.readdir(tmpDir)).toEqual(['run-manifest.json']);
  });

  it('produces byte-identical output for equal manifests', async () => {
    const a = join(tmpDir, 'a.json');
    const b = join(tmpDir, 'b.json');
    await store.save(manifest, a);
    await store.save({ ...manifest, stage1: manifest.stage1 }, b);
    expect(await fs.readFile(a, 'utf8')).toBe(await fs.readFile(b, 'utf8'));
  });

  it('refuses to save an absolute path', async () => {
    const path = join(tmpDir, 'run-manifest.json');
    await expect(
      store.save({ ...manifest, finalModelPath: '/tmp/final-model' }, path),
    ).rejects.toBeInstanceOf(InvalidFormatError);
    await expect(fs.stat(path)).rejects.toThrow();
  });

  it('throws NotFoundError for a missing file', async () => {
    const path = join(tmpDir, 'missing.json');
    const error = await store.load(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) {
      expect(error.path).toBe(path);
    }
  });

  it('throws InvalidFormatError for malformed JSON', async () => {
    const path = join(tmpDir, 'run-manifest.json');
    await fs.writeFile(path, '{"runId": ');
    const error = await store.load(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidFormatError);
    if (error instanceof InvalidFormatError) {
      expect(error.message).toMatch(/^Failed to parse JSON in /);
    }
  });

  it('throws InvalidFormatError naming the path when the manifest cannot be read', async () => {
    const path = join(tmpDir, 'run-manifest.json');
    await fs.mkdir(path);
    const error = await store.load(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidFormatError);
    if (error instanceof InvalidFormatError) {
      expect(error.path).toBe(path);
      expect(error.message).toMatch(/^Unreadable run manifest .*run-manifest\.json: EISDIR/);
    }
  });

  it('reports the layout a legacy document was read from', async () => {
    const path = join(tmpDir, 'run-manifest.json');
    await fs.writeFile(
      path,
      JSON.stringify({
        schemaVersion: '1.0',
        runId: 'r',
        timestamp: 't',
        baseModel: 'm',
      }),
    );
    const loaded = await store.loadWithLayout(path);
    expect(loaded.layout).toBe('v1');
    expect(loaded.manifest.schemaVersion).toBe('2.0');
  });

  it('parses in-memory documents', () => {
    expect(store.parse(manifest).manifest).toEqual(manifest);
  });

  it('emits a ManifestSaved event', async () => {
    const logger = new NoopLogger();
    const spy = vi.spyOn(logger, 'log');
    const path = join(tmpDir, 'run-manifest.json');
    await new ManifestStore(logger).save(manifest, path);

    expect(spy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'ManifestSaved',
        runId: 'security-lora-20250101_120000',
        payload: { manifestPath: path, schemaVersion: '2.0' },
      }),
    );
  });
});
