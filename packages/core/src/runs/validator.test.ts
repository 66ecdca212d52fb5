import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join, ValidationFailedError } from '@adapterlab/shared';
import {
  assertValidArtifact,
  inspectModelDirectory,
  REQUIRED_FILES,
  validateArtifact,
} from './validator';

describe('validateArtifact', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'adapterlab-validator-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports every required file missing for an absent directory', async () => {
    const dir = join(tmpDir, 'stage1', 'adapters');
    const result = await validateArtifact(dir, 'lora');
    expect(result).toEqual({
      valid: false,
      kind: 'lora',
      directory: dir,
      missing: ['adapters.safetensors', 'adapter_config.json'],
      empty: [],
    });
  });

  it('accepts a LoRA directory with both files non-empty', async () => {
    await fs.writeFile(join(tmpDir, 'adapters.safetensors'), Buffer.alloc(10));
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '{}');

    const result = await validateArtifact(tmpDir, 'lora');
    expect(result.valid).toBe(true);
    expect(result.missing).toEqual([]);
    expect(result.empty).toEqual([]);
  });

  it('separates empty files from missing ones', async () => {
    await fs.writeFile(join(tmpDir, 'config.json'), '');
    await fs.writeFile(join(tmpDir, 'model.safetensors'), Buffer.alloc(4));

    const result = await validateArtifact(tmpDir, 'fused');
    expect(result.valid).toBe(false);
    expect(result.missing).toEqual(['tokenizer.json']);
    expect(result.empty).toEqual(['config.json']);
  });

  it('treats a directory with a required file name as missing', async () => {
    await fs.mkdir(join(tmpDir, 'adapter_model.safetensors'));
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '{}');

    const result = await validateArtifact(tmpDir, 'peft');
    expect(result.missing).toEqual(['adapter_model.safetensors']);
  });

  it('checks only the requested kind, ignoring stray files of other kinds', async () => {
    await fs.writeFile(join(tmpDir, 'adapters.safetensors'), Buffer.alloc(10));
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '{}');
    await fs.writeFile(join(tmpDir, 'config.json'), '{}');

    expect((await validateArtifact(tmpDir, 'lora')).valid).toBe(true);
    expect((await validateArtifact(tmpDir, 'fused')).missing).toEqual([
      'model.safetensors',
      'tokenizer.json',
    ]);
  });

  it('returns identical results when called twice on an unchanged directory', async () => {
    await fs.writeFile(join(tmpDir, 'adapters.safetensors'), '');
    const first = await validateArtifact(tmpDir, 'lora');
    const second = await validateArtifact(tmpDir, 'lora');
    expect(second).toEqual(first);
  });

  it('exposes the required-file table', () => {
    expect(REQUIRED_FILES.peft).toEqual(['adapter_model.safetensors', 'adapter_config.json']);
  });
});

describe('assertValidArtifact', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'adapterlab-validator-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns the directory when valid', async () => {
    await fs.writeFile(join(tmpDir, 'adapter_model.safetensors'), Buffer.alloc(8));
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '{}');
    await expect(assertValidArtifact(tmpDir, 'peft')).resolves.toBe(tmpDir);
  });

  it('throws ValidationFailedError naming the files', async () => {
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '');
    const error = await assertValidArtifact(tmpDir, 'lora').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationFailedError);
    if (error instanceof ValidationFailedError) {
      expect(error.missing).toEqual(['adapters.safetensors']);
      expect(error.empty).toEqual(['adapter_config.json']);
      expect(error.kind).toBe('lora');
    }
  });
});

describe('inspectModelDirectory', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'adapterlab-inspect-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports a missing directory', async () => {
    const dir = join(tmpDir, 'nope');
    const report = await inspectModelDirectory(dir);
    expect(report.exists).toBe(false);
    expect(report.errors).toEqual([`Model directory does not exist: ${dir}`]);
  });

  it('lists every satisfied kind and warns about tiny weights', async () => {
    await fs.writeFile(join(tmpDir, 'adapter_model.safetensors'), Buffer.alloc(16));
    await fs.writeFile(join(tmpDir, 'adapter_config.json'), '{"r": 8}');

    const report = await inspectModelDirectory(tmpDir);
    expect(report.satisfies).toEqual(['peft']);
    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual(['Model file adapter_model.safetensors is very small (0.0MB)']);
  });

  it('flags unparseable JSON and a directory with no structure', async () => {
    await fs.writeFile(join(tmpDir, 'config.json'), '{not json');

    const report = await inspectModelDirectory(tmpDir);
    expect(report.satisfies).toEqual([]);
    expect(report.invalidJson).toEqual(['config.json']);
    expect(report.errors[0]).toBe(
      'No valid model structure found (neither LoRA, fused, nor converted)',
    );
    expect(report.errors).toContain('No .safetensors files found');
  });
});
