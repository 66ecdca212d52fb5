import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { writeSafetensorsFile, type Tensor } from '@adapterlab/core';
import { ConfigError, join, NoCompletedRunsError, UsageError } from '@adapterlab/shared';
import { createProgram, exitCodeFor, name, reportError } from './program';

describe('adapterlab CLI', () => {
  let tmpDir: string;
  let runsDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;

  async function cli(...args: string[]): Promise<void> {
    await createProgram({ cwd: tmpDir, homeDir: tmpDir }).parseAsync(
      ['--runs-dir', runsDir, ...args],
      { from: 'user' },
    );
  }

  function stdout(): string {
    return logSpy.mock.calls.map((c) => String(c[0])).join('\n');
  }

  function jsonOutput(): unknown {
    return JSON.parse(stdout());
  }

  async function completeRun(runId: string): Promise<void> {
    await fs.writeFile(join(runsDir, runId, 'final-model', 'model.safetensors'), 'weights');
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'adapterlab-cli-'));
    runsDir = join(tmpDir, 'runs');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('exports name', () => {
    expect(name).toBe('@adapterlab/cli');
  });

  describe('runs', () => {
    it('creates a run and prints its summary', async () => {
      await cli('runs', 'create', '--id', '20250101_000000', '--json');

      expect(jsonOutput()).toMatchObject({
        runId: 'security-lora-20250101_000000',
        runDir: join(runsDir, 'security-lora-20250101_000000'),
        baseModel: 'OLMo-2-1B-mlx-q4',
        status: 'in_progress',
      });
      const manifest = await fs.readFile(
        join(runsDir, 'security-lora-20250101_000000', 'run-manifest.json'),
        'utf8',
      );
      expect(manifest).toContain('"runId": "security-lora-20250101_000000"');
    });

    it('takes the run prefix from the repo config', async () => {
      await fs.writeFile(join(tmpDir, '.adapterlab.yaml'), 'runPrefix: exp-\n');
      await cli('runs', 'create', '--id', 'a', '--json');
      expect(jsonOutput()).toMatchObject({ runId: 'exp-a' });
    });

    it('filters the listing by status', async () => {
      await cli('runs', 'create', '--id', '1');
      await cli('runs', 'create', '--id', '2');
      await completeRun('security-lora-2');
      logSpy.mockClear();

      await cli('runs', 'list', '--status', 'completed', '--json');

      expect(jsonOutput()).toEqual([
        expect.objectContaining({ runId: 'security-lora-2', status: 'completed' }),
      ]);
    });

    it('rejects an unknown status', async () => {
      const error = await cli('runs', 'list', '--status', 'done').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(UsageError);
      expect(exitCodeFor(error)).toBe(2);
    });

    it('reports the latest completed run', async () => {
      await cli('runs', 'create', '--id', '1');
      await expect(cli('runs', 'latest')).rejects.toBeInstanceOf(NoCompletedRunsError);

      await completeRun('security-lora-1');
      logSpy.mockClear();
      await cli('runs', 'latest');
      expect(stdout()).toContain('security-lora-1');
      expect(stdout()).toContain('completed');
    });

    it('prints declared paths', async () => {
      await cli('runs', 'create', '--id', '1');
      logSpy.mockClear();

      await cli('runs', 'path', '1', 'training-data', '--stage', 'stage2', '--dataset', 'codefix');

      expect(stdout()).toBe(
        join(runsDir, 'security-lora-1', 'stage2', 'training-data', 'codefix-dataset.jsonl'),
      );
    });

    it('inspects a fresh run as incomplete', async () => {
      await cli('runs', 'create', '--id', '1');
      logSpy.mockClear();

      await cli('runs', 'inspect', '1', '--json');

      expect(jsonOutput()).toMatchObject({
        runId: 'security-lora-1',
        status: 'in_progress',
        valid: false,
        checks: { manifest: true, stage1Adapters: false, stage2Adapters: false, finalModel: false },
      });
      expect(process.exitCode).toBe(1);
    });

    it('keeps runs when cleanup is not confirmed', async () => {
      await cli('runs', 'create', '--id', '1');
      logSpy.mockClear();

      await cli('runs', 'cleanup', '--non-interactive');

      expect(stdout()).toContain('Would remove 1 training run(s)');
      await expect(fs.stat(join(runsDir, 'security-lora-1'))).resolves.toBeDefined();
    });

    it('removes unfinished runs with --yes', async () => {
      await cli('runs', 'create', '--id', '1');
      await cli('runs', 'create', '--id', '2');
      await completeRun('security-lora-2');
      logSpy.mockClear();

      await cli('runs', 'cleanup', '--yes', '--json');

      expect(jsonOutput()).toEqual({
        dryRun: false,
        removed: [join(runsDir, 'security-lora-1')],
        failed: [],
        count: 1,
      });
      expect((await fs.readdir(runsDir)).sort()).toEqual(['security-lora-2']);
    });
  });

  describe('validate', () => {
    it('reports missing files for the requested kind', async () => {
      await fs.mkdir(join(tmpDir, 'adapters'));

      await cli('validate', 'adapters', '--kind', 'lora', '--json');

      expect(jsonOutput()).toEqual({
        valid: false,
        kind: 'lora',
        directory: join(tmpDir, 'adapters'),
        missing: ['adapters.safetensors', 'adapter_config.json'],
        empty: [],
      });
      expect(process.exitCode).toBe(1);
    });

    it('rejects an unknown kind', async () => {
      await expect(cli('validate', '.', '--kind', 'gguf')).rejects.toBeInstanceOf(UsageError);
    });
  });

  describe('convert', () => {
    it('converts an MLX adapter and validates the result', async () => {
      const source = join(tmpDir, 'mlx');
      await writeSafetensorsFile(
        join(source, 'adapters.safetensors'),
        new Map<string, Tensor>([
          ['model.layers.0.mlp.up_proj.lora_a', { dtype: 'U8', shape: [2], data: new Uint8Array([1, 2]) }],
        ]),
      );
      await fs.writeFile(join(source, 'adapter_config.json'), '{"lora_parameters": {"rank": 4}}');

      await cli('convert', 'mlx', 'peft', '--json');
      expect(jsonOutput()).toMatchObject({
        mode: 'converted',
        path: join(tmpDir, 'peft'),
        parametersConverted: 1,
        peftConfig: { r: 4, base_model_name_or_path: 'allenai/OLMo-2-1B' },
      });

      logSpy.mockClear();
      await cli('validate', 'peft', '--kind', 'peft', '--deep', '--json');
      expect(jsonOutput()).toMatchObject({ valid: true, parameterCount: 1, errors: [] });
      expect(process.exitCode).toBeUndefined();
    });

    it('passes the fallback through when the source has no adapter', async () => {
      await fs.mkdir(join(tmpDir, 'empty'));

      await cli('convert', 'empty', 'peft', '--fallback', 'final-model', '--json');

      expect(jsonOutput()).toMatchObject({
        mode: 'passthrough',
        path: join(tmpDir, 'final-model'),
      });
    });
  });

  describe('errors', () => {
    it('maps user-correctable errors to exit code 2', () => {
      expect(exitCodeFor(new ConfigError('bad config'))).toBe(2);
      expect(exitCodeFor(new UsageError('bad usage'))).toBe(2);
      expect(exitCodeFor(new NoCompletedRunsError('/runs'))).toBe(1);
      expect(exitCodeFor(new Error('boom'))).toBe(1);
    });

    it('prints errors as JSON in json mode', () => {
      reportError(new UsageError('bad usage'), { json: true });
      expect(stdout()).toBe('{"error":{"code":"UsageError","message":"bad usage"}}');
    });
  });
});
