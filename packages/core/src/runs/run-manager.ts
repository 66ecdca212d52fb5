import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import { ensureDir, remove } from 'fs-extra';
import {
  AppError,
  DEFAULT_BASE_MODEL,
  DEFAULT_RUN_PREFIX,
  eventBase,
  isDirectory,
  isErrnoException,
  join,
  NoCompletedRunsError,
  NoopLogger,
  NotFoundError,
  resolve as resolvePath,
  UsageError,
  type Logger,
} from '@adapterlab/shared';
import { MANIFEST_SCHEMA_VERSION, type RunManifest } from './manifest';
import { ManifestStore } from './manifest-store';
import { TrainingRun, type RunStatus } from './training-run';

/** Directories created with every new run; everything else appears as training writes it */
const RUN_SKELETON = [
  'stage1/adapters',
  'stage1/training-data',
  'stage1/evaluation',
  'stage2/adapters',
  'stage2/training-data',
  'stage2/evaluation',
  'final-model',
];

export interface TrainingRunManagerOptions {
  runsDir: string;
  runPrefix?: string;
  baseModel?: string;
  logger?: Logger;
  /** Clock used for generated ids and manifest timestamps */
  now?: () => Date;
}

export interface CreateRunOptions {
  /** Suffix after the run prefix; defaults to the local time as `YYYYMMDD_HHMMSS` */
  runId?: string;
  baseModel?: string;
  /** Recorded as stage 1 training parameters */
  trainingParams?: Record<string, unknown>;
}

export interface RunSummary {
  runId: string;
  runDir: string;
  timestamp: string;
  baseModel: string;
  status: RunStatus;
}

export interface RunListing {
  run: TrainingRun;
  summary: RunSummary;
}

export type RunFilter = RunStatus | readonly RunStatus[] | ((summary: RunSummary) => boolean);

export interface CleanupOptions {
  /** List what would be removed without deleting anything */
  dryRun?: boolean;
  /** Statuses to remove; defaults to `failed` and `in_progress` */
  statuses?: readonly RunStatus[];
}

export interface CleanupResult {
  dryRun: boolean;
  /** Run directories removed (or, in a dry run, that would be) */
  removed: string[];
  /** Directories whose deletion failed; the sweep continued past them */
  failed: Array<{ runDir: string; error: string }>;
  count: number;
}

export interface RunInspection {
  runId: string;
  runDir: string;
  status: RunStatus;
  valid: boolean;
  checks: {
    manifest: boolean;
    stage1Adapters: boolean;
    stage2Adapters: boolean;
    finalModel: boolean;
  };
  errors: string[];
}

/**
 * Formats a local time as `YYYYMMDD_HHMMSS`.
 */
export function formatRunId(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function compareByTimestamp(a: RunSummary, b: RunSummary): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  if (a.runId !== b.runId) return a.runId < b.runId ? -1 : 1;
  return 0;
}

function toPredicate(filter: RunFilter): (summary: RunSummary) => boolean {
  if (typeof filter === 'function') return filter;
  const statuses: readonly RunStatus[] = typeof filter === 'string' ? [filter] : filter;
  return (summary) => statuses.includes(summary.status);
}

/**
 * Owns the directory that holds every training run: creates runs with their
 * whole path contract declared up front, discovers completed runs and prunes
 * unfinished ones.
 */
export class TrainingRunManager {
  readonly runsDir: string;
  readonly runPrefix: string;
  readonly baseModel: string;

  private readonly logger: Logger;
  private readonly store: ManifestStore;
  private readonly now: () => Date;

  constructor(options: TrainingRunManagerOptions) {
    this.runsDir = resolvePath(options.runsDir);
    this.runPrefix = options.runPrefix ?? DEFAULT_RUN_PREFIX;
    this.baseModel = options.baseModel ?? DEFAULT_BASE_MODEL;
    this.logger = options.logger ?? new NoopLogger();
    this.store = new ManifestStore(this.logger);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates a run directory and persists a manifest declaring every stage
   * path before any training has happened.
   */
  async createRun(options: CreateRunOptions = {}): Promise<TrainingRun> {
    const now = this.now();
    const runName = this.runName(options.runId ?? formatRunId(now));
    const runDir = join(this.runsDir, runName);

    if (await isDirectory(runDir)) {
      await this.logger.warn(`Training run directory already exists: ${runDir}`);
    }

    const baseModel = options.baseModel ?? this.baseModel;
    const manifest: RunManifest = {
      schemaVersion: MANIFEST_SCHEMA_VERSION,
      runId: runName,
      timestamp: now.toISOString(),
      baseModel,
      stage1: {
        adaptersPath: './stage1/adapters',
        trainingDataPath: './stage1/training-data',
        evaluationResultsPath: './stage1/evaluation/evaluation_results.json',
        mergedModelPath: './stage1/merged-model',
        trainingParams: { ...options.trainingParams },
        datasetStats: {},
      },
      stage2: {
        adaptersPath: './stage2/adapters',
        trainingDataPath: './stage2/training-data',
        evaluationResultsPath: './stage2/evaluation/evaluation_results.json',
        trainingDataPaths: {
          codefix: './stage2/training-data/codefix-dataset.jsonl',
          mixed: './stage2/training-data/mixed-dataset.jsonl',
        },
        trainingParams: {},
        datasetStats: {},
      },
      finalModelPath: './final-model',
    };

    for (const dir of RUN_SKELETON) {
      await ensureDir(join(runDir, dir));
    }

    const run = this.open(runDir);
    run.setManifest(manifest);
    await run.saveManifest();

    await this.logger.log({
      ...eventBase(runName),
      type: 'RunCreated',
      payload: { runDir, baseModel },
    });
    await this.logger.info(`Created training run ${runName}`);
    return run;
  }

  /**
   * The completed run with the greatest manifest timestamp.
   *
   * @throws NoCompletedRunsError if no run has its final model weights
   */
  async getLatestRun(): Promise<TrainingRun> {
    const completed = await this.listRuns('completed');
    const latest = completed.at(-1);
    if (!latest) {
      throw new NoCompletedRunsError(this.runsDir);
    }
    return latest.run;
  }

  /**
   * Handle on an existing run; the prefix is added when `runId` lacks it.
   *
   * @throws NotFoundError if the run directory does not exist
   */
  async getRunById(runId: string): Promise<TrainingRun> {
    const runDir = join(this.runsDir, this.runName(runId));
    if (!(await isDirectory(runDir))) {
      throw new NotFoundError(`Training run not found: ${runDir}`, runDir);
    }
    return this.open(runDir);
  }

  /**
   * Every run whose manifest loads, sorted by timestamp ascending. Runs with
   * a missing or invalid manifest are skipped with one warning each.
   */
  async listRuns(filter?: RunFilter): Promise<RunListing[]> {
    const listings: RunListing[] = [];

    for (const runDir of await this.runDirectories()) {
      const run = this.open(runDir);
      try {
        listings.push({ run, summary: await this.summarize(run) });
      } catch (error) {
        if (!(error instanceof AppError)) throw error;
        await this.skip(runDir, error);
      }
    }

    const predicate = filter === undefined ? undefined : toPredicate(filter);
    return listings
      .filter((listing) => !predicate || predicate(listing.summary))
      .sort((a, b) => compareByTimestamp(a.summary, b.summary));
  }

  /**
   * @throws NotFoundError | InvalidFormatError if the run's manifest does not load
   */
  async summarize(run: TrainingRun): Promise<RunSummary> {
    const manifest = await run.getManifest();
    return {
      runId: manifest.runId,
      runDir: run.runDir,
      timestamp: manifest.timestamp,
      baseModel: manifest.baseModel,
      status: await run.status(),
    };
  }

  /**
   * Deletes run directories whose status is in `statuses`. Destructive unless
   * `dryRun` is set; a failed deletion is logged and the sweep continues.
   */
  async cleanupFailedRuns(options: CleanupOptions = {}): Promise<CleanupResult> {
    const dryRun = options.dryRun ?? false;
    const statuses = options.statuses ?? ['failed', 'in_progress'];
    const result: CleanupResult = { dryRun, removed: [], failed: [], count: 0 };

    for (const runDir of await this.runDirectories()) {
      const status = await this.open(runDir).status();
      if (!statuses.includes(status)) continue;

      if (!dryRun) {
        try {
          await remove(runDir);
        } catch (error) {
          const failure = error instanceof Error ? error : new Error(String(error));
          await this.logger.error(failure, `Failed to remove training run ${runDir}`);
          result.failed.push({ runDir, error: failure.message });
          continue;
        }
      }

      result.removed.push(runDir);
      await this.logger.log({
        ...eventBase(this.dirName(runDir)),
        type: 'RunRemoved',
        payload: { runDir, status, dryRun },
      });
    }

    result.count = result.removed.length;
    await this.logger.info(
      dryRun
        ? `Would remove ${result.count} training run(s)`
        : `Removed ${result.count} training run(s)`,
    );
    return result;
  }

  /**
   * Structural report for one run: does the manifest load, and do the
   * declared adapters and final model hold their required files.
   */
  async inspectRun(runId: string): Promise<RunInspection> {
    const run = await this.getRunById(runId);
    const errors: string[] = [];
    const check = async (attempt: () => Promise<unknown>): Promise<boolean> => {
      try {
        await attempt();
        return true;
      } catch (error) {
        if (!(error instanceof AppError)) throw error;
        errors.push(error.message);
        return false;
      }
    };

    const manifest = await check(() => run.getManifest());
    const checks = manifest
      ? {
          manifest,
          stage1Adapters: await check(() => run.resolve('stage1', 'adapters')),
          stage2Adapters: await check(() => run.resolve('stage2', 'adapters')),
          finalModel: await check(() => run.resolveFinalModel()),
        }
      : { manifest, stage1Adapters: false, stage2Adapters: false, finalModel: false };

    return {
      runId: manifest ? await run.runId() : this.dirName(run.runDir),
      runDir: run.runDir,
      status: await run.status(),
      valid: Object.values(checks).every(Boolean),
      checks,
      errors,
    };
  }

  private open(runDir: string): TrainingRun {
    return new TrainingRun(runDir, { store: this.store, logger: this.logger });
  }

  private runName(runId: string): string {
    if (runId.length === 0 || /[\\/]/.test(runId) || runId === '.' || runId === '..') {
      throw new UsageError(`Invalid run id: "${runId}"`);
    }
    return runId.startsWith(this.runPrefix) ? runId : `${this.runPrefix}${runId}`;
  }

  private dirName(runDir: string): string {
    return runDir.slice(runDir.lastIndexOf('/') + 1);
  }

  /** Prefixed child directories of the runs directory, in name order. */
  private async runDirectories(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.runsDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory() && entry.name.startsWith(this.runPrefix))
      .map((entry) => join(this.runsDir, entry.name))
      .sort();
  }

  private async skip(runDir: string, error: AppError): Promise<void> {
    await this.logger.warn(`Skipping training run ${runDir}: ${error.message}`);
    await this.logger.log({
      ...eventBase(this.dirName(runDir)),
      type: 'RunSkipped',
      payload: { runDir, reason: error.code },
    });
  }
}
