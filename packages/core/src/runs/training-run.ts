import { copy, pathExists } from 'fs-extra';
import {
  AppError,
  fileSize,
  join,
  MissingStageError,
  NoManifestError,
  NoopLogger,
  NotFoundError,
  resolve as resolvePath,
  UnknownDatasetError,
  type Logger,
  type TrainingInvocation,
} from '@adapterlab/shared';
import { MANIFEST_FILENAME, type RunManifest, type StageManifest, type StageName } from './manifest';
import { ManifestStore } from './manifest-store';
import { assertValidArtifact } from './validator';

/** Stage-scoped artifacts that {@link TrainingRun.resolve} can locate */
export type StageArtifact = 'adapters' | 'mergedModel';

/**
 * Derived, never persisted:
 * - `completed`: the final model's weight file exists
 * - `in_progress`: the manifest loads but the run is not complete
 * - `failed`: the manifest is missing or invalid
 */
export type RunStatus = 'completed' | 'in_progress' | 'failed';

export const RUN_STATUSES: readonly RunStatus[] = ['completed', 'in_progress', 'failed'];

/** Weight file whose presence marks a run as complete */
export const FINAL_MODEL_WEIGHTS = 'model.safetensors';

export interface TrainingRunOptions {
  store?: ManifestStore;
  logger?: Logger;
}

export interface StageResults {
  trainingParams?: Record<string, unknown>;
  datasetStats?: Record<string, unknown>;
}

/**
 * Handle on one run directory. Paths come from the run manifest, are
 * resolved against the run root on every access and validated each time, so
 * a handle can be held while training progresses.
 */
export class TrainingRun {
  readonly runDir: string;
  readonly manifestPath: string;

  private manifest?: RunManifest;
  private readonly store: ManifestStore;
  private readonly logger: Logger;

  constructor(runDir: string, options: TrainingRunOptions = {}) {
    this.runDir = resolvePath(runDir);
    this.manifestPath = join(this.runDir, MANIFEST_FILENAME);
    this.logger = options.logger ?? new NoopLogger();
    this.store = options.store ?? new ManifestStore(this.logger);
  }

  /**
   * The cached manifest, loaded from disk on first use.
   *
   * @throws NotFoundError | InvalidFormatError
   */
  async getManifest(): Promise<RunManifest> {
    if (!this.manifest) {
      this.manifest = await this.store.load(this.manifestPath);
    }
    return this.manifest;
  }

  /** Drops the cached manifest and reads it again. */
  async reload(): Promise<RunManifest> {
    this.manifest = undefined;
    return this.getManifest();
  }

  setManifest(manifest: RunManifest): void {
    this.manifest = manifest;
  }

  /**
   * @throws NoManifestError if no manifest was created or loaded
   */
  async saveManifest(): Promise<void> {
    if (!this.manifest) {
      throw new NoManifestError(this.runDir);
    }
    await this.store.save(this.manifest, this.manifestPath);
  }

  async runId(): Promise<string> {
    return (await this.getManifest()).runId;
  }

  async timestamp(): Promise<string> {
    return (await this.getManifest()).timestamp;
  }

  /**
   * Absolute path of a stage artifact, after checking its directory holds
   * the files that artifact requires.
   *
   * @throws MissingStageError if the stage or the artifact path is not declared
   * @throws ValidationFailedError naming the missing or empty files
   */
  async resolve(stage: StageName, artifact: StageArtifact): Promise<string> {
    const declared = await this.stage(stage);
    if (artifact === 'adapters') {
      return assertValidArtifact(this.absolute(declared.adaptersPath), 'lora');
    }
    if (!declared.mergedModelPath) {
      throw new MissingStageError(stage, `Stage "${stage}" declares no merged model path`);
    }
    return assertValidArtifact(this.absolute(declared.mergedModelPath), 'fused');
  }

  /**
   * Absolute path of the final merged model, validated as a fused model.
   *
   * @throws MissingStageError if the manifest declares no final model path
   */
  async resolveFinalModel(): Promise<string> {
    const { finalModelPath } = await this.getManifest();
    if (!finalModelPath) {
      throw new MissingStageError('finalModel', 'Run manifest declares no final model path');
    }
    return assertValidArtifact(this.absolute(finalModelPath), 'fused');
  }

  /**
   * Declared training data location, absolute. With `dataset`, selects a
   * named dataset instead. Existence is not checked.
   *
   * @throws MissingStageError | UnknownDatasetError
   */
  async trainingDataPath(stage: StageName, dataset?: string): Promise<string> {
    const declared = await this.stage(stage);
    if (dataset === undefined) {
      return this.absolute(declared.trainingDataPath);
    }
    const datasets = declared.trainingDataPaths ?? {};
    const path = datasets[dataset];
    if (path === undefined) {
      throw new UnknownDatasetError(stage, dataset, Object.keys(datasets).sort());
    }
    return this.absolute(path);
  }

  /**
   * @throws MissingStageError if the stage or its evaluation path is not declared
   */
  async evaluationResultsPath(stage: StageName): Promise<string> {
    const declared = await this.stage(stage);
    if (!declared.evaluationResultsPath) {
      throw new MissingStageError(stage, `Stage "${stage}" declares no evaluation results path`);
    }
    return this.absolute(declared.evaluationResultsPath);
  }

  async status(): Promise<RunStatus> {
    let manifest: RunManifest;
    try {
      manifest = await this.getManifest();
    } catch (error) {
      if (error instanceof AppError && (error.code === 'NotFound' || error.code === 'InvalidFormat')) {
        return 'failed';
      }
      throw error;
    }
    if (!manifest.finalModelPath) {
      return 'in_progress';
    }
    const weights = join(this.absolute(manifest.finalModelPath), FINAL_MODEL_WEIGHTS);
    return (await fileSize(weights)) === undefined ? 'in_progress' : 'completed';
  }

  async isComplete(): Promise<boolean> {
    return (await this.status()) === 'completed';
  }

  /**
   * Copies a training and a validation JSONL file into the stage's training
   * data directory as `train.jsonl` and `valid.jsonl`.
   *
   * @returns The training data directory
   * @throws NotFoundError if either source file does not exist
   */
  async prepareTrainingData(stage: StageName, trainFile: string, validFile: string): Promise<string> {
    for (const source of [trainFile, validFile]) {
      if (!(await pathExists(source))) {
        throw new NotFoundError(`Training data file not found: ${source}`, source);
      }
    }
    const dataDir = await this.trainingDataPath(stage);
    await copy(trainFile, join(dataDir, 'train.jsonl'));
    await copy(validFile, join(dataDir, 'valid.jsonl'));
    await this.logger.info(`Prepared ${stage} training data in ${dataDir}`);
    return dataDir;
  }

  /**
   * Merges training metadata into the cached manifest. Call
   * {@link saveManifest} to persist it.
   */
  async recordStageResults(stage: StageName, results: StageResults): Promise<void> {
    const declared = await this.stage(stage);
    declared.trainingParams = { ...declared.trainingParams, ...results.trainingParams };
    declared.datasetStats = { ...declared.datasetStats, ...results.datasetStats };
  }

  /**
   * Arguments for the external trainer of one stage. Stage 2 resumes from
   * stage 1's adapters, which must therefore validate.
   *
   * @throws MissingStageError | ValidationFailedError
   */
  async trainingInvocation(
    stage: StageName,
    params?: Record<string, unknown>,
  ): Promise<TrainingInvocation> {
    const manifest = await this.getManifest();
    const declared = await this.stage(stage);
    return {
      baseModel: manifest.baseModel,
      trainingDataDir: this.absolute(declared.trainingDataPath),
      outputDir: this.absolute(declared.adaptersPath),
      resumeAdapterDir: stage === 'stage2' ? await this.resolve('stage1', 'adapters') : undefined,
      params: params ?? declared.trainingParams,
    };
  }

  private async stage(stage: StageName): Promise<StageManifest> {
    const declared = (await this.getManifest())[stage];
    if (!declared) {
      throw new MissingStageError(stage);
    }
    return declared;
  }

  private absolute(relativePath: string): string {
    return join(this.runDir, relativePath);
  }
}
