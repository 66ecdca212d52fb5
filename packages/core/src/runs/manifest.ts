import { z } from 'zod';
import { InvalidFormatError, isAbsolutePath, isRecord } from '@adapterlab/shared';

export const MANIFEST_FILENAME = 'run-manifest.json';
/** Layout every manifest is written in */
export const MANIFEST_SCHEMA_VERSION = '2.0';
/** Stage-metadata layout, still readable */
export const LEGACY_SCHEMA_VERSION = '1.0';

export const STAGES = ['stage1', 'stage2'] as const;
export type StageName = (typeof STAGES)[number];

/**
 * Declared artifact locations and metadata for one training stage. Every path
 * is relative to the run root.
 */
export interface StageManifest {
  adaptersPath: string;
  trainingDataPath: string;
  evaluationResultsPath?: string;
  /** Fused model produced from this stage's adapters, when the stage merges */
  mergedModelPath?: string;
  /** Named datasets, e.g. `codefix` and `mixed` for stage 2 */
  trainingDataPaths?: Record<string, string>;
  trainingParams: Record<string, unknown>;
  datasetStats: Record<string, unknown>;
}

export interface RunManifest {
  schemaVersion: typeof MANIFEST_SCHEMA_VERSION;
  runId: string;
  /** Creation time, ISO 8601; the only sort key for run discovery */
  timestamp: string;
  baseModel: string;
  stage1?: StageManifest;
  stage2?: StageManifest;
  /** Fully merged deployable model, expected once stage 2 completes */
  finalModelPath?: string;
}

/**
 * On-disk layouts a manifest may be found in. Only `v2` is ever written.
 *
 * - `v2`: `{schemaVersion: "2.0", runId, timestamp, baseModel, stage1, stage2, finalModelPath}`
 * - `v1`: same top level, stages carry `finalModelPath`/`mergedModelPath` directly
 * - `snake`: `{version, run_metadata: {run_id, timestamp, base_model}, stage1: {adapters_path, ...}}`
 * - `flat`: single-stage `{version, run_id, timestamp, base_model, adapters_path, training_data_path}`
 */
export type ManifestLayout = 'v2' | 'v1' | 'snake' | 'flat';

const pathField = z.string().min(1);
const paramsField = z.record(z.string(), z.unknown());

const StageV2Schema = z.object({
  adaptersPath: pathField,
  trainingDataPath: pathField,
  evaluationResultsPath: pathField.optional(),
  mergedModelPath: pathField.optional(),
  trainingDataPaths: z.record(z.string(), pathField).optional(),
  trainingParams: paramsField.default({}),
  datasetStats: paramsField.default({}),
});

const ManifestV2Schema = z.object({
  schemaVersion: z.string().optional(),
  runId: z.string().min(1),
  timestamp: z.string().min(1),
  baseModel: z.string().min(1),
  stage1: StageV2Schema.optional(),
  stage2: StageV2Schema.optional(),
  finalModelPath: pathField.optional(),
});

const StageV1Schema = z.object({
  adaptersPath: pathField,
  trainingDataPath: pathField,
  finalModelPath: pathField.optional(),
  mergedModelPath: pathField.optional(),
  trainingDataPaths: z.record(z.string(), pathField).optional(),
});

const ManifestV1Schema = z.object({
  schemaVersion: z.string().optional(),
  runId: z.string().min(1),
  timestamp: z.string().min(1),
  baseModel: z.string().min(1),
  stage1: StageV1Schema.optional(),
  stage2: StageV1Schema.optional(),
});

const StageSnakeSchema = z.object({
  adapters_path: pathField,
  training_data_path: pathField,
  final_model_path: pathField.nullish(),
  merged_model_path: pathField.nullish(),
  training_data_paths: z.record(z.string(), pathField).nullish(),
});

const ManifestSnakeSchema = z.object({
  version: z.string().optional(),
  run_metadata: z
    .object({
      run_id: z.string().min(1),
      timestamp: z.string().min(1),
      base_model: z.string().min(1),
    }),
  stage1: StageSnakeSchema.nullish(),
  stage2: StageSnakeSchema.nullish(),
});

const ManifestFlatSchema = z.object({
  version: z.string().optional(),
  run_id: z.string().min(1),
  timestamp: z.string().min(1),
  base_model: z.string().min(1),
  training_params: paramsField.nullish(),
  adapters_path: pathField,
  training_data_path: pathField,
});

const V2_ONLY_STAGE_FIELDS = ['evaluationResultsPath', 'trainingParams', 'datasetStats'];

/**
 * Picks the layout of a parsed manifest document. An explicit
 * `schemaVersion` wins; otherwise version-specific fields decide, and a
 * document with none of them is read as the legacy `v1` layout.
 */
export function detectManifestLayout(doc: Record<string, unknown>): ManifestLayout {
  if (doc.schemaVersion === MANIFEST_SCHEMA_VERSION) return 'v2';
  if (doc.schemaVersion === LEGACY_SCHEMA_VERSION) return 'v1';
  if ('run_metadata' in doc) return 'snake';
  if ('adapters_path' in doc) return 'flat';

  if ('finalModelPath' in doc) return 'v2';
  for (const stage of STAGES) {
    const value = doc[stage];
    if (isRecord(value) && V2_ONLY_STAGE_FIELDS.some((field) => field in value)) {
      return 'v2';
    }
  }
  return 'v1';
}

function invalid(source: string, layout: ManifestLayout, error: z.ZodError): InvalidFormatError {
  const issue = error.issues[0];
  const field = issue.path.join('.') || '(root)';
  return new InvalidFormatError(
    `Invalid run manifest (${layout} layout) in ${source}: ${field}: ${issue.message}`,
    source,
    { field, cause: error },
  );
}

function fromV2(doc: Record<string, unknown>, source: string): RunManifest {
  const result = ManifestV2Schema.safeParse(doc);
  if (!result.success) throw invalid(source, 'v2', result.error);
  const data = result.data;
  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    runId: data.runId,
    timestamp: data.timestamp,
    baseModel: data.baseModel,
    stage1: data.stage1,
    stage2: data.stage2,
    finalModelPath: data.finalModelPath,
  };
}

function fromV1(doc: Record<string, unknown>, source: string): RunManifest {
  const result = ManifestV1Schema.safeParse(doc);
  if (!result.success) throw invalid(source, 'v1', result.error);
  const data = result.data;

  let finalModelPath: string | undefined;
  const migrateStage = (stage: z.infer<typeof StageV1Schema> | undefined) => {
    if (!stage) return undefined;
    const { finalModelPath: stageFinal, ...paths } = stage;
    finalModelPath = stageFinal ?? finalModelPath;
    const migrated: StageManifest = { ...paths, trainingParams: {}, datasetStats: {} };
    return migrated;
  };

  const stage1 = migrateStage(data.stage1);
  const stage2 = migrateStage(data.stage2);
  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    runId: data.runId,
    timestamp: data.timestamp,
    baseModel: data.baseModel,
    stage1,
    stage2,
    finalModelPath,
  };
}

function fromSnake(doc: Record<string, unknown>, source: string): RunManifest {
  const result = ManifestSnakeSchema.safeParse(doc);
  if (!result.success) throw invalid(source, 'snake', result.error);
  const data = result.data;

  let finalModelPath: string | undefined;
  const migrateStage = (stage: z.infer<typeof StageSnakeSchema> | null | undefined) => {
    if (!stage) return undefined;
    finalModelPath = stage.final_model_path ?? finalModelPath;
    const migrated: StageManifest = {
      adaptersPath: stage.adapters_path,
      trainingDataPath: stage.training_data_path,
      mergedModelPath: stage.merged_model_path ?? undefined,
      trainingDataPaths: stage.training_data_paths ?? undefined,
      trainingParams: {},
      datasetStats: {},
    };
    return migrated;
  };

  const metadata = data.run_metadata;
  const stage1 = migrateStage(data.stage1);
  const stage2 = migrateStage(data.stage2);
  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    runId: metadata.run_id,
    timestamp: metadata.timestamp,
    baseModel: metadata.base_model,
    stage1,
    stage2,
    finalModelPath,
  };
}

function fromFlat(doc: Record<string, unknown>, source: string): RunManifest {
  const result = ManifestFlatSchema.safeParse(doc);
  if (!result.success) throw invalid(source, 'flat', result.error);
  const data = result.data;
  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    runId: data.run_id,
    timestamp: data.timestamp,
    baseModel: data.base_model,
    stage1: {
      adaptersPath: data.adapters_path,
      trainingDataPath: data.training_data_path,
      trainingParams: data.training_params ?? {},
      datasetStats: {},
    },
  };
}

const READERS: Record<
  ManifestLayout,
  (doc: Record<string, unknown>, source: string) => RunManifest
> = {
  v2: fromV2,
  v1: fromV1,
  snake: fromSnake,
  flat: fromFlat,
};

/**
 * Validates a parsed manifest document and migrates it to the canonical
 * representation.
 *
 * @param source File path (or other label) used in error messages
 * @throws InvalidFormatError naming the first missing or mistyped field, or an absolute path
 */
export function migrateManifest(
  doc: unknown,
  source: string,
): { manifest: RunManifest; layout: ManifestLayout } {
  if (!isRecord(doc)) {
    throw new InvalidFormatError(`Run manifest in ${source} is not a JSON object`, source);
  }
  const layout = detectManifestLayout(doc);
  const manifest = READERS[layout](doc, source);
  assertRelativePaths(manifest, source);
  return { manifest, layout };
}

/**
 * Every path-valued field of a manifest as `[dotted field name, value]`.
 */
export function manifestPathFields(manifest: RunManifest): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  for (const stageName of STAGES) {
    const stage = manifest[stageName];
    if (!stage) continue;
    fields.push([`${stageName}.adaptersPath`, stage.adaptersPath]);
    fields.push([`${stageName}.trainingDataPath`, stage.trainingDataPath]);
    if (stage.evaluationResultsPath) {
      fields.push([`${stageName}.evaluationResultsPath`, stage.evaluationResultsPath]);
    }
    if (stage.mergedModelPath) {
      fields.push([`${stageName}.mergedModelPath`, stage.mergedModelPath]);
    }
    for (const [name, value] of Object.entries(stage.trainingDataPaths ?? {})) {
      fields.push([`${stageName}.trainingDataPaths.${name}`, value]);
    }
  }
  if (manifest.finalModelPath) {
    fields.push(['finalModelPath', manifest.finalModelPath]);
  }
  return fields;
}

/**
 * @throws InvalidFormatError for the first absolute path, naming its field
 */
export function assertRelativePaths(manifest: RunManifest, source: string): void {
  for (const [field, value] of manifestPathFields(manifest)) {
    if (isAbsolutePath(value)) {
      throw new InvalidFormatError(
        `Run manifest field ${field} must be relative to the run root, got absolute path ${value}`,
        source,
        { field },
      );
    }
  }
}
