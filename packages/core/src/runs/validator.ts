import * as fs from 'fs/promises';
import { fileSize, isDirectory, join, parseJson, ValidationFailedError } from '@adapterlab/shared';

/**
 * Directory layouts an artifact can be checked against. Callers always name
 * the kind; a directory is never probed for "whatever it looks like".
 */
export const ARTIFACT_KINDS = ['lora', 'fused', 'peft'] as const;
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export const REQUIRED_FILES: Readonly<Record<ArtifactKind, readonly string[]>> = {
  lora: ['adapters.safetensors', 'adapter_config.json'],
  fused: ['config.json', 'model.safetensors', 'tokenizer.json'],
  peft: ['adapter_model.safetensors', 'adapter_config.json'],
};

export const ARTIFACT_KIND_LABELS: Readonly<Record<ArtifactKind, string>> = {
  lora: 'LoRA adapter',
  fused: 'fused model',
  peft: 'converted adapter',
};

export interface ArtifactValidation {
  valid: boolean;
  kind: ArtifactKind;
  directory: string;
  /** Required files that are absent (or not regular files) */
  missing: string[];
  /** Required files that exist with size 0 */
  empty: string[];
}

/**
 * Checks that every required file of `kind` exists in `directory` and is
 * non-empty. Only sizes are inspected; tensor headers are not parsed.
 */
export async function validateArtifact(
  directory: string,
  kind: ArtifactKind,
): Promise<ArtifactValidation> {
  const missing: string[] = [];
  const empty: string[] = [];

  for (const file of REQUIRED_FILES[kind]) {
    const size = await fileSize(join(directory, file));
    if (size === undefined) {
      missing.push(file);
    } else if (size === 0) {
      empty.push(file);
    }
  }

  return {
    valid: missing.length === 0 && empty.length === 0,
    kind,
    directory,
    missing,
    empty,
  };
}

/**
 * Like {@link validateArtifact}, but throws {@link ValidationFailedError}
 * naming the missing and empty files.
 */
export async function assertValidArtifact(directory: string, kind: ArtifactKind): Promise<string> {
  const result = await validateArtifact(directory, kind);
  if (!result.valid) {
    throw new ValidationFailedError(directory, kind, result.missing, result.empty);
  }
  return directory;
}

const SMALL_WEIGHTS_BYTES = 100 * 1024;
const LARGE_WEIGHTS_BYTES = 50_000 * 1024 * 1024;

export interface ModelDirectoryReport {
  directory: string;
  exists: boolean;
  /** Structure kinds whose required files are all present and non-empty */
  satisfies: ArtifactKind[];
  /** JSON files directly inside the directory that failed to parse */
  invalidJson: string[];
  errors: string[];
  warnings: string[];
}

/**
 * Pre-upload health report for a model directory. Lists every structure kind
 * the directory satisfies without choosing one, checks that its JSON files
 * parse, and flags implausibly small or large weight files.
 */
export async function inspectModelDirectory(directory: string): Promise<ModelDirectoryReport> {
  const report: ModelDirectoryReport = {
    directory,
    exists: false,
    satisfies: [],
    invalidJson: [],
    errors: [],
    warnings: [],
  };

  if (!(await isDirectory(directory))) {
    report.errors.push(`Model directory does not exist: ${directory}`);
    return report;
  }
  report.exists = true;

  for (const kind of ARTIFACT_KINDS) {
    if ((await validateArtifact(directory, kind)).valid) {
      report.satisfies.push(kind);
    }
  }
  if (report.satisfies.length === 0) {
    report.errors.push('No valid model structure found (neither LoRA, fused, nor converted)');
  }

  const entries = (await fs.readdir(directory, { withFileTypes: true }))
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const name of entries.filter((n) => n.endsWith('.json'))) {
    try {
      parseJson(await fs.readFile(join(directory, name), 'utf8'), name);
    } catch (error) {
      report.invalidJson.push(name);
      report.errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  const weights = entries.filter((n) => n.endsWith('.safetensors'));
  if (weights.length === 0) {
    report.errors.push('No .safetensors files found');
  }
  for (const name of weights) {
    const size = (await fileSize(join(directory, name))) ?? 0;
    const sizeMb = (size / (1024 * 1024)).toFixed(1);
    if (size < SMALL_WEIGHTS_BYTES) {
      report.warnings.push(`Model file ${name} is very small (${sizeMb}MB)`);
    } else if (size > LARGE_WEIGHTS_BYTES) {
      report.warnings.push(`Model file ${name} is very large (${sizeMb}MB)`);
    }
  }

  return report;
}
