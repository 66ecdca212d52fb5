import { readFile } from 'fs-extra';
import {
  AppError,
  atomicWrite,
  ConversionError,
  eventBase,
  fileSize,
  isRecord,
  join,
  NoopLogger,
  parseJson,
  PostValidationFailedError,
  SourceNotFoundError,
  type Logger,
} from '@adapterlab/shared';
import { validateArtifact } from '../runs/validator';
import { generateModelCard } from './model-card';
import { renameParameters, toPeftParameterName } from './naming';
import {
  createPeftConfig,
  parseMlxAdapterConfig,
  type MlxAdapterConfig,
  type PeftAdapterConfig,
} from './peft-config';
import { readSafetensorsFile, writeSafetensorsFile } from './safetensors';

export const MLX_WEIGHTS_FILE = 'adapters.safetensors';
export const MLX_CONFIG_FILE = 'adapter_config.json';
export const PEFT_WEIGHTS_FILE = 'adapter_model.safetensors';
export const PEFT_CONFIG_FILE = 'adapter_config.json';
export const MODEL_CARD_FILE = 'README.md';

const REQUIRED_PEFT_CONFIG_FIELDS = ['peft_type', 'target_modules'];

export interface ConverterOptions {
  logger?: Logger;
  modelIdMappings?: Record<string, string>;
  targetModules?: readonly string[];
  /** Run the converted adapter belongs to, recorded on emitted events */
  runId?: string;
}

export interface ConversionResult {
  mode: 'converted';
  sourceDir: string;
  /** Directory to publish: the converted adapter */
  path: string;
  files: string[];
  parametersConverted: number;
  baseModel: string;
  mlxConfig: MlxAdapterConfig;
  peftConfig: PeftAdapterConfig;
}

export interface PassthroughResult {
  mode: 'passthrough';
  sourceDir: string;
  /** Directory to publish instead: the caller's fallback */
  path: string;
  reason: string;
}

export interface PeftValidation {
  valid: boolean;
  directory: string;
  filesFound: string[];
  /** Tensor count, when the weights decoded */
  parameterCount?: number;
  errors: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rewrites an MLX LoRA adapter directory (`adapters.safetensors`,
 * `adapter_config.json`) into the PEFT layout (`adapter_model.safetensors`,
 * `adapter_config.json`, `README.md`). Tensor bytes are copied unchanged;
 * only names and the config change.
 */
export class AdapterFormatConverter {
  private readonly logger: Logger;

  constructor(private readonly options: ConverterOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * @throws SourceNotFoundError if either source file is absent; checked before anything is read
   * @throws ConversionError wrapping any read, parse, rename or write failure
   * @throws PostValidationFailedError if the written output does not hold the PEFT files
   */
  async convertOrFail(
    sourceDir: string,
    outputDir: string,
    baseModel: string,
  ): Promise<ConversionResult> {
    const weightsPath = join(sourceDir, MLX_WEIGHTS_FILE);
    const configPath = join(sourceDir, MLX_CONFIG_FILE);
    const absent = await this.absentSources(sourceDir);
    if (absent.length > 0) {
      const path = join(sourceDir, absent[0]);
      throw new SourceNotFoundError(`MLX adapter file not found: ${path}`, path);
    }

    await this.logger.info(`Converting MLX adapter ${sourceDir} to PEFT format in ${outputDir}`);

    let result: ConversionResult;
    try {
      const mlxConfig = parseMlxAdapterConfig(
        parseJson(await readFile(configPath, 'utf8'), configPath),
        configPath,
      );
      const { metadata, tensors } = await readSafetensorsFile(weightsPath);
      const renamed = renameParameters(tensors, toPeftParameterName);

      const peftConfig = createPeftConfig(mlxConfig, baseModel, this.options);
      const files = [
        join(outputDir, PEFT_WEIGHTS_FILE),
        join(outputDir, PEFT_CONFIG_FILE),
        join(outputDir, MODEL_CARD_FILE),
      ];
      await writeSafetensorsFile(files[0], renamed, metadata);
      await atomicWrite(files[1], JSON.stringify(peftConfig, null, 2) + '\n');
      await atomicWrite(
        files[2],
        generateModelCard(mlxConfig, peftConfig.base_model_name_or_path, peftConfig.target_modules),
      );

      result = {
        mode: 'converted',
        sourceDir,
        path: outputDir,
        files,
        parametersConverted: renamed.size,
        baseModel,
        mlxConfig,
        peftConfig,
      };
    } catch (error) {
      if (error instanceof AppError && error.code === 'ConversionError') throw error;
      throw new ConversionError(
        `Failed to convert adapter at ${sourceDir}: ${errorMessage(error)}`,
        { cause: error, details: { sourceDir, outputDir } },
      );
    }

    const check = await validateArtifact(outputDir, 'peft');
    if (!check.valid) {
      throw new PostValidationFailedError(outputDir, check.missing, check.empty);
    }

    await this.logger.log({
      ...eventBase(this.options.runId ?? ''),
      type: 'AdapterConverted',
      payload: {
        sourceDir,
        outputDir,
        mode: 'converted',
        parametersConverted: result.parametersConverted,
      },
    });
    await this.logger.info(`Converted ${result.parametersConverted} parameters`);
    return result;
  }

  /**
   * Like {@link convertOrFail}, except that an adapter directory without its
   * MLX files yields `fallbackDir` unconverted. Any other failure still throws.
   */
  async convertOrPassthrough(
    sourceDir: string,
    outputDir: string,
    baseModel: string,
    fallbackDir: string,
  ): Promise<ConversionResult | PassthroughResult> {
    const absent = await this.absentSources(sourceDir);
    if (absent.length === 0) {
      return this.convertOrFail(sourceDir, outputDir, baseModel);
    }

    const reason = `No MLX adapter in ${sourceDir} (missing ${absent.join(', ')})`;
    await this.logger.warn(`${reason}; using ${fallbackDir} unconverted`);
    await this.logger.log({
      ...eventBase(this.options.runId ?? ''),
      type: 'AdapterConverted',
      payload: { sourceDir, outputDir: fallbackDir, mode: 'passthrough', parametersConverted: 0 },
    });
    return { mode: 'passthrough', sourceDir, path: fallbackDir, reason };
  }

  /**
   * Deep check of a converted adapter: required files including the model
   * card, required config fields, and weights that decode.
   */
  async validatePeftAdapter(directory: string): Promise<PeftValidation> {
    const report: PeftValidation = { valid: false, directory, filesFound: [], errors: [] };

    for (const file of [PEFT_WEIGHTS_FILE, PEFT_CONFIG_FILE, MODEL_CARD_FILE]) {
      if ((await fileSize(join(directory, file))) === undefined) {
        report.errors.push(`Missing required file: ${file}`);
      } else {
        report.filesFound.push(file);
      }
    }

    if (report.filesFound.includes(PEFT_CONFIG_FILE)) {
      const configPath = join(directory, PEFT_CONFIG_FILE);
      try {
        const config = parseJson(await readFile(configPath, 'utf8'), configPath);
        for (const field of REQUIRED_PEFT_CONFIG_FIELDS) {
          if (!isRecord(config) || !(field in config)) {
            report.errors.push(`Missing required config field: ${field}`);
          }
        }
      } catch (error) {
        report.errors.push(`Invalid adapter config: ${errorMessage(error)}`);
      }
    }

    if (report.filesFound.includes(PEFT_WEIGHTS_FILE)) {
      try {
        const { tensors } = await readSafetensorsFile(join(directory, PEFT_WEIGHTS_FILE));
        report.parameterCount = tensors.size;
      } catch (error) {
        report.errors.push(`Invalid adapter weights file: ${errorMessage(error)}`);
      }
    }

    report.valid = report.errors.length === 0;
    return report;
  }

  private async absentSources(sourceDir: string): Promise<string[]> {
    const absent: string[] = [];
    for (const file of [MLX_WEIGHTS_FILE, MLX_CONFIG_FILE]) {
      if ((await fileSize(join(sourceDir, file))) === undefined) {
        absent.push(file);
      }
    }
    return absent;
  }
}
