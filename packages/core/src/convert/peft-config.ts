import { z } from 'zod';
import {
  DEFAULT_MODEL_ID_MAPPINGS,
  DEFAULT_TARGET_MODULES,
  InvalidFormatError,
} from '@adapterlab/shared';

export const DEFAULT_LORA_RANK = 8;
export const DEFAULT_LORA_ALPHA = 20;
export const DEFAULT_LORA_DROPOUT = 0;

/**
 * Fields read from an MLX `adapter_config.json`. Anything else in the file is
 * kept but ignored.
 */
export const MlxAdapterConfigSchema = z
  .object({
    lora_parameters: z
      .object({
        rank: z.number().int().positive().optional(),
        scale: z.number().optional(),
        dropout: z.number().min(0).max(1).optional(),
      })
      .passthrough()
      .optional(),
    iters: z.number().int().nonnegative().optional(),
    learning_rate: z.number().optional(),
    optimizer: z.string().optional(),
    fine_tune_type: z.string().optional(),
  })
  .passthrough();

export type MlxAdapterConfig = z.infer<typeof MlxAdapterConfigSchema>;

export interface PeftAdapterConfig {
  peft_type: 'LORA';
  task_type: 'CAUSAL_LM';
  target_modules: string[];
  r: number;
  lora_alpha: number;
  lora_dropout: number;
  bias: 'none';
  base_model_name_or_path: string;
  inference_mode: boolean;
  init_lora_weights: boolean;
}

export interface PeftConfigOptions {
  modelIdMappings?: Record<string, string>;
  targetModules?: readonly string[];
}

/**
 * @throws InvalidFormatError naming the first mistyped field
 */
export function parseMlxAdapterConfig(raw: unknown, source: string): MlxAdapterConfig {
  const result = MlxAdapterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.') || '(root)';
    throw new InvalidFormatError(
      `Invalid adapter config in ${source}: ${field}: ${issue.message}`,
      source,
      { field, cause: result.error },
    );
  }
  return result.data;
}

/**
 * Hub identifier for a local model directory: the directory's basename is
 * matched exactly, then as a substring in table order; failing both, the
 * basename is returned with `-mlx`, `-q4` and `-q8` removed.
 */
export function mapToHubModelId(
  localPath: string,
  mappings: Record<string, string> = DEFAULT_MODEL_ID_MAPPINGS,
): string {
  const segments = localPath.replace(/\\/g, '/').split('/').filter(Boolean);
  const name = segments.at(-1) ?? localPath;

  const exact = mappings[name];
  if (exact !== undefined) return exact;

  for (const [pattern, hubId] of Object.entries(mappings)) {
    if (name.includes(pattern)) return hubId;
  }

  return name.replaceAll('-mlx', '').replaceAll('-q4', '').replaceAll('-q8', '');
}

export function createPeftConfig(
  mlxConfig: MlxAdapterConfig,
  baseModel: string,
  options: PeftConfigOptions = {},
): PeftAdapterConfig {
  const lora = mlxConfig.lora_parameters ?? {};
  return {
    peft_type: 'LORA',
    task_type: 'CAUSAL_LM',
    target_modules: [...(options.targetModules ?? DEFAULT_TARGET_MODULES)],
    r: lora.rank ?? DEFAULT_LORA_RANK,
    lora_alpha: lora.scale ?? DEFAULT_LORA_ALPHA,
    lora_dropout: lora.dropout ?? DEFAULT_LORA_DROPOUT,
    bias: 'none',
    base_model_name_or_path: mapToHubModelId(baseModel, options.modelIdMappings),
    inference_mode: false,
    init_lora_weights: true,
  };
}
