import { z } from 'zod';

export const DEFAULT_RUN_PREFIX = 'security-lora-';
export const DEFAULT_BASE_MODEL = 'OLMo-2-1B-mlx-q4';
export const DEFAULT_RUNS_DIR = './fine-tuned-models';

/** Modules every converted adapter targets; the MLX format does not record them. */
export const DEFAULT_TARGET_MODULES = [
  'q_proj',
  'v_proj',
  'k_proj',
  'o_proj',
  'gate_proj',
  'up_proj',
  'down_proj',
];

/**
 * Local model directory names and the hub identifiers they were pulled from.
 * Matched exactly first, then as substrings in this order.
 */
export const DEFAULT_MODEL_ID_MAPPINGS: Record<string, string> = {
  'OLMo-2-1B': 'allenai/OLMo-2-1B',
  'OLMo-2-1B-mlx': 'allenai/OLMo-2-1B',
  'OLMo-2-1B-mlx-q4': 'allenai/OLMo-2-1B',
  'OLMo-1B': 'allenai/OLMo-1B-hf',
  'OLMo-7B': 'allenai/OLMo-7B-hf',
  'llama-2-7b': 'meta-llama/Llama-2-7b-hf',
  'llama-2-13b': 'meta-llama/Llama-2-13b-hf',
  'mistral-7b': 'mistralai/Mistral-7B-v0.1',
};

export const ConversionConfigSchema = z.object({
  modelIdMappings: z.record(z.string(), z.string()).default(DEFAULT_MODEL_ID_MAPPINGS),
  targetModules: z.array(z.string()).min(1).default(DEFAULT_TARGET_MODULES),
});

export const LoggingConfigSchema = z.object({
  /** JSONL file receiving lifecycle events; console only when unset */
  eventsPath: z.string().optional(),
  verbose: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Directory holding one subdirectory per training run */
  runsDir: z.string().min(1).default(DEFAULT_RUNS_DIR),
  /** Fixed prefix of every run directory name and run id */
  runPrefix: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9._-]+$/, 'runPrefix may only contain letters, digits, ".", "_" and "-"')
    .default(DEFAULT_RUN_PREFIX),
  /** Stage-0 model new runs start from */
  baseModel: z.string().min(1).default(DEFAULT_BASE_MODEL),
  conversion: ConversionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
