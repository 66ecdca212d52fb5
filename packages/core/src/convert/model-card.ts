import { DEFAULT_TARGET_MODULES } from '@adapterlab/shared';
import {
  DEFAULT_LORA_ALPHA,
  DEFAULT_LORA_DROPOUT,
  DEFAULT_LORA_RANK,
  type MlxAdapterConfig,
} from './peft-config';

const CARD_TAGS = ['security', 'vulnerability-analysis', 'mlx-converted'];

function orNA(value: string | number | undefined): string {
  return value === undefined ? 'N/A' : String(value);
}

/**
 * README for a converted adapter: hub front matter followed by the adapter
 * shape and the training provenance recorded in the MLX config.
 */
export function generateModelCard(
  mlxConfig: MlxAdapterConfig,
  baseModelId: string,
  targetModules: readonly string[] = DEFAULT_TARGET_MODULES,
): string {
  const lora = mlxConfig.lora_parameters ?? {};
  const lines = [
    '---',
    `base_model: ${baseModelId}`,
    'base_model_relation: adapter',
    'library_name: peft',
    'peft_type: LORA',
    'tags:',
    ...CARD_TAGS.map((tag) => `- ${tag}`),
    'license: apache-2.0',
    '---',
    '',
    '# Security Analysis LoRA Adapter',
    '',
    'Low-rank adapter trained with MLX-LM and converted to the PEFT adapter layout.',
    '',
    '## Model Details',
    '',
    `- **Base Model**: ${baseModelId}`,
    '- **Adapter Type**: LoRA (Low-Rank Adaptation)',
    `- **Target Modules**: ${targetModules.join(', ')}`,
    `- **LoRA Rank**: ${lora.rank ?? DEFAULT_LORA_RANK}`,
    `- **LoRA Alpha**: ${lora.scale ?? DEFAULT_LORA_ALPHA}`,
    `- **LoRA Dropout**: ${lora.dropout ?? DEFAULT_LORA_DROPOUT}`,
    '',
    '## Training Details',
    '',
    '- **Training Framework**: MLX-LM (converted to PEFT format)',
    `- **Iterations**: ${orNA(mlxConfig.iters)}`,
    `- **Learning Rate**: ${orNA(mlxConfig.learning_rate)}`,
    `- **Optimizer**: ${orNA(mlxConfig.optimizer)}`,
    `- **Fine-tune Type**: ${orNA(mlxConfig.fine_tune_type)}`,
    '',
    '## Conversion Notes',
    '',
    '1. Parameter suffixes `lora_a`/`lora_b` become `lora_A.weight`/`lora_B.weight`',
    '2. Every parameter name is rooted under `base_model.`',
    '3. Tensor values are copied byte for byte',
    '',
    '## License',
    '',
    'Apache 2.0',
    '',
  ];
  return lines.join('\n');
}
