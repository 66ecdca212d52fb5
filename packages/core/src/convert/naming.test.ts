import { describe, it, expect } from 'vitest';
import { ConversionError } from '@adapterlab/shared';
import { renameParameters, toMlxParameterName, toPeftParameterName } from './naming';

describe('toPeftParameterName', () => {
  it('adds the root prefix and the weight marker to A and B matrices', () => {
    expect(toPeftParameterName('model.layers.0.self_attn.q_proj.lora_a')).toBe(
      'base_model.model.layers.0.self_attn.q_proj.lora_A.weight',
    );
    expect(toPeftParameterName('model.layers.12.mlp.down_proj.lora_b')).toBe(
      'base_model.model.layers.12.mlp.down_proj.lora_B.weight',
    );
  });

  it('does not double the prefix', () => {
    expect(toPeftParameterName('base_model.model.layers.1.self_attn.v_proj.lora_a')).toBe(
      'base_model.model.layers.1.self_attn.v_proj.lora_A.weight',
    );
  });

  it('only rewrites a trailing suffix', () => {
    expect(toPeftParameterName('model.lora_a_scale')).toBe('base_model.model.lora_a_scale');
    expect(toPeftParameterName('model.lora_a.extra.lora_b')).toBe(
      'base_model.model.lora_a.extra.lora_B.weight',
    );
  });
});

describe('toMlxParameterName', () => {
  it('inverts the conversion', () => {
    const names = [
      'model.layers.0.self_attn.q_proj.lora_a',
      'model.layers.0.self_attn.q_proj.lora_b',
      'model.norm.weight',
    ];
    expect(names.map((n) => toMlxParameterName(toPeftParameterName(n)))).toEqual(names);
  });
});

describe('renameParameters', () => {
  it('keeps values and renames keys', () => {
    const renamed = renameParameters(
      new Map([
        ['model.a.lora_a', 1],
        ['model.a.lora_b', 2],
      ]),
      toPeftParameterName,
    );
    expect([...renamed.entries()]).toEqual([
      ['base_model.model.a.lora_A.weight', 1],
      ['base_model.model.a.lora_B.weight', 2],
    ]);
  });

  it('rejects names that collide after conversion', () => {
    const parameters = new Map([
      ['model.a.lora_a', 1],
      ['base_model.model.a.lora_a', 2],
    ]);
    expect(() => renameParameters(parameters, toPeftParameterName)).toThrow(ConversionError);
    expect(() => renameParameters(parameters, toPeftParameterName)).toThrow(
      'Parameters "model.a.lora_a" and "base_model.model.a.lora_a" both convert to "base_model.model.a.lora_A.weight"',
    );
  });
});
