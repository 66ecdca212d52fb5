export const name = '@adapterlab/core';

export * from './runs/validator';
export * from './runs/manifest';
export * from './runs/manifest-store';
export * from './runs/training-run';
export * from './runs/run-manager';
export * from './convert/safetensors';
export * from './convert/naming';
export * from './convert/peft-config';
export * from './convert/model-card';
export * from './convert/converter';
export * from './config/loader';
