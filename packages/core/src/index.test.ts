import { describe, it, expect } from 'vitest';
import { AdapterFormatConverter, ConfigLoader, name, TrainingRunManager } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@adapterlab/core');
  });

  it('exports the run and conversion entry points', () => {
    expect(typeof TrainingRunManager).toBe('function');
    expect(typeof AdapterFormatConverter).toBe('function');
    expect(typeof ConfigLoader.load).toBe('function');
  });
});
