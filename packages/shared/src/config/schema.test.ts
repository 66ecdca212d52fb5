import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  DEFAULT_BASE_MODEL,
  DEFAULT_RUN_PREFIX,
  DEFAULT_RUNS_DIR,
  DEFAULT_TARGET_MODULES,
} from './schema';

describe('ConfigSchema', () => {
  it('fills every default from an empty document', () => {
    const config = ConfigSchema.parse({});
    expect(config).toEqual({
      configVersion: 1,
      runsDir: DEFAULT_RUNS_DIR,
      runPrefix: DEFAULT_RUN_PREFIX,
      baseModel: DEFAULT_BASE_MODEL,
      conversion: {
        modelIdMappings: expect.objectContaining({ 'OLMo-2-1B-mlx-q4': 'allenai/OLMo-2-1B' }),
        targetModules: DEFAULT_TARGET_MODULES,
      },
      logging: { verbose: false },
    });
  });

  it('rejects a run prefix containing a path separator', () => {
    const result = ConfigSchema.safeParse({ runPrefix: 'runs/' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['runPrefix']);
    }
  });

  it('rejects an empty target module list', () => {
    const result = ConfigSchema.safeParse({ conversion: { targetModules: [] } });
    expect(result.success).toBe(false);
  });
});
