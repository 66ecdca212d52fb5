import { describe, it, expect, vi } from 'vitest';
import { NoopLogger } from './noopLogger';
import { eventBase } from '../types/events';

describe('NoopLogger', () => {
  it('writes nothing and returns itself as child', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new NoopLogger();
    logger.log({ ...eventBase('r1'), type: 'RunSkipped', payload: { runDir: '/x', reason: 'y' } });
    logger.warn('ignored');
    logger.error(new Error('ignored'));

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
    expect(logger.child({ a: 1 })).toBe(logger);

    logSpy.mockRestore();
    errorSpy.mockRestore();
  });
});
