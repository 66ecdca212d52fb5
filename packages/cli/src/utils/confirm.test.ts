import { describe, it, expect, vi, beforeEach } from 'vitest';
import { confirm } from './confirm';
import inquirer from 'inquirer';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn(),
  },
}));

describe('confirm utility', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    // Reset TTY to true by default for tests, can override
    Object.defineProperty(process.stdin, 'isTTY', { value: true, configurable: true });
  });

  it('should return true when yes flag is set', async () => {
    const result = await confirm('Action', undefined, true, { yes: true });
    expect(result).toBe(true);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('should return false when nonInteractive flag is set', async () => {
    const result = await confirm('Action', undefined, true, { nonInteractive: true });
    expect(result).toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('should prompt when interactive and return user selection (true)', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: true });

    const result = await confirm('Action', 'Details', true);

    expect(result).toBe(true);
    expect(inquirer.prompt).toHaveBeenCalledWith([
      { type: 'confirm', name: 'confirmed', message: 'Action\nDetails', default: false },
    ]);
  });

  it('should prompt when interactive and return user selection (false)', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: false });

    const result = await confirm('Action');

    expect(result).toBe(false);
  });

  it('should return false if not TTY (simulating non-interactive env)', async () => {
    Object.defineProperty(process.stdin, 'isTTY', { value: false, configurable: true });

    const result = await confirm('Action');

    expect(result).toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });
});
