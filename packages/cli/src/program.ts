import { Command } from 'commander';
import { version } from '../package.json';
import { registerConvertCommand } from './commands/convert';
import { registerRunsCommand } from './commands/runs';
import { registerValidateCommand } from './commands/validate';
import type { Environment } from './context';

import { AppError, ConfigError, UsageError } from '@adapterlab/shared';

export const name = '@adapterlab/cli';

export function createProgram(env: Environment = { cwd: process.cwd() }): Command {
  const program = new Command();

  program
    .name('adapterlab')
    .description('Training run manifests, artifact validation and LoRA adapter conversion')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--runs-dir <dir>', 'Directory holding the training runs')
    .option('--verbose', 'Enable verbose logging')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts (fail if prompt needed)');

  registerRunsCommand(program, env);
  registerValidateCommand(program, env);
  registerConvertCommand(program, env);

  return program;
}

/** 2 for mistakes the user can fix by changing the invocation or config, 1 otherwise. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

export function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}
