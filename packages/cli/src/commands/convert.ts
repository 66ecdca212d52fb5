import type { Command } from 'commander';
import { resolve } from '@adapterlab/shared';
import { createContext, createConverter, type Environment } from '../context';

export function registerConvertCommand(program: Command, env: Environment) {
  program
    .command('convert <source> <output>')
    .description('Convert an MLX LoRA adapter directory into the PEFT adapter layout')
    .option('--base-model <model>', 'Local base model path or name (default: configured baseModel)')
    .option(
      '--fallback <dir>',
      'Publish this directory unconverted when the source holds no MLX adapter',
    )
    .action(
      async (
        source: string,
        output: string,
        opts: { baseModel?: string; fallback?: string },
        command: Command,
      ) => {
        const ctx = createContext(command, env);
        const converter = createConverter(ctx);
        const sourceDir = resolve(env.cwd, source);
        const outputDir = resolve(env.cwd, output);
        const baseModel = opts.baseModel ?? ctx.config.baseModel;

        const result =
          opts.fallback === undefined
            ? await converter.convertOrFail(sourceDir, outputDir, baseModel)
            : await converter.convertOrPassthrough(
                sourceDir,
                outputDir,
                baseModel,
                resolve(env.cwd, opts.fallback),
              );
        ctx.renderer.conversion(result);
      },
    );
}
