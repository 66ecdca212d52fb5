import type { Command } from 'commander';
import {
  ARTIFACT_KINDS,
  inspectModelDirectory,
  validateArtifact,
  type ArtifactKind,
} from '@adapterlab/core';
import { resolve, UsageError } from '@adapterlab/shared';
import { createContext, createConverter, type Environment } from '../context';

function parseKind(value: string): ArtifactKind {
  const kind = ARTIFACT_KINDS.find((candidate) => candidate === value);
  if (kind === undefined) {
    throw new UsageError(
      `Unknown artifact kind "${value}"; expected one of: ${ARTIFACT_KINDS.join(', ')}`,
    );
  }
  return kind;
}

export function registerValidateCommand(program: Command, env: Environment) {
  program
    .command('validate <dir>')
    .description(
      'Check a model directory. With --kind, checks that structure only; ' +
        'without, reports every structure it satisfies',
    )
    .option('--kind <kind>', `Expected structure (${ARTIFACT_KINDS.join(', ')})`)
    .option('--deep', 'For --kind peft: also check the model card, config fields and weights')
    .action(async (dir: string, opts: { kind?: string; deep?: boolean }, command: Command) => {
      const ctx = createContext(command, env);
      const directory = resolve(env.cwd, dir);

      if (opts.kind === undefined) {
        if (opts.deep) throw new UsageError('--deep requires --kind peft');
        const report = await inspectModelDirectory(directory);
        ctx.renderer.directory(report);
        if (report.errors.length > 0) process.exitCode = 1;
        return;
      }

      const kind = parseKind(opts.kind);
      if (opts.deep) {
        if (kind !== 'peft') throw new UsageError('--deep requires --kind peft');
        const report = await createConverter(ctx).validatePeftAdapter(directory);
        ctx.renderer.peftValidation(report);
        if (!report.valid) process.exitCode = 1;
        return;
      }

      const report = await validateArtifact(directory, kind);
      ctx.renderer.validation(report);
      if (!report.valid) process.exitCode = 1;
    });
}
