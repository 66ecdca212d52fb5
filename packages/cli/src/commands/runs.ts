import type { Command } from 'commander';
import {
  RUN_STATUSES,
  STAGES,
  type RunStatus,
  type StageName,
  type TrainingRun,
} from '@adapterlab/core';
import { UsageError } from '@adapterlab/shared';
import { createContext, createRunManager, type Environment } from '../context';
import { confirm } from '../utils/confirm';

const RUN_PATHS = ['adapters', 'merged-model', 'training-data', 'evaluation', 'final-model'] as const;
type RunPath = (typeof RUN_PATHS)[number];

function oneOf<T extends string>(value: string, allowed: readonly T[], what: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new UsageError(`Unknown ${what} "${value}"; expected one of: ${allowed.join(', ')}`);
  }
  return match;
}

function parseStatuses(values: string[] | undefined): RunStatus[] | undefined {
  return values?.map((value) => oneOf(value, RUN_STATUSES, 'run status'));
}

async function resolveRunPath(
  run: TrainingRun,
  kind: RunPath,
  stage: StageName,
  dataset?: string,
): Promise<string> {
  switch (kind) {
    case 'adapters':
      return run.resolve(stage, 'adapters');
    case 'merged-model':
      return run.resolve(stage, 'mergedModel');
    case 'training-data':
      return run.trainingDataPath(stage, dataset);
    case 'evaluation':
      return run.evaluationResultsPath(stage);
    case 'final-model':
      return run.resolveFinalModel();
  }
}

export function registerRunsCommand(program: Command, env: Environment) {
  const runs = program.command('runs').description('Create, discover and prune training runs');

  runs
    .command('create')
    .description('Create a run directory with its full path contract declared')
    .option('--id <id>', 'Run id after the prefix (default: local time as YYYYMMDD_HHMMSS)')
    .option('--base-model <model>', 'Model stage 1 starts from')
    .action(async (opts: { id?: string; baseModel?: string }, command: Command) => {
      const ctx = createContext(command, env);
      const manager = createRunManager(ctx);
      const run = await manager.createRun({ runId: opts.id, baseModel: opts.baseModel });
      ctx.renderer.run(await manager.summarize(run));
    });

  runs
    .command('list')
    .description('List runs with a readable manifest, oldest first')
    .option('--status <status...>', `Only runs with these statuses (${RUN_STATUSES.join(', ')})`)
    .action(async (opts: { status?: string[] }, command: Command) => {
      const ctx = createContext(command, env);
      const statuses = parseStatuses(opts.status);
      const listings = await createRunManager(ctx).listRuns(statuses);
      ctx.renderer.runs(listings.map((listing) => listing.summary));
    });

  runs
    .command('latest')
    .description('Show the most recent completed run')
    .action(async (_opts: Record<string, never>, command: Command) => {
      const ctx = createContext(command, env);
      const manager = createRunManager(ctx);
      ctx.renderer.run(await manager.summarize(await manager.getLatestRun()));
    });

  runs
    .command('show <id>')
    .description('Show one run')
    .action(async (id: string, _opts: Record<string, never>, command: Command) => {
      const ctx = createContext(command, env);
      const manager = createRunManager(ctx);
      ctx.renderer.run(await manager.summarize(await manager.getRunById(id)));
    });

  runs
    .command('path <id> <artifact>')
    .description(`Print a validated artifact path (${RUN_PATHS.join(', ')})`)
    .option('--stage <stage>', 'Stage the artifact belongs to', 'stage1')
    .option('--dataset <name>', 'Named training dataset')
    .action(
      async (
        id: string,
        artifact: string,
        opts: { stage: string; dataset?: string },
        command: Command,
      ) => {
        const ctx = createContext(command, env);
        const kind = oneOf(artifact, RUN_PATHS, 'artifact');
        const stage = oneOf(opts.stage, STAGES, 'stage');
        const run = await createRunManager(ctx).getRunById(id);
        ctx.renderer.path(await resolveRunPath(run, kind, stage, opts.dataset));
      },
    );

  runs
    .command('inspect <id>')
    .description('Check a run manifest and the artifacts it declares')
    .action(async (id: string, _opts: Record<string, never>, command: Command) => {
      const ctx = createContext(command, env);
      const report = await createRunManager(ctx).inspectRun(id);
      ctx.renderer.inspection(report);
      if (!report.valid) process.exitCode = 1;
    });

  runs
    .command('cleanup')
    .description('Remove runs that never completed')
    .option('--dry-run', 'List the runs that would be removed')
    .option('--status <status...>', 'Statuses to remove (default: failed in_progress)')
    .action(async (opts: { dryRun?: boolean; status?: string[] }, command: Command) => {
      const ctx = createContext(command, env);
      const manager = createRunManager(ctx);
      const statuses = parseStatuses(opts.status);

      const preview = await manager.cleanupFailedRuns({ dryRun: true, statuses });
      if (opts.dryRun || preview.count === 0) {
        ctx.renderer.cleanup(preview);
        return;
      }

      const approved = await confirm(
        `Remove ${preview.count} training run(s)?`,
        preview.removed.map((dir) => `  - ${dir}`).join('\n'),
        true,
        { yes: ctx.options.yes, nonInteractive: ctx.options.nonInteractive },
      );
      if (!approved) {
        await ctx.logger.warn('Cleanup cancelled; nothing was removed (pass --yes to confirm)');
        ctx.renderer.cleanup(preview);
        return;
      }

      ctx.renderer.cleanup(await manager.cleanupFailedRuns({ statuses }));
    });
}
