import path from 'node:path';
import type { Command } from 'commander';
import { AdapterFormatConverter, ConfigLoader, TrainingRunManager } from '@adapterlab/core';
import { JsonlLogger, type Config, type ConfigInput, type Logger } from '@adapterlab/shared';
import { OutputRenderer } from './output';
import { TerminalLogger } from './ui/terminal-logger';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  runsDir?: string;
  verbose?: boolean;
  yes?: boolean;
  nonInteractive?: boolean;
};

/** Where configuration is looked up; overridable for tests */
export interface Environment {
  cwd: string;
  homeDir?: string;
}

export interface CommandContext {
  options: GlobalOptions;
  config: Config;
  logger: Logger;
  renderer: OutputRenderer;
}

export function createContext(command: Command, env: Environment): CommandContext {
  const options = command.optsWithGlobals<GlobalOptions>();

  const flags: ConfigInput = {};
  if (options.runsDir) flags.runsDir = options.runsDir;
  if (options.verbose) flags.logging = { verbose: true };

  const config = ConfigLoader.load({
    configPath: options.config,
    flags,
    cwd: env.cwd,
    homeDir: env.homeDir,
  });

  const { eventsPath, verbose } = config.logging;
  const events = eventsPath ? new JsonlLogger(path.resolve(env.cwd, eventsPath)) : undefined;

  return {
    options,
    config,
    logger: new TerminalLogger({ verbose, events }),
    renderer: new OutputRenderer(Boolean(options.json)),
  };
}

export function createRunManager(ctx: CommandContext): TrainingRunManager {
  return new TrainingRunManager({
    runsDir: ctx.config.runsDir,
    runPrefix: ctx.config.runPrefix,
    baseModel: ctx.config.baseModel,
    logger: ctx.logger,
  });
}

export function createConverter(ctx: CommandContext): AdapterFormatConverter {
  return new AdapterFormatConverter({
    logger: ctx.logger,
    modelIdMappings: ctx.config.conversion.modelIdMappings,
    targetModules: ctx.config.conversion.targetModules,
  });
}
