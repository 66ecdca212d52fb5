import pc from 'picocolors';
import type {
  ArtifactValidation,
  CleanupResult,
  ConversionResult,
  ModelDirectoryReport,
  PassthroughResult,
  PeftValidation,
  RunInspection,
  RunStatus,
  RunSummary,
} from '@adapterlab/core';
import { printTable } from './table';

const STATUS_COLORS: Record<RunStatus, (text: string) => string> = {
  completed: pc.green,
  in_progress: pc.yellow,
  failed: pc.red,
};

const CHECK_LABELS: Array<[keyof RunInspection['checks'], string]> = [
  ['manifest', 'Manifest'],
  ['stage1Adapters', 'Stage 1 adapters'],
  ['stage2Adapters', 'Stage 2 adapters'],
  ['finalModel', 'Final model'],
];

function mark(ok: boolean): string {
  return ok ? pc.green('✅') : pc.red('❌');
}

/**
 * Prints command results: pretty JSON with `--json`, otherwise a short human
 * report on stdout.
 */
export class OutputRenderer {
  constructor(private isJson: boolean) {}

  runs(summaries: RunSummary[]): void {
    if (this.isJson) return this.json(summaries);
    if (summaries.length === 0) {
      console.log(pc.gray('No training runs found.'));
      return;
    }
    printTable(
      summaries.map((s) => ({
        'Run ID': s.runId,
        Status: s.status,
        Timestamp: s.timestamp,
        'Base Model': s.baseModel,
      })),
    );
  }

  run(summary: RunSummary): void {
    if (this.isJson) return this.json(summary);
    console.log(pc.bold(summary.runId));
    console.log(`  Status: ${STATUS_COLORS[summary.status](summary.status)}`);
    console.log(`  Timestamp: ${summary.timestamp}`);
    console.log(`  Base model: ${summary.baseModel}`);
    console.log(`  Directory: ${summary.runDir}`);
  }

  inspection(report: RunInspection): void {
    if (this.isJson) return this.json(report);
    console.log(`${mark(report.valid)} ${pc.bold(report.runId)} (${report.status})`);
    for (const [key, label] of CHECK_LABELS) {
      console.log(`  ${mark(report.checks[key])} ${label}`);
    }
    this.errors(report.errors);
  }

  cleanup(result: CleanupResult): void {
    if (this.isJson) return this.json(result);
    const verb = result.dryRun ? 'Would remove' : 'Removed';
    console.log(`${verb} ${result.count} training run(s)`);
    result.removed.forEach((dir) => console.log(`  - ${dir}`));
    if (result.failed.length > 0) {
      console.log(pc.red(`Failed to remove ${result.failed.length} training run(s):`));
      result.failed.forEach((f) => console.log(`  - ${f.runDir}: ${f.error}`));
    }
  }

  validation(report: ArtifactValidation): void {
    if (this.isJson) return this.json(report);
    console.log(`${mark(report.valid)} ${report.directory} (${report.kind})`);
    report.missing.forEach((file) => console.log(`  missing: ${file}`));
    report.empty.forEach((file) => console.log(`  empty: ${file}`));
  }

  directory(report: ModelDirectoryReport): void {
    if (this.isJson) return this.json(report);
    console.log(pc.bold(report.directory));
    const kinds = report.satisfies.length > 0 ? report.satisfies.join(', ') : 'none';
    console.log(`  Artifact kinds: ${kinds}`);
    this.errors(report.errors);
    report.warnings.forEach((warning) => console.log(pc.yellow(`  warning: ${warning}`)));
  }

  conversion(result: ConversionResult | PassthroughResult): void {
    if (this.isJson) return this.json(result);
    if (result.mode === 'passthrough') {
      console.log(pc.yellow(`Passed through ${result.path} unconverted`));
      console.log(`  Reason: ${result.reason}`);
      return;
    }
    console.log(pc.green(`Converted ${result.parametersConverted} parameters into ${result.path}`));
    console.log(`  Base model: ${result.peftConfig.base_model_name_or_path}`);
    result.files.forEach((file) => console.log(`  - ${file}`));
  }

  peftValidation(report: PeftValidation): void {
    if (this.isJson) return this.json(report);
    console.log(`${mark(report.valid)} ${report.directory} (PEFT adapter)`);
    if (report.parameterCount !== undefined) {
      console.log(`  Parameters: ${report.parameterCount}`);
    }
    this.errors(report.errors);
  }

  path(path: string): void {
    if (this.isJson) return this.json({ path });
    console.log(path);
  }

  private errors(errors: string[]): void {
    errors.forEach((error) => console.log(pc.red(`  - ${error}`)));
  }

  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
