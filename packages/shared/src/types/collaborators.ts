/**
 * Interfaces of the external collaborators around the run artifacts. Scanner
 * parsers and the training subprocess are implemented elsewhere; only the
 * file-level contract they leave behind is managed here.
 */

export type FindingSeverity = 'critical' | 'high' | 'medium' | 'low' | 'info' | 'unknown';

/** One normalized result from a security scanner. */
export interface Finding {
  /** Scanner that produced the result, e.g. "trivy" or "semgrep" */
  tool: string;
  /** Rule or advisory identifier */
  id: string;
  severity: FindingSeverity;
  /** Repository-relative file path the result points at */
  path: string;
  line: number;
  message?: string;
  [key: string]: unknown;
}

/** Pure `rawFile → Finding[]` parser for one scanner's output format. */
export interface FindingParser {
  readonly tool: string;
  parse(filePath: string): Promise<Finding[]>;
}

/**
 * Arguments handed to the external training subprocess. It reads
 * `train.jsonl`/`valid.jsonl` from `trainingDataDir` and writes adapter (and
 * optionally fused-model) files into `outputDir`.
 */
export interface TrainingInvocation {
  baseModel: string;
  trainingDataDir: string;
  outputDir: string;
  /** Adapter to resume from, e.g. stage 1's adapters when training stage 2 */
  resumeAdapterDir?: string;
  params?: Record<string, unknown>;
}
