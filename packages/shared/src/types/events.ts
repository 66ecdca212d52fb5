/**
 * Base interface for all lifecycle events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the training run the event concerns */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a run directory and its manifest are created */
export interface RunCreated extends BaseEvent {
  type: 'RunCreated';
  payload: {
    runDir: string;
    baseModel: string;
  };
}

/** Emitted after a manifest has been written to disk */
export interface ManifestSaved extends BaseEvent {
  type: 'ManifestSaved';
  payload: {
    manifestPath: string;
    schemaVersion: string;
  };
}

/** Emitted when discovery skips a run whose manifest cannot be loaded */
export interface RunSkipped extends BaseEvent {
  type: 'RunSkipped';
  payload: {
    runDir: string;
    reason: string;
  };
}

/** Emitted when cleanup deletes (or, in dry-run, would delete) a run directory */
export interface RunRemoved extends BaseEvent {
  type: 'RunRemoved';
  payload: {
    runDir: string;
    status: string;
    dryRun: boolean;
  };
}

/** Emitted after an adapter has been converted, or passed through unconverted */
export interface AdapterConverted extends BaseEvent {
  type: 'AdapterConverted';
  payload: {
    sourceDir: string;
    outputDir: string;
    mode: 'converted' | 'passthrough';
    parametersConverted: number;
  };
}

export type LifecycleEvent =
  | RunCreated
  | ManifestSaved
  | RunSkipped
  | RunRemoved
  | AdapterConverted;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; callers add `type` and `payload`.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
