// packages/core/src/runs/manifest-store.ts

import { readFile } from 'fs-extra';
import {
  atomicWrite,
  eventBase,
  InvalidFormatError,
  isErrnoException,
  NoopLogger,
  NotFoundError,
  parseJson,
  stableStringify,
  type Logger,
} from '@adapterlab/shared';
import {
  assertRelativePaths,
  MANIFEST_SCHEMA_VERSION,
  migrateManifest,
  type ManifestLayout,
  type RunManifest,
} from './manifest';

export interface LoadedManifest {
  manifest: RunManifest;
  /** Layout the document was stored in before migration */
  layout: ManifestLayout;
}

/**
 * Reads and writes run manifests. Any supported layout is read; only the
 * canonical layout is written.
 */
export class ManifestStore {
  constructor(private readonly logger: Logger = new NoopLogger()) {}

  /**
   * Validates an in-memory manifest document.
   *
   * @throws InvalidFormatError naming the offending field
   */
  parse(raw: unknown, source = '<memory>'): LoadedManifest {
    return migrateManifest(raw, source);
  }

  /**
   * @throws NotFoundError if there is no file at `path`
   * @throws InvalidFormatError if the file cannot be read or is not a valid
   *   manifest of any supported layout
   */
  async load(path: string): Promise<RunManifest> {
    return (await this.loadWithLayout(path)).manifest;
  }

  async loadWithLayout(path: string): Promise<LoadedManifest> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        throw new NotFoundError(`Run manifest not found: ${path}`, path);
      }
      throw new InvalidFormatError(
        `Unreadable run manifest ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
        { cause: error },
      );
    }

    let doc: unknown;
    try {
      doc = parseJson(text, path);
    } catch (error) {
      throw new InvalidFormatError(
        error instanceof Error ? error.message : String(error),
        path,
        { cause: error },
      );
    }
    return this.parse(doc, path);
  }

  /**
   * Writes `manifest` in the canonical layout with sorted keys. The write
   * goes through a temp file and rename; parent directories are created.
   *
   * @throws InvalidFormatError if any recorded path is absolute
   */
  async save(manifest: RunManifest, path: string): Promise<void> {
    assertRelativePaths(manifest, path);
    const document: RunManifest = { ...manifest, schemaVersion: MANIFEST_SCHEMA_VERSION };
    await atomicWrite(path, stableStringify(document));
    await this.logger.log({
      ...eventBase(manifest.runId),
      type: 'ManifestSaved',
      payload: { manifestPath: path, schemaVersion: MANIFEST_SCHEMA_VERSION },
    });
  }
}
