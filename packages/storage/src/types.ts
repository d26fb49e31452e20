/**
 * Types for record loading
 */

import type { SubjectRecord } from '@phenoxform/collector';

/**
 * Destination for finished subject records
 *
 * Implementations throw LoadError when a record cannot be stored.
 */
export interface Loader {
  readonly name: string;
  load(records: readonly SubjectRecord[]): Promise<void>;
}

export interface FileSystemLoaderOptions {
  outDir: string;
  /** Create outDir (and its parents) when missing; otherwise a missing directory is a LoadError */
  createDir?: boolean;
}
