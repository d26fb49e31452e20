/**
 * File system loader: one pretty-printed JSON file per subject
 */

import { mkdir, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { pino } from 'pino';
import { LoadError, errorMessage } from '@phenoxform/core';
import type { SubjectRecord } from '@phenoxform/collector';
import type { FileSystemLoaderOptions, Loader } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * File name for a subject id; characters unsafe in paths become underscores
 */
export function recordFileName(id: string): string {
  return `${id.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

export class FileSystemLoader implements Loader {
  readonly name = 'file_system';
  private readonly outDir: string;
  private readonly createDir: boolean;

  constructor(options: FileSystemLoaderOptions) {
    this.outDir = options.outDir;
    this.createDir = options.createDir ?? false;
  }

  private async ensureOutDir(): Promise<void> {
    if (this.createDir) {
      try {
        await mkdir(this.outDir, { recursive: true });
      } catch (error) {
        throw new LoadError(`Cannot create output directory ${this.outDir}: ${errorMessage(error)}`, undefined, { cause: error });
      }
      return;
    }

    const isDirectory = await stat(this.outDir).then(info => info.isDirectory(), () => false);
    if (!isDirectory) {
      throw new LoadError(`Output directory ${this.outDir} does not exist`);
    }
  }

  async load(records: readonly SubjectRecord[]): Promise<void> {
    await this.ensureOutDir();

    const written = new Map<string, string>();
    for (const record of records) {
      const fileName = recordFileName(record.id);
      const clash = written.get(fileName);
      if (clash !== undefined) {
        throw new LoadError(`Subjects "${clash}" and "${record.id}" map to the same file ${fileName}`, record.id);
      }
      written.set(fileName, record.id);

      const path = join(this.outDir, fileName);
      try {
        await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
      } catch (error) {
        logger.error({ event: 'storage.write.failed', path, subjectId: record.id, error: errorMessage(error) }, 'Record write failed');
        throw new LoadError(`Cannot write record ${record.id} to ${path}: ${errorMessage(error)}`, record.id, { cause: error });
      }
    }

    logger.info({ event: 'storage.loaded', outDir: this.outDir, records: records.length }, 'Records written');
  }
}
