import type { SubjectRecord } from '@phenoxform/collector';
import type { Loader } from './types.js';

/**
 * Keeps loaded records in memory, keyed by subject id
 */
export class MemoryLoader implements Loader {
  readonly name = 'memory';
  private readonly stored = new Map<string, SubjectRecord>();

  async load(records: readonly SubjectRecord[]): Promise<void> {
    for (const record of records) {
      this.stored.set(record.id, record);
    }
  }

  get records(): SubjectRecord[] {
    return [...this.stored.values()];
  }

  get(id: string): SubjectRecord | undefined {
    return this.stored.get(id);
  }

  clear(): void {
    this.stored.clear();
  }
}
