/**
 * Keyed record store. Records are plain JSON-compatible data; `load` returns undefined
 * when nothing is stored under the key.
 */
export interface SaveManager {
  save(key: string, record: unknown): void;
  load(key: string): unknown;
  delete(key: string): void;
}

const cloneRecord = (record: unknown): unknown => {
  return record === undefined ? undefined : structuredClone(record);
};

/**
 * In-process store. Records are cloned on the way in and out so callers never share
 * references with what is stored.
 */
export class MemorySaveStore implements SaveManager {
  private readonly records = new Map<string, unknown>();

  get size(): number {
    return this.records.size;
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  keys(): string[] {
    return [...this.records.keys()];
  }

  save(key: string, record: unknown): void {
    this.records.set(key, cloneRecord(record));
  }

  load(key: string): unknown {
    return cloneRecord(this.records.get(key));
  }

  delete(key: string): void {
    this.records.delete(key);
  }
}
