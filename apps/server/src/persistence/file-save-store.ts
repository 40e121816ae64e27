import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";
import type { SaveManager } from "./save-manager";

const FILE_EXTENSION = ".json";

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

/**
 * JSON file store, one file per key. Reads are served from an in-memory copy filled by
 * `hydrate()`; writes go to the copy at once and reach disk in order per key, through a
 * temp file and rename so a crash never leaves a half-written record.
 */
export class FileSaveStore implements SaveManager {
  private readonly cache = new Map<string, string>();
  private readonly writes = new Map<string, Promise<void>>();
  private readonly logger: Logger;

  constructor(
    readonly directory: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createModuleLogger("file-save-store");
  }

  /** Load every record on disk into memory. Unreadable files are skipped with a warning. */
  async hydrate(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const files = await readdir(this.directory);
    for (const file of files) {
      if (!file.endsWith(FILE_EXTENSION)) {
        continue;
      }
      const key = decodeURIComponent(file.slice(0, -FILE_EXTENSION.length));
      try {
        const text = await readFile(path.join(this.directory, file), "utf8");
        JSON.parse(text);
        this.cache.set(key, text);
      } catch (error) {
        this.logger.warn({ err: error, file }, "Skipping unreadable save file");
      }
    }
    this.logger.info({ directory: this.directory, records: this.cache.size }, "Save store hydrated");
  }

  save(key: string, record: unknown): void {
    if (record === undefined) {
      this.delete(key);
      return;
    }
    const text = JSON.stringify(record);
    this.cache.set(key, text);
    this.enqueue(key, async () => {
      await mkdir(this.directory, { recursive: true });
      const target = this.filePathFor(key);
      const temp = `${target}.tmp`;
      await writeFile(temp, text, "utf8");
      await rename(temp, target);
    });
  }

  load(key: string): unknown {
    const text = this.cache.get(key);
    return text === undefined ? undefined : JSON.parse(text);
  }

  delete(key: string): void {
    this.cache.delete(key);
    this.enqueue(key, async () => {
      try {
        await rm(this.filePathFor(key));
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    });
  }

  /** Resolves once every queued write has reached disk or failed. */
  async flush(): Promise<void> {
    while (this.writes.size > 0) {
      await Promise.all([...this.writes.values()]);
    }
  }

  private filePathFor(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}${FILE_EXTENSION}`);
  }

  private enqueue(key: string, operation: () => Promise<void>): void {
    const previous = this.writes.get(key) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(operation)
      .catch((error: unknown) => {
        this.logger.error({ err: error, key }, "Failed to write save record");
      })
      .then(() => {
        if (this.writes.get(key) === next) {
          this.writes.delete(key);
        }
      });
    this.writes.set(key, next);
  }
}
