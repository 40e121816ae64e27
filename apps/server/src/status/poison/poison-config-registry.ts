import { readFile } from "node:fs/promises";
import { parsePoisonConfig, type PoisonConfig } from "@tickbound/shared";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";

/**
 * Read-only lookup of poison configs by id, case-insensitive. Misses are cached
 * so a missing config is reported once, not on every lookup.
 */
export class PoisonConfigRegistry {
  private readonly configs = new Map<string, PoisonConfig>();
  private readonly misses = new Set<string>();
  private readonly logger: Logger;

  constructor(configs: Iterable<PoisonConfig> = [], logger?: Logger) {
    this.logger = logger ?? createModuleLogger("poison-config-registry");
    for (const config of configs) {
      this.register(config);
    }
  }

  /**
   * Load every config from a JSON array on disk. Malformed entries are skipped with a warning;
   * an unreadable file yields an empty registry.
   */
  static async fromFile(filePath: string, logger?: Logger): Promise<PoisonConfigRegistry> {
    const registry = new PoisonConfigRegistry([], logger);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, "utf8"));
    } catch (error) {
      registry.logger.error({ err: error, filePath }, "Failed to read poison configs");
      return registry;
    }
    if (!Array.isArray(parsed)) {
      registry.logger.error({ filePath }, "Poison config file is not an array");
      return registry;
    }
    for (const [index, raw] of parsed.entries()) {
      const config = parsePoisonConfig(raw);
      if (!config) {
        registry.logger.warn({ filePath, index }, "Skipping poison config without an id");
        continue;
      }
      registry.register(config);
    }
    return registry;
  }

  get size(): number {
    return this.configs.size;
  }

  /** First registration of an id wins. */
  register(config: PoisonConfig): void {
    const key = config.id.toLowerCase();
    if (this.configs.has(key)) {
      return;
    }
    this.configs.set(key, config);
    this.misses.delete(key);
  }

  resolve(id: string | undefined): PoisonConfig | undefined {
    const key = id?.trim().toLowerCase();
    if (!key) {
      return undefined;
    }
    const config = this.configs.get(key);
    if (config) {
      return config;
    }
    if (!this.misses.has(key)) {
      this.misses.add(key);
      this.logger.error({ configId: id }, "Poison config could not be resolved");
    }
    return undefined;
  }
}
