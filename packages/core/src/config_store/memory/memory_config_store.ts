import type { ConfigStore } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ pagination: { defaultPageSize: 10 } });
 * const config = await new ConfigManager(configStore, {}).loadConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return structuredClone(this.config);
  }

  async saveConfig(config: unknown): Promise<void> {
    this.config = structuredClone(config);
  }

  setConfig(config: unknown): void {
    this.config = structuredClone(config);
  }

  getConfig(): unknown {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
