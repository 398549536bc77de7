/**
 * ConfigStore Interface
 *
 * Abstraction for taskdesk.config.json persistence (filesystem, or memory for tests).
 */

/**
 * @example
 * ```typescript
 * const store = new FsConfigStore('/srv/taskdesk');
 * const raw = await store.loadConfig();
 * ```
 */
export interface ConfigStore {
  /**
   * @returns the parsed file, or null when there is none
   */
  loadConfig(): Promise<unknown>;

  saveConfig(config: unknown): Promise<void>;
}
