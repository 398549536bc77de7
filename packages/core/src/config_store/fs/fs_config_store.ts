import { promises as fs } from 'fs';
import * as path from 'path';
import { ValidationError } from '../../errors';
import type { ConfigStore } from '../config_store';

export const CONFIG_FILE_NAME = 'taskdesk.config.json';

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem-based ConfigStore reading `<root>/taskdesk.config.json`.
 * A missing file is not an error; defaults apply.
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(rootPath: string) {
    this.configPath = path.join(rootPath, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch {
      throw new ValidationError(CONFIG_FILE_NAME, 'is not valid JSON');
    }
  }

  async saveConfig(config: unknown): Promise<void> {
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
