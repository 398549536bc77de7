/**
 * ConfigManager - engine configuration
 *
 * Merges taskdesk.config.json (through a ConfigStore) with built-in defaults
 * and TASKDESK_* environment variables, then validates the result.
 * Environment variables win over the file.
 */

import type { ConfigStore } from '../config_store';
import { ValidationError } from '../errors';
import { isLogLevel } from '../logger';
import type { MailSettings } from '../mail';
import { SchemaValidationCache } from '../record_schemas';
import { assertValidRecord, validateRecordDetailed } from '../record_validations';
import type {
  DatabaseConfig,
  EngineConfig,
  IConfigManager,
  StoredConfig,
} from './config_manager.types';

export const DEFAULT_MAIL_PORT = 587;
export const DEFAULT_MAIL_TIMEOUT_MS = 10000;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  database: null,
  mail: null,
  pagination: { defaultPageSize: 20, maxPageSize: 100 },
  notifications: { defaultListLimit: 20 },
  sessions: { ttlMs: 8 * 60 * 60 * 1000 },
  logLevel: 'info',
};

export type ConfigEnvironment = Record<string, string | undefined>;

function isStoredConfig(value: unknown): value is StoredConfig {
  return SchemaValidationCache.getValidator('stored_config_schema')(value) === true;
}

function parseStoredConfig(raw: unknown): StoredConfig {
  if (raw === null || raw === undefined) return {};
  if (isStoredConfig(raw)) return raw;

  const { errors } = validateRecordDetailed('stored_config_schema', raw);
  const [first] = errors;
  throw new ValidationError(first?.field ?? 'config', first?.message ?? 'must be an object', errors);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function setIfDefined<K extends keyof MailSettings>(
  target: Partial<MailSettings>,
  key: K,
  value: MailSettings[K] | undefined
): void {
  if (value !== undefined) target[key] = value;
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * const manager = new ConfigManager(new FsConfigStore(process.cwd()));
 * const config = await manager.loadConfig();
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly env: ConfigEnvironment;

  constructor(configStore: ConfigStore, env: ConfigEnvironment = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  /**
   * Loads, merges and validates the configuration.
   * @throws ValidationError naming the offending field
   */
  async loadConfig(): Promise<EngineConfig> {
    const stored = parseStoredConfig(await this.configStore.loadConfig());

    const config: EngineConfig = {
      database: this.resolveDatabase(stored),
      mail: this.resolveMail(stored),
      pagination: { ...DEFAULT_ENGINE_CONFIG.pagination, ...stored.pagination },
      notifications: { ...DEFAULT_ENGINE_CONFIG.notifications, ...stored.notifications },
      sessions: {
        ttlMs:
          parseInteger(this.env['TASKDESK_SESSION_TTL_MS']) ??
          stored.sessions?.ttlMs ??
          DEFAULT_ENGINE_CONFIG.sessions.ttlMs,
      },
      logLevel: this.resolveLogLevel(stored),
    };

    if (config.pagination.defaultPageSize > config.pagination.maxPageSize) {
      throw new ValidationError('pagination.defaultPageSize', 'must not exceed pagination.maxPageSize');
    }

    return assertValidRecord('engine_config_schema', config);
  }

  private resolveDatabase(stored: StoredConfig): DatabaseConfig | null {
    const url = this.env['TASKDESK_DATABASE_URL'];
    if (url) {
      return { ...stored.database, connectionString: url };
    }
    return stored.database ?? null;
  }

  /**
   * Missing host or sender disables mail; that is not an error.
   */
  private resolveMail(stored: StoredConfig): MailSettings | null {
    const merged: Partial<MailSettings> = { ...stored.mail };
    setIfDefined(merged, 'host', this.env['TASKDESK_SMTP_HOST']);
    setIfDefined(merged, 'port', parseInteger(this.env['TASKDESK_SMTP_PORT']));
    setIfDefined(merged, 'username', this.env['TASKDESK_SMTP_USERNAME']);
    setIfDefined(merged, 'password', this.env['TASKDESK_SMTP_PASSWORD']);
    setIfDefined(merged, 'sender', this.env['TASKDESK_SMTP_SENDER']);
    setIfDefined(merged, 'secure', parseBoolean(this.env['TASKDESK_SMTP_SECURE']));
    setIfDefined(merged, 'timeoutMs', parseInteger(this.env['TASKDESK_SMTP_TIMEOUT_MS']));

    if (!merged.host || !merged.sender) {
      return null;
    }

    return {
      ...merged,
      host: merged.host,
      sender: merged.sender,
      port: merged.port ?? DEFAULT_MAIL_PORT,
      secure: merged.secure ?? false,
      timeoutMs: merged.timeoutMs ?? DEFAULT_MAIL_TIMEOUT_MS,
    };
  }

  private resolveLogLevel(stored: StoredConfig): EngineConfig['logLevel'] {
    const fromEnv = this.env['TASKDESK_LOG_LEVEL'];
    if (fromEnv !== undefined) {
      if (!isLogLevel(fromEnv)) {
        throw new ValidationError('logLevel', `unknown level ${fromEnv}`);
      }
      return fromEnv;
    }
    return stored.logLevel ?? DEFAULT_ENGINE_CONFIG.logLevel;
  }
}
