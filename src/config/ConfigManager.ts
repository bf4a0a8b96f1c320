/**
 * Configuration Manager
 * Loads and validates configuration from the environment
 */
import { readFileSync, existsSync } from 'fs';
import { logger, setLogLevel } from '../core/Logger.js';
import { ValidationError } from '../core/errors.js';
import {
  appConfigSchema,
  type AppConfig,
  type CloudflareConfig,
  type LookupConfig,
} from './schema.js';

type Env = Record<string, string | undefined>;

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(env: Env, key: string): string | undefined {
  const secretPath = `/run/secrets/${key.toLowerCase()}`;
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Failed to read Docker secret');
    }
  }

  return env[key];
}

export class ConfigManager {
  private _config: AppConfig;

  constructor(env: Env = process.env) {
    const parsed = appConfigSchema.safeParse({
      logLevel: env['LOG_LEVEL']?.toLowerCase() ?? 'info',
      cloudflare: {
        apiToken: getSecret(env, 'CLOUDFLARE_API_TOKEN'),
        organizationId: env['CLOUDFLARE_ORGANIZATION_ID'] || undefined,
        baseUrl: env['CLOUDFLARE_BASE_URL'] || undefined,
        maxRetries: env['CLOUDFLARE_MAX_RETRIES'],
        timeout: env['CLOUDFLARE_TIMEOUT'],
      },
      lookup: {
        perPage: env['ACCESS_RULES_PER_PAGE'],
        maxPages: env['ACCESS_RULES_MAX_PAGES'],
      },
    });

    if (!parsed.success) {
      throw ValidationError.fromZod('configuration', parsed.error);
    }

    this._config = parsed.data;
    setLogLevel(this._config.logLevel);

    logger.debug(
      {
        logLevel: this._config.logLevel,
        organizationId: this._config.cloudflare.organizationId,
        perPage: this._config.lookup.perPage,
        maxPages: this._config.lookup.maxPages,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._config;
  }

  get cloudflare(): Readonly<CloudflareConfig> {
    return this._config.cloudflare;
  }

  get lookup(): Readonly<LookupConfig> {
    return this._config.lookup;
  }
}

let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
