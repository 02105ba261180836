import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

type ConfigSection = keyof Config;
type RawConfig = Record<ConfigSection, Record<string, unknown>>;

const SECTIONS: ConfigSection[] = ['server', 'logging', 'mcp', 'cache', 'crawler', 'index'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private raw: RawConfig;
  private config: Config;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    // Load .env file if it exists
    loadEnv();

    // Start with defaults
    this.raw = structuredClone(defaultConfig);

    // Load from config file if exists
    this.loadFromFile();

    // Override with environment variables
    this.loadFromEnv();

    // Validate final configuration
    this.config = this.validate();
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = join(process.cwd(), 'config', 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file ${configPath}: ${toError(error).message}`,
        { configPath },
        toError(error)
      );
    }

    if (!isPlainObject(fileConfig)) {
      throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, { configPath });
    }

    for (const section of SECTIONS) {
      const value = fileConfig[section];
      if (isPlainObject(value)) {
        Object.assign(this.raw[section], value);
      }
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = this.env;

    if (env['NODE_ENV']) {
      this.raw.server['nodeEnv'] = env['NODE_ENV'];
    }

    // Logging configuration
    this.setString('logging', 'level', 'DOCMIRROR_LOG_LEVEL');
    this.setString('logging', 'format', 'DOCMIRROR_LOG_FORMAT');
    this.setString('logging', 'dir', 'DOCMIRROR_LOG_DIR');
    this.setInt('logging', 'maxFiles', 'DOCMIRROR_LOG_MAX_FILES');
    this.setString('logging', 'maxSize', 'DOCMIRROR_LOG_MAX_SIZE');
    this.setBoolean('logging', 'toFile', 'DOCMIRROR_LOG_TO_FILE');
    this.setBoolean('logging', 'silent', 'DOCMIRROR_LOG_SILENT');

    // MCP configuration
    this.setString('mcp', 'serverName', 'DOCMIRROR_SERVER_NAME');
    this.setString('mcp', 'serverVersion', 'DOCMIRROR_SERVER_VERSION');
    this.setString('mcp', 'transport', 'DOCMIRROR_TRANSPORT');

    // Cache configuration
    this.setString('cache', 'cacheDir', 'DOCMIRROR_CACHE_DIR');
    this.setString('cache', 'baseUrl', 'DOCMIRROR_BASE_URL');
    this.setString('cache', 'hostSegment', 'DOCMIRROR_HOST_SEGMENT');
    this.setString('cache', 'pathPrefix', 'DOCMIRROR_PATH_PREFIX');
    this.setBoolean('cache', 'skipDownload', 'DOCMIRROR_SKIP_DOWNLOAD');
    this.setInt('cache', 'minFileCount', 'DOCMIRROR_MIN_FILE_COUNT');
    this.setInt('cache', 'minFreeDiskMb', 'DOCMIRROR_MIN_FREE_DISK_MB');

    // Crawler configuration
    this.setInt('crawler', 'maxRetries', 'DOCMIRROR_MAX_RETRIES');
    this.setInt('crawler', 'requestTimeout', 'DOCMIRROR_REQUEST_TIMEOUT');
    this.setString('crawler', 'userAgent', 'DOCMIRROR_USER_AGENT');

    // Index configuration
    this.setBoolean('index', 'enableFullText', 'DOCMIRROR_ENABLE_FULL_TEXT');
  }

  private setString(section: ConfigSection, key: string, name: string): void {
    const value = this.env[name];
    if (value !== undefined && value !== '') {
      this.raw[section][key] = value;
    }
  }

  private setInt(section: ConfigSection, key: string, name: string): void {
    const value = this.env[name];
    if (value !== undefined && value !== '') {
      this.raw[section][key] = parseInt(value, 10);
    }
  }

  private setBoolean(section: ConfigSection, key: string, name: string): void {
    const value = this.env[name];
    if (value !== undefined && value !== '') {
      this.raw[section][key] = value.trim().toLowerCase() === 'true';
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): Config {
    const result = ConfigSchema.safeParse(this.raw);
    if (!result.success) {
      const details = result.error.errors
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${details}`, {
        issues: result.error.errors,
      });
    }
    return result.data;
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
