import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogFormat, LogLevel } from '../../domain/common/ILogger';

/**
 * Storage backend options.
 */
export interface StorageConfig {
  type: 'filesystem' | 'memory';
}

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials: boolean;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * Static bearer token mapped to the actor it authenticates.
 */
export interface ApiTokenEntry {
  token: string;
  actorId: string;
  name?: string;
}

/**
 * Limits for the tool endpoints.
 */
export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;

  // Storage
  dataDir: string;
  storage: StorageConfig;

  // Transport
  cors: CorsConfig;
  apiTokens: ApiTokenEntry[];
  rateLimit: RateLimitConfig;

  // Operational
  log: LogConfig;

  // Environment
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const STORAGE_TYPES: readonly StorageConfig['type'][] = ['filesystem', 'memory'];
const NODE_ENVS: readonly ConfigOptions['nodeEnv'][] = ['development', 'production', 'test'];

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Pick a value from an allowed list, or report the raw value as invalid.
 */
function oneOf<T extends string>(allowed: readonly T[], raw: string, name: string): T {
  const match = allowed.find(candidate => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Parse `token:actorId[:name]` entries separated by commas.
 */
export function parseApiTokens(raw: string | undefined): ApiTokenEntry[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    .map(entry => {
      const [token, actorId, name] = entry.split(':').map(s => s.trim());
      if (!token || !actorId) {
        throw new ConfigError(`Invalid API_TOKENS entry: expected token:actorId[:name]`);
      }
      return name ? { token, actorId, name } : { token, actorId };
    });
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadFromEnvironment(env);
    this.validate();
  }

  private loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOptions {
    return {
      // Server
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '0.0.0.0',

      // Storage
      dataDir: expandPath(env.DATA_DIR || '~/.handoff/data'),
      storage: {
        type: oneOf(STORAGE_TYPES, env.STORAGE_TYPE || 'filesystem', 'STORAGE_TYPE')
      },

      // CORS
      cors: {
        enabled: env.CORS_ENABLED !== 'false',
        origins: env.CORS_ORIGINS?.split(',').map(s => s.trim()).filter(Boolean) || ['*'],
        credentials: env.CORS_CREDENTIALS === 'true'
      },

      apiTokens: parseApiTokens(env.API_TOKENS),
      rateLimit: {
        maxRequests: parseInt(env.RATE_LIMIT_MAX || '60', 10),
        windowMs: parseInt(env.RATE_LIMIT_WINDOW_MS || '60000', 10)
      },

      // Operational
      log: {
        level: oneOf(LOG_LEVELS, env.LOG_LEVEL || 'info', 'LOG_LEVEL'),
        format: oneOf(LOG_FORMATS, env.LOG_FORMAT || 'pretty', 'LOG_FORMAT')
      },

      // Environment
      nodeEnv: oneOf(NODE_ENVS, env.NODE_ENV || 'development', 'NODE_ENV')
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (!Number.isInteger(this.config.port) || this.config.port < 1 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 1 and 65535');
    }

    if (!Number.isInteger(this.config.rateLimit.maxRequests) || this.config.rateLimit.maxRequests < 1) {
      throw new ConfigError('RATE_LIMIT_MAX must be a positive integer');
    }

    if (!Number.isInteger(this.config.rateLimit.windowMs) || this.config.rateLimit.windowMs < 1000) {
      throw new ConfigError('RATE_LIMIT_WINDOW_MS must be at least 1000');
    }

    const tokens = new Set<string>();
    for (const entry of this.config.apiTokens) {
      if (tokens.has(entry.token)) {
        throw new ConfigError('API_TOKENS contains a duplicate token');
      }
      tokens.add(entry.token);
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get dataDir(): string { return this.config.dataDir; }
  get storage(): StorageConfig { return this.config.storage; }
  get cors(): CorsConfig { return this.config.cors; }
  get apiTokens(): ApiTokenEntry[] { return this.config.apiTokens; }
  get rateLimit(): RateLimitConfig { return this.config.rateLimit; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  get isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }

  /**
   * Create a Config instance from an object (useful for testing).
   * Environment variables are ignored; unspecified options take their defaults.
   */
  static fromObject(overrides: Partial<ConfigOptions>): Config {
    const config = new Config({});
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  /**
   * Get configuration as plain object, with token secrets left out.
   */
  toJSON(): Omit<ConfigOptions, 'apiTokens'> & { apiTokens: number } {
    return { ...this.config, apiTokens: this.config.apiTokens.length };
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  dataDir: ${this.dataDir}`,
      `  storage.type: ${this.storage.type}`,
      `  apiTokens: ${this.apiTokens.length}`,
      `  rateLimit: ${this.rateLimit.maxRequests}/${this.rateLimit.windowMs}ms`,
      `  log: ${this.log.level} (${this.log.format})`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
