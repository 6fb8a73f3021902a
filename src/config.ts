// Process configuration for the login/profile service.
// Built once at startup and handed to every component.

import type { LogThreshold } from './utils/logger.js';
import { resolveLogLevel } from './utils/logger.js';

export const DEFAULT_PORT = 5003;
export const DEFAULT_DB_PATH = './data/login-profile.db';
export const MIN_BCRYPT_ROUNDS = 10;
export const MAX_PORT = 65535;

export interface AppConfig {
  readonly port: number;
  readonly dbPath: string;
  readonly tokenSecret: string;
  /** Token lifetime; undefined means tokens never expire */
  readonly tokenTtlSeconds: number | undefined;
  readonly bcryptRounds: number;
  readonly environment: string;
  readonly sqlDebug: boolean;
  readonly seedDemoUsers: boolean;
  readonly logLevel: LogThreshold;
}

export type Env = Record<string, string | undefined>;

/**
 * Raised when the environment cannot produce a usable configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

const parseInteger = (name: string, raw: string): number => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(trimmed, 10);
};

const getPort = (env: Env): number => {
  if (!env.PORT) return DEFAULT_PORT;

  const port = parseInteger('PORT', env.PORT);
  if (port < 0 || port > MAX_PORT) {
    throw new ConfigError(`PORT must be between 0 and ${MAX_PORT}, got ${port}`);
  }
  return port;
};

const getTokenSecret = (env: Env): string => {
  const secret = env.JWT_SECRET;

  if (!secret) {
    throw new ConfigError(
      'JWT_SECRET environment variable is not set. ' +
      'This is required for token generation and validation. ' +
      'Please set JWT_SECRET in your environment or .env file.'
    );
  }

  return secret;
};

const getTokenTtl = (env: Env): number | undefined => {
  const raw = env.JWT_EXPIRY_SECONDS;
  if (raw === undefined || raw.trim() === '') return undefined;

  const ttl = parseInteger('JWT_EXPIRY_SECONDS', raw);
  if (ttl <= 0) {
    throw new ConfigError(`JWT_EXPIRY_SECONDS must be positive, got ${ttl}`);
  }
  return ttl;
};

/**
 * Minimum 10 rounds enforced for security
 */
const getBcryptRounds = (env: Env): number => {
  const raw = env.BCRYPT_ROUNDS;
  const rounds = raw ? parseInteger('BCRYPT_ROUNDS', raw) : MIN_BCRYPT_ROUNDS;
  return Math.max(rounds, MIN_BCRYPT_ROUNDS);
};

export function loadConfig(env: Env = process.env): AppConfig {
  const environment = env.NODE_ENV || 'development';
  const seedFlag = env.SEED_DEMO_USERS;

  return {
    port: getPort(env),
    dbPath: env.DB_PATH || DEFAULT_DB_PATH,
    tokenSecret: getTokenSecret(env),
    tokenTtlSeconds: getTokenTtl(env),
    bcryptRounds: getBcryptRounds(env),
    environment,
    sqlDebug: env.SQL_DEBUG === 'true',
    seedDemoUsers: seedFlag === undefined ? environment !== 'production' : seedFlag === 'true',
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}
