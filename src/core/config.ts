/**
 * Configuration Module
 *
 * Builds the application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 * The result is passed explicitly into the engine; nothing reads it globally.
 */

import 'dotenv/config';
import { ValidationError } from '../errors/index.js';
import { TIME_DEFAULTS, VERIFICATION } from './constants.js';

export interface SshTunnelConfig {
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
  passphrase?: string;
  localPort: number; // 0 lets the OS pick a free port
  remoteHost: string;
  remotePort: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: false | { rejectUnauthorized: boolean };
  connectionTimeoutMillis: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  ssh: SshTunnelConfig | null;
  ticksPerSecond: number;
  verifyTolerance: number;
  exportDir: string;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

/**
 * Helper function to ensure required environment variables are present
 *
 * @param name - Environment variable name
 * @returns The environment variable value
 * @throws ValidationError if the variable is not set
 */
function required(env: Env, name: string): string {
  const v = env[name];
  if (!v) throw new ValidationError(`Missing required env var ${name}`, name);
  return v;
}

function numeric(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Env var ${name} must be a number, got "${raw}"`, name);
  }
  return value;
}

function positive(env: Env, name: string, fallback: number): number {
  const value = numeric(env, name, fallback);
  if (value <= 0) {
    throw new ValidationError(`Env var ${name} must be positive, got ${value}`, name);
  }
  return value;
}

function loadSshConfig(env: Env): SshTunnelConfig | null {
  const host = env.SSH_HOST;
  if (!host) return null;

  return {
    host,
    port: numeric(env, 'SSH_PORT', 22),
    username: required(env, 'SSH_USER'),
    privateKeyPath: required(env, 'SSH_KEY_FILE'),
    passphrase: env.SSH_KEY_PASSPHRASE || undefined,
    localPort: numeric(env, 'SSH_LOCAL_PORT', 0),
    remoteHost: env.SSH_REMOTE_HOST || 'localhost',
    remotePort: numeric(env, 'SSH_REMOTE_PORT', 5432)
  };
}

/**
 * Reads the application configuration
 *
 * @param env - Variables to read from (defaults to process.env)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    database: {
      host: env.DB_HOST || 'localhost',
      port: numeric(env, 'DB_PORT', 5432),
      user: required(env, 'DB_USER'),
      password: required(env, 'DB_PASSWORD'),
      database: required(env, 'DB_NAME'),
      ssl: env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
      connectionTimeoutMillis: numeric(env, 'DB_CONNECTION_TIMEOUT_MS', 5000)
    },
    // Tunnel is only set up when SSH_HOST is present
    ssh: loadSshConfig(env),
    ticksPerSecond: positive(env, 'TICKS_PER_SECOND', TIME_DEFAULTS.TICKS_PER_SECOND),
    verifyTolerance: positive(env, 'VERIFY_TOLERANCE', VERIFICATION.TOLERANCE),
    exportDir: env.EXPORT_DIR || '.',
    logLevel: env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal)
  };
}
