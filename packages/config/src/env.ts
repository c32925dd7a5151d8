import { IANAZone } from 'luxon';

/**
 * Environment is missing a variable or holds an unusable value
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type Env = Record<string, string | undefined>;

export function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function stringEnv(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

/**
 * Positive integer, or the fallback when unset
 */
export function intEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Comma-separated list, trimmed, empty entries dropped
 */
export function listEnv(env: Env, name: string, fallback: readonly string[]): string[] {
  const raw = env[name];
  if (!raw) {
    return [...fallback];
  }
  const values = raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  if (values.length === 0) {
    throw new ConfigError(`${name} must list at least one value`);
  }
  return values;
}

/**
 * IANA time zone name, validated
 */
export function zoneEnv(env: Env, name: string, fallback: string): string {
  const zone = env[name] || fallback;
  if (!IANAZone.isValidZone(zone)) {
    throw new ConfigError(`${name} is not a valid IANA time zone: "${zone}"`);
  }
  return zone;
}

export interface LoggingConfig {
  logLevel: string;
  prettyLogs: boolean;
}

export function loggingEnv(env: Env): LoggingConfig {
  return {
    logLevel: stringEnv(env, 'LOG_LEVEL', 'info'),
    prettyLogs: env['NODE_ENV'] === 'development',
  };
}
