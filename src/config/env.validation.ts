import type { LogLevel } from '@nestjs/common';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

const DEV_SECRET = 'change-me';

export interface AppEnv {
  NODE_ENV: string;
  PORT: number;
  DATABASE_URL?: string;
  JWT_SECRET_KEY: string;
  JWT_EXPIRES_IN: string | number;
  BCRYPT_ROUNDS: number;
  LOG_LEVEL: LogLevel;
}

function readString(config: Record<string, unknown>, key: string): string | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

function readInt(config: Record<string, unknown>, key: string, fallback: number, min: number, max: number): number {
  const raw = readString(config, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${key}: expected an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

/**
 * Token lifetime as the signer reads it: a bare digit string is a number of
 * seconds, anything else a timespan such as `1h` or `7d`.
 */
export function parseExpiresIn(value: unknown): string | number {
  if (typeof value === 'number') return value;
  const text = typeof value === 'string' ? value.trim() : '';
  if (text.length === 0) return '1h';
  return /^\d+$/.test(text) ? Number(text) : text;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates process configuration once at startup and fills in defaults.
 * Production refuses to start without a real signing secret.
 */
export const validateEnv = (config: Record<string, unknown>): Record<string, unknown> & AppEnv => {
  const nodeEnv = readString(config, 'NODE_ENV') ?? 'development';
  const production = nodeEnv === 'production';

  const secret = readString(config, 'JWT_SECRET_KEY');
  if (production && (!secret || secret === DEV_SECRET)) {
    throw new Error('Missing required environment variable: JWT_SECRET_KEY');
  }

  const databaseUrl = readString(config, 'DATABASE_URL');
  if (databaseUrl && !/^(postgres(ql)?:\/\/|sqlite:)/.test(databaseUrl)) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${databaseUrl.split(':')[0]}`);
  }

  const logLevel = readString(config, 'LOG_LEVEL') ?? (production ? 'log' : 'verbose');
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  return {
    ...config,
    NODE_ENV: nodeEnv,
    PORT: readInt(config, 'PORT', 5000, 1, 65535),
    DATABASE_URL: databaseUrl,
    JWT_SECRET_KEY: secret ?? DEV_SECRET,
    JWT_EXPIRES_IN: parseExpiresIn(readString(config, 'JWT_EXPIRES_IN')),
    BCRYPT_ROUNDS: readInt(config, 'BCRYPT_ROUNDS', 10, 4, 15),
    LOG_LEVEL: logLevel,
  };
};

/** Levels enabled for a threshold, cumulative from `error`. */
export function logLevelsFor(threshold: LogLevel): LogLevel[] {
  const index = LOG_LEVELS.indexOf(threshold);
  return LOG_LEVELS.slice(0, index < 0 ? LOG_LEVELS.length : index + 1);
}
