import type { LogLevel } from '@nestjs/common';
import { ConfigError } from '../lib/errors/ConfigError';
import { loadMongoConfig, type MongoConfig } from '../infra/mongo/mongo.config';
import {
  MAX_TIMER_DELAY_MS,
  processEnvReader,
  readOptionalString,
  readPort,
  readPositiveInt,
  readString,
  type EnvReader,
} from './env';

/** Injection token for the frozen AppConfig. */
export const APP_CONFIG = Symbol('APP_CONFIG');

export const APP_ENVIRONMENTS = ['development', 'production', 'testing'] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

const LOG_LEVELS_BY_THRESHOLD: Readonly<Record<string, LogLevel[]>> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  log: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

export interface AppConfig {
  readonly env: AppEnvironment;
  readonly serviceName: string;
  readonly version: string | null;
  readonly host: string;
  readonly port: number;
  /** Enabled Nest logger levels. */
  readonly logLevels: readonly LogLevel[];
  readonly health: {
    /** Deadline for each readiness probe. */
    readonly databaseTimeoutMs: number;
  };
  readonly inspections: {
    /** Furthest an inspection may be scheduled, in days from today. */
    readonly maxScheduleDaysAhead: number;
  };
  readonly mongo: MongoConfig;
}

export const APP_DEFAULTS = {
  serviceName: 'apiary-api',
  port: 3000,
  healthDatabaseTimeoutMs: 5_000,
  maxScheduleDaysAhead: 365,
} as const;

function isAppEnvironment(value: string): value is AppEnvironment {
  return (APP_ENVIRONMENTS as readonly string[]).includes(value);
}

function resolveEnvironment(read: EnvReader): AppEnvironment {
  const env = readString(read, 'APP_ENV', 'development').toLowerCase();
  if (!isAppEnvironment(env)) {
    throw new ConfigError(
      `Invalid environment '${env}'. Available: ${APP_ENVIRONMENTS.join(', ')}`,
      'APP_ENV',
    );
  }
  return env;
}

function resolveLogLevels(read: EnvReader, env: AppEnvironment): LogLevel[] {
  const fallback = env === 'development' ? 'debug' : 'log';
  const threshold = readString(read, 'LOG_LEVEL', fallback).toLowerCase();
  return LOG_LEVELS_BY_THRESHOLD[threshold] ?? LOG_LEVELS_BY_THRESHOLD[fallback];
}

/**
 * Build the application config from environment variables.
 * Malformed numbers fall back to defaults; an unknown APP_ENV or a
 * production deployment without MONGO_URI throws ConfigError.
 */
export function loadAppConfig(read: EnvReader = processEnvReader()): AppConfig {
  const env = resolveEnvironment(read);

  const config: AppConfig = {
    env,
    serviceName: readString(read, 'SERVICE_NAME', APP_DEFAULTS.serviceName),
    version: readOptionalString(read, 'APP_VERSION'),
    host: readString(
      read,
      'HOST',
      env === 'production' ? '0.0.0.0' : '127.0.0.1',
    ),
    port: readPort(read, 'PORT', APP_DEFAULTS.port),
    logLevels: resolveLogLevels(read, env),
    health: {
      databaseTimeoutMs: readPositiveInt(
        read,
        'HEALTH_DB_TIMEOUT_MS',
        APP_DEFAULTS.healthDatabaseTimeoutMs,
        MAX_TIMER_DELAY_MS,
      ),
    },
    inspections: {
      maxScheduleDaysAhead: readPositiveInt(
        read,
        'INSPECTION_MAX_DAYS_AHEAD',
        APP_DEFAULTS.maxScheduleDaysAhead,
      ),
    },
    mongo: loadMongoConfig(read, env),
  };

  return Object.freeze(config);
}
