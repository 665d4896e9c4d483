import { ConfigService } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';
import { ISO_DATE_FORMAT } from '@fxrates/shared';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  corsOrigin: string[] | '*';
  logLevels: LogLevel[];
  upstream: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  cache: {
    store: 'redis' | 'memory';
    latestTtlMs: number;
    historicalTtlMs: number;
  };
  redis: {
    host: string;
    port: number;
    password: string;
    db: number;
  };
  refresh: {
    enabled: boolean;
    intervalMs: number;
  };
  historyDaysLimit: number;
  /** Layout of dates in query parameters */
  dateFormat: string;
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Everything at or above `level` in severity
 */
export function logLevelsFrom(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}

/**
 * Builds the typed config once from the validated environment.
 * Components receive this object; nothing else reads process.env.
 */
export function loadAppConfig(config: ConfigService): AppConfig {
  const corsOrigin = config.get<string>('CORS_ORIGIN', '*');
  const env = config.get<string>('NODE_ENV', 'development');

  return {
    env: env === 'production' || env === 'test' ? env : 'development',
    port: Number(config.get('PORT', 8080)),
    corsOrigin: corsOrigin === '*' ? '*' : corsOrigin.split(',').map((origin) => origin.trim()),
    logLevels: logLevelsFrom(config.get<string>('LOG_LEVEL', 'log')),
    upstream: {
      baseUrl: config.get<string>('UPSTREAM_BASE_URL', 'https://api.frankfurter.app'),
      timeoutMs: Number(config.get('UPSTREAM_TIMEOUT_MS', 30_000)),
      maxRetries: Number(config.get('UPSTREAM_MAX_RETRIES', 5)),
      retryBaseDelayMs: Number(config.get('UPSTREAM_RETRY_BASE_DELAY_MS', 1_000)),
    },
    cache: {
      store: config.get<string>('CACHE_STORE', 'redis') === 'memory' ? 'memory' : 'redis',
      latestTtlMs: Number(config.get('LATEST_RATE_CACHE_TTL_MS', 60 * 60 * 1000)),
      historicalTtlMs: Number(config.get('HISTORICAL_RATE_CACHE_TTL_MS', 30 * 24 * 60 * 60 * 1000)),
    },
    redis: {
      host: config.get<string>('REDIS_HOST', 'localhost'),
      port: Number(config.get('REDIS_PORT', 6379)),
      password: config.get<string>('REDIS_PASSWORD', ''),
      db: Number(config.get('REDIS_DB', 0)),
    },
    refresh: {
      enabled: parseBoolean(config.get<string | boolean>('REFRESH_ENABLED', true)),
      intervalMs: Number(config.get('REFRESH_INTERVAL_MS', 30 * 60 * 1000)),
    },
    historyDaysLimit: Number(config.get('HISTORY_DAYS_LIMIT', 90)),
    dateFormat: config.get<string>('DATE_FORMAT', ISO_DATE_FORMAT),
  };
}

function parseBoolean(value: string | boolean): boolean {
  return typeof value === 'boolean' ? value : value.toLowerCase() === 'true';
}
