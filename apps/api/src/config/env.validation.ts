import * as Joi from 'joi';
import { ISO_DATE_FORMAT, isSupportedDateFormat } from '@fxrates/shared';

/**
 * Environment variable validation schema
 */
export const envValidationSchema = Joi.object({
  // Node
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(8080),
  CORS_ORIGIN: Joi.string().default('*'),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'log', 'debug', 'verbose').default('log'),

  // Upstream rate provider
  UPSTREAM_BASE_URL: Joi.string().uri().default('https://api.frankfurter.app'),
  UPSTREAM_TIMEOUT_MS: Joi.number().integer().positive().default(30_000),
  UPSTREAM_MAX_RETRIES: Joi.number().integer().min(0).default(5),
  UPSTREAM_RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(1_000),

  // Cache
  CACHE_STORE: Joi.string().valid('redis', 'memory').default('redis'),
  LATEST_RATE_CACHE_TTL_MS: Joi.number().integer().positive().default(60 * 60 * 1000),
  HISTORICAL_RATE_CACHE_TTL_MS: Joi.number().integer().positive().default(30 * 24 * 60 * 60 * 1000),

  // Redis
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().port().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').default(''),
  REDIS_DB: Joi.number().integer().min(0).default(0),

  // Background refresh
  REFRESH_ENABLED: Joi.boolean().default(true),
  REFRESH_INTERVAL_MS: Joi.number().integer().positive().default(30 * 60 * 1000),

  // Historical queries
  HISTORY_DAYS_LIMIT: Joi.number().integer().positive().default(90),
  DATE_FORMAT: Joi.string()
    .custom((value: string, helpers) =>
      isSupportedDateFormat(value) ? value : helpers.error('any.invalid'),
    )
    .default(ISO_DATE_FORMAT),
});
