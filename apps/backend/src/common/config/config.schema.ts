import * as Joi from 'joi';

const duration = Joi.string().pattern(/^\d+[smhd]?$/);

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3001),

  // Database (primary for writes, optional replica for reads)
  DATABASE_URL: Joi.string().required(),
  DATABASE_REPLICA_URL: Joi.string().optional(),

  // Redis (tier-2 cache, revocation store, invalidation pub/sub)
  REDIS_URL: Joi.string().optional(),
  REDIS_READ_TIMEOUT_MS: Joi.number().integer().min(1).max(50).default(50),
  REDIS_WRITE_TIMEOUT_MS: Joi.number().integer().min(1).default(500),

  // JWT
  JWT_SECRET: Joi.string().min(32).required(),
  JWT_ACCESS_EXPIRES_IN: duration.default('12h'),
  JWT_REFRESH_EXPIRES_IN: duration.default('7d'),
  JWT_LEGACY_EXPIRES_IN: duration.default('30d'),

  // Two-tier cache
  CACHE_LOCAL_TTL_MS: Joi.number().integer().min(1).max(60000).default(60000),
  CACHE_SHARED_TTL_MS: Joi.number()
    .integer()
    .min(Joi.ref('CACHE_LOCAL_TTL_MS'))
    .default(300000),
  CACHE_LOCAL_MAX_ENTRIES: Joi.number().integer().min(1).default(10000),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'log', 'debug', 'verbose')
    .default('log'),
});
