export default () => ({
  app: {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '3001', 10),
  },
  database: {
    url: process.env.DATABASE_URL,
    replicaUrl: process.env.DATABASE_REPLICA_URL || undefined,
  },
  redis: {
    url: process.env.REDIS_URL || undefined,
    readTimeoutMs: parseInt(process.env.REDIS_READ_TIMEOUT_MS || '50', 10),
    writeTimeoutMs: parseInt(process.env.REDIS_WRITE_TIMEOUT_MS || '500', 10),
  },
  jwt: {
    secret: process.env.JWT_SECRET,
    accessExpiresIn: process.env.JWT_ACCESS_EXPIRES_IN || '12h',
    refreshExpiresIn: process.env.JWT_REFRESH_EXPIRES_IN || '7d',
    legacyExpiresIn: process.env.JWT_LEGACY_EXPIRES_IN || '30d',
  },
  cache: {
    localTtlMs: parseInt(process.env.CACHE_LOCAL_TTL_MS || '60000', 10),
    sharedTtlMs: parseInt(process.env.CACHE_SHARED_TTL_MS || '300000', 10),
    localMaxEntries: parseInt(
      process.env.CACHE_LOCAL_MAX_ENTRIES || '10000',
      10,
    ),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'log',
  },
});
