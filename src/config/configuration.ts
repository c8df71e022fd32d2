function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default () => ({
  port: intFromEnv('PORT', 3000),
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: intFromEnv('DB_PORT', 5432),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || '',
    name: process.env.DB_NAME || 'screening',
    poolMax: intFromEnv('DB_POOL_MAX', 20),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
  },
  providers: {
    lloyds: {
      baseUrl: process.env.LLOYDS_BASE_URL || 'https://api.lloydslistintelligence.com/v1',
      apiKey: process.env.LLOYDS_API_KEY || '',
      maxRetries: intFromEnv('LLOYDS_MAX_RETRIES', 3),
    },
    kpler: {
      baseUrl: process.env.KPLER_BASE_URL || 'https://api.kpler.com/v2',
      vesselRisksPath: process.env.KPLER_VESSEL_RISKS_PATH || '/compliance/vessel-risks',
      apiKey: process.env.KPLER_API_KEY || '',
      maxRetries: intFromEnv('KPLER_MAX_RETRIES', 2),
    },
    circuitBreaker: {
      timeout: intFromEnv('PROVIDER_BREAKER_TIMEOUT_MS', 10000),
      errorThresholdPercentage: intFromEnv('PROVIDER_BREAKER_ERROR_PERCENT', 50),
      resetTimeout: intFromEnv('PROVIDER_BREAKER_RESET_MS', 30000),
    },
  },
  screening: {
    providerTimeoutMs: intFromEnv('SCREENING_PROVIDER_TIMEOUT_MS', 15000),
    windowDays: intFromEnv('SCREENING_WINDOW_DAYS', 365),
  },
});
