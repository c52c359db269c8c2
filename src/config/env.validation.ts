import Joi from 'joi';

const tenantNamePattern = /^[a-z0-9][a-z0-9_-]*$/i;

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Redis connection URI; every tenant keyspace lives in this one instance.
  CACHE_REDIS_URL: Joi.string().uri().allow('').default('redis://localhost:6379'),
  // Symmetric secret for access tokens. Rotating it invalidates every issued token.
  ACCESS_KEYS_SECRET: Joi.string().min(16).required(),
  ACCESS_KEYS_REDIS_PREFIX: Joi.string().default('access-keys'),
  ACCESS_KEYS_EXPIRES_IN_DAYS: Joi.number().integer().positive().default(30),
  // Per-call store timeout in ms; a timeout denies with store-unavailable.
  ACCESS_KEYS_STORE_TIMEOUT_MS: Joi.number().integer().min(50).default(2000),
  TENANT_MAIN_NAME: Joi.string().pattern(tenantNamePattern).default('main'),
  // Comma-separated tenant names; the main tenant is always included.
  TENANT_NAMES: Joi.string()
    .allow('')
    .default('main')
    .custom((value: string, helpers) => {
      const names = value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
      if (names.some((name) => !tenantNamePattern.test(name))) {
        return helpers.error('any.custom');
      }
      return value;
    }, 'Tenant list validation')
    .messages({
      'any.custom': 'TENANT_NAMES must be a comma-separated list of alphanumeric names',
    }),
  // Comma-separated bearer tokens for the internal admin API; empty disables it.
  ADMIN_API_TOKEN: Joi.string().allow('').default(''),
});
