import Joi from 'joi';

export const appEnvSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'test', 'production')
    .default('development'),
  PORT: Joi.number().port().default(3002),
  API_PREFIX: Joi.string().default('api'),
  API_VERSION: Joi.string().default('1'),
  CORS_ORIGIN: Joi.string().default('*'),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly')
    .default('debug'),
  LOG_DIR: Joi.string().default('logs'),

  DATABASE_PATH: Joi.string().default('study_groups.db'),
  DATABASE_SYNCHRONIZE: Joi.boolean().default(true),
  DATABASE_SEED: Joi.boolean().default(true),

  MATCHING_BASE_SCORE: Joi.number().integer().min(0).default(5),
  MATCHING_INTERVAL_MS: Joi.number().integer().min(0).default(0),

  THROTTLE_TTL: Joi.number().integer().min(1).default(60),
  THROTTLE_LIMIT: Joi.number().integer().min(1).default(100),
}).unknown(true);
