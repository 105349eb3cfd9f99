import { registerAs } from '@nestjs/config';

const NODE_ENVS = ['development', 'test', 'production'] as const;

export type NodeEnv = (typeof NODE_ENVS)[number];

function toNodeEnv(value: string | undefined): NodeEnv {
  return NODE_ENVS.find((env) => env === value) ?? 'development';
}

export interface AppConfig {
  nodeEnv: NodeEnv;
  port: number;
  apiPrefix: string;
  apiVersion: string;
  corsOrigin: string;
  logLevel: string;
  logDir: string;
}

export const appConfig = registerAs(
  'app',
  (): AppConfig => ({
    nodeEnv: toNodeEnv(process.env.NODE_ENV),
    port: parseInt(process.env.PORT || '3002', 10),
    apiPrefix: process.env.API_PREFIX || 'api',
    apiVersion: process.env.API_VERSION || '1',
    corsOrigin: process.env.CORS_ORIGIN || '*',
    logLevel: process.env.LOG_LEVEL || 'debug',
    logDir: process.env.LOG_DIR || 'logs',
  }),
);
