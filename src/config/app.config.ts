import { registerAs } from '@nestjs/config';

export const appConfig = registerAs('app', () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL,
  logDir: process.env.LOG_DIR ?? 'logs',
}));

export const isDevelopment = (): boolean =>
  (process.env.NODE_ENV ?? 'development') === 'development';
