import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export interface LoggerSettings {
  nodeEnv: string;
  level?: string;
  logDir?: string;
}

export const formatLogValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (value instanceof Error) {
    return value.message;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return '[unserializable]';
  }
};

export const consoleLine = printf((info) => {
  const context = formatLogValue(info.context);
  const stack = formatLogValue(info.stack);
  return [
    formatLogValue(info.timestamp),
    info.level,
    context ? `[${context}]` : '',
    formatLogValue(info.message),
  ]
    .filter((part) => part !== '')
    .join(' ')
    .concat(stack ? `\n${stack}` : '');
});

export function resolveLogLevel(settings: LoggerSettings): string {
  if (settings.level) {
    return settings.level;
  }
  if (settings.nodeEnv === 'test') {
    return 'warn';
  }
  return settings.nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Console output always; JSON files under `logDir` (errors apart) unless running tests.
 */
export function createWinstonOptions(settings: LoggerSettings): WinstonModuleOptions {
  const level = resolveLogLevel(settings);
  const fileFormat = combine(timestamp(), errors({ stack: true }), json());

  const consoleTransport = new winston.transports.Console({
    level,
    format: combine(
      colorize({ all: settings.nodeEnv !== 'production' }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      errors({ stack: true }),
      consoleLine,
    ),
  });

  if (!settings.logDir || settings.nodeEnv === 'test') {
    return { level, transports: [consoleTransport] };
  }

  const files = [
    new winston.transports.File({
      filename: `${settings.logDir}/error.log`,
      level: 'error',
      format: fileFormat,
    }),
    new winston.transports.File({
      filename: `${settings.logDir}/combined.log`,
      level,
      format: fileFormat,
    }),
  ];

  return { level, transports: [consoleTransport, ...files] };
}
