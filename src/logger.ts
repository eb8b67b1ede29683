import winston from 'winston';

const { format, transports } = winston;

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined,
  format: format.combine(format.timestamp(), format.json()),
  defaultMeta: { service: 'volrisk' },
  transports: [new transports.Console()],
});

export type Logger = winston.Logger;

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
