import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type Level = (typeof LEVELS)[number];

function parseLevel(raw: string | undefined): Level {
  if (raw === undefined) return 'info';
  const lower = raw.trim().toLowerCase();
  return LEVELS.find((l) => l === lower) ?? 'info';
}

export function createLogger(opts: { level?: string; pretty?: boolean } = {}): Logger {
  const options: LoggerOptions = {
    level: parseLevel(opts.level ?? process.env.LOG_LEVEL),
    base: { service: 'pulsewatch' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const pretty = opts.pretty ?? process.env.LOG_PRETTY === '1';
  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname,service' },
      }),
    );
  }
  return pino(options);
}

export const logger: Logger = createLogger();
