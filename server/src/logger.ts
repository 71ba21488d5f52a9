import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  /** Write to this stream instead of the console. */
  stream?: NodeJS.WritableStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base = winston.createLogger({
    levels: Object.fromEntries(LOG_LEVELS.map((level, i) => [level, i])),
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${level}] ${String(message)}${extra}`;
      }),
    ),
    transports: [
      options.stream
        ? new winston.transports.Stream({ stream: options.stream })
        : new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
    ],
  });

  const forward = (level: LogLevel): LogMethod => (message, meta) => {
    base.log(level, message, meta ?? {});
  };

  return {
    error: forward('error'),
    warn: forward('warn'),
    info: forward('info'),
    debug: forward('debug'),
    trace: forward('trace'),
  };
}
