import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const validLevels: readonly string[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
];

function resolveLogLevel(value?: string): LogLevel | 'silent' {
  if (!value) {
    return 'info';
  }
  if (value === 'silent') {
    return 'silent';
  }
  return isLogLevel(value) ? value : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return validLevels.includes(value);
}

export type Logger = PinoLogger;

// Pretty output only for interactive terminals; DATESORT_LOG_JSON forces JSON lines
const isTTY = process.stdout.isTTY;
const useJsonOutput = process.env.DATESORT_LOG_JSON === 'true';

function buildLoggerOptions(): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLogLevel(process.env.DATESORT_LOG_LEVEL),
    base: { app: 'datesort' },
  };

  if (!isTTY || useJsonOutput) {
    return base;
  }

  try {
    require.resolve('pino-pretty');
    return {
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,app',
          singleLine: false,
          messageFormat: '{msg}',
        },
      },
    };
  } catch {
    // pino-pretty not available, will use JSON output
    return base;
  }
}

export const logger: Logger = pino(buildLoggerOptions());

/**
 * Raise or lower the level of the shared logger (used by `--verbose`).
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
