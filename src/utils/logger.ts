import pino from 'pino';
import type { Logger } from 'pino';

/**
 * The root logger is built before configuration is validated, so an unknown
 * level falls back to `info` here and is reported by `loadConfig`.
 */
export function resolveLogLevel(value: string | undefined): string {
  const level = value?.trim();
  if (!level) return 'info';
  return level === 'silent' || Object.hasOwn(pino.levels.values, level) ? level : 'info';
}

function createLogger(): Logger {
  const options: pino.LoggerOptions = {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    base: { service: 'riskdrift' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (process.env.LOG_PRETTY === 'true') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  // stdout is reserved for command output
  return pino(options, pino.destination(2));
}

export const logger = createLogger();

export function createChildLogger(module: string, context: Record<string, unknown> = {}): Logger {
  return logger.child({ module, ...context });
}
