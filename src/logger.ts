/**
 * Diagnostics for the fetcher, robots loader and traversal engine.
 *
 * `sitewalk walk` prints one visited URL per line on stdout so its output
 * can be piped into other tools; every log line therefore goes to fd 2,
 * including pino-pretty output in development. Tests run with
 * LOG_LEVEL=silent (see vitest.config.ts).
 */
import { createRequire } from 'node:module';
import pino from 'pino';

const require = createRequire(import.meta.url);
const isDev = process.env.NODE_ENV === 'development';

/**
 * pino-pretty is an optional dev-time dependency; fall back to JSON logs
 * when it is not installed.
 */
function isPinoPrettyAvailable(): boolean {
  if (!isDev) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

export function getLogLevel(envLevel: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const level = envLevel?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

const options = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'sitewalk',
  },
};

export const logger = isPinoPrettyAvailable()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));
