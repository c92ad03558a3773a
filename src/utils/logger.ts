import pino, { type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';

/**
 * KCONFIG_LOG_LEVEL, else debug under NODE_ENV=development and info otherwise.
 * An installed binary runs without NODE_ENV and logs at info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env['KCONFIG_LOG_LEVEL']?.trim();
  if (configured) {
    return configured;
  }
  return env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

const level = resolveLogLevel();

// Build options conditionally so a silenced logger never starts a transport worker
const options: LoggerOptions = {
  level,
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

if (isDev && level !== 'silent') {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

// Logs go to stderr; stdout carries command output
export const logger = options.transport
  ? pino(options)
  : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}

/**
 * Wait until buffered log lines are written. The pretty transport writes
 * from a worker thread, so this runs before a child takes over the terminal.
 */
export function flushLogs(): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
