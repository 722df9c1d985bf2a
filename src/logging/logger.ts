import pino, { type Logger } from 'pino';

import { APP_NAME, type LogLevel } from '../config/serverConfig';

export function createLogger(level: LogLevel): Logger {
  return pino({
    name: APP_NAME,
    level,
  });
}

export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}
