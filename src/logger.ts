import { pino, destination, type Logger as PinoLogger } from 'pino';
import pretty from 'pino-pretty';
import { IS_PRODUCTION } from './config.js';

let rootLogger: PinoLogger | undefined;

/**
 * One pino instance (and one pretty stream in development) shared by every
 * namespace; each `Logger` is a child carrying its own name and level.
 */
function getRootLogger(): PinoLogger {
  if (!rootLogger) {
    rootLogger = IS_PRODUCTION
      ? pino({ level: 'trace' })
      : pino(
          { level: 'trace' },
          pretty({
            colorize: true,
            ignore: 'pid,hostname',
            messageFormat: '[{name}] {msg}',
            destination: destination({ sync: true }),
            sync: true,
          }),
        );
  }
  return rootLogger;
}

export class Logger {
  private readonly logger: PinoLogger;

  constructor(namespace: string, level?: string) {
    this.logger = getRootLogger().child({ name: namespace }, { level: level || process.env.LOG_LEVEL || 'info' });
  }

  error(message: string, data?: unknown) {
    this.logger.error(data, message);
  }

  warn(message: string, data?: unknown) {
    this.logger.warn(data, message);
  }

  info(message: string, data?: unknown) {
    this.logger.info(data, message);
  }

  debug(message: string, data?: unknown) {
    this.logger.debug(data, message);
  }

  /** Resolves once buffered output has been written; call before the process exits */
  async flush(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.flush(() => resolve());
    });
  }
}
