import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level (default: `PSN_CLIENT_LOG_LEVEL` or `info`) */
  level?: string;
  /** Logger name (default: `psn-client`) */
  name?: string;
}

/**
 * Create the pino logger used when the caller does not supply one
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'psn-client',
    level: options.level ?? process.env.PSN_CLIENT_LOG_LEVEL ?? 'info',
  });
}
