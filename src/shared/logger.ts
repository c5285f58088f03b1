import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const REDACT_PATHS = [
  'api_key',
  'apiKey',
  'password',
  'secret',
  'twitter_bearer_token',
  '*.api_key',
  '*.twitter_bearer_token',
  '*.password',
];

export interface CreateLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Build a pino logger. With an explicit destination the pretty transport is
 * never used, so tests can capture raw JSON lines.
 */
export function createLogger(
  opts: CreateLoggerOptions = {},
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    level: opts.level ?? process.env['LOG_LEVEL'] ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '***REDACTED***' },
  };

  if (destination) {
    return pino(options, destination);
  }

  const pretty = opts.pretty ?? process.env['NODE_ENV'] !== 'production';
  return pino({
    ...options,
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
}

export const logger = createLogger();
