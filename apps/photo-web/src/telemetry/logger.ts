import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
}

/**
 * Root logger shared by Fastify and the services. Session cookies are
 * redacted from request and response logs.
 */
export function createLogger(config: LoggerConfig = {}, destination?: DestinationStream): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'photo-web',
    level: config.level ?? inferDefaultLevel(),
    redact: ['req.headers.cookie', 'res.headers["set-cookie"]'],
  };

  return destination ? pino(options, destination) : pino(options);
}

/** `info` in production, `debug` everywhere else. */
function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
