import pino, { type Logger } from "pino";

export interface LoggerOptions {
  level: string;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
}

/**
 * Logs go to stderr: stdout may carry the calendar itself (output "-").
 */
export function createLogger(opts: LoggerOptions): Logger {
  if (opts.pretty) {
    return pino({
      level: opts.level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }
  return pino({ level: opts.level }, pino.destination(2));
}
