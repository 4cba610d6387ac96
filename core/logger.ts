import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import { prettyFactory } from "pino-pretty";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Human-readable lines instead of NDJSON. */
  pretty?: boolean;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  if (options.pretty) {
    const prettify = prettyFactory({
      translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
      colorize: false,
      ignore: "pid,hostname",
    });
    const out: DestinationStream = options.destination ?? process.stdout;
    return pino(
      { base: undefined, level },
      {
        write: (line: string) => {
          out.write(prettify(line));
        },
      }
    );
  }
  return pino(
    {
      base: undefined,
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.epochTime,
    },
    options.destination ?? pino.destination(1)
  );
}

export const logger = createLogger();
