import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

/**
 * Root logger for one harness run. Lines go to stdout unless a
 * `destination` is given.
 */
export function createLogger(level: LogLevel = "info", destination?: DestinationStream): Logger {
  const options = {
    level,
    base: {
      system: "fifo-verify",
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Returns a child logger bound to one harness component.
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
