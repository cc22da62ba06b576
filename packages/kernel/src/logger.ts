/**
 * Structured logging.
 *
 * Components grab a named logger once at module scope and log
 * `(fields, message)` pairs:
 *
 * ```typescript
 * const log = Logger.for("HttpRequest");
 * log.warn({ url, retriesLeft }, "retrying");
 * ```
 *
 * `Logger.configure()` may run after loggers were created; it updates them all.
 */

import { pino, type Logger as PinoLogger, type LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;
export type ComponentLogger = PinoLogger;

export interface LoggerOptions {
  level: LogLevel;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.HOOKLOOP_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

const root: PinoLogger = pino({ name: "hookloop", level: defaultLevel() });
const components = new Map<string, PinoLogger>();

export const Logger = {
  /** Named child logger, cached per component. */
  for(component: string): ComponentLogger {
    let logger = components.get(component);
    if (!logger) {
      logger = root.child({ component });
      components.set(component, logger);
    }
    return logger;
  },

  configure(options: LoggerOptions): void {
    root.level = options.level;
    for (const logger of components.values()) {
      logger.level = options.level;
    }
  },

  get level(): string {
    return root.level;
  },
};
