/**
 * Structured logging.
 *
 * Components take an optional pino logger and log through a child bound to
 * their component name. Without one they stay silent.
 */

import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  readonly level?: LevelWithSilent;
  /** Human-readable output through pino-pretty */
  readonly pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    ...(options.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? pino({ level: "silent" })).child({ component });
}
