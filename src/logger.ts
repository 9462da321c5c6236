/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

export type LogLevel = "debug" | "warn";

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  child(component: string): Logger;
}

/** Receives every record a logger emits; `message` is already prefixed with the component. */
export type LogSink = (level: LogLevel, message: string, context?: LogContext) => void;

const consoleSink: LogSink = (level, message, context) => {
  const args: unknown[] = context === undefined ? [message] : [message, context];
  if (level === "warn") {
    console.warn(...args);
  } else {
    console.debug(...args);
  }
};

/**
 * Creates a logger for a specific component.
 * @param component Component name, printed as a `[component]` prefix.
 * @param sink Where records go. Defaults to the console.
 */
export function createLogger(component: string, sink: LogSink = consoleSink): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    sink(level, `[${component}] ${message}`, context);
  };
  return {
    debug: (message, context) => log("debug", message, context),
    warn: (message, context) => log("warn", message, context),
    child: (sub) => createLogger(`${component}:${sub}`, sink),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  child: () => silentLogger,
};
