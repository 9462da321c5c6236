/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

export { HttpUrl } from "./url";
export { HttpUrlBuilder } from "./builder";
export { canonicalizeHost } from "./host";
export { DEFAULT_PORTS, MAX_PORT, defaultPort, defaultDomainToAscii } from "./config";
export type { DomainToAscii, HttpUrlOptions, Scheme } from "./config";
export { createLogger, silentLogger } from "./logger";
export type { LogContext, Logger, LogLevel, LogSink } from "./logger";
export {
  IncompleteUrlError,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  InvalidHostError,
  InvalidPathSegmentError,
  InvalidPortError,
  InvalidSchemeError,
  UrlError
} from "./errors";
