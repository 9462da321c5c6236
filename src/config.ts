/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { toAscii } from "idna-uts46";
import { type Logger, silentLogger } from "./logger";

export type Scheme = "http" | "https";

export const DEFAULT_PORTS: Readonly<Record<Scheme, number>> = Object.freeze({
  http: 80,
  https: 443,
});

export const MAX_PORT = 65535;

export function defaultPort(scheme: Scheme): number {
  return DEFAULT_PORTS[scheme];
}

export function isScheme(value: string): value is Scheme {
  return value === "http" || value === "https";
}

/** Converts a Unicode domain name to ASCII. Throws if the name cannot be converted. */
export type DomainToAscii = (domain: string) => string;

export interface HttpUrlOptions {
  /** Receives parse warnings and the reasons non-throwing factories return null. Silent by default. */
  logger?: Logger;
  /** Replaces the UTS #46 conversion used for non-ASCII host names. */
  domainToAscii?: DomainToAscii;
}

export interface ResolvedOptions {
  readonly logger: Logger;
  readonly domainToAscii: DomainToAscii;
}

// Unicode ToASCII with nontransitional processing, STD3 rules and DNS length checks off.
export const defaultDomainToAscii: DomainToAscii = (domain) => toAscii(domain, {
  transitional: false,
  useStd3ASCII: false,
  verifyDnsLength: false
});

const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze({
  logger: silentLogger,
  domainToAscii: defaultDomainToAscii,
});

export function resolveOptions(options?: HttpUrlOptions | ResolvedOptions): ResolvedOptions {
  if (options === undefined) {
    return DEFAULT_OPTIONS;
  }
  return Object.freeze({
    logger: options.logger ?? silentLogger,
    domainToAscii: options.domainToAscii ?? defaultDomainToAscii,
  });
}
