/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { type HttpUrlOptions, type ResolvedOptions, resolveOptions } from "./config";
import { parseIPv6, serializeIPv6 } from "./host/ipv6";
import { parseIPv4, serializeIPv4 } from "./host/ipv4";
import { isAlphanumeric, isDigit, parseHexDigit } from "./util";

export const enum HostType {
  DOMAIN,
  IPV4,
  IPV6
}

// Unreserved characters: ALPHA / DIGIT / "-" / "." / "_" / "~"
function isUnreserved(code: number): boolean {
  return isAlphanumeric(code)
      || code === 0x2D // U+002D (-)
      || code === 0x2E // U+002E (.)
      || code === 0x5F // U+005F (_)
      || code === 0x7E; // U+007E (~)
}

// Decodes %XX escapes whose byte is an unreserved character, leaving every other escape as is.
function decodeUnreserved(input: string): string {
  if (input.indexOf('%') === -1) {
    return input;
  }
  let output = '';
  for (let i = 0; i < input.length; i++) {
    if ('%' === input[i] && i + 2 < input.length) {
      const d1 = parseHexDigit(input.charCodeAt(i + 1));
      const d2 = parseHexDigit(input.charCodeAt(i + 2));
      if (d1 !== -1 && d2 !== -1 && isUnreserved((d1 << 4) + d2)) {
        output += String.fromCharCode((d1 << 4) + d2);
        i += 2;
        continue;
      }
    }
    output += input[i];
  }
  return output;
}

function isAscii(input: string): boolean {
  for (let i = 0; i < input.length; i++) {
    if (input.charCodeAt(i) > 0x7F) {
      return false;
    }
  }
  return true;
}

function isValidDomain(input: string): boolean {
  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i);
    if (code === 0x2E) { // U+002E (.)
      if (i === 0 || '.' === input[i - 1]) {
        return false;
      }
    } else if (!(isAlphanumeric(code) || code === 0x2D)) { // U+002D (-)
      return false;
    }
  }
  return true;
}

export function hostType(host: string): HostType {
  if (host.indexOf(':') !== -1) {
    return HostType.IPV6;
  }
  const lastDot = host.lastIndexOf('.');
  return lastDot !== -1 && isDigit(host.charCodeAt(lastDot + 1)) ? HostType.IPV4 : HostType.DOMAIN;
}

function canonicalizeIPv6(input: string): string | null {
  // 1. Strip the surrounding brackets, if any.
  let text = input;
  if ('[' === text[0] && ']' === text[text.length - 1]) {
    text = text.slice(1, -1);
  }
  // 2. Drop the zone ID, which does not change the address.
  const percent = text.indexOf('%');
  if (percent !== -1) {
    text = text.slice(0, percent);
  }
  // 3. Parse and serialize the address.
  const address = parseIPv6(text);
  return address === null ? null : serializeIPv6(address);
}

/**
 * Returns the canonical form of a host: a lowercase DNS name, a dotted-decimal IPv4 address
 * or a compressed IPv6 address without brackets. Returns null if input is not a valid host.
 */
export function canonicalizeHost(input: string, options?: HttpUrlOptions | ResolvedOptions): string | null {
  // 1. If input contains U+003A (:) or is wrapped in brackets, it is an IPv6 literal.
  if (input.indexOf(':') !== -1 || ('[' === input[0] && ']' === input[input.length - 1])) {
    return canonicalizeIPv6(input);
  }
  // 2. Decode escaped unreserved characters. Only a name with non-ASCII code points goes
  //    through the IDNA conversion, which rejects hyphen placements DNS allows.
  let asciiDomain = decodeUnreserved(input);
  if (!isAscii(asciiDomain)) {
    try {
      asciiDomain = resolveOptions(options).domainToAscii(asciiDomain);
    } catch (e) {
      if (e instanceof Error) {
        return null;
      }
      throw e;
    }
  }
  // 3. Remove one trailing U+002E (.). An empty name, or one still ending in U+002E (.), is invalid.
  if (asciiDomain.length > 1 && '.' === asciiDomain[asciiDomain.length - 1]) {
    asciiDomain = asciiDomain.slice(0, -1);
  }
  if (asciiDomain === '' || '.' === asciiDomain[asciiDomain.length - 1]) {
    return null;
  }
  // 4. A name whose last label starts with a digit must be an IPv4 address.
  if (hostType(asciiDomain) === HostType.IPV4) {
    const address = parseIPv4(asciiDomain);
    return address === null ? null : serializeIPv4(address);
  }
  // 5. Otherwise it must be a DNS name.
  if (!isValidDomain(asciiDomain)) {
    return null;
  }
  return asciiDomain.toLowerCase();
}
