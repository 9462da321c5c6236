/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { ONLY_DEC } from "../util";

export type IPv4Address = number; // 32-bit unsigned integer

/**
 * Parses a dotted-decimal IPv4 literal: exactly four decimal parts, each 0 to 255,
 * without leading zeros other than a lone `0`. Returns null for anything else.
 */
export function parseIPv4(input: string): IPv4Address | null {
  // 1. Let parts be input split on U+002E (.).
  const parts = input.split('.');
  // 2. If parts does not have exactly four items, return failure.
  if (parts.length !== 4) {
    return null;
  }
  let address = 0;
  // 3. For each part in parts:
  for (const part of parts) {
    // 1. If part is not a non-empty run of ASCII digits, return failure.
    if (!ONLY_DEC.test(part)) {
      return null;
    }
    // 2. If part has a leading zero, return failure.
    if (part.length > 1 && '0' === part[0]) {
      return null;
    }
    // 3. If part is greater than 255, return failure.
    const n = parseInt(part, 10);
    if (n > 255) {
      return null;
    }
    // 4. Shift the octet into address.
    address = address * 256 + n;
  }
  // 4. Return address.
  return address;
}

export function serializeIPv4(address: IPv4Address): string {
  // 1. Let output be the empty string.
  const output: string[] = [];
  // 2. Let n be the value of address.
  let n = address;
  // 3. For each i in the range 1 to 4, inclusive:
  for (let i = 1; i <= 4; i++) {
    // 1. Prepend n % 256, serialized, to output.
    output.push(`${n & 0xFF}`);
    // 2. Set n to floor(n / 256).
    n = n >>> 8;
  }
  // 4. Return output joined with U+002E (.).
  return output.reverse().join('.');
}
