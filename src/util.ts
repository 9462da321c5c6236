/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

export const ONLY_DEC = /^[0-9]+$/;

export type Tuple8<T> = [T, T, T, T, T, T, T, T];

const mathMin = Math.min;
const stringFromCharCode = String.fromCharCode;
const MAX_SIZE = 0x4000;

export function isAlpha(codePoint: number): boolean {
  return (codePoint >= 0x41 && codePoint <= 0x5A) // A to Z
      || (codePoint >= 0x61 && codePoint <= 0x7A); // a to z
}

export function isDigit(codePoint: number): boolean {
  return codePoint >= 0x30 && codePoint <= 0x39; // 0 to 9
}

export function isAlphanumeric(codePoint: number): boolean {
  return isAlpha(codePoint) || isDigit(codePoint);
}

export function isHexDigit(codePoint: number): boolean {
  return parseHexDigit(codePoint) !== -1;
}

export function parseHexDigit(codePoint: number): number {
  if (codePoint >= 0x30 && codePoint <= 0x39) { // 0 to 9
    return codePoint - 0x30;
  } else if (codePoint >= 0x41 && codePoint <= 0x46) { // A to F
    return codePoint - 0x41 + 0xA;
  } else if (codePoint >= 0x61 && codePoint <= 0x66) { // a to f
    return codePoint - 0x61 + 0xA;
  }
  return -1;
}

export function swap<T>(array: T[], i: number, j: number): void {
  const temp = array[i];
  array[i] = array[j];
  array[j] = temp;
}

// Number of UTF-16 code units taken by codePoint.
export function charCount(codePoint: number): number {
  return codePoint > 0xFFFF ? 2 : 1;
}

export function codePointAt(input: string, index: number): number {
  // index is always in range, the fallback only satisfies the checker
  return input.codePointAt(index) ?? 0;
}

// Offset of the first code unit in [pos, limit) that is one of delimiters, or limit.
export function delimiterOffset(input: string, pos: number, limit: number, delimiters: string): number {
  for (let i = pos; i < limit; i++) {
    if (delimiters.indexOf(input[i]) !== -1) {
      return i;
    }
  }
  return limit;
}

export function fromCodeUnits(codeUnits: number[]): string {
  const length = codeUnits.length;
  // Prevent stack overflow when apply()ing with long array
  // by splitting input in smaller slices
  const parts: string[] = [];
  for (let start = 0; start < length; start += MAX_SIZE) {
    const end = mathMin(start + MAX_SIZE, length);
    parts.push(stringFromCharCode.apply(null, codeUnits.slice(start, end)));
  }
  return parts.join('');
}
