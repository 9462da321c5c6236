/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { fromCodeUnits } from "./util";

const REPLACEMENT_CHARACTER = 0xFFFD;
const QUESTION_MARK = 0x3F;

function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xD800 && codePoint <= 0xDFFF;
}

function createByte(codePoint: number, shift: number): number {
  return ((codePoint >> shift) & 0x3F) | 0x80;
}

/**
 * Appends the UTF-8 encoding of codePoint to output.
 *
 * Unpaired surrogates cannot be encoded and are written as a single `?`.
 */
export function encodeCodePoint(codePoint: number, output: number[]): void {
  if ((codePoint & 0xFFFFFF80) === 0) { // 1-byte sequence
    output.push(codePoint);
  }
  else if ((codePoint & 0xFFFFF800) === 0) { // 2-byte sequence
    output.push(((codePoint >> 6) & 0x1F) | 0xC0);
    output.push((codePoint & 0x3F) | 0x80);
  }
  else if ((codePoint & 0xFFFF0000) === 0) { // 3-byte sequence
    if (isSurrogate(codePoint)) {
      output.push(QUESTION_MARK);
      return;
    }
    output.push(((codePoint >> 12) & 0x0F) | 0xE0);
    output.push(createByte(codePoint, 6));
    output.push((codePoint & 0x3F) | 0x80);
  }
  else if (codePoint <= 0x10FFFF) { // 4-byte sequence
    output.push(((codePoint >> 18) & 0x07) | 0xF0);
    output.push(createByte(codePoint, 12));
    output.push(createByte(codePoint, 6));
    output.push((codePoint & 0x3F) | 0x80);
  }
  else {
    throw new RangeError(`Unexpected code point: 0x${codePoint.toString(16)}`);
  }
}

// Transcodes input[pos, limit) to UTF-8, appending to output.
export function encodeUtf8(input: string, pos: number, limit: number, output: number[]): void {
  for (let i = pos; i < limit; i++) {
    const c = input.charCodeAt(i);
    if (c >= 0xD800 && c <= 0xDBFF && i + 1 < limit) {
      const low = input.charCodeAt(i + 1);
      if (low >= 0xDC00 && low <= 0xDFFF) {
        encodeCodePoint(((c & 0x3FF) << 10) + (low & 0x3FF) + 0x10000, output);
        i++;
        continue;
      }
    }
    encodeCodePoint(c, output);
  }
}

function pushCodePoint(codePoint: number, output: number[]): void {
  if (codePoint > 0xFFFF) {
    codePoint -= 0x10000;
    output.push(codePoint >>> 10 & 0x3FF | 0xD800);
    codePoint = 0xDC00 | codePoint & 0x3FF;
  }
  output.push(codePoint);
}

/**
 * Decodes a UTF-8 byte sequence. Never fails: every maximal ill-formed subsequence
 * becomes a single U+FFFD.
 */
export function decodeUtf8(bytes: ReadonlyArray<number>): string {
  const output: number[] = [];
  let codePoint = 0;
  let bytesNeeded = 0;
  let bytesSeen = 0;
  let lowerBoundary = 0x80;
  let upperBoundary = 0xBF;
  for (let index = 0; index < bytes.length; index++) {
    const byte = bytes[index];
    if (bytesNeeded === 0) {
      if (byte <= 0x7F) {
        output.push(byte);
      } else if (byte >= 0xC2 && byte <= 0xDF) {
        bytesNeeded = 1;
        codePoint = byte & 0x1F;
      } else if (byte >= 0xE0 && byte <= 0xEF) {
        if (byte === 0xE0) lowerBoundary = 0xA0;
        if (byte === 0xED) upperBoundary = 0x9F;
        bytesNeeded = 2;
        codePoint = byte & 0x0F;
      } else if (byte >= 0xF0 && byte <= 0xF4) {
        if (byte === 0xF0) lowerBoundary = 0x90;
        if (byte === 0xF4) upperBoundary = 0x8F;
        bytesNeeded = 3;
        codePoint = byte & 0x07;
      } else {
        output.push(REPLACEMENT_CHARACTER);
      }
      continue;
    }
    if (byte < lowerBoundary || byte > upperBoundary) {
      // Not a continuation byte: emit a replacement and reprocess this byte.
      codePoint = bytesNeeded = bytesSeen = 0;
      lowerBoundary = 0x80;
      upperBoundary = 0xBF;
      output.push(REPLACEMENT_CHARACTER);
      index--;
      continue;
    }
    lowerBoundary = 0x80;
    upperBoundary = 0xBF;
    codePoint = (codePoint << 6) | (byte & 0x3F);
    bytesSeen++;
    if (bytesSeen === bytesNeeded) {
      pushCodePoint(codePoint, output);
      codePoint = bytesNeeded = bytesSeen = 0;
    }
  }
  // Truncated sequence at the end of input.
  if (bytesNeeded !== 0) {
    output.push(REPLACEMENT_CHARACTER);
  }
  return fromCodeUnits(output);
}
