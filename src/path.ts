/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { canonicalize, EncodeSet } from "./encode";
import { delimiterOffset } from "./util";

const SINGLE_DOT = /^(?:\.|%2e)$/i;
// Mixed-case %2e%2E is not a dot segment.
const DOUBLE_DOT = /^(?:\.\.|%2[eE]\.|\.%2[eE]|%2e%2e|%2E%2E)$/;

const SEGMENT_DELIMITERS = '/\\';

export function isSingleDotPathSegment(input: string): boolean {
  return SINGLE_DOT.test(input);
}

export function isDoubleDotPathSegment(input: string): boolean {
  return DOUBLE_DOT.test(input);
}

/**
 * Removes the last segment. The list keeps ending at a `/` boundary, so popping past the
 * root leaves the single empty segment.
 */
export function popSegment(segments: string[]): void {
  const removed = segments.pop();
  if (removed === '' && segments.length > 0) {
    segments[segments.length - 1] = '';
  } else {
    segments.push('');
  }
}

/**
 * Encodes input[pos, limit) as a path segment and applies it to segments: `.` is dropped,
 * `..` pops, anything else takes the place of an empty last segment or is appended.
 */
export function pushSegment(segments: string[], input: string, pos: number, limit: number,
                            addTrailingSlash: boolean, alreadyEncoded: boolean): void {
  const segment = canonicalize(input, EncodeSet.PATH_SEGMENT, { alreadyEncoded }, pos, limit);
  if (isSingleDotPathSegment(segment)) {
    return;
  }
  if (isDoubleDotPathSegment(segment)) {
    popSegment(segments);
    return;
  }
  if (segments[segments.length - 1] === '') {
    segments[segments.length - 1] = segment;
  } else {
    segments.push(segment);
  }
  if (addTrailingSlash) {
    segments.push('');
  }
}

/**
 * Resolves the already-encoded path reference input[pos, limit) against segments, in place.
 * Both `/` and `\` separate segments.
 */
export function resolvePath(segments: string[], input: string, pos: number, limit: number): void {
  // 1. An empty reference keeps the base path.
  if (pos === limit) {
    return;
  }
  // 2. An absolute reference starts over from the root;
  //    a relative one replaces the last segment of the base.
  const c = input[pos];
  if ('/' === c || '\\' === c) {
    segments.length = 0;
    segments.push('');
    pos++;
  } else {
    segments[segments.length - 1] = '';
  }
  // 3. Apply each segment of the reference in turn.
  let i = pos;
  while (i < limit) {
    const segmentEnd = delimiterOffset(input, i, limit, SEGMENT_DELIMITERS);
    const hasTrailingSlash = segmentEnd < limit;
    pushSegment(segments, input, i, segmentEnd, hasTrailingSlash, true);
    i = segmentEnd;
    if (hasTrailingSlash) {
      i++;
    }
  }
}

// Adds each slash-separated segment of text to segments.
export function addPathSegments(segments: string[], text: string, alreadyEncoded: boolean): void {
  let offset = 0;
  do {
    const segmentEnd = delimiterOffset(text, offset, text.length, SEGMENT_DELIMITERS);
    const addTrailingSlash = segmentEnd < text.length;
    pushSegment(segments, text, offset, segmentEnd, addTrailingSlash, alreadyEncoded);
    offset = segmentEnd + 1;
  } while (offset <= text.length);
}
