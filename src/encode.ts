/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { charCount, codePointAt, isAlphanumeric, isHexDigit, parseHexDigit } from "./util";
import { decodeUtf8, encodeCodePoint, encodeUtf8 } from "./utf8";

/**
 * The contexts a piece of URL text can be encoded for. Each one has its own set of
 * printable ASCII characters that must be escaped.
 *
 * The `*_URI` contexts are stricter variants used when re-encoding a URL for consumers
 * with a tighter grammar.
 */
export const enum EncodeSet {
  SCHEME,
  USERNAME,
  PASSWORD,
  PATH_SEGMENT,
  PATH_SEGMENT_URI,
  QUERY,
  QUERY_COMPONENT_REENCODE,
  QUERY_COMPONENT,
  QUERY_COMPONENT_URI,
  FRAGMENT,
  FRAGMENT_URI
}

export interface CanonicalizeOptions {
  /** Input is already percent-encoded: `%` passes through and raw tab, newline, form feed and carriage return are dropped. */
  alreadyEncoded?: boolean;
  /** With alreadyEncoded, a `%` that does not start a valid escape is encoded as `%25`. */
  strict?: boolean;
  /** `+` stands for a space: a literal plus is written as `%2B` (or kept as `+` when alreadyEncoded). */
  plusIsSpace?: boolean;
  /** Non-ASCII code points are percent-encoded. Defaults to true. */
  asciiOnly?: boolean;
}

// https://url.spec.whatwg.org/#percent-encode
export function percentEncode(byte: number): string {
  return `%${byte <= 0xF ? '0' : ''}${byte.toString(16).toUpperCase()}`;
}

// Characters that may appear after the first letter of a scheme.
function isSchemeCodePoint(code: number): boolean {
  return isAlphanumeric(code)
      || code === 0x2B // U+002B (+)
      || code === 0x2D // U+002D (-)
      || code === 0x2E; // U+002E (.)
}

function isUserinfoEncode(code: number): boolean {
  return code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x2F // U+002F (/)
      || (code >= 0x3A && code <= 0x3E) // U+003A (:) to U+003E (>)
      || code === 0x3F // U+003F (?)
      || code === 0x40 // U+0040 (@)
      || (code >= 0x5B && code <= 0x5E) // U+005B ([), U+005C (\), U+005D (]), U+005E (^)
      || code === 0x60 // U+0060 (`)
      || (code >= 0x7B && code <= 0x7D); // U+007B ({), U+007C (|), U+007D (})
}

function isPathSegmentEncode(code: number): boolean {
  return code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x2F // U+002F (/)
      || code === 0x3C // U+003C (<)
      || code === 0x3E // U+003E (>)
      || code === 0x3F // U+003F (?)
      || code === 0x5C // U+005C (\)
      || code === 0x5E // U+005E (^)
      || code === 0x60 // U+0060 (`)
      || (code >= 0x7B && code <= 0x7D); // U+007B ({), U+007C (|), U+007D (})
}

function isQueryEncode(code: number): boolean {
  return code === 0x20 // U+0020 SPACE
      || code === 0x21 // U+0021 (!)
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x24 // U+0024 ($)
      || (code >= 0x26 && code <= 0x29) // U+0026 (&), U+0027 ('), U+0028 ((), U+0029 ())
      || code === 0x2C // U+002C (,)
      || code === 0x2F // U+002F (/)
      || (code >= 0x3A && code <= 0x40) // U+003A (:) to U+0040 (@)
      || (code >= 0x5B && code <= 0x5E) // U+005B ([) to U+005E (^)
      || code === 0x60 // U+0060 (`)
      || (code >= 0x7B && code <= 0x7E); // U+007B ({) to U+007E (~)
}

function isQueryComponentEncode(code: number): boolean {
  return code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x27 // U+0027 (')
      || code === 0x3C // U+003C (<)
      || code === 0x3E; // U+003E (>)
}

function isFragmentUriEncode(code: number): boolean {
  return code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x3C // U+003C (<)
      || code === 0x3E // U+003E (>)
      || code === 0x5C // U+005C (\)
      || code === 0x5E // U+005E (^)
      || code === 0x60 // U+0060 (`)
      || (code >= 0x7B && code <= 0x7D); // U+007B ({), U+007C (|), U+007D (})
}

// Whether a printable ASCII code point must be escaped in the given context.
export function requiresEncoding(code: number, set: EncodeSet): boolean {
  switch (set) {
    case EncodeSet.SCHEME:
      return !isSchemeCodePoint(code);
    case EncodeSet.USERNAME:
    case EncodeSet.PASSWORD:
      return isUserinfoEncode(code);
    case EncodeSet.PATH_SEGMENT:
      return isPathSegmentEncode(code);
    case EncodeSet.PATH_SEGMENT_URI:
      return code === 0x5B || code === 0x5D; // U+005B ([), U+005D (])
    case EncodeSet.QUERY:
      return isQueryEncode(code);
    case EncodeSet.QUERY_COMPONENT_REENCODE:
      return isQueryComponentEncode(code)
          || code === 0x26 // U+0026 (&)
          || code === 0x3D; // U+003D (=)
    case EncodeSet.QUERY_COMPONENT:
      return isQueryComponentEncode(code);
    case EncodeSet.QUERY_COMPONENT_URI:
      return code === 0x5C // U+005C (\)
          || code === 0x5E // U+005E (^)
          || code === 0x60 // U+0060 (`)
          || (code >= 0x7B && code <= 0x7D); // U+007B ({), U+007C (|), U+007D (})
    case EncodeSet.FRAGMENT:
      return false;
    case EncodeSet.FRAGMENT_URI:
      return isFragmentUriEncode(code);
  }
}

// True if input[pos, limit) starts with `%` followed by two hex digits.
export function isPercentEncoded(input: string, pos: number, limit: number): boolean {
  return pos + 2 < limit
      && input.charCodeAt(pos) === 0x25 // U+0025 (%)
      && isHexDigit(input.charCodeAt(pos + 1))
      && isHexDigit(input.charCodeAt(pos + 2));
}

function mustEncode(input: string, i: number, limit: number, codePoint: number, set: EncodeSet,
                    alreadyEncoded: boolean, strict: boolean, asciiOnly: boolean): boolean {
  return codePoint < 0x20
      || codePoint === 0x7F
      || (codePoint >= 0x80 && asciiOnly)
      || (codePoint < 0x80 && requiresEncoding(codePoint, set))
      || (codePoint === 0x25 && (!alreadyEncoded || (strict && !isPercentEncoded(input, i, limit))));
}

/**
 * Returns input[pos, limit) encoded for the given context. When nothing needs to change the
 * substring itself is returned.
 */
export function canonicalize(input: string, set: EncodeSet, options: CanonicalizeOptions = {},
                             pos: number = 0, limit: number = input.length): string {
  const alreadyEncoded = options.alreadyEncoded ?? false;
  const strict = options.strict ?? false;
  const plusIsSpace = options.plusIsSpace ?? false;
  const asciiOnly = options.asciiOnly ?? true;
  let i = pos;
  for (; i < limit; i += charCount(codePointAt(input, i))) {
    const codePoint = codePointAt(input, i);
    if (mustEncode(input, i, limit, codePoint, set, alreadyEncoded, strict, asciiOnly)
        || (codePoint === 0x2B && plusIsSpace)) {
      break;
    }
  }
  if (i === limit) {
    return input.slice(pos, limit);
  }

  // Slow path: the text has at least one character to change.
  let output = input.slice(pos, i);
  let bytes: number[] = [];
  for (; i < limit; i += charCount(codePointAt(input, i))) {
    const codePoint = codePointAt(input, i);
    if (alreadyEncoded
        && (codePoint === 0x09 || codePoint === 0x0A || codePoint === 0x0C || codePoint === 0x0D)) {
      continue;
    }
    if (codePoint === 0x2B && plusIsSpace) {
      output += alreadyEncoded ? '+' : '%2B';
    } else if (mustEncode(input, i, limit, codePoint, set, alreadyEncoded, strict, asciiOnly)) {
      encodeCodePoint(codePoint, bytes);
      output += bytes.map(percentEncode).join('');
      bytes = [];
    } else {
      output += String.fromCodePoint(codePoint);
    }
  }
  return output;
}

/**
 * Decodes the `%XX` escapes in encoded[pos, limit), and `+` when plusIsSpace is set.
 * Malformed escapes are kept as literal text and malformed UTF-8 becomes U+FFFD.
 */
export function percentDecode(encoded: string, plusIsSpace: boolean = false,
                              pos: number = 0, limit: number = encoded.length): string {
  let i = pos;
  for (; i < limit; i++) {
    const c = encoded.charCodeAt(i);
    if (c === 0x25 || (c === 0x2B && plusIsSpace)) {
      break;
    }
  }
  if (i === limit) {
    return encoded.slice(pos, limit);
  }

  // Slow path: collect the bytes, then decode them as UTF-8 in one pass.
  const bytes: number[] = [];
  encodeUtf8(encoded, pos, i, bytes);
  for (; i < limit; i += charCount(codePointAt(encoded, i))) {
    const codePoint = codePointAt(encoded, i);
    if (codePoint === 0x25 && i + 2 < limit) {
      const d1 = parseHexDigit(encoded.charCodeAt(i + 1));
      const d2 = parseHexDigit(encoded.charCodeAt(i + 2));
      if (d1 !== -1 && d2 !== -1) {
        bytes.push((d1 << 4) + d2);
        i += 2;
        continue;
      }
    } else if (codePoint === 0x2B && plusIsSpace) {
      bytes.push(0x20);
      continue;
    }
    encodeCodePoint(codePoint, bytes);
  }
  return decodeUtf8(bytes);
}
