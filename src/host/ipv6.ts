/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { isDigit, isHexDigit, parseHexDigit, swap, type Tuple8 } from "../util";

export type IPv6Address = Tuple8<number>; // eight 16-bit unsigned integers

/**
 * Parses the text of an IPv6 literal, without brackets or zone ID.
 * Returns null if input is not a valid address.
 */
export function parseIPv6(input: string): IPv6Address | null {
  const size = input.length;
  // 1. Let address be a new IPv6 address whose IPv6 pieces are all 0.
  const address: IPv6Address = [0, 0, 0, 0, 0, 0, 0, 0];
  // 2. Let pieceIndex be 0.
  let pieceIndex = 0;
  // 3. Let compress be null.
  let compress: number | null = null;
  // 4. Let pointer be a pointer into input, initially 0.
  let pointer = 0;
  // 5. If c is U+003A (:), then remaining must start with another U+003A (:).
  if (pointer < size && ':' === input[pointer]) {
    if (!(pointer + 1 < size && ':' === input[pointer + 1])) {
      return null;
    }
    pointer += 2;
    pieceIndex += 1;
    compress = pieceIndex;
  }
  // 6. While c is not the end of input:
  while (pointer < size) {
    // 1. If pieceIndex is 8, there are too many groups.
    if (pieceIndex === 8) {
      return null;
    }
    // 2. If c is U+003A (:), this is the compression marker.
    if (':' === input[pointer]) {
      // A second marker is a failure.
      if (null !== compress) {
        return null;
      }
      pointer += 1;
      pieceIndex += 1;
      compress = pieceIndex;
      continue;
    }
    // 3. Read up to four hex digits into value.
    let value = 0;
    let length = 0;
    while (length < 4 && pointer < size && isHexDigit(input.charCodeAt(pointer))) {
      value = value << 4 | parseHexDigit(input.charCodeAt(pointer));
      pointer += 1;
      length += 1;
    }
    // 4. If c is U+002E (.), the rest of input is an embedded IPv4 address, e.g. ::ffff:192.168.0.1
    if ('.' === input[pointer]) {
      // 1. If length is 0, return failure.
      if (length === 0) {
        return null;
      }
      // 2. Rewind to the start of the dotted quad.
      pointer -= length;
      // 3. The dotted quad needs two free pieces.
      if (pieceIndex > 6) {
        return null;
      }
      let numbersSeen = 0;
      // 4. While c is not the end of input:
      while (pointer < size) {
        let ipv4Piece = -1;
        // 1. Every number after the first is preceded by U+002E (.).
        if (numbersSeen > 0) {
          if ('.' === input[pointer] && numbersSeen < 4) {
            pointer += 1;
          } else {
            return null;
          }
        }
        // 2. If c is not an ASCII digit, return failure.
        if (!(pointer < size && isDigit(input.charCodeAt(pointer)))) {
          return null;
        }
        // 3. Read the decimal number, rejecting leading zeros and values above 255.
        while (pointer < size && isDigit(input.charCodeAt(pointer))) {
          const number = input.charCodeAt(pointer) - 0x30;
          if (ipv4Piece === -1) {
            ipv4Piece = number;
          } else if (ipv4Piece === 0) {
            return null;
          } else {
            ipv4Piece = ipv4Piece * 10 + number;
            if (ipv4Piece > 255) {
              return null;
            }
          }
          pointer += 1;
        }
        // 4. Shift the number into the current piece.
        address[pieceIndex] = address[pieceIndex] << 8 | ipv4Piece;
        numbersSeen += 1;
        // 5. If numbersSeen is 2 or 4, then increase pieceIndex by 1.
        if (numbersSeen === 2 || numbersSeen === 4) {
          pieceIndex += 1;
        }
      }
      // 5. If numbersSeen is not 4, return failure.
      if (numbersSeen !== 4) {
        return null;
      }
      break;
    }
    // 5. Otherwise, if c is U+003A (:), it must be followed by another group.
    else if (':' === input[pointer]) {
      pointer += 1;
      if (pointer === size) {
        return null;
      }
    }
    // 6. Otherwise, if c is not the end of input, return failure.
    else if (pointer < size) {
      return null;
    }
    // 7. Set address[pieceIndex] to value.
    address[pieceIndex] = value;
    pieceIndex += 1;
  }
  // 7. If compress is non-null, move the pieces after it to the end of address.
  if (compress !== null) {
    let swaps = pieceIndex - compress;
    pieceIndex = 7;
    while (pieceIndex !== 0 && swaps > 0) {
      swap(address, pieceIndex, compress + swaps - 1);
      pieceIndex -= 1;
      swaps -= 1;
    }
  }
  // 8. Otherwise, all eight pieces must have been given.
  else if (pieceIndex !== 8) {
    return null;
  }
  // 9. Return address.
  return address;
}

/**
 * Serializes address in the RFC 5952 form: lowercase hex without leading zeros, with the
 * longest run of two or more zero pieces (the first one on a tie) replaced by `::`.
 */
export function serializeIPv6(address: IPv6Address): string {
  // 1. Let output be the empty string.
  let output = '';
  // 2. Let compress be an index to the first IPv6 piece
  //    in the first longest sequences of address’s IPv6 pieces that are 0.
  const compress: number | null = findFirstLongestZeroSequence(address);
  // 3. Let ignore0 be false.
  let ignore0 = false;
  // 4. For each pieceIndex in the range 0 to 7, inclusive:
  for (let pieceIndex = 0; pieceIndex < 8; pieceIndex++) {
    // 1. Skip the zero pieces of the compressed run.
    if (ignore0) {
      if (address[pieceIndex] === 0) {
        continue;
      }
      ignore0 = false;
    }
    // 2. If compress is pieceIndex, append the separator and start skipping.
    if (compress === pieceIndex) {
      output += (pieceIndex === 0) ? '::' : ':';
      ignore0 = true;
      continue;
    }
    // 3. Append address[pieceIndex] as the shortest possible lowercase hexadecimal number.
    output += address[pieceIndex].toString(16);
    // 4. If pieceIndex is not 7, then append U+003A (:) to output.
    if (pieceIndex !== 7) {
      output += ':';
    }
  }
  // 5. Return output.
  return output;
}

function findFirstLongestZeroSequence(address: IPv6Address): number | null {
  let longestStart = 0;
  let longestLength = 0;
  let currentStart = 0;
  let currentLength = 0;
  for (let pieceIndex = 0; pieceIndex < 8; pieceIndex++) {
    if (address[pieceIndex] === 0) {
      if (currentLength === 0) {
        currentStart = pieceIndex;
      }
      currentLength++;
    } else {
      // A later run must be strictly longer to win.
      if (currentLength > longestLength) {
        longestStart = currentStart;
        longestLength = currentLength;
      }
      currentLength = 0;
    }
  }
  if (currentLength > longestLength) {
    longestStart = currentStart;
    longestLength = currentLength;
  }
  return (longestLength > 1) ? longestStart : null;
}
