import { describe, it, expect } from "vitest";
import { canonicalize, EncodeSet, isPercentEncoded, percentDecode, percentEncode } from "../../src/encode";
import { decodeUtf8, encodeCodePoint, encodeUtf8 } from "../../src/utf8";

describe("percentEncode", () => {
  it("should write two uppercase hex digits", () => {
    expect(percentEncode(0x0a)).toBe("%0A");
    expect(percentEncode(0xff)).toBe("%FF");
    expect(percentEncode(0x20)).toBe("%20");
  });
});

describe("canonicalize", () => {
  it("should return the substring untouched when nothing needs encoding", () => {
    expect(canonicalize("abc", EncodeSet.PATH_SEGMENT)).toBe("abc");
    expect(canonicalize("xabcx", EncodeSet.PATH_SEGMENT, {}, 1, 4)).toBe("abc");
  });

  it("should encode characters of the context's set", () => {
    expect(canonicalize("a b", EncodeSet.PATH_SEGMENT)).toBe("a%20b");
    expect(canonicalize("a/b?c#d", EncodeSet.PATH_SEGMENT)).toBe("a%2Fb%3Fc%23d");
    expect(canonicalize("a:b@c", EncodeSet.USERNAME)).toBe("a%3Ab%40c");
    expect(canonicalize("a:b@c", EncodeSet.PATH_SEGMENT)).toBe("a:b@c");
  });

  it("should always encode control characters", () => {
    expect(canonicalize("a\u0001b\u007fc", EncodeSet.FRAGMENT)).toBe("a%01b%7Fc");
    expect(canonicalize("a\tb", EncodeSet.PATH_SEGMENT)).toBe("a%09b");
  });

  it("should drop tab, newline, form feed and carriage return from encoded input", () => {
    expect(canonicalize("a\tb\nc\fd\re", EncodeSet.PATH_SEGMENT, { alreadyEncoded: true })).toBe("abcde");
  });

  it("should encode non-ASCII code points as UTF-8 unless allowed", () => {
    expect(canonicalize("☃", EncodeSet.PATH_SEGMENT)).toBe("%E2%98%83");
    expect(canonicalize("🍩", EncodeSet.PATH_SEGMENT)).toBe("%F0%9F%8D%A9");
    expect(canonicalize("☃", EncodeSet.FRAGMENT, { asciiOnly: false })).toBe("☃");
  });

  it("should encode an unpaired surrogate as a question mark", () => {
    expect(canonicalize("a\ud800b", EncodeSet.PATH_SEGMENT)).toBe("a%3Fb");
  });

  it("should encode % unless the input is already encoded", () => {
    expect(canonicalize("100%", EncodeSet.PATH_SEGMENT)).toBe("100%25");
    expect(canonicalize("%41", EncodeSet.PATH_SEGMENT)).toBe("%2541");
    expect(canonicalize("%41", EncodeSet.PATH_SEGMENT, { alreadyEncoded: true })).toBe("%41");
    expect(canonicalize("%zz", EncodeSet.PATH_SEGMENT, { alreadyEncoded: true })).toBe("%zz");
  });

  it("should encode invalid escapes in strict mode", () => {
    expect(canonicalize("%zz%41", EncodeSet.PATH_SEGMENT, { alreadyEncoded: true, strict: true })).toBe("%25zz%41");
    expect(canonicalize("%4", EncodeSet.PATH_SEGMENT, { alreadyEncoded: true, strict: true })).toBe("%254");
  });

  it("should treat + specially when it means space", () => {
    expect(canonicalize("a+b", EncodeSet.QUERY, { plusIsSpace: true })).toBe("a%2Bb");
    expect(canonicalize("a+b", EncodeSet.QUERY_COMPONENT, { alreadyEncoded: true, plusIsSpace: true })).toBe("a+b");
    expect(canonicalize("a+b", EncodeSet.PATH_SEGMENT)).toBe("a+b");
  });

  it("should escape only the stricter sets when re-encoding", () => {
    expect(canonicalize("[a]", EncodeSet.PATH_SEGMENT_URI, { alreadyEncoded: true, strict: true })).toBe("%5Ba%5D");
    expect(canonicalize("a|b", EncodeSet.QUERY_COMPONENT_URI, { alreadyEncoded: true, strict: true })).toBe("a%7Cb");
    expect(canonicalize("a b", EncodeSet.FRAGMENT_URI, { alreadyEncoded: true, strict: true, asciiOnly: false }))
      .toBe("a%20b");
  });
});

describe("isPercentEncoded", () => {
  it("should need a percent sign and two hex digits", () => {
    expect(isPercentEncoded("%2f", 0, 3)).toBe(true);
    expect(isPercentEncoded("%2g", 0, 3)).toBe(false);
    expect(isPercentEncoded("%2f", 0, 2)).toBe(false);
    expect(isPercentEncoded("a%2F", 1, 4)).toBe(true);
  });
});

describe("percentDecode", () => {
  it("should return text without escapes unchanged", () => {
    expect(percentDecode("plain")).toBe("plain");
  });

  it("should decode multi-byte sequences", () => {
    expect(percentDecode("%E2%98%83")).toBe("☃");
    expect(percentDecode("%F0%9F%8D%A9")).toBe("🍩");
    expect(percentDecode("caf%C3%A9")).toBe("café");
  });

  it("should keep malformed escapes as text", () => {
    expect(percentDecode("a%f")).toBe("a%f");
    expect(percentDecode("%")).toBe("%");
    expect(percentDecode("%%30%30")).toBe("%00");
    expect(percentDecode("%zz")).toBe("%zz");
  });

  it("should replace invalid UTF-8 with U+FFFD", () => {
    expect(percentDecode("%E2%98x")).toBe("�x");
    expect(percentDecode("%80")).toBe("�");
  });

  it("should keep non-ASCII characters next to escapes", () => {
    expect(percentDecode("é%20")).toBe("é ");
  });

  it("should decode + only when it means space", () => {
    expect(percentDecode("a+b", true)).toBe("a b");
    expect(percentDecode("a+b", false)).toBe("a+b");
    expect(percentDecode("a%2Bb", true)).toBe("a+b");
  });
});

describe("UTF-8", () => {
  it("should encode code points of every length", () => {
    const bytes: number[] = [];
    encodeCodePoint(0x41, bytes);
    encodeCodePoint(0xe9, bytes);
    encodeCodePoint(0x2603, bytes);
    encodeCodePoint(0x1f369, bytes);
    expect(bytes).toEqual([0x41, 0xc3, 0xa9, 0xe2, 0x98, 0x83, 0xf0, 0x9f, 0x8d, 0xa9]);
  });

  it("should combine surrogate pairs when transcoding text", () => {
    const bytes: number[] = [];
    encodeUtf8("x🍩", 1, 3, bytes);
    expect(bytes).toEqual([0xf0, 0x9f, 0x8d, 0xa9]);
  });

  it("should replace each maximal ill-formed subsequence", () => {
    expect(decodeUtf8([0xed, 0xa0, 0x80])).toBe("���");
    expect(decodeUtf8([0xf0, 0x9f, 0x8d])).toBe("�");
    expect(decodeUtf8([0xc3, 0x41])).toBe("�A");
    expect(decodeUtf8([0xff])).toBe("�");
  });
});
