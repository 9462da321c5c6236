import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { canonicalize, EncodeSet, percentDecode } from "../../src/encode";
import { canonicalizeHost } from "../../src/host";
import { parseIPv4, serializeIPv4 } from "../../src/host/ipv4";
import { serializeIPv6 } from "../../src/host/ipv6";
import { HttpUrl } from "../../src/url";

const label = fc.stringMatching(/^[a-z][a-z0-9]{0,9}$/);
const domain = fc.array(label, { minLength: 1, maxLength: 3 }).map((labels) => labels.join("."));
const segment = fc.string({ minLength: 1, maxLength: 12 }).filter((s) => s !== "." && s !== "..");
// A fragment ending in a space would lose it to whitespace trimming when reparsed.
const fragment = fc.string({ maxLength: 12 }).filter((s) => !s.endsWith(" "));
const piece = fc.integer({ min: 0, max: 0xffff });

describe("HttpUrl properties", () => {
  it("reparses built URLs to the same canonical string and components", () => {
    fc.assert(
      fc.property(
        fc.constantFrom("http", "https"),
        domain,
        fc.array(segment, { maxLength: 4 }),
        fc.string({ minLength: 1, maxLength: 8 }),
        fc.option(fc.string({ maxLength: 8 })),
        fc.option(fragment),
        (scheme, host, segments, name, value, frag) => {
          const builder = HttpUrl.builder().scheme(scheme).host(host).addQueryParameter(name, value).fragment(frag);
          for (const s of segments) {
            builder.addPathSegment(s);
          }
          const url = builder.build();
          const reparsed = HttpUrl.get(url.toString());
          expect(reparsed.toString()).toBe(url.toString());
          expect(reparsed.pathSegments).toEqual(segments.length > 0 ? segments : [""]);
          expect(reparsed.queryParameterName(0)).toBe(name);
          expect(reparsed.queryParameterValue(0)).toBe(value);
          expect(reparsed.fragment).toBe(frag);
        },
      ),
      { numRuns: 200 },
    );
  });

  it("resolving the empty reference is the identity", () => {
    fc.assert(
      fc.property(domain, fc.array(segment, { maxLength: 3 }), (host, segments) => {
        const builder = HttpUrl.builder().scheme("http").host(host);
        for (const s of segments) {
          builder.addPathSegment(s);
        }
        const url = builder.build();
        expect(url.resolve("")?.equals(url)).toBe(true);
      }),
    );
  });
});

describe("percent-encoding properties", () => {
  it("decodes what it encodes", () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (text) => {
        expect(percentDecode(canonicalize(text, EncodeSet.PATH_SEGMENT))).toBe(text);
        expect(percentDecode(canonicalize(text, EncodeSet.QUERY, { plusIsSpace: true }), true)).toBe(text);
      }),
    );
  });

  it("leaves encoded text unchanged when encoding it again as already encoded", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        const encoded = canonicalize(text, EncodeSet.PATH_SEGMENT);
        expect(canonicalize(encoded, EncodeSet.PATH_SEGMENT, { alreadyEncoded: true })).toBe(encoded);
      }),
    );
  });
});

describe("host properties", () => {
  it("gives full, padded and bracketed IPv6 spellings the same canonical form", () => {
    fc.assert(
      fc.property(fc.tuple(piece, piece, piece, piece, piece, piece, piece, piece), (pieces) => {
        const expected = serializeIPv6(pieces);
        const full = pieces.map((p) => p.toString(16)).join(":");
        const padded = pieces.map((p) => p.toString(16).toUpperCase().padStart(4, "0")).join(":");
        expect(canonicalizeHost(full)).toBe(expected);
        expect(canonicalizeHost(padded)).toBe(expected);
        expect(canonicalizeHost(`[${padded}]`)).toBe(expected);
        expect(canonicalizeHost(expected)).toBe(expected);
      }),
    );
  });

  it("round-trips IPv4 addresses", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (address) => {
        expect(parseIPv4(serializeIPv4(address))).toBe(address);
      }),
    );
  });
});
