import { describe, it, expect } from "vitest";
import { HttpUrl } from "../../src/url";
import { addPathSegments, popSegment, resolvePath } from "../../src/path";

function resolve(base: string, link: string): string | undefined {
  return HttpUrl.get(base).resolve(link)?.toString();
}

describe("path resolution", () => {
  describe("against a base without a trailing slash", () => {
    const base = "http://host/a/b/c";
    const cases: Array<[string, string]> = [
      ["d/e/f", "http://host/a/b/d/e/f"],
      ["../../d/e/f", "http://host/d/e/f"],
      ["..", "http://host/a/"],
      ["../..", "http://host/"],
      ["../../..", "http://host/"],
      ["../../../..", "http://host/"],
      [".", "http://host/a/b/"],
      ["././..", "http://host/a/"],
      ["c/d/../e/../", "http://host/a/b/c/"],
      ["..e/", "http://host/a/b/..e/"],
      ["e/f../", "http://host/a/b/e/f../"],
      ["%2e.", "http://host/a/"],
      [".%2e", "http://host/a/"],
      ["%2e%2e", "http://host/a/"],
      ["%2E%2E", "http://host/a/"],
      ["%2E.", "http://host/a/"],
      [".%2E", "http://host/a/"],
      ["%2E%2e", "http://host/a/b/%2E%2e"],
      ["%2e%2E", "http://host/a/b/%2e%2E"],
      ["%2e", "http://host/a/b/"],
      ["%2E", "http://host/a/b/"],
      ["/x/y", "http://host/x/y"],
      ["", "http://host/a/b/c"],
    ];
    for (const [link, expected] of cases) {
      it(`should resolve "${link}"`, () => {
        expect(resolve(base, link)).toBe(expected);
      });
    }
  });

  describe("against a base with a trailing slash", () => {
    const base = "http://host/a/b/c/";
    const cases: Array<[string, string]> = [
      ["d/e/f", "http://host/a/b/c/d/e/f"],
      ["../../d/e/f", "http://host/a/d/e/f"],
      ["..", "http://host/a/b/"],
      ["../..", "http://host/a/"],
      ["../../../..", "http://host/"],
      [".", "http://host/a/b/c/"],
      ["c/d/../e/../", "http://host/a/b/c/c/"],
    ];
    for (const [link, expected] of cases) {
      it(`should resolve "${link}"`, () => {
        expect(resolve(base, link)).toBe(expected);
      });
    }
  });

  it("should treat backslashes as separators", () => {
    expect(resolve("http://host/a/b/c", "d\\e\\f")).toBe("http://host/a/b/d/e/f");
    expect(resolve("http://host/a/b/c", "\\x")).toBe("http://host/x");
    expect(resolve("http://host/a/b/c", "\\\\host2\\x")).toBe("http://host2/x");
  });

  it("should resolve a same-scheme reference without slashes as relative", () => {
    expect(resolve("http://host/a/b/c", "http:d/e/f")).toBe("http://host/a/b/d/e/f");
  });

  it("should read an authority when the scheme changes", () => {
    expect(resolve("http://host/a/b/c", "https:d")).toBe("https://d/");
  });

  it("should keep escaped slashes inside a segment", () => {
    const url = HttpUrl.get("http://host/a%2Fb%2Fc");
    expect(url.pathSegments).toEqual(["a/b/c"]);
    expect(url.encodedPathSegments).toEqual(["a%2Fb%2Fc"]);
  });

  it("should keep a lone percent sign as a segment", () => {
    const url = HttpUrl.get("http://host/%");
    expect(url.pathSegments).toEqual(["%"]);
    expect(url.toString()).toBe("http://host/%");
  });
});

describe("segment lists", () => {
  it("should stop popping at the root", () => {
    const segments = [""];
    popSegment(segments);
    expect(segments).toEqual([""]);
  });

  it("should end a popped path at a slash", () => {
    const segments = ["a", "b"];
    popSegment(segments);
    expect(segments).toEqual(["a", ""]);
  });

  it("should resolve a range of the input in place", () => {
    const segments = ["a", "b"];
    resolvePath(segments, "?x/y?", 1, 4);
    expect(segments).toEqual(["a", "x", "y"]);
  });

  it("should add a trailing empty segment for a trailing slash", () => {
    const segments = [""];
    addPathSegments(segments, "x/y/", false);
    expect(segments).toEqual(["x", "y", ""]);
  });
});
