/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { type HttpUrlOptions, isScheme, MAX_PORT, type ResolvedOptions, resolveOptions } from "./config";
import { canonicalize, EncodeSet } from "./encode";
import {
  IncompleteUrlError,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  InvalidHostError,
  InvalidPathSegmentError,
  InvalidPortError,
  InvalidSchemeError
} from "./errors";
import { canonicalizeHost } from "./host";
import { parse, serializeRecord, UrlRecord } from "./parser";
import { addPathSegments, isDoubleDotPathSegment, isSingleDotPathSegment, pushSegment, resolvePath } from "./path";
import { parseQuery, type QueryParameter } from "./query";
import { HttpUrl } from "./url";

/**
 * Mutable accumulator for the components of an {@link HttpUrl}.
 *
 * Methods without `encoded` in their name take decoded text and percent-encode it; the
 * `encoded*` variants keep existing escapes and only encode what must be escaped.
 * Every method returns the builder, so calls can be chained.
 */
export class HttpUrlBuilder {
  private _url: UrlRecord;
  private _serialized: string | null = null;
  private readonly _options: ResolvedOptions;

  constructor(options?: HttpUrlOptions | ResolvedOptions, url: UrlRecord = new UrlRecord()) {
    this._options = resolveOptions(options);
    this._url = url;
  }

  private _changed(): this {
    this._serialized = null;
    return this;
  }

  /** Sets the scheme, which must be `http` or `https` in any case. */
  scheme(scheme: string): this {
    const lower = scheme.toLowerCase();
    if (!isScheme(lower)) {
      throw new InvalidSchemeError(`unexpected scheme: ${scheme}`);
    }
    this._url._scheme = lower;
    return this._changed();
  }

  /**
   * Sets the host: a DNS name, an internationalized domain name, an IPv4 address or an IPv6
   * address with or without brackets.
   */
  host(host: string): this {
    if (host === '') {
      throw new InvalidHostError('host must not be empty');
    }
    const canonical = canonicalizeHost(host, this._options);
    if (canonical === null) {
      throw new InvalidHostError(`unexpected host: ${host}`);
    }
    this._url._host = canonical;
    return this._changed();
  }

  port(port: number): this {
    if (!Number.isInteger(port) || port <= 0 || port > MAX_PORT) {
      throw new InvalidPortError(`unexpected port: ${port}`);
    }
    this._url._port = port;
    return this._changed();
  }

  username(username: string): this {
    this._url._encodedUsername = canonicalize(username, EncodeSet.USERNAME);
    return this._changed();
  }

  encodedUsername(encodedUsername: string): this {
    this._url._encodedUsername = canonicalize(encodedUsername, EncodeSet.USERNAME, { alreadyEncoded: true });
    return this._changed();
  }

  password(password: string): this {
    this._url._encodedPassword = canonicalize(password, EncodeSet.PASSWORD);
    return this._changed();
  }

  encodedPassword(encodedPassword: string): this {
    this._url._encodedPassword = canonicalize(encodedPassword, EncodeSet.PASSWORD, { alreadyEncoded: true });
    return this._changed();
  }

  addPathSegment(pathSegment: string): this {
    pushSegment(this._url._encodedPathSegments, pathSegment, 0, pathSegment.length, false, false);
    return this._changed();
  }

  /** Adds each `/` or `\` separated segment of pathSegments. A trailing slash adds an empty segment. */
  addPathSegments(pathSegments: string): this {
    addPathSegments(this._url._encodedPathSegments, pathSegments, false);
    return this._changed();
  }

  addEncodedPathSegment(encodedPathSegment: string): this {
    pushSegment(this._url._encodedPathSegments, encodedPathSegment, 0, encodedPathSegment.length, false, true);
    return this._changed();
  }

  addEncodedPathSegments(encodedPathSegments: string): this {
    addPathSegments(this._url._encodedPathSegments, encodedPathSegments, true);
    return this._changed();
  }

  setPathSegment(index: number, pathSegment: string): this {
    return this._setPathSegment(index, canonicalize(pathSegment, EncodeSet.PATH_SEGMENT));
  }

  setEncodedPathSegment(index: number, encodedPathSegment: string): this {
    return this._setPathSegment(index,
      canonicalize(encodedPathSegment, EncodeSet.PATH_SEGMENT, { alreadyEncoded: true }));
  }

  private _setPathSegment(index: number, canonicalSegment: string): this {
    const segments = this._url._encodedPathSegments;
    checkIndex(index, segments.length);
    if (isSingleDotPathSegment(canonicalSegment) || isDoubleDotPathSegment(canonicalSegment)) {
      throw new InvalidPathSegmentError(`unexpected path segment: ${canonicalSegment}`);
    }
    segments[index] = canonicalSegment;
    return this._changed();
  }

  /** Removes the segment at index. Removing the only segment leaves the path `/`. */
  removePathSegment(index: number): this {
    const segments = this._url._encodedPathSegments;
    checkIndex(index, segments.length);
    segments.splice(index, 1);
    if (segments.length === 0) {
      segments.push('');
    }
    return this._changed();
  }

  /** Replaces the whole path. encodedPath must start with `/`. */
  encodedPath(encodedPath: string): this {
    if (encodedPath[0] !== '/') {
      throw new InvalidArgumentError(`unexpected encodedPath: ${encodedPath}`);
    }
    resolvePath(this._url._encodedPathSegments, encodedPath, 0, encodedPath.length);
    return this._changed();
  }

  query(query: string | null): this {
    this._url._encodedQuery = query !== null
      ? parseQuery(canonicalize(query, EncodeSet.QUERY_COMPONENT, { plusIsSpace: true }))
      : null;
    return this._changed();
  }

  encodedQuery(encodedQuery: string | null): this {
    this._url._encodedQuery = encodedQuery !== null
      ? parseQuery(canonicalize(encodedQuery, EncodeSet.QUERY_COMPONENT, { alreadyEncoded: true, plusIsSpace: true }))
      : null;
    return this._changed();
  }

  /** Appends a query parameter. A null value adds the name without `=`. */
  addQueryParameter(name: string, value: string | null): this {
    return this._addQueryParameter(
      canonicalizeQueryName(name, false),
      value !== null ? canonicalize(value, EncodeSet.QUERY, { plusIsSpace: true }) : null);
  }

  addEncodedQueryParameter(encodedName: string, encodedValue: string | null): this {
    return this._addQueryParameter(
      canonicalizeQueryName(encodedName, true),
      encodedValue !== null
        ? canonicalize(encodedValue, EncodeSet.QUERY_COMPONENT_REENCODE, { alreadyEncoded: true, plusIsSpace: true })
        : null);
  }

  private _addQueryParameter(name: string, value: string | null): this {
    if (this._url._encodedQuery === null) {
      this._url._encodedQuery = [];
    }
    this._url._encodedQuery.push([name, value]);
    return this._changed();
  }

  /** Replaces every parameter called name with a single one. */
  setQueryParameter(name: string, value: string | null): this {
    this.removeAllQueryParameters(name);
    return this.addQueryParameter(name, value);
  }

  setEncodedQueryParameter(encodedName: string, encodedValue: string | null): this {
    this.removeAllEncodedQueryParameters(encodedName);
    return this.addEncodedQueryParameter(encodedName, encodedValue);
  }

  removeAllQueryParameters(name: string): this {
    return this._removeAllCanonicalQueryParameters(canonicalizeQueryName(name, false));
  }

  removeAllEncodedQueryParameters(encodedName: string): this {
    return this._removeAllCanonicalQueryParameters(canonicalizeQueryName(encodedName, true));
  }

  private _removeAllCanonicalQueryParameters(canonicalName: string): this {
    const query = this._url._encodedQuery;
    if (query === null) {
      return this;
    }
    let removed = false;
    for (let i = query.length - 1; i >= 0; i--) {
      if (query[i][0] === canonicalName) {
        query.splice(i, 1);
        removed = true;
      }
    }
    if (removed && query.length === 0) {
      this._url._encodedQuery = null;
    }
    return this._changed();
  }

  fragment(fragment: string | null): this {
    this._url._encodedFragment = fragment !== null
      ? canonicalize(fragment, EncodeSet.FRAGMENT, { asciiOnly: false })
      : null;
    return this._changed();
  }

  encodedFragment(encodedFragment: string | null): this {
    this._url._encodedFragment = encodedFragment !== null
      ? canonicalize(encodedFragment, EncodeSet.FRAGMENT, { alreadyEncoded: true, asciiOnly: false })
      : null;
    return this._changed();
  }

  /**
   * Re-encodes the components so the URL also satisfies grammars stricter than the one this
   * builder accepts: brackets in the path, some punctuation in the query and fragment, and
   * every `%` that does not start a valid escape.
   */
  reEncodeForUri(): this {
    const url = this._url;
    url._encodedPathSegments = url._encodedPathSegments.map(
      (segment) => canonicalize(segment, EncodeSet.PATH_SEGMENT_URI, { alreadyEncoded: true, strict: true }));
    if (url._encodedQuery !== null) {
      url._encodedQuery = url._encodedQuery.map(([name, value]): QueryParameter => [
        canonicalize(name, EncodeSet.QUERY_COMPONENT_URI, { alreadyEncoded: true, strict: true, plusIsSpace: true }),
        value !== null
          ? canonicalize(value, EncodeSet.QUERY_COMPONENT_URI, { alreadyEncoded: true, strict: true, plusIsSpace: true })
          : null
      ]);
    }
    if (url._encodedFragment !== null) {
      url._encodedFragment = canonicalize(url._encodedFragment, EncodeSet.FRAGMENT_URI,
        { alreadyEncoded: true, strict: true, asciiOnly: false });
    }
    return this._changed();
  }

  /**
   * Replaces the contents of this builder with input, resolved against base.
   * Throws a {@link UrlError} subclass describing the first problem found.
   */
  parse(input: string, base: HttpUrl | null = null): this {
    this._url = parse(input, base !== null ? base._record : null, this._options);
    return this._changed();
  }

  build(): HttpUrl {
    if (this._url._scheme === null) {
      throw new IncompleteUrlError('scheme was not set');
    }
    if (this._url._host === null) {
      throw new IncompleteUrlError('host was not set');
    }
    return new HttpUrl(this._url._clone(), this.toString(), this._options);
  }

  /** Serializes the components set so far. Missing components are left out. */
  toString(): string {
    if (this._serialized === null) {
      this._serialized = serializeRecord(this._url);
    }
    return this._serialized;
  }
}

function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfBoundsError(index, size);
  }
}

function canonicalizeQueryName(name: string, alreadyEncoded: boolean): string {
  if (name === '') {
    throw new InvalidArgumentError('queryParameterName must not be empty.');
  }
  return alreadyEncoded
    ? canonicalize(name, EncodeSet.QUERY_COMPONENT_REENCODE, { alreadyEncoded: true, plusIsSpace: true })
    : canonicalize(name, EncodeSet.QUERY, { plusIsSpace: true });
}
