/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { defaultPort, MAX_PORT, type ResolvedOptions, type Scheme } from "./config";
import { canonicalize, EncodeSet, isPercentEncoded, requiresEncoding } from "./encode";
import { InvalidHostError, InvalidPortError, InvalidSchemeError } from "./errors";
import { canonicalizeHost, hostType, HostType } from "./host";
import { resolvePath } from "./path";
import { parseQuery, type QueryParameter, serializeQuery } from "./query";
import { delimiterOffset, isAlpha, isDigit, ONLY_DEC } from "./util";

// Holds every component in its encoded form.
export class UrlRecord {
  _scheme: Scheme | null = null;
  _encodedUsername: string = '';
  _encodedPassword: string = '';
  _host: string | null = null;
  _port: number | null = null;
  _encodedPathSegments: string[] = [''];
  _encodedQuery: QueryParameter[] | null = null;
  _encodedFragment: string | null = null;

  _clone(): UrlRecord {
    const copy = new UrlRecord();
    copy._scheme = this._scheme;
    copy._encodedUsername = this._encodedUsername;
    copy._encodedPassword = this._encodedPassword;
    copy._host = this._host;
    copy._port = this._port;
    copy._encodedPathSegments = this._encodedPathSegments.slice();
    copy._encodedQuery = cloneQuery(this._encodedQuery);
    copy._encodedFragment = this._encodedFragment;
    return copy;
  }
}

export function cloneQuery(query: ReadonlyArray<Readonly<QueryParameter>> | null): QueryParameter[] | null {
  return query === null ? null : query.map(([name, value]): QueryParameter => [name, value]);
}

// The port a record connects to: its explicit port or the default of its scheme.
export function effectivePort(url: UrlRecord): number {
  if (url._port !== null) {
    return url._port;
  }
  return url._scheme !== null ? defaultPort(url._scheme) : -1;
}

/**
 * Serializes a record, possibly incomplete. Missing parts are skipped: a record without a
 * scheme serializes without `scheme://`.
 */
export function serializeRecord(url: UrlRecord): string {
  // 1. Let output be url’s scheme followed by "://", if it has one.
  let output = url._scheme !== null ? `${url._scheme}://` : '';
  // 2. If url has a username or a password, append them followed by U+0040 (@).
  if ('' !== url._encodedUsername || '' !== url._encodedPassword) {
    output += url._encodedUsername;
    if ('' !== url._encodedPassword) {
      output += `:${url._encodedPassword}`;
    }
    output += '@';
  }
  // 3. Append url’s host, in brackets if it is an IPv6 address.
  if (null !== url._host) {
    output += hostType(url._host) === HostType.IPV6 ? `[${url._host}]` : url._host;
  }
  // 4. Append the port unless it is the scheme’s default port.
  if (null !== url._port || null !== url._scheme) {
    const port = effectivePort(url);
    if (null === url._scheme || port !== defaultPort(url._scheme)) {
      output += `:${port}`;
    }
  }
  // 5. For each segment in url’s path, append U+002F (/) followed by the segment.
  for (const segment of url._encodedPathSegments) {
    output += `/${segment}`;
  }
  // 6. If url’s query is non-null, append U+003F (?) followed by the query.
  if (null !== url._encodedQuery) {
    output += `?${serializeQuery(url._encodedQuery)}`;
  }
  // 7. If url’s fragment is non-null, append U+0023 (#) followed by the fragment.
  if (null !== url._encodedFragment) {
    output += `#${url._encodedFragment}`;
  }
  return output;
}

const enum ParserState {
  SCHEME,
  AUTHORITY,
  RELATIVE,
  PATH,
  QUERY,
  FRAGMENT,
  DONE
}

function isAsciiWhitespace(c: string): boolean {
  return c === '\t' || c === '\n' || c === '\f' || c === '\r' || c === ' ';
}

// Offset of the `:` ending a scheme at the start of input[pos, limit), or -1 if there is none.
function schemeDelimiterOffset(input: string, pos: number, limit: number): number {
  if (limit - pos < 2) {
    return -1;
  }
  if (!isAlpha(input.charCodeAt(pos))) {
    return -1;
  }
  for (let i = pos + 1; i < limit; i++) {
    const c = input.charCodeAt(i);
    if (c === 0x3A) { // U+003A (:)
      return i;
    }
    if (requiresEncoding(c, EncodeSet.SCHEME)) {
      return -1;
    }
  }
  return -1;
}

function slashCount(input: string, pos: number, limit: number): number {
  let count = 0;
  while (pos < limit && ('/' === input[pos] || '\\' === input[pos])) {
    count++;
    pos++;
  }
  return count;
}

// Finds the `:` before the port, skipping over a bracketed IPv6 address.
function portColonOffset(input: string, pos: number, limit: number): number {
  for (let i = pos; i < limit; i++) {
    const c = input[i];
    if ('[' === c) {
      while (++i < limit) {
        if (']' === input[i]) {
          break;
        }
      }
    } else if (':' === c) {
      return i;
    }
  }
  return limit;
}

// Reads the digits of input[pos, limit), ignoring anything else. Returns -1 if out of range.
function parsePort(input: string, pos: number, limit: number): number {
  let digits = '';
  for (let i = pos; i < limit; i++) {
    if (isDigit(input.charCodeAt(i))) {
      digits += input[i];
    }
  }
  if (digits === '') {
    return -1;
  }
  const port = parseInt(digits, 10);
  return port > 0 && port <= MAX_PORT ? port : -1;
}

function startsWithIgnoreCase(input: string, pos: number, prefix: string): boolean {
  return input.slice(pos, pos + prefix.length).toLowerCase() === prefix;
}

/**
 * Parses input, resolving it against base when it is a relative reference.
 * Throws a {@link UrlError} subclass if input is not a valid HTTP or HTTPS URL.
 */
export function parse(input: string, base: UrlRecord | null, options: ResolvedOptions): UrlRecord {
  const logger = options.logger;
  const url = new UrlRecord();
  // 1. Ignore leading and trailing ASCII whitespace.
  let pos = 0;
  let limit = input.length;
  while (pos < limit && isAsciiWhitespace(input[pos])) {
    pos++;
  }
  while (limit > pos && isAsciiWhitespace(input[limit - 1])) {
    limit--;
  }
  let state = ParserState.SCHEME;
  while (state !== ParserState.DONE) {
    switch (state) {
      case ParserState.SCHEME: {
        // 1. Read the scheme if input has one, or take the base’s.
        const schemeDelimiter = schemeDelimiterOffset(input, pos, limit);
        if (schemeDelimiter !== -1) {
          if (startsWithIgnoreCase(input, pos, 'https:')) {
            url._scheme = 'https';
            pos += 'https:'.length;
          } else if (startsWithIgnoreCase(input, pos, 'http:')) {
            url._scheme = 'http';
            pos += 'http:'.length;
          } else {
            throw new InvalidSchemeError(
              `Expected URL scheme 'http' or 'https' but was '${input.slice(pos, schemeDelimiter)}'`);
          }
        } else if (base !== null && base._scheme !== null) {
          url._scheme = base._scheme;
        } else {
          throw new InvalidSchemeError("Expected URL scheme 'http' or 'https' but no colon was found");
        }
        // 2. Read an authority if input starts with two or more slashes, if there is no base,
        //    or if the scheme differs from the base’s. Otherwise this is a relative reference.
        const slashes = slashCount(input, pos, limit);
        if (slashes >= 2 || base === null || base._scheme !== url._scheme) {
          if (input.slice(pos, pos + slashes).indexOf('\\') !== -1) {
            logger.warn('Backslash used as a separator after the scheme', { input });
          }
          pos += slashes;
          state = ParserState.AUTHORITY;
        } else {
          state = ParserState.RELATIVE;
        }
        break;
      }

      case ParserState.AUTHORITY: {
        // [username[:password]@]host[:port]
        let hasUsername = false;
        let hasPassword = false;
        for (;;) {
          const componentDelimiter = delimiterOffset(input, pos, limit, '@/\\?#');
          if (componentDelimiter !== limit && '@' === input[componentDelimiter]) {
            // 1. User info precedes. The first U+003A (:) separates username from password,
            //    and every U+0040 (@) but the last belongs to the user info.
            if (hasUsername) {
              logger.warn('Unescaped @ in the user info', { input });
            }
            if (!hasPassword) {
              const passwordColon = delimiterOffset(input, pos, componentDelimiter, ':');
              const username = canonicalize(input, EncodeSet.USERNAME, { alreadyEncoded: true }, pos, passwordColon);
              url._encodedUsername = hasUsername ? `${url._encodedUsername}%40${username}` : username;
              if (passwordColon !== componentDelimiter) {
                hasPassword = true;
                url._encodedPassword = canonicalize(input, EncodeSet.PASSWORD, { alreadyEncoded: true },
                  passwordColon + 1, componentDelimiter);
              }
              hasUsername = true;
            } else {
              url._encodedPassword += `%40${canonicalize(input, EncodeSet.PASSWORD, { alreadyEncoded: true },
                pos, componentDelimiter)}`;
            }
            pos = componentDelimiter + 1;
            continue;
          }
          // 2. Host and port precede.
          const portColon = portColonOffset(input, pos, componentDelimiter);
          const hostText = input.slice(pos, portColon);
          const host = canonicalizeHost(hostText, options);
          if (host === null) {
            throw new InvalidHostError(`Invalid URL host: "${hostText}"`);
          }
          url._host = host;
          if (portColon + 1 < componentDelimiter) {
            const portText = input.slice(portColon + 1, componentDelimiter);
            const port = parsePort(input, portColon + 1, componentDelimiter);
            if (port === -1) {
              throw new InvalidPortError(`Invalid URL port: "${portText}"`);
            }
            if (!ONLY_DEC.test(portText)) {
              logger.warn('Ignored characters in port', { input, port: portText });
            }
            url._port = port;
          }
          pos = componentDelimiter;
          break;
        }
        state = ParserState.PATH;
        break;
      }

      case ParserState.RELATIVE: {
        // Copy the authority and path of base. Its query survives only if input has no path or query.
        if (base !== null) {
          url._encodedUsername = base._encodedUsername;
          url._encodedPassword = base._encodedPassword;
          url._host = base._host;
          url._port = base._port;
          url._encodedPathSegments = base._encodedPathSegments.slice();
          if (pos === limit || '#' === input[pos]) {
            url._encodedQuery = cloneQuery(base._encodedQuery);
          }
        }
        state = ParserState.PATH;
        break;
      }

      case ParserState.PATH: {
        const pathDelimiter = delimiterOffset(input, pos, limit, '?#');
        if (input.slice(pos, pathDelimiter).indexOf('\\') !== -1) {
          logger.warn('Backslash used as a path separator', { input });
        }
        resolvePath(url._encodedPathSegments, input, pos, pathDelimiter);
        pos = pathDelimiter;
        state = pos < limit && '?' === input[pos] ? ParserState.QUERY : ParserState.FRAGMENT;
        break;
      }

      case ParserState.QUERY: {
        const queryDelimiter = delimiterOffset(input, pos, limit, '#');
        url._encodedQuery = parseQuery(canonicalize(input, EncodeSet.QUERY_COMPONENT,
          { alreadyEncoded: true, plusIsSpace: true }, pos + 1, queryDelimiter));
        pos = queryDelimiter;
        state = ParserState.FRAGMENT;
        break;
      }

      case ParserState.FRAGMENT: {
        if (pos < limit && '#' === input[pos]) {
          for (let i = pos + 1; i < limit; i++) {
            if ('%' === input[i] && !isPercentEncoded(input, i, limit)) {
              logger.warn('Malformed percent escape in the fragment', { input });
              break;
            }
          }
          url._encodedFragment = canonicalize(input, EncodeSet.FRAGMENT,
            { alreadyEncoded: true, asciiOnly: false }, pos + 1, limit);
        }
        state = ParserState.DONE;
        break;
      }
    }
  }
  return url;
}
