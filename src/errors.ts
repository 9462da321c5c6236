/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

/**
 * Error classes with a stable, machine-readable `code`.
 *
 * Everything a caller can trigger with bad input extends {@link UrlError}, which is what the
 * non-throwing factories turn into `null`.
 * @module
 */

export class UrlError extends TypeError {
  public readonly code: string;

  constructor(message: string, code: string = "ERR_URL") {
    super(message);
    this.name = "UrlError";
    this.code = code;
  }
}

export class InvalidSchemeError extends UrlError {
  constructor(message: string) {
    super(message, "ERR_URL_SCHEME");
    this.name = "InvalidSchemeError";
  }
}

export class InvalidHostError extends UrlError {
  constructor(message: string) {
    super(message, "ERR_URL_HOST");
    this.name = "InvalidHostError";
  }
}

export class InvalidPortError extends UrlError {
  constructor(message: string) {
    super(message, "ERR_URL_PORT");
    this.name = "InvalidPortError";
  }
}

export class InvalidPathSegmentError extends UrlError {
  constructor(message: string) {
    super(message, "ERR_URL_PATH_SEGMENT");
    this.name = "InvalidPathSegmentError";
  }
}

export class InvalidArgumentError extends UrlError {
  constructor(message: string) {
    super(message, "ERR_URL_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class IndexOutOfBoundsError extends RangeError {
  public readonly code = "ERR_URL_INDEX";

  constructor(index: number, size: number) {
    super(`Index ${index} out of bounds for length ${size}`);
    this.name = "IndexOutOfBoundsError";
  }
}

// Thrown by build() when a required component is missing.
export class IncompleteUrlError extends Error {
  public readonly code = "ERR_URL_INCOMPLETE";

  constructor(message: string) {
    super(message);
    this.name = "IncompleteUrlError";
  }
}
