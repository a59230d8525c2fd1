/**
 * Error taxonomy shared by the Bitbucket and Service Desk clients.
 * Nothing here is retried; every error surfaces to the caller.
 */

/**
 * Non-2xx HTTP response. `message` is the server-supplied message when one
 * could be extracted from the body.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(message: string, status: number, url: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string, url: string) {
    super(message, 404, url);
    this.name = "NotFoundError";
  }
}

/**
 * A document's type tag (or a field an accessor reads) disagrees with what
 * the wrapper expects.
 */
export class SchemaMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaMismatchError";
  }
}

/** Action refused by the locally cached state. No request was sent. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class TimeFormatError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid timestamp: "${value}"`);
    this.name = "TimeFormatError";
    this.value = value;
  }
}
