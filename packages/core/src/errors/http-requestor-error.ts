export type HttpRequestorErrorKind =
  | 'authentication-unavailable'
  | 'server-error'
  | 'timeout'
  | 'certificate-trust-rejected'
  | 'transport-failure';

export type TransportFailureKind =
  | 'dns'
  | 'connection-refused'
  | 'connection-reset'
  | 'unknown';

export interface HttpRequestorErrorOptions {
  /** Refinement for `transport-failure` errors. */
  transportFailureKind?: TransportFailureKind;
  /** The underlying transport or TLS error, if any. */
  cause?: unknown;
}

/**
 * Describes why a single request attempt failed. Returned inside a failed
 * attempt result rather than thrown, so the retry loop can inspect it.
 */
export class HttpRequestorError extends Error {
  public readonly kind: HttpRequestorErrorKind;
  public readonly statusCode: number;
  public readonly transportFailureKind?: TransportFailureKind;

  constructor(
    kind: HttpRequestorErrorKind,
    statusCode: number,
    message: string,
    options?: HttpRequestorErrorOptions,
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HttpRequestorError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.transportFailureKind = options?.transportFailureKind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the caller's AbortSignal fires while an attempt is waiting for a
 * connection slot or for response headers. The name matches the DOM
 * `AbortError` so callers can detect aborts without importing this class.
 */
export class RequestCancelledError extends Error {
  constructor(message = 'Aborted', options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'AbortError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResponseAlreadyReleasedError extends Error {
  constructor(requestId: number) {
    super(`Response for request ${requestId} has already been released`);
    this.name = 'ResponseAlreadyReleasedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RequestorDisposedError extends Error {
  constructor() {
    super('HttpRequestor has been disposed');
    this.name = 'RequestorDisposedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
