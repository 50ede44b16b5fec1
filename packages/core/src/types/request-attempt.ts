import type { Readable } from 'node:stream';
import type { HttpRequestorError } from '../errors/http-requestor-error.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface SendRequestOptions {
  /** Id from `HttpRequestor.getNewRequestId()`, used to correlate telemetry. */
  requestId: number;
  uri: string | URL;
  method: HttpMethod;
  /** Serialised as UTF-8 JSON when present. */
  body?: unknown;
  /**
   * Cancels the slot wait and the wait for response headers. Firing it makes
   * `sendRequest` reject with a `RequestCancelledError`.
   */
  signal?: AbortSignal;
  /** Value for the `Accept` header, e.g. `application/x-git-packfile`. */
  accept?: string;
}

export interface SuccessfulRequestAttempt {
  succeeded: true;
  statusCode: 200;
  shouldRetry: false;
  /** `Content-Type` response header, empty when the server sent none. */
  contentType: string;
  /** The response body, read lazily from the connection. */
  stream: Readable;
  /**
   * Destroys `stream`, disposes the response and returns the connection slot.
   * Must be called exactly once; a second call throws
   * `ResponseAlreadyReleasedError`.
   */
  release(): void;
}

export interface FailedRequestAttempt {
  succeeded: false;
  statusCode: number;
  shouldRetry: boolean;
  error: HttpRequestorError;
}

export type RequestAttemptResult =
  | SuccessfulRequestAttempt
  | FailedRequestAttempt;
