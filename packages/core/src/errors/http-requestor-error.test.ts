import {
  HttpRequestorError,
  RequestCancelledError,
  RequestorDisposedError,
  ResponseAlreadyReleasedError,
} from './http-requestor-error.js';

describe('HttpRequestorError', () => {
  it('carries the kind, status and transport refinement', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = new HttpRequestorError(
      'transport-failure',
      500,
      'fetch failed',
      { transportFailureKind: 'connection-refused', cause },
    );

    expect(error).toBeInstanceOf(HttpRequestorError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('HttpRequestorError');
    expect(error.kind).toBe('transport-failure');
    expect(error.statusCode).toBe(500);
    expect(error.transportFailureKind).toBe('connection-refused');
    expect(error.cause).toBe(cause);
  });
});

describe('RequestCancelledError', () => {
  it('is named like a DOM abort', () => {
    const error = new RequestCancelledError();

    expect(error).toBeInstanceOf(RequestCancelledError);
    expect(error.name).toBe('AbortError');
    expect(error.message).toBe('Aborted');
  });
});

describe('ResponseAlreadyReleasedError', () => {
  it('names the request', () => {
    expect(new ResponseAlreadyReleasedError(42).message).toBe(
      'Response for request 42 has already been released',
    );
  });
});

describe('RequestorDisposedError', () => {
  it('is its own error class', () => {
    const error = new RequestorDisposedError();

    expect(error).toBeInstanceOf(RequestorDisposedError);
    expect(error.name).toBe('RequestorDisposedError');
    expect(error.message).toBe('HttpRequestor has been disposed');
  });
});
