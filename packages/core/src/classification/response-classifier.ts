import { STATUS_CODES } from 'node:http';
import type {
  HttpRequestorErrorKind,
  TransportFailureKind,
} from '../errors/http-requestor-error.js';

export interface CredentialFlags {
  isAnonymous: boolean;
  isBackingOff: boolean;
}

export interface StatusClassification {
  shouldRetry: boolean;
  message: string;
  /** The credential was rejected and must be revoked with the backend. */
  revokeCredential: boolean;
}

export type TransportClassification =
  | { cancelled: true }
  | {
      cancelled: false;
      kind: Extract<
        HttpRequestorErrorKind,
        'timeout' | 'certificate-trust-rejected' | 'transport-failure'
      >;
      statusCode: number;
      shouldRetry: boolean;
      message: string;
      transportFailureKind?: TransportFailureKind;
    };

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// OpenSSL verification failures surfaced by Node's TLS socket.
const CERTIFICATE_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'CERT_SIGNATURE_FAILURE',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'HOSTNAME_MISMATCH',
]);

const TRANSPORT_FAILURE_KINDS: Record<string, TransportFailureKind> = {
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  ECONNREFUSED: 'connection-refused',
  ECONNRESET: 'connection-reset',
  EPIPE: 'connection-reset',
  UND_ERR_SOCKET: 'connection-reset',
};

export function isRetryableStatus(statusCode: number): boolean {
  return (
    statusCode === 408 ||
    statusCode === 401 ||
    (statusCode >= 500 && statusCode < 600)
  );
}

/**
 * A rejected credential, a bad request or a redirect to a sign-in page all
 * mean the current credential should be dropped. An anonymous backend has
 * nothing to revoke on a 401.
 */
export function shouldRevokeCredential(
  statusCode: number,
  isAnonymous: boolean,
): boolean {
  if (statusCode === 401) {
    return !isAnonymous;
  }
  return statusCode === 400 || REDIRECT_STATUSES.has(statusCode);
}

function describeStatus(statusCode: number): string {
  return `${statusCode} (${STATUS_CODES[statusCode] ?? 'Unknown'})`;
}

/**
 * Decide whether a non-200 response is worth retrying and build the message
 * reported to the user. The credential flags are passed in as observed at the
 * time of the response.
 */
export function classifyStatus(
  statusCode: number,
  serverMessage: string,
  flags: CredentialFlags,
): StatusClassification {
  const status = describeStatus(statusCode);

  if (statusCode === 401 && flags.isAnonymous) {
    return {
      shouldRetry: false,
      message: 'Anonymous request was rejected with a 401',
      revokeCredential: false,
    };
  }

  const shouldRetry = isRetryableStatus(statusCode);

  if (shouldRevokeCredential(statusCode, flags.isAnonymous)) {
    const message = flags.isBackingOff
      ? `Server returned error code ${status} after successfully renewing your PAT. You may not have access to this repo. Original error message from server: ${serverMessage}`
      : `Server returned error code ${status}. Your PAT may be expired and we are asking for a new one. Original error message from server: ${serverMessage}`;
    return { shouldRetry, message, revokeCredential: true };
  }

  return {
    shouldRetry,
    message: `Server returned error code ${status}. Original error message from server: ${serverMessage}`,
    revokeCredential: false,
  };
}

function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Error codes along the `cause` chain, outermost first. undici wraps socket
 * and TLS errors in a `TypeError('fetch failed')`.
 */
function collectErrorCodes(error: unknown): Array<string> {
  const codes: Array<string> = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    const code = errorCode(current);
    if (code) codes.push(code);
    current = current.cause;
  }

  return codes;
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

function isCertificateRejection(code: string): boolean {
  return (
    code.startsWith('ERR_TLS_') ||
    code.startsWith('ERR_SSL_') ||
    CERTIFICATE_ERROR_CODES.has(code)
  );
}

/**
 * Classify an error thrown before any status code was received.
 *
 * Only an abort the caller asked for counts as cancellation; any other abort
 * means the configured timeout elapsed.
 */
export function classifyTransportFailure(
  error: unknown,
  cancellationRequested: boolean,
  requestUri: string,
): TransportClassification {
  if (cancellationRequested) {
    return { cancelled: true };
  }

  if (isAbortError(error)) {
    return {
      cancelled: false,
      kind: 'timeout',
      statusCode: 408,
      shouldRetry: true,
      message: `Request to ${requestUri} timed out`,
    };
  }

  const codes = collectErrorCodes(error);
  const message = error instanceof Error ? error.message : String(error);

  if (codes.some(isCertificateRejection)) {
    return {
      cancelled: false,
      kind: 'certificate-trust-rejected',
      statusCode: 401,
      shouldRetry: false,
      message,
    };
  }

  const refined = codes
    .map((code) => TRANSPORT_FAILURE_KINDS[code])
    .find((kind) => kind !== undefined);

  return {
    cancelled: false,
    kind: 'transport-failure',
    statusCode: 500,
    shouldRetry: true,
    message,
    transportFailureKind: refined ?? 'unknown',
  };
}
