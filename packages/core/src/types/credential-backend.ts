import type { Tracer } from './tracer.js';

export type CredentialLookupResult =
  | { success: true; credential: string }
  | { success: false; errorMessage: string };

/**
 * Supplies and tracks the token sent in the `Authorization` header.
 *
 * Implementations must tolerate concurrent calls from parallel attempts; the
 * requestor adds no locking of its own.
 */
export interface CredentialBackend {
  /** No token is attempted while anonymous. */
  readonly isAnonymous: boolean;
  /**
   * True when the backend renewed the token recently and will not renew it
   * again for a while.
   */
  readonly isBackingOff: boolean;

  tryGetCredentials(tracer: Tracer): Promise<CredentialLookupResult>;

  /**
   * Called after a 200 response. `credential` is undefined for anonymous
   * requests.
   */
  confirmCredentialsWorked(credential: string | undefined): void | Promise<void>;

  /** Called when the server rejected `credential` (401, 400 or a redirect). */
  revoke(credential: string | undefined): void | Promise<void>;
}
