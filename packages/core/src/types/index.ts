export type { EventLevel, EventMetadata, Tracer } from './tracer.js';
export type {
  CredentialBackend,
  CredentialLookupResult,
} from './credential-backend.js';
export type {
  HttpMethod,
  SendRequestOptions,
  SuccessfulRequestAttempt,
  FailedRequestAttempt,
  RequestAttemptResult,
} from './request-attempt.js';
