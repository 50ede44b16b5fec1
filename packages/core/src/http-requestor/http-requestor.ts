import { performance } from 'node:perf_hooks';
import { Readable } from 'node:stream';
import {
  fetch,
  type Dispatcher,
  type RequestInit,
  type Response,
} from 'undici';
import { CertificateLoader } from '../certificates/certificate-loader.js';
import {
  createGitCertificatePasswordProvider,
  type CertificatePasswordProvider,
} from '../certificates/certificate-password.js';
import { DirectoryCertificateStore } from '../certificates/certificate-store.js';
import {
  parseTrustedCertificates,
  type ClientCertificate,
} from '../certificates/client-certificate.js';
import {
  classifyStatus,
  classifyTransportFailure,
  shouldRevokeCredential,
} from '../classification/response-classifier.js';
import {
  parseRequestorConfig,
  type RequestorConfig,
  type RequestorConfigInput,
} from '../config/requestor-config.js';
import {
  HttpRequestorError,
  RequestCancelledError,
  RequestorDisposedError,
  ResponseAlreadyReleasedError,
} from '../errors/http-requestor-error.js';
import { ConnectionThrottle } from '../throttle/connection-throttle.js';
import type { CredentialBackend } from '../types/credential-backend.js';
import type {
  FailedRequestAttempt,
  RequestAttemptResult,
  SendRequestOptions,
  SuccessfulRequestAttempt,
} from '../types/request-attempt.js';
import type { EventMetadata, Tracer } from '../types/tracer.js';
import { createDispatcher } from './transport.js';

export interface HttpRequestorOptions {
  config: RequestorConfigInput;
  credentials: CredentialBackend;
  tracer: Tracer;
  /** Defaults to the process-wide {@link ConnectionThrottle.shared} gate. */
  throttle?: ConnectionThrottle;
  /**
   * Consulted when `ssl.sslCertPasswordProtected` is set. Defaults to asking
   * `git credential fill`.
   */
  passwordProvider?: CertificatePasswordProvider;
  /**
   * Dispatcher used instead of the TLS agent built from `config.ssl`, e.g. an
   * undici `MockAgent`. The caller keeps ownership and closes it.
   */
  dispatcher?: Dispatcher;
}

/**
 * Aborts on the caller's signal or when the header timeout elapses,
 * whichever comes first.
 */
class AttemptSignal {
  private readonly controller = new AbortController();
  private readonly callerSignal: AbortSignal | undefined;
  private readonly onCallerAbort = () => this.controller.abort();
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(callerSignal: AbortSignal | undefined, timeoutMs: number) {
    this.callerSignal = callerSignal;
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, {
        once: true,
      });
    }
    this.timer = setTimeout(() => this.controller.abort(), timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Headers arrived; the body is no longer subject to the timeout. */
  stopTimer(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
  }

  dispose(): void {
    this.stopTimer();
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}

function formatMilliseconds(ms: number): string {
  return ms.toFixed(4);
}

let requestCount = 0;

/**
 * Sends single authenticated request attempts to the object server.
 *
 * Each attempt holds a slot of the shared {@link ConnectionThrottle} from
 * before the request is sent until the response is released. Failed attempts
 * release their slot before they are returned; successful ones hand the slot
 * to the caller together with the body stream.
 */
export class HttpRequestor {
  readonly config: RequestorConfig;
  readonly clientCertificate: ClientCertificate | undefined;
  private readonly credentials: CredentialBackend;
  private readonly tracer: Tracer;
  private readonly throttle: ConnectionThrottle;
  private readonly dispatcher: Dispatcher;
  private readonly isDispatcherManaged: boolean;
  private readonly certificateLoader: CertificateLoader;
  private readonly userAgent: string;
  private isDisposed = false;

  private constructor(
    options: HttpRequestorOptions,
    config: RequestorConfig,
    certificateLoader: CertificateLoader,
    clientCertificate: ClientCertificate | undefined,
  ) {
    this.config = config;
    this.credentials = options.credentials;
    this.tracer = options.tracer;
    this.throttle = options.throttle ?? ConnectionThrottle.shared();
    this.certificateLoader = certificateLoader;
    this.clientCertificate = clientCertificate;
    this.userAgent = `${config.userAgent.product}/${config.userAgent.version}`;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.isDispatcherManaged = false;
    } else {
      this.dispatcher = createDispatcher({
        sslVerify: config.ssl.sslVerify,
        clientCertificate,
        connections: this.throttle.capacity,
      });
      this.isDispatcherManaged = true;
    }
  }

  /**
   * Validate the configuration and load the client certificate, if one is
   * configured. A certificate that cannot be found or decrypted is logged and
   * the requestor connects without one.
   *
   * @throws {RequestorConfigError} when the configuration is invalid
   */
  static async create(options: HttpRequestorOptions): Promise<HttpRequestor> {
    const config = parseRequestorConfig(options.config);
    const trustedRoots = parseTrustedCertificates(config.trustedCertificates);
    const storePath = config.certificateStorePath;

    const certificateLoader = new CertificateLoader({
      tracer: options.tracer,
      trustedRoots,
      openStore: storePath
        ? () => DirectoryCertificateStore.open(storePath, { trustedRoots })
        : undefined,
    });

    let clientCertificate: ClientCertificate | undefined;
    const certificateId = config.ssl.sslCertificate;
    if (certificateId) {
      let password: string | undefined;
      if (config.ssl.sslCertPasswordProtected) {
        const provider =
          options.passwordProvider ??
          createGitCertificatePasswordProvider({ tracer: options.tracer });
        const lookup = await provider(certificateId);
        if (lookup.success) {
          password = lookup.password;
        }
      }

      clientCertificate = await certificateLoader.resolve(
        certificateId,
        password,
        config.ssl.sslVerify,
      );
    }

    return new HttpRequestor(
      options,
      config,
      certificateLoader,
      clientCertificate,
    );
  }

  /** Process-wide, monotonically increasing id for correlating telemetry. */
  static getNewRequestId(): number {
    requestCount += 1;
    return requestCount;
  }

  /**
   * Make one request attempt.
   *
   * Every outcome except cancellation is returned as a value; check
   * `shouldRetry` to decide whether to try again. On success the caller must
   * call `release()` once it is done with `stream`.
   *
   * @throws {RequestCancelledError} when `signal` fires before the result is
   * ready, including while an error body is read
   * @throws {RequestorDisposedError} after `dispose()`
   */
  async sendRequest(options: SendRequestOptions): Promise<RequestAttemptResult> {
    if (this.isDisposed) {
      throw new RequestorDisposedError();
    }

    const { requestId, method, body, signal, accept } = options;
    const uri = options.uri.toString();

    let credential: string | undefined;
    if (!this.credentials.isAnonymous) {
      const lookup = await this.credentials.tryGetCredentials(this.tracer);
      if (!lookup.success) {
        return {
          succeeded: false,
          statusCode: 401,
          shouldRetry: true,
          error: new HttpRequestorError(
            'authentication-unavailable',
            401,
            lookup.errorMessage,
          ),
        };
      }
      credential = lookup.credential;
    }

    // Without this header the server redirects failed auth to an interactive
    // sign-in page instead of answering 401.
    const headers: Record<string, string> = {
      'X-TFS-FedAuthRedirect': 'Suppress',
      'User-Agent': this.userAgent,
    };
    if (credential) {
      headers['Authorization'] = `Basic ${credential}`;
    }
    if (accept) {
      headers['Accept'] = accept;
    }

    let requestBody: string | undefined;
    if (body !== undefined) {
      requestBody = JSON.stringify(body);
      headers['Content-Type'] = 'application/json; charset=utf-8';
    }

    const metadata: EventMetadata = {
      RequestId: requestId,
      availableConnections: this.throttle.availableCount,
    };

    const connectionWaitStart = performance.now();
    await this.throttle.acquire(signal);
    const connectionWaitTime = performance.now() - connectionWaitStart;

    const attemptSignal = new AttemptSignal(signal, this.config.timeoutMs);
    let responseWaitTime = 0;
    let response: Response | undefined;
    let result: RequestAttemptResult | undefined;

    try {
      const responseWaitStart = performance.now();
      const outcome = await this.send(
        uri,
        {
          method,
          headers,
          body: requestBody,
          redirect: 'manual',
          signal: attemptSignal.signal,
          dispatcher: this.dispatcher,
        },
        signal,
      ).finally(() => {
        responseWaitTime = performance.now() - responseWaitStart;
        attemptSignal.stopTimer();
      });

      if ('failure' in outcome) {
        result = outcome.failure;
        return result;
      }
      response = outcome.response;

      metadata.CacheName = response.headers.get('X-Cache-Name') ?? '';
      metadata.StatusCode = response.status;

      if (response.status === 200) {
        const contentType = response.headers.get('Content-Type') ?? '';
        metadata.ContentType = contentType;

        await this.credentials.confirmCredentialsWorked(credential);
        result = this.createSuccessfulAttempt(
          requestId,
          response,
          contentType,
          attemptSignal,
        );
        return result;
      }

      result = await this.createServerFailure(
        response,
        credential,
        signal,
        uri,
      );
      return result;
    } finally {
      metadata.connectionWaitTimeMS = formatMilliseconds(connectionWaitTime);
      metadata.responseWaitTimeMS = formatMilliseconds(responseWaitTime);
      this.tracer.relatedEvent('Informational', 'NetworkResponse', metadata);

      // Only a successful attempt defers the release to its consumer; every
      // other exit, including unexpected errors, gives the slot back here.
      if (!result?.succeeded) {
        attemptSignal.dispose();
        this.discardBody(response);
        this.throttle.release();
      }
    }
  }

  /**
   * Close the owned connection pool and the certificate store. Safe to call
   * more than once.
   */
  async dispose(): Promise<void> {
    if (this.isDisposed) return;
    this.isDisposed = true;

    this.certificateLoader.close();
    if (this.isDispatcherManaged) {
      await this.dispatcher.close();
    }
  }

  private async send(
    uri: string,
    init: RequestInit,
    signal: AbortSignal | undefined,
  ): Promise<{ response: Response } | { failure: FailedRequestAttempt }> {
    try {
      return { response: await fetch(uri, init) };
    } catch (error) {
      return { failure: this.createTransportFailure(error, signal, uri) };
    }
  }

  private createSuccessfulAttempt(
    requestId: number,
    response: Response,
    contentType: string,
    attemptSignal: AttemptSignal,
  ): SuccessfulRequestAttempt {
    const stream = response.body
      ? Readable.fromWeb(response.body)
      : Readable.from([]);
    let isReleased = false;

    return {
      succeeded: true,
      statusCode: 200,
      shouldRetry: false,
      contentType,
      stream,
      release: () => {
        if (isReleased) {
          throw new ResponseAlreadyReleasedError(requestId);
        }
        isReleased = true;

        try {
          stream.destroy();
          attemptSignal.dispose();
        } finally {
          this.throttle.release();
        }
      },
    };
  }

  private async createServerFailure(
    response: Response,
    credential: string | undefined,
    signal: AbortSignal | undefined,
    uri: string,
  ): Promise<FailedRequestAttempt> {
    let serverMessage: string;
    try {
      serverMessage = await response.text();
    } catch (error) {
      return this.createTransportFailure(error, signal, uri);
    }
    const statusCode = response.status;

    // Revoke before reading isBackingOff: revoking is what moves the backend
    // into its backing-off state.
    if (shouldRevokeCredential(statusCode, this.credentials.isAnonymous)) {
      await this.credentials.revoke(credential);
    }

    const classification = classifyStatus(statusCode, serverMessage, {
      isAnonymous: this.credentials.isAnonymous,
      isBackingOff: this.credentials.isBackingOff,
    });

    return {
      succeeded: false,
      statusCode,
      shouldRetry: classification.shouldRetry,
      error: new HttpRequestorError(
        'server-error',
        statusCode,
        classification.message,
      ),
    };
  }

  private createTransportFailure(
    error: unknown,
    signal: AbortSignal | undefined,
    uri: string,
  ): FailedRequestAttempt {
    const classification = classifyTransportFailure(
      error,
      signal?.aborted ?? false,
      uri,
    );

    if (classification.cancelled) {
      throw new RequestCancelledError(`Request to ${uri} was cancelled`, {
        cause: error,
      });
    }

    return {
      succeeded: false,
      statusCode: classification.statusCode,
      shouldRetry: classification.shouldRetry,
      error: new HttpRequestorError(
        classification.kind,
        classification.statusCode,
        classification.message,
        {
          transportFailureKind: classification.transportFailureKind,
          cause: error,
        },
      ),
    };
  }

  private discardBody(response: Response | undefined): void {
    const body = response?.body;
    if (!response || !body || response.bodyUsed || body.locked) {
      return;
    }

    body.cancel().catch((error: unknown) => {
      this.tracer.relatedError('Failed to discard response body', {
        Exception: error,
      });
    });
  }
}
