export { HttpRequestor } from './http-requestor/http-requestor.js';
export type { HttpRequestorOptions } from './http-requestor/http-requestor.js';
export {
  buildConnectOptions,
  createDispatcher,
  MINIMUM_TLS_VERSION,
} from './http-requestor/transport.js';
export type { TransportOptions } from './http-requestor/transport.js';
export { ConnectionThrottle } from './throttle/connection-throttle.js';
export {
  classifyStatus,
  classifyTransportFailure,
  isRetryableStatus,
  shouldRevokeCredential,
} from './classification/response-classifier.js';
export type {
  CredentialFlags,
  StatusClassification,
  TransportClassification,
} from './classification/response-classifier.js';
export { CertificateLoader } from './certificates/certificate-loader.js';
export type { CertificateLoaderOptions } from './certificates/certificate-loader.js';
export { DirectoryCertificateStore } from './certificates/certificate-store.js';
export type {
  CertificateStore,
  DirectoryCertificateStoreOptions,
} from './certificates/certificate-store.js';
export {
  CertificateFormatError,
  isCertificateValid,
  parseClientCertificate,
  parseTrustedCertificates,
} from './certificates/client-certificate.js';
export type { ClientCertificate } from './certificates/client-certificate.js';
export {
  createGitCertificatePasswordProvider,
  createGitCommandRunner,
} from './certificates/certificate-password.js';
export type {
  CertificatePasswordProvider,
  GitCertificatePasswordProviderOptions,
  GitCommandResult,
  GitCommandRunner,
  GitCommandRunnerOptions,
  PasswordLookupResult,
} from './certificates/certificate-password.js';
export {
  parseRequestorConfig,
  RequestorConfigError,
  RequestorConfigSchema,
  SslSettingsSchema,
  UserAgentSchema,
} from './config/requestor-config.js';
export type {
  RequestorConfig,
  RequestorConfigInput,
  SslSettings,
  UserAgent,
} from './config/requestor-config.js';
export {
  HttpRequestorError,
  RequestCancelledError,
  RequestorDisposedError,
  ResponseAlreadyReleasedError,
} from './errors/http-requestor-error.js';
export type {
  HttpRequestorErrorKind,
  HttpRequestorErrorOptions,
  TransportFailureKind,
} from './errors/http-requestor-error.js';
export { ConsoleTracer } from './tracing/console-tracer.js';
export type { ConsoleTracerOptions } from './tracing/console-tracer.js';
export * from './types/index.js';
