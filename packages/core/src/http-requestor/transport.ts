import type { ConnectionOptions } from 'node:tls';
import { Agent, type Dispatcher } from 'undici';
import type { ClientCertificate } from '../certificates/client-certificate.js';

export interface TransportOptions {
  /** When false, the server certificate is not checked at all. */
  sslVerify: boolean;
  /** Presented on every connection when set. */
  clientCertificate?: ClientCertificate;
  /** Connections per origin; matches the throttle capacity. */
  connections: number;
}

export const MINIMUM_TLS_VERSION = 'TLSv1.2';

export function buildConnectOptions(
  options: Omit<TransportOptions, 'connections'>,
): ConnectionOptions {
  const connect: ConnectionOptions = {
    minVersion: MINIMUM_TLS_VERSION,
    rejectUnauthorized: options.sslVerify,
  };

  if (options.clientCertificate) {
    connect.cert = options.clientCertificate.cert;
    connect.key = options.clientCertificate.key;
    connect.passphrase = options.clientCertificate.passphrase;
  }

  return connect;
}

export function createDispatcher(options: TransportOptions): Dispatcher {
  return new Agent({
    connections: options.connections,
    connect: buildConnectOptions(options),
  });
}
