import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Agent } from 'undici';
import { parseClientCertificate } from '../certificates/client-certificate.js';
import {
  buildConnectOptions,
  createDispatcher,
  MINIMUM_TLS_VERSION,
} from './transport.js';

const fixtures = fileURLToPath(
  new URL('../../fixtures/certificates/', import.meta.url),
);

describe('buildConnectOptions', () => {
  it('requires TLS 1.2 and verifies the server by default', () => {
    expect(buildConnectOptions({ sslVerify: true })).toEqual({
      minVersion: 'TLSv1.2',
      rejectUnauthorized: true,
    });
    expect(MINIMUM_TLS_VERSION).toBe('TLSv1.2');
  });

  it('turns off server verification when sslVerify is false', () => {
    expect(buildConnectOptions({ sslVerify: false }).rejectUnauthorized).toBe(
      false,
    );
  });

  it('presents the client certificate with its passphrase', () => {
    const clientCertificate = parseClientCertificate(
      readFileSync(`${fixtures}client-encrypted.pem`, 'utf8'),
      'test-secret',
    );

    const connect = buildConnectOptions({ sslVerify: true, clientCertificate });

    expect(connect.cert).toBe(clientCertificate.cert);
    expect(connect.key).toBe(clientCertificate.key);
    expect(connect.passphrase).toBe('test-secret');
  });
});

describe('createDispatcher', () => {
  it('builds an undici agent', async () => {
    const dispatcher = createDispatcher({ sslVerify: true, connections: 4 });

    expect(dispatcher).toBeInstanceOf(Agent);
    await dispatcher.close();
  });
});
