import {
  X509Certificate,
  createPrivateKey,
  type KeyObject,
} from 'node:crypto';
import { rootCertificates } from 'node:tls';
import { Lazy } from '../utils/lazy.js';
import { parsePemBundle } from './pem.js';

const MAX_CHAIN_DEPTH = 10;

export interface ClientCertificate {
  /** Parsed leaf certificate. */
  certificate: X509Certificate;
  /** Chain certificates that followed the leaf in the source file. */
  chain: Array<X509Certificate>;
  /** Leaf and chain as PEM, ready for `tls.connect({ cert })`. */
  cert: string;
  /** Private key as PEM, possibly encrypted with `passphrase`. */
  key: string;
  passphrase?: string;
}

/**
 * Raised for certificate content that cannot be used. Treated the same as a
 * decryption failure by the loader.
 */
export class CertificateFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CertificateFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const bundledRoots = new Lazy(() =>
  rootCertificates.map((pem) => new X509Certificate(pem)),
);

export function parseTrustedCertificates(
  pems: ReadonlyArray<string>,
): Array<X509Certificate> {
  return pems.flatMap((pem) =>
    parsePemBundle(pem).certificates.map((block) => new X509Certificate(block)),
  );
}

/**
 * Parse a PEM bundle holding a certificate and its private key. Throws when
 * the key cannot be decrypted or does not belong to the certificate.
 */
export function parseClientCertificate(
  pem: string,
  passphrase?: string,
): ClientCertificate {
  const bundle = parsePemBundle(pem);
  const [leafPem, ...chainPems] = bundle.certificates;

  if (!leafPem) {
    throw new CertificateFormatError('No certificate block found');
  }
  if (!bundle.privateKey) {
    throw new CertificateFormatError('No private key block found');
  }

  const certificate = new X509Certificate(leafPem);
  const keyObject: KeyObject = createPrivateKey({
    key: bundle.privateKey,
    format: 'pem',
    passphrase,
  });

  if (!certificate.checkPrivateKey(keyObject)) {
    throw new CertificateFormatError(
      'Private key does not match the certificate',
    );
  }

  return {
    certificate,
    chain: chainPems.map((block) => new X509Certificate(block)),
    cert: bundle.certificates.join('\n'),
    key: bundle.privateKey,
    passphrase,
  };
}

// X509Certificate pads single-digit days, e.g. "Jan  1 00:00:00 2020 GMT".
function parseCertificateDate(value: string): number {
  return Date.parse(value.replace(/\s+/g, ' '));
}

function isWithinValidityPeriod(
  certificate: X509Certificate,
  now: number,
): boolean {
  return (
    parseCertificateDate(certificate.validFrom) <= now &&
    now <= parseCertificateDate(certificate.validTo)
  );
}

function issuedBy(
  certificate: X509Certificate,
  issuer: X509Certificate,
): boolean {
  return certificate.checkIssued(issuer) && certificate.verify(issuer.publicKey);
}

/**
 * A certificate is valid when it and every certificate above it are inside
 * their validity period and the chain ends at a trusted root. Intermediates
 * come from the certificate's own file.
 */
export function isCertificateValid(
  clientCertificate: Pick<ClientCertificate, 'certificate' | 'chain'>,
  extraTrustedRoots: ReadonlyArray<X509Certificate> = [],
  now: number = Date.now(),
): boolean {
  const roots = [...extraTrustedRoots, ...bundledRoots.value];
  let current = clientCertificate.certificate;

  for (let depth = 0; depth < MAX_CHAIN_DEPTH; depth++) {
    if (!isWithinValidityPeriod(current, now)) {
      return false;
    }

    const root = roots.find((candidate) => issuedBy(current, candidate));
    if (root) {
      return isWithinValidityPeriod(root, now);
    }

    const next = clientCertificate.chain.find(
      (candidate) => candidate !== current && issuedBy(current, candidate),
    );
    if (!next) {
      return false;
    }
    current = next;
  }

  return false;
}
