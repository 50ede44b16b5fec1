import { readFileSync, readdirSync } from 'node:fs';
import { extname, join } from 'node:path';
import type { X509Certificate } from 'node:crypto';
import {
  isCertificateValid,
  parseClientCertificate,
  type ClientCertificate,
} from './client-certificate.js';
import { parsePemBundle } from './pem.js';

/**
 * Read-only source of client certificates, searched when the configured
 * certificate is not a file on disk.
 */
export interface CertificateStore {
  /**
   * First certificate whose subject contains `subjectName`
   * (case-insensitive). With `validOnly`, certificates that fail
   * {@link isCertificateValid} are skipped.
   */
  findBySubjectName(
    subjectName: string,
    validOnly: boolean,
  ): ClientCertificate | undefined;

  close(): void;
}

const CERTIFICATE_EXTENSIONS = new Set(['.pem', '.crt', '.cer']);

export interface DirectoryCertificateStoreOptions {
  /** Roots trusted in addition to Node's bundled CA list. */
  trustedRoots?: ReadonlyArray<X509Certificate>;
}

/**
 * Certificate store backed by a directory of unencrypted PEM bundles. Files
 * are read once, when the store is opened; files without a private key are
 * skipped.
 */
export class DirectoryCertificateStore implements CertificateStore {
  private readonly entries: ReadonlyArray<ClientCertificate>;
  private readonly trustedRoots: ReadonlyArray<X509Certificate>;
  private isClosed = false;

  private constructor(
    entries: ReadonlyArray<ClientCertificate>,
    trustedRoots: ReadonlyArray<X509Certificate>,
  ) {
    this.entries = entries;
    this.trustedRoots = trustedRoots;
  }

  /**
   * Throws when the directory does not exist or a certificate file cannot be
   * parsed.
   */
  static open(
    directory: string,
    options: DirectoryCertificateStoreOptions = {},
  ): DirectoryCertificateStore {
    const files = readdirSync(directory, { withFileTypes: true })
      .filter(
        (entry) =>
          entry.isFile() &&
          CERTIFICATE_EXTENSIONS.has(extname(entry.name).toLowerCase()),
      )
      .map((entry) => entry.name)
      .sort();

    const entries: Array<ClientCertificate> = [];
    for (const name of files) {
      const pem = readFileSync(join(directory, name), 'utf8');
      if (!parsePemBundle(pem).privateKey) continue;
      entries.push(parseClientCertificate(pem));
    }

    return new DirectoryCertificateStore(entries, options.trustedRoots ?? []);
  }

  get size(): number {
    return this.entries.length;
  }

  findBySubjectName(
    subjectName: string,
    validOnly: boolean,
  ): ClientCertificate | undefined {
    if (this.isClosed) {
      throw new Error('Certificate store has been closed');
    }

    const needle = subjectName.toLowerCase();
    return this.entries.find(
      (entry) =>
        entry.certificate.subject.toLowerCase().includes(needle) &&
        (!validOnly || isCertificateValid(entry, this.trustedRoots)),
    );
  }

  close(): void {
    this.isClosed = true;
  }
}
