import { readFile, stat } from 'node:fs/promises';
import type { X509Certificate } from 'node:crypto';
import type { Tracer } from '../types/tracer.js';
import { Lazy } from '../utils/lazy.js';
import type { CertificateStore } from './certificate-store.js';
import {
  isCertificateValid,
  parseClientCertificate,
  type ClientCertificate,
} from './client-certificate.js';

export interface CertificateLoaderOptions {
  tracer: Tracer;
  /**
   * Opens the certificate store on the first lookup that needs it; the
   * opened store is reused until `close()`. Without it only files are
   * considered.
   */
  openStore?: () => CertificateStore;
  /** Roots trusted in addition to Node's bundled CA list. */
  trustedRoots?: ReadonlyArray<X509Certificate>;
}

// Any stat failure (missing, looping symlink, over-long name, no access)
// means the identifier is not a readable file and is looked up by subject.
async function isFile(path: string): Promise<boolean> {
  return stat(path).then(
    (stats) => stats.isFile(),
    () => false,
  );
}

/**
 * Turns a configured certificate id into a usable client certificate.
 *
 * A failure to find or decrypt the certificate is logged and reported as
 * `undefined`; the requestor then connects without a client certificate.
 */
export class CertificateLoader {
  private readonly tracer: Tracer;
  private readonly store: Lazy<CertificateStore> | undefined;
  private readonly trustedRoots: ReadonlyArray<X509Certificate>;

  constructor(options: CertificateLoaderOptions) {
    this.tracer = options.tracer;
    this.trustedRoots = options.trustedRoots ?? [];
    this.store = options.openStore ? new Lazy(options.openStore) : undefined;
  }

  /**
   * @param certificateId   Path of a PEM file, or a subject name to look up
   *                        in the store.
   * @param password        Passphrase for an encrypted private key.
   * @param requireValid    Ignore certificates that are expired, not yet
   *                        valid, or not chained to a trusted root.
   */
  async resolve(
    certificateId: string,
    password: string | undefined,
    requireValid: boolean,
  ): Promise<ClientCertificate | undefined> {
    if (await isFile(certificateId)) {
      return this.loadFromFile(certificateId, password, requireValid);
    }

    if (this.store) {
      try {
        const found = this.store.value.findBySubjectName(
          certificateId,
          requireValid,
        );
        if (found) {
          return found;
        }
      } catch (error) {
        this.tracer.relatedError(
          'Error, while searching for certificate in store',
          { Exception: error, CertificateId: certificateId },
        );
        return undefined;
      }
    }

    this.tracer.relatedError(`Certificate ${certificateId} not found`, {
      CertificateId: certificateId,
    });
    return undefined;
  }

  /** Closes the store if it was ever opened. */
  close(): void {
    if (this.store?.isValueCreated) {
      this.store.value.close();
    }
  }

  private async loadFromFile(
    path: string,
    password: string | undefined,
    requireValid: boolean,
  ): Promise<ClientCertificate | undefined> {
    try {
      const pem = await readFile(path, 'utf8');
      const certificate = parseClientCertificate(pem, password);
      if (requireValid && !isCertificateValid(certificate, this.trustedRoots)) {
        return undefined;
      }
      return certificate;
    } catch (error) {
      this.tracer.relatedError('Error, while loading certificate from disk', {
        Exception: error,
        CertificateId: path,
      });
      return undefined;
    }
  }
}
