const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----[\s\S]+?-----END \1-----/g;

const PRIVATE_KEY_LABELS = new Set([
  'PRIVATE KEY',
  'ENCRYPTED PRIVATE KEY',
  'RSA PRIVATE KEY',
  'EC PRIVATE KEY',
]);

export interface PemBundle {
  /** Leaf first, then any chain certificates, in file order. */
  certificates: Array<string>;
  privateKey?: string;
}

/**
 * Split a PEM file into its certificate blocks and (first) private key.
 * Unknown block types are ignored.
 */
export function parsePemBundle(text: string): PemBundle {
  const bundle: PemBundle = { certificates: [] };

  for (const match of text.matchAll(PEM_BLOCK)) {
    const [block, label] = match;
    if (label === 'CERTIFICATE') {
      bundle.certificates.push(block);
    } else if (label && PRIVATE_KEY_LABELS.has(label) && !bundle.privateKey) {
      bundle.privateKey = block;
    }
  }

  return bundle;
}
