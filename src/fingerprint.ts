import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { AppError, Logger, errorMessage } from './logger.js';
import { Fingerprint, FingerprintFn, HashAlgorithm } from './types.js';

const logger = new Logger({ context: 'fingerprint' });

export const SUPPORTED_ALGORITHMS: readonly HashAlgorithm[] = ['MD5', 'SHA-256'];

export const DEFAULT_ALGORITHM: HashAlgorithm = 'SHA-256';

const ALGORITHM_ALIASES: Record<string, HashAlgorithm> = {
  md5: 'MD5',
  '-md5': 'MD5',
  sha256: 'SHA-256',
  'sha-256': 'SHA-256',
  '-sha256': 'SHA-256',
};

const NODE_DIGEST_NAMES: Record<HashAlgorithm, string> = {
  MD5: 'md5',
  'SHA-256': 'sha256',
};

/**
 * Map a user-supplied algorithm name onto a supported algorithm
 */
export function normalizeAlgorithm(value: string): HashAlgorithm {
  const algorithm = ALGORITHM_ALIASES[value.trim().toLowerCase()];
  if (!algorithm) {
    throw new AppError(`Invalid hash algorithm: ${value}`, 'INVALID_ALGORITHM', 400, {
      supported: [...SUPPORTED_ALGORITHMS],
    });
  }
  return algorithm;
}

/**
 * Stream a file through the digest and return its upper-case hex form,
 * or null when the file cannot be read.
 */
export function fingerprintFile(path: string, algorithm: HashAlgorithm): Promise<Fingerprint | null> {
  return new Promise((resolve) => {
    const hash = createHash(NODE_DIGEST_NAMES[algorithm]);
    const stream = createReadStream(path);

    stream.on('error', (error) => {
      logger.warn(`Cannot fingerprint file: ${path}`, { error: errorMessage(error) });
      resolve(null);
    });
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex').toUpperCase()));
  });
}

export function createFingerprinter(algorithm: HashAlgorithm): FingerprintFn {
  return (path) => fingerprintFile(path, algorithm);
}
