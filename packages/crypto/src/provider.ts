import { webcrypto } from 'node:crypto';
import { KeyGenerationError } from '@suiconf/types';

/** Anything that can fill a byte array from a cryptographically secure source. */
export interface RandomSource {
  getRandomValues<T extends Uint8Array>(array: T): T;
}

let cachedSource: RandomSource | null = null;

export function getSecureRandom(): RandomSource {
  if (cachedSource) {
    return cachedSource;
  }

  if (typeof webcrypto?.getRandomValues !== 'function') {
    throw new KeyGenerationError(
      'EntropyUnavailable',
      'WebCrypto getRandomValues is not available in this environment'
    );
  }

  cachedSource = {
    getRandomValues: (array) => webcrypto.getRandomValues(array)
  };
  return cachedSource;
}
