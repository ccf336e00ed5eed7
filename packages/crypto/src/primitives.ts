import { blake2b } from '@noble/hashes/blake2b.js';
import { KeyGenerationError, describeError } from '@suiconf/types';
import { getSecureRandom, type RandomSource } from './provider';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function randomBytes(length: number, source?: RandomSource): Uint8Array {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error('randomBytes length must be a positive integer.');
  }

  const provider = source ?? getSecureRandom();
  const buffer = new Uint8Array(length);
  try {
    provider.getRandomValues(buffer);
  } catch (error) {
    throw new KeyGenerationError(
      'EntropyUnavailable',
      `Secure random source could not be read: ${describeError(error)}`,
      { cause: error }
    );
  }
  return buffer;
}

export function blake2b256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 });
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((byte) => byte.toString(16).padStart(2, '0'))
    .join('');
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/** Strict standard-alphabet base64 decode; returns null for anything else. */
export function fromBase64(encoded: string): Uint8Array | null {
  if (encoded.length === 0 || !BASE64_PATTERN.test(encoded)) {
    return null;
  }
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}
