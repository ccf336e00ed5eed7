/**
 * Keypair generation and Sui address derivation.
 *
 * A Sui address is `0x` + hex(BLAKE2b-256(flag || publicKey)), where the flag
 * byte names the signature scheme. Stored key material uses the same
 * `flag || publicKey` bytes, base64 encoded.
 *
 * Secret keys are drawn from the secure random source, used once to compute
 * the public key, and wiped. Nothing here returns or retains them.
 *
 * @module keyMaterial
 */

import { ed25519 } from '@noble/curves/ed25519.js';
import { p256 } from '@noble/curves/p256.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { type Curve, CURVES, KeyGenerationError, isCurve } from '@suiconf/types';
import { blake2b256, bytesToHex, concatBytes, fromBase64, randomBytes, toBase64 } from './primitives';
import type { RandomSource } from './provider';

// ── Scheme constants ───────────────────────────────────────────────

export const SIGNATURE_SCHEME_FLAGS: Readonly<Record<Curve, number>> = {
  ed25519: 0x00,
  secp256k1: 0x01,
  secp256r1: 0x02
};

export const PUBLIC_KEY_LENGTHS: Readonly<Record<Curve, number>> = {
  ed25519: 32,
  secp256k1: 33,
  secp256r1: 33
};

const SECRET_KEY_LENGTH = 32;

// Weierstrass scalars outside [1, n) are re-drawn; n is within 2^-32 of 2^256
// for both curves, so more than a couple of draws means a broken source.
const MAX_SECRET_DRAWS = 8;

const PUBLIC_KEY_DERIVERS: Readonly<Record<Curve, (secret: Uint8Array) => Uint8Array>> = {
  ed25519: (secret) => ed25519.getPublicKey(secret),
  secp256k1: (secret) => secp256k1.getPublicKey(secret, true),
  secp256r1: (secret) => p256.getPublicKey(secret, true)
};

// ── Types ──────────────────────────────────────────────────────────

export interface KeyMaterial {
  readonly curve: Curve;
  readonly publicKey: Uint8Array;
  /** base64 of `flag || publicKey` */
  readonly publicKeyBase64: string;
  readonly address: string;
}

export interface DecodedPublicKey {
  readonly curve: Curve;
  readonly publicKey: Uint8Array;
}

export interface KeyMaterialGenerator {
  generate(curve: string): KeyMaterial;
}

// ── Address scheme ─────────────────────────────────────────────────

function flagged(curve: Curve, publicKey: Uint8Array): Uint8Array {
  return concatBytes(Uint8Array.of(SIGNATURE_SCHEME_FLAGS[curve]), publicKey);
}

export function addressFromPublicKey(curve: Curve, publicKey: Uint8Array): string {
  return `0x${bytesToHex(blake2b256(flagged(curve, publicKey)))}`;
}

function curveForFlag(flag: number): Curve | null {
  return CURVES.find((curve) => SIGNATURE_SCHEME_FLAGS[curve] === flag) ?? null;
}

/** Splits base64 `flag || publicKey` back into curve and raw key, or null if it is not one. */
export function decodePublicKey(publicKeyBase64: string): DecodedPublicKey | null {
  const bytes = fromBase64(publicKeyBase64);
  if (!bytes || bytes.length < 2) {
    return null;
  }

  const curve = curveForFlag(bytes[0] ?? -1);
  if (!curve) {
    return null;
  }

  const publicKey = bytes.slice(1);
  if (publicKey.length !== PUBLIC_KEY_LENGTHS[curve]) {
    return null;
  }

  return { curve, publicKey };
}

export function deriveAddress(publicKeyBase64: string): string | null {
  const decoded = decodePublicKey(publicKeyBase64);
  return decoded ? addressFromPublicKey(decoded.curve, decoded.publicKey) : null;
}

// ── Generation ─────────────────────────────────────────────────────

function derivePublicKey(curve: Curve, random: RandomSource | undefined): Uint8Array {
  const derive = PUBLIC_KEY_DERIVERS[curve];
  let rejection: unknown;

  for (let draw = 0; draw < MAX_SECRET_DRAWS; draw++) {
    const secret = randomBytes(SECRET_KEY_LENGTH, random);
    try {
      return derive(secret);
    } catch (error) {
      rejection = error;
    } finally {
      secret.fill(0);
    }
  }

  throw new KeyGenerationError(
    'EntropyUnavailable',
    `Random source produced no valid ${curve} secret in ${MAX_SECRET_DRAWS} draws`,
    { cause: rejection }
  );
}

export function createKeyMaterialGenerator(random?: RandomSource): KeyMaterialGenerator {
  return {
    generate(curve: string): KeyMaterial {
      if (!isCurve(curve)) {
        throw new KeyGenerationError(
          'UnsupportedCurve',
          `Unsupported curve '${curve}'. Expected one of: ${CURVES.join(', ')}`
        );
      }

      const publicKey = derivePublicKey(curve, random);
      return {
        curve,
        publicKey,
        publicKeyBase64: toBase64(flagged(curve, publicKey)),
        address: addressFromPublicKey(curve, publicKey)
      };
    }
  };
}

const defaultGenerator = createKeyMaterialGenerator();

export function generateKeyMaterial(curve: string): KeyMaterial {
  return defaultGenerator.generate(curve);
}
