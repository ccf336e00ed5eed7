import { z } from 'zod';

export const CURVES = ['ed25519', 'secp256k1', 'secp256r1'] as const;

export const CurveSchema = z.enum(CURVES);

export type Curve = z.infer<typeof CurveSchema>;

export function isCurve(value: unknown): value is Curve {
  return CurveSchema.safeParse(value).success;
}

export const DOCUMENT_FORMATS = ['primary-json', 'primary-toml', 'client-yaml'] as const;

/**
 * On-disk encoding of an open document. Primary configs come in JSON or
 * TOML; client configs are always YAML.
 */
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export const NETWORK_NAMES = ['devnet', 'testnet', 'mainnet', 'localnet'] as const;

export const NetworkNameSchema = z.enum(NETWORK_NAMES);

export type NetworkName = z.infer<typeof NetworkNameSchema>;

export * from './errors';
