/**
 * Seed documents for "new config". A primary config starts with one group
 * holding one profile and one identity; a client config with one environment
 * and one key. Everything seeded is active.
 *
 * @module defaults
 */

import type { KeyMaterialGenerator } from '@suiconf/crypto';
import type { ClientDocument, ConfigDocument, PrimaryDocument, Profile } from '@suiconf/data-model';
import { CURRENT_PRIMARY_SCHEMA_VERSION } from '@suiconf/data-model';
import type { Curve, DocumentFormat, NetworkName } from '@suiconf/types';
import { kindOfFormat } from './adapters/formats';

export interface NetworkPreset {
  readonly rpcUrl: string;
  readonly graphqlUrl: string;
  readonly grpcUrl: string;
}

export const NETWORK_PRESETS: Readonly<Record<NetworkName, NetworkPreset>> = {
  devnet: {
    rpcUrl: 'https://fullnode.devnet.sui.io:443',
    graphqlUrl: 'https://sui-devnet.mystenlabs.com/graphql',
    grpcUrl: 'https://fullnode.devnet.sui.io:443'
  },
  testnet: {
    rpcUrl: 'https://fullnode.testnet.sui.io:443',
    graphqlUrl: 'https://sui-testnet.mystenlabs.com/graphql',
    grpcUrl: 'https://fullnode.testnet.sui.io:443'
  },
  mainnet: {
    rpcUrl: 'https://fullnode.mainnet.sui.io:443',
    graphqlUrl: 'https://sui-mainnet.mystenlabs.com/graphql',
    grpcUrl: 'https://fullnode.mainnet.sui.io:443'
  },
  localnet: {
    rpcUrl: 'http://127.0.0.1:9000',
    graphqlUrl: 'http://127.0.0.1:9125/graphql',
    grpcUrl: 'http://127.0.0.1:9000'
  }
};

export const DEFAULT_GROUP_NAME = 'sui_config';
export const DEFAULT_IDENTITY_ALIAS = 'primary';

export interface NewDocumentOptions {
  /** Endpoint preset for the seeded profile or environment. Defaults to devnet. */
  readonly network?: NetworkName;
  /** Fill the seeded profile's graphql_url from the preset. */
  readonly graphql?: boolean;
  /** Fill the seeded profile's grpc_url from the preset. */
  readonly grpc?: boolean;
  readonly curve?: Curve;
}

function seededProfile(network: NetworkName, options: NewDocumentOptions): Profile {
  const preset = NETWORK_PRESETS[network];
  return {
    name: network,
    rpcUrl: preset.rpcUrl,
    ...(options.graphql ? { graphqlUrl: preset.graphqlUrl } : {}),
    ...(options.grpc ? { grpcUrl: preset.grpcUrl } : {}),
    active: true,
    extras: {}
  };
}

/** Throws KeyGenerationError when the seeded key cannot be generated. */
export function defaultPrimaryDocument(options: NewDocumentOptions, keys: KeyMaterialGenerator): PrimaryDocument {
  const network = options.network ?? 'devnet';
  const material = keys.generate(options.curve ?? 'ed25519');

  return {
    kind: 'primary',
    version: CURRENT_PRIMARY_SCHEMA_VERSION,
    extras: {},
    groups: [
      {
        name: DEFAULT_GROUP_NAME,
        active: true,
        extras: {},
        profiles: [seededProfile(network, options)],
        identities: [
          {
            alias: DEFAULT_IDENTITY_ALIAS,
            publicKey: material.publicKeyBase64,
            curve: material.curve,
            address: material.address,
            active: true,
            extras: {}
          }
        ]
      }
    ]
  };
}

/** Throws KeyGenerationError when the seeded key cannot be generated. */
export function defaultClientDocument(options: NewDocumentOptions, keys: KeyMaterialGenerator): ClientDocument {
  const network = options.network ?? 'devnet';
  const material = keys.generate(options.curve ?? 'ed25519');

  return {
    kind: 'client',
    extras: {},
    envs: [{ alias: network, rpc: NETWORK_PRESETS[network].rpcUrl, active: true, extras: {} }],
    keys: [{ alias: DEFAULT_IDENTITY_ALIAS, publicKey: material.publicKeyBase64, active: true, extras: {} }]
  };
}

export function defaultDocument(
  format: DocumentFormat,
  options: NewDocumentOptions,
  keys: KeyMaterialGenerator
): ConfigDocument {
  return kindOfFormat(format) === 'client'
    ? defaultClientDocument(options, keys)
    : defaultPrimaryDocument(options, keys);
}
