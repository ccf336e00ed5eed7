/**
 * Documents and a deterministic key generator shared by the engine tests.
 * Key material is derived for real so fixtures survive address checks on load.
 */

import { type KeyMaterialGenerator, type RandomSource, createKeyMaterialGenerator } from '@suiconf/crypto';
import type { ClientDocument, Identity, PrimaryDocument } from '@suiconf/data-model';

export function repeatingSource(byte: number): RandomSource {
  return {
    getRandomValues<T extends Uint8Array>(array: T): T {
      array.fill(byte);
      return array;
    }
  };
}

export function fixedKeys(byte = 7): KeyMaterialGenerator {
  return createKeyMaterialGenerator(repeatingSource(byte));
}

function identity(alias: string, byte: number, active: boolean): Identity {
  const material = fixedKeys(byte).generate('ed25519');
  return {
    alias,
    publicKey: material.publicKeyBase64,
    curve: material.curve,
    address: material.address,
    active,
    extras: {}
  };
}

export function primaryDocument(): PrimaryDocument {
  return {
    kind: 'primary',
    version: '1.0.0',
    extras: {},
    groups: [
      {
        name: 'sui_config',
        active: true,
        extras: {},
        profiles: [
          {
            name: 'devnet',
            rpcUrl: 'https://fullnode.devnet.sui.io:443',
            graphqlUrl: 'https://sui-devnet.mystenlabs.com/graphql',
            active: true,
            extras: {}
          },
          { name: 'testnet', rpcUrl: 'https://fullnode.testnet.sui.io:443', active: false, extras: {} }
        ],
        identities: [identity('primary', 1, true), identity('backup', 2, false)]
      },
      {
        name: 'staging',
        active: false,
        extras: {},
        profiles: [{ name: 'localnet', rpcUrl: 'http://127.0.0.1:9000', active: true, extras: {} }],
        identities: [identity('builder', 3, true)]
      }
    ]
  };
}

export function clientDocument(): ClientDocument {
  const key = fixedKeys(4).generate('secp256k1');
  return {
    kind: 'client',
    extras: {},
    envs: [
      { alias: 'devnet', rpc: 'https://fullnode.devnet.sui.io:443', active: true, extras: {} },
      { alias: 'localnet', rpc: 'http://127.0.0.1:9000', active: false, extras: {} }
    ],
    keys: [{ alias: 'primary', publicKey: key.publicKeyBase64, active: true, extras: {} }]
  };
}
