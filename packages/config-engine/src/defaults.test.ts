import { describe, expect, it } from 'vitest';
import { activeViolations } from './invariants';
import { NETWORK_PRESETS, defaultClientDocument, defaultDocument, defaultPrimaryDocument } from './defaults';
import { fixedKeys } from './testDocuments';

describe('defaultPrimaryDocument', () => {
  it('seeds one active group, profile and identity on devnet', () => {
    const keys = fixedKeys(5);
    const expected = fixedKeys(5).generate('ed25519');
    const document = defaultPrimaryDocument({}, keys);

    expect(document).toEqual({
      kind: 'primary',
      version: '1.0.0',
      extras: {},
      groups: [
        {
          name: 'sui_config',
          active: true,
          extras: {},
          profiles: [{ name: 'devnet', rpcUrl: 'https://fullnode.devnet.sui.io:443', active: true, extras: {} }],
          identities: [
            {
              alias: 'primary',
              publicKey: expected.publicKeyBase64,
              curve: 'ed25519',
              address: expected.address,
              active: true,
              extras: {}
            }
          ]
        }
      ]
    });
    expect(activeViolations(document)).toEqual([]);
  });

  it('fills graphql and grpc urls from the chosen network', () => {
    const document = defaultPrimaryDocument({ network: 'testnet', graphql: true, grpc: true }, fixedKeys());

    expect(document.groups[0]?.profiles[0]).toEqual({
      name: 'testnet',
      rpcUrl: NETWORK_PRESETS.testnet.rpcUrl,
      graphqlUrl: 'https://sui-testnet.mystenlabs.com/graphql',
      grpcUrl: 'https://fullnode.testnet.sui.io:443',
      active: true,
      extras: {}
    });
  });

  it('uses the requested curve for the seeded identity', () => {
    const document = defaultPrimaryDocument({ curve: 'secp256k1' }, fixedKeys());

    expect(document.groups[0]?.identities[0]?.curve).toBe('secp256k1');
  });
});

describe('defaultClientDocument', () => {
  it('seeds one environment and one key', () => {
    const document = defaultClientDocument({ network: 'localnet' }, fixedKeys(6));

    expect(document.envs).toEqual([{ alias: 'localnet', rpc: 'http://127.0.0.1:9000', active: true, extras: {} }]);
    expect(document.keys).toEqual([
      { alias: 'primary', publicKey: fixedKeys(6).generate('ed25519').publicKeyBase64, active: true, extras: {} }
    ]);
  });
});

describe('defaultDocument', () => {
  it('picks the document kind from the format', () => {
    expect(defaultDocument('primary-toml', {}, fixedKeys()).kind).toBe('primary');
    expect(defaultDocument('client-yaml', {}, fixedKeys()).kind).toBe('client');
  });
});
