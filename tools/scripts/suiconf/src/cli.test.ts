import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type KeyMaterialGenerator, createKeyMaterialGenerator } from '@suiconf/crypto';
import { runCli } from './cli';
import type { CliContext } from './commands/context';
import type { CommandOutcome } from './output';

function fixedKeys(): KeyMaterialGenerator {
  return createKeyMaterialGenerator({
    getRandomValues<T extends Uint8Array>(array: T): T {
      array.fill(5);
      return array;
    }
  });
}

let dir: string;
let context: CliContext;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'suiconf-cli-'));
  context = { config: { curve: 'ed25519', network: 'devnet' }, cwd: dir, keys: fixedKeys() };
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function texts(outcome: CommandOutcome): string[] {
  return outcome.lines.map((entry) => entry.text);
}

async function run(...argv: string[]): Promise<CommandOutcome> {
  return runCli(argv, context);
}

describe('suiconf new and show', () => {
  it('creates a primary config and lists it', async () => {
    const path = join(dir, 'PysuiConfig.json');
    const address = fixedKeys().generate('ed25519').address;

    const created = await run('new', 'PysuiConfig.json', '--graphql');
    expect(created).toEqual({
      exitCode: 0,
      lines: [{ tone: 'success', text: `created ${path} (primary-json)` }]
    });

    const shown = await run('show', 'PysuiConfig.json');
    expect(shown.exitCode).toBe(0);
    expect(texts(shown)).toEqual([
      `${path} (primary-json)`,
      '* group sui_config',
      '    * profile devnet https://fullnode.devnet.sui.io:443',
      `    * identity primary ${address}`
    ]);

    const written: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(written).toMatchObject({
      version: '1.0.0',
      groups: [{ profiles: [{ graphql_url: 'https://sui-devnet.mystenlabs.com/graphql' }] }]
    });
  });

  it('refuses to overwrite an existing file without --force', async () => {
    await run('new', 'PysuiConfig.toml');

    const again = await run('new', 'PysuiConfig.toml');
    expect(again.exitCode).toBe(1);
    expect(texts(again)).toEqual([`${join(dir, 'PysuiConfig.toml')} already exists; pass --force to replace it`]);

    expect((await run('new', 'PysuiConfig.toml', '--force')).exitCode).toBe(0);
  });

  it('rejects unknown extensions and networks as usage errors', async () => {
    const badPath = await run('new', 'config.ini');
    const badNetwork = await run('new', 'PysuiConfig.json', '--network', 'moonnet');

    expect(badPath.exitCode).toBe(2);
    expect(badPath.lines[0]).toEqual({
      tone: 'error',
      text: "new: 'config.ini' must end in .json, .toml, .yaml or .yml"
    });
    expect(badNetwork.exitCode).toBe(2);
    expect(badNetwork.lines[0]?.text).toBe(
      "new: unknown network 'moonnet'; expected one of: devnet, testnet, mainnet, localnet"
    );
  });
});

describe('suiconf edits', () => {
  it('applies a sequence of edits to a primary config', async () => {
    await run('new', 'PysuiConfig.json');
    const file = ['--file', 'PysuiConfig.json'];

    const added = await run('add-group', 'ops', '--active', ...file);
    expect(texts(added)).toEqual(["Added group 'ops'", `saved ${join(dir, 'PysuiConfig.json')}`]);

    const steps = [
      ['add-profile', 'mainnet', 'https://fullnode.mainnet.sui.io:443', '--group', 'ops'],
      ['add-identity', 'signer', '--group', 'ops', '--curve', 'secp256k1'],
      ['rename', 'group', 'ops', 'operations'],
      ['remove', 'group', 'sui_config']
    ];
    for (const step of steps) {
      const outcome = await run(...step, ...file);
      expect(outcome.exitCode).toBe(0);
    }

    const signer = fixedKeys().generate('secp256k1').address;
    expect(texts(await run('show', ...file)).slice(1)).toEqual([
      '* group operations',
      '    * profile mainnet https://fullnode.mainnet.sui.io:443',
      `    * identity signer ${signer}`
    ]);
  });

  it('moves the active flag with activate', async () => {
    await run('new', 'PysuiConfig.json');
    await run('add-profile', 'testnet', 'https://fullnode.testnet.sui.io:443', '--group', 'sui_config', '-f', 'PysuiConfig.json');

    const outcome = await run('activate', 'profile', 'testnet', '--group', 'sui_config', '-f', 'PysuiConfig.json');

    expect(texts(outcome)[0]).toBe("Profile 'testnet' is now active in group 'sui_config'");
    expect(texts(await run('show', 'PysuiConfig.json')).slice(2, 4)).toEqual([
      '      profile devnet https://fullnode.devnet.sui.io:443',
      '    * profile testnet https://fullnode.testnet.sui.io:443'
    ]);
  });

  it('uses SUICONF_FILE when no --file is given', async () => {
    await run('new', 'PysuiConfig.json');
    context = { ...context, config: { ...context.config, file: join(dir, 'PysuiConfig.json') } };

    expect((await run('add-group', 'ops')).exitCode).toBe(0);
  });

  it('reports engine errors with their code and keeps the file unchanged', async () => {
    await run('new', 'PysuiConfig.json');
    const path = join(dir, 'PysuiConfig.json');
    const before = await readFile(path, 'utf8');

    const duplicate = await run('add-group', 'sui_config', '-f', 'PysuiConfig.json');
    const lastGroup = await run('remove', 'group', 'sui_config', '-f', 'PysuiConfig.json');

    expect(duplicate).toEqual({
      exitCode: 1,
      lines: [{ tone: 'error', text: "[DuplicateName] group 'sui_config' already exists" }]
    });
    expect(texts(lastGroup)).toEqual([
      "[WouldEmptyRequiredCollection] cannot delete group 'sui_config': a config must keep at least one group"
    ]);
    expect(await readFile(path, 'utf8')).toBe(before);
  });

  it('edits client configs without groups', async () => {
    await run('new', 'client.yaml', '--network', 'localnet');
    const file = ['-f', 'client.yaml'];

    expect((await run('add-env', 'testnet', 'https://fullnode.testnet.sui.io:443', '--active', ...file)).exitCode).toBe(0);
    expect((await run('add-identity', 'hot_wallet', ...file)).exitCode).toBe(0);

    const withGroup = await run('add-identity', 'cold_wallet', '--group', 'sui_config', ...file);
    expect(withGroup.exitCode).toBe(2);
    expect(withGroup.lines[0]?.text).toBe('add-identity: --group applies to primary configs only');

    const shown = texts(await run('show', ...file));
    expect(shown.slice(1, 3)).toEqual(['  env localnet http://127.0.0.1:9000', '* env testnet https://fullnode.testnet.sui.io:443']);
    expect(shown.slice(3).map((text) => text.slice(0, text.lastIndexOf(' ')))).toEqual([
      '* key primary',
      '  key hot_wallet'
    ]);
  });
});

describe('suiconf keygen and usage', () => {
  it('prints key material for the requested curve', async () => {
    const material = fixedKeys().generate('secp256r1');

    expect(texts(await run('keygen', '--curve', 'secp256r1'))).toEqual([
      'curve: secp256r1',
      `public key: ${material.publicKeyBase64}`,
      `address: ${material.address}`
    ]);
  });

  it('reports unsupported curves', async () => {
    expect(await run('keygen', '--curve', 'bls12381')).toEqual({
      exitCode: 1,
      lines: [
        {
          tone: 'error',
          text: "[UnsupportedCurve] Unsupported curve 'bls12381'. Expected one of: ed25519, secp256k1, secp256r1"
        }
      ]
    });
  });

  it('prints usage for missing, unknown and malformed commands', async () => {
    expect((await run('--help')).exitCode).toBe(0);
    expect((await run()).lines[0]?.text).toBe('missing command');
    expect((await run('explode')).lines[0]?.text).toBe("unknown command 'explode'");
    expect((await run('show', '--verbose')).exitCode).toBe(2);
    expect((await run('add-group', 'ops')).lines[0]?.text).toBe(
      'add-group: no config file given; pass --file or set SUICONF_FILE'
    );
    expect((await run('add-group', '-f', 'x.json')).lines[0]?.text).toBe('add-group: expected <name>');
  });
});
