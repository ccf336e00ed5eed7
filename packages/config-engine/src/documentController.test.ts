import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createKeyMaterialGenerator } from '@suiconf/crypto';
import { findGroup, type PrimaryDocument } from '@suiconf/data-model';
import { KeyGenerationError, NoDocumentOpenError } from '@suiconf/types';
import { primaryJsonAdapter } from './adapters/primaryAdapter';
import { DocumentController } from './documentController';
import { fixedKeys, primaryDocument } from './testDocuments';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'suiconf-controller-'));
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function controller(): DocumentController {
  return new DocumentController({ keys: fixedKeys(8) });
}

function primary(controllerUnderTest: DocumentController): PrimaryDocument {
  const document = controllerUnderTest.document;
  if (document?.kind !== 'primary') {
    throw new Error('expected a primary document');
  }
  return document;
}

async function writeConfig(name: string, text: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text, 'utf8');
  return path;
}

describe('DocumentController', () => {
  it('starts with no document open', async () => {
    const subject = controller();

    expect(subject.document).toBeNull();
    expect(subject.format).toBeNull();
    expect(subject.filePath).toBeNull();
    expect(subject.dirty).toBe(false);
    expect(() => subject.apply({ type: 'add_group', name: 'ops' })).toThrow(NoDocumentOpenError);
    expect(await subject.save()).toMatchObject({ ok: false, error: { code: 'NoDocument' } });
    expect(await subject.saveAs(join(dir, 'PysuiConfig.json'))).toMatchObject({
      ok: false,
      error: { code: 'NoDocument' }
    });
  });

  it('loads a file without a working random source', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = new DocumentController({
      keys: createKeyMaterialGenerator({
        getRandomValues() {
          throw new Error('no entropy device');
        }
      })
    });

    expect(await subject.load(path)).toEqual({ ok: true, document: primaryDocument() });
    expect(() => subject.newDocument('primary-json')).toThrow(KeyGenerationError);
    expect(subject.document).toEqual(primaryDocument());
  });

  it('opens a seeded primary document with no file', () => {
    const subject = controller();
    const document = subject.newDocument('primary-json');

    expect(subject.document).toBe(document);
    expect(document.kind).toBe('primary');
    expect(subject.format).toBe('primary-json');
    expect(subject.filePath).toBeNull();
    expect(subject.dirty).toBe(false);
  });

  it('refuses to save before a path is set', async () => {
    const subject = controller();
    subject.newDocument('primary-json');

    const result = await subject.save();

    expect(result).toMatchObject({ ok: false, error: { code: 'NoPathSet' } });
  });

  it('loads a file, tracks it and logs the outcome', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();

    const result = await subject.load(path);

    expect(result).toEqual({ ok: true, document: primaryDocument() });
    expect(subject.filePath).toBe(path);
    expect(subject.format).toBe('primary-json');
    expect(console.info).toHaveBeenCalledWith(`[suiconf:document] loaded ${path} (primary-json)`);
  });

  it('re-reads the file on every load', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();
    await subject.load(path);

    const changed = { ...primaryDocument(), extras: { note: 'edited elsewhere' } };
    await writeFile(path, primaryJsonAdapter.serialize(changed), 'utf8');
    await subject.load(path);

    expect(subject.document?.extras).toEqual({ note: 'edited elsewhere' });
  });

  it('keeps the open document when a load fails', async () => {
    const subject = controller();
    subject.newDocument('primary-json');
    const before = subject.document;

    const missing = await subject.load(join(dir, 'missing.json'));
    const unknown = await subject.load(join(dir, 'config.ini'));
    const broken = await subject.load(await writeConfig('broken.json', '{"groups": '));

    expect(missing).toMatchObject({ ok: false, error: { code: 'Io' } });
    expect(unknown).toMatchObject({ ok: false, error: { code: 'UnrecognizedFormat' } });
    expect(broken.ok).toBe(false);
    if (!broken.ok) {
      expect(broken.error.code).toBe('MalformedDocument');
      expect(broken.error.path).toBe(join(dir, 'broken.json'));
      expect(broken.error.message.startsWith(`${join(dir, 'broken.json')}: invalid JSON`)).toBe(true);
    }
    expect(subject.document).toBe(before);
    expect(console.warn).toHaveBeenCalledTimes(3);
  });

  it('marks edits dirty and clears the flag on save', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();
    await subject.load(path);

    subject.apply({ type: 'add_group', name: 'ops' });
    expect(subject.dirty).toBe(true);

    const saved = await subject.save();
    expect(saved).toEqual({ ok: true, path });
    expect(subject.dirty).toBe(false);

    const reloaded = primaryJsonAdapter.parse(await readFile(path, 'utf8'));
    expect(reloaded.ok && reloaded.document.groups.map((group) => group.name)).toEqual([
      'sui_config',
      'staging',
      'ops'
    ]);
  });

  it('keeps edits made while a save is in flight dirty', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();
    await subject.load(path);
    subject.apply({ type: 'add_group', name: 'ops' });

    const saving = subject.save();
    subject.apply({ type: 'add_group', name: 'qa_env' });

    expect(await saving).toEqual({ ok: true, path });
    expect(subject.dirty).toBe(true);
    const written = primaryJsonAdapter.parse(await readFile(path, 'utf8'));
    expect(written.ok && written.document.groups.map((group) => group.name)).toEqual(['sui_config', 'staging', 'ops']);
  });

  it('does not mark failed or no-op edits dirty', () => {
    const subject = controller();
    subject.newDocument('primary-json');

    subject.apply({ type: 'delete_group', name: 'ghost' });
    subject.apply({ type: 'rename_group', from: 'sui_config', to: 'sui_config' });

    expect(subject.dirty).toBe(false);
  });

  it('saves as a new path and leaves the original file untouched', async () => {
    const original = primaryJsonAdapter.serialize(primaryDocument());
    const path = await writeConfig('PysuiConfig.json', original);
    const subject = controller();
    await subject.load(path);
    subject.apply({ type: 'add_group', name: 'ops' });

    const copy = join(dir, 'copy.json');
    const result = await subject.saveAs(copy);

    expect(result).toEqual({ ok: true, path: copy });
    expect(subject.filePath).toBe(copy);
    expect(await readFile(path, 'utf8')).toBe(original);
    expect((await readdir(dir)).sort()).toEqual(['PysuiConfig.json', 'copy.json']);
  });

  it('converts a primary document to TOML through save-as', async () => {
    const subject = controller();
    subject.newDocument('primary-json');
    const before = subject.document;
    const target = join(dir, 'PysuiConfig.toml');

    await subject.saveAs(target);
    expect(subject.format).toBe('primary-toml');

    const reloaded = await controller().load(target);
    expect(reloaded).toEqual({ ok: true, document: before });
  });

  it('keeps the tracked path when save-as fails', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();
    await subject.load(path);

    const wrongKind = await subject.saveAs(join(dir, 'client.yaml'));
    const noDirectory = await subject.saveAs(join(dir, 'absent', 'PysuiConfig.json'));

    expect(wrongKind).toMatchObject({ ok: false, error: { code: 'IncompatibleFormat' } });
    expect(noDirectory).toMatchObject({ ok: false, error: { code: 'Io' } });
    expect(subject.filePath).toBe(path);
    expect(subject.format).toBe('primary-json');
  });

  it('creates client documents and refuses primary paths for them', async () => {
    const subject = controller();
    subject.newDocument('client-yaml', { network: 'testnet' });

    expect(subject.document?.kind).toBe('client');
    const refused = await subject.saveAs(join(dir, 'PysuiConfig.json'));
    expect(refused).toMatchObject({ ok: false, error: { code: 'IncompatibleFormat' } });

    const client = join(dir, 'client.yaml');
    expect(await subject.saveAs(client)).toEqual({ ok: true, path: client });
    expect(await readFile(client, 'utf8')).toContain('rpc: https://fullnode.testnet.sui.io:443');
  });

  it('resets the path and dirty flag on new', async () => {
    const path = await writeConfig('PysuiConfig.json', primaryJsonAdapter.serialize(primaryDocument()));
    const subject = controller();
    await subject.load(path);
    subject.apply({ type: 'add_group', name: 'ops' });

    const document = subject.newDocument('primary-toml', { graphql: true });

    expect(subject.document).toBe(document);
    expect(subject.filePath).toBeNull();
    expect(subject.format).toBe('primary-toml');
    expect(subject.dirty).toBe(false);
    expect(findGroup(primary(subject), 'sui_config').profiles[0]?.graphqlUrl).toBe(
      'https://sui-devnet.mystenlabs.com/graphql'
    );
  });
});
