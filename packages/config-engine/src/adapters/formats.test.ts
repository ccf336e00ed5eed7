import { describe, expect, it } from 'vitest';
import { SaveError } from '@suiconf/types';
import { clientDocument, primaryDocument } from '../testDocuments';
import { formatForPath, kindOfFormat, parseConfig, serializeConfig } from './formats';

function saveErrorFrom(write: () => unknown): SaveError {
  try {
    write();
  } catch (error) {
    if (error instanceof SaveError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the write to fail');
}

describe('formatForPath', () => {
  it('maps extensions to formats', () => {
    expect(formatForPath('/tmp/PysuiConfig.json')).toBe('primary-json');
    expect(formatForPath('config.TOML')).toBe('primary-toml');
    expect(formatForPath('client.yaml')).toBe('client-yaml');
    expect(formatForPath('client.yml')).toBe('client-yaml');
    expect(formatForPath('notes.txt')).toBeNull();
    expect(formatForPath('Makefile')).toBeNull();
  });

  it('knows which document kind each format holds', () => {
    expect(kindOfFormat('primary-json')).toBe('primary');
    expect(kindOfFormat('primary-toml')).toBe('primary');
    expect(kindOfFormat('client-yaml')).toBe('client');
  });
});

describe('serializeConfig', () => {
  it('converts a primary document between encodings', () => {
    const document = primaryDocument();
    const viaToml = parseConfig(serializeConfig(document, 'primary-toml'), 'primary-toml');
    const viaJson = parseConfig(serializeConfig(document, 'primary-json'), 'primary-json');

    expect(viaToml).toEqual(viaJson);
    expect(viaToml).toEqual({ ok: true, document });
  });

  it('keeps entity-level unknown keys through a save and load cycle in both encodings', () => {
    const base = primaryDocument();
    const [first, second] = base.groups;
    const document = {
      ...base,
      groups: [
        { ...first, identities: first.identities.map((identity) => ({ ...identity, extras: { label: 'laptop' } })) },
        second
      ]
    };

    for (const format of ['primary-json', 'primary-toml'] as const) {
      const once = parseConfig(serializeConfig(document, format), format);
      expect(once).toEqual({ ok: true, document });
      if (once.ok) {
        expect(parseConfig(serializeConfig(once.document, format), format)).toEqual(once);
      }
    }
  });

  it('fails instead of dropping null values when converting JSON to TOML', () => {
    const base = primaryDocument();
    const [first, second] = base.groups;
    const [devnet, ...profiles] = first.profiles;
    const document = {
      ...base,
      groups: [{ ...first, profiles: [{ ...devnet, extras: { ws: null } }, ...profiles] }, second]
    };

    const loaded = parseConfig(serializeConfig(document, 'primary-json'), 'primary-json');
    expect(loaded).toEqual({ ok: true, document });
    if (!loaded.ok) {
      return;
    }

    const nested = saveErrorFrom(() => serializeConfig(loaded.document, 'primary-toml'));
    expect(nested.code).toBe('Unserializable');
    expect(nested.message).toBe(
      "document cannot be written as primary-toml: 'groups.0.profiles.0.ws' is null and TOML has no null value"
    );

    const inArray = saveErrorFrom(() => serializeConfig({ ...base, extras: { tags: ['ops', null] } }, 'primary-toml'));
    expect(inArray.message).toBe(
      "document cannot be written as primary-toml: 'tags.1' is null and TOML has no null value"
    );
  });

  it('refuses to write a document in the other kind of format', () => {
    expect(() => serializeConfig(clientDocument(), 'primary-json')).toThrow(SaveError);
    expect(() => serializeConfig(primaryDocument(), 'client-yaml')).toThrow(
      'a primary config cannot be written as client-yaml'
    );
  });
});
