import { decodePublicKey } from '@suiconf/crypto';
import {
  type ClientDocument,
  type ClientKey,
  ClientConfigFileSchema,
  type Environment,
  type EnvironmentRecord,
  EnvironmentRecordSchema,
  type KeyRecord,
  KeyRecordSchema
} from '@suiconf/data-model';
import type { LoadResult } from '@suiconf/types';
import { parseDocument, stringify } from 'yaml';
import { enforceActiveInvariant } from '../invariants';
import { type FormatAdapter, describeIssues, firstDuplicate, malformed, splitExtras, unserializable } from './adapter';

const FILE_KEYS = Object.keys(ClientConfigFileSchema.shape);
const ENV_KEYS = Object.keys(EnvironmentRecordSchema.shape);
const KEY_KEYS = Object.keys(KeyRecordSchema.shape);

function toEnvironment(record: EnvironmentRecord): Environment {
  return { alias: record.alias, rpc: record.rpc, active: record.active, extras: splitExtras(record, ENV_KEYS) };
}

function toKey(record: KeyRecord): ClientKey {
  return {
    alias: record.alias,
    publicKey: record.public_key,
    active: record.active,
    extras: splitExtras(record, KEY_KEYS)
  };
}

export function decodeClient(value: unknown): LoadResult<ClientDocument> {
  const parsed = ClientConfigFileSchema.safeParse(value);
  if (!parsed.success) {
    return malformed(describeIssues(parsed.error), parsed.error);
  }

  const file = parsed.data;
  const env = firstDuplicate(file.envs.map((entry) => entry.alias));
  if (env !== null) {
    return malformed(`duplicate environment alias '${env}'`);
  }
  const key = firstDuplicate(file.keystore.map((entry) => entry.alias));
  if (key !== null) {
    return malformed(`duplicate key alias '${key}'`);
  }
  const undecodable = file.keystore.find((entry) => decodePublicKey(entry.public_key) === null);
  if (undecodable) {
    return malformed(`key '${undecodable.alias}' has an invalid public key`);
  }

  return {
    ok: true,
    document: enforceActiveInvariant<ClientDocument>({
      kind: 'client',
      envs: file.envs.map(toEnvironment),
      keys: file.keystore.map(toKey),
      extras: splitExtras(file, FILE_KEYS)
    })
  };
}

export function encodeClient(document: ClientDocument): Record<string, unknown> {
  return {
    envs: document.envs.map((env) => ({ alias: env.alias, rpc: env.rpc, active: env.active, ...env.extras })),
    keystore: document.keys.map((key) => ({
      alias: key.alias,
      public_key: key.publicKey,
      active: key.active,
      ...key.extras
    })),
    ...document.extras
  };
}

export const clientYamlAdapter: FormatAdapter<ClientDocument> = {
  format: 'client-yaml',
  kind: 'client',

  parse(text) {
    // duplicate mapping keys are reported as document errors
    const yaml = parseDocument(text, { uniqueKeys: true });
    const [first] = yaml.errors;
    if (first) {
      return malformed(`invalid YAML: ${first.message.split('\n')[0]}`, first);
    }
    const value: unknown = yaml.toJS();
    return decodeClient(value);
  },

  serialize(document) {
    try {
      return stringify(encodeClient(document));
    } catch (error) {
      throw unserializable('client-yaml', error);
    }
  }
};
