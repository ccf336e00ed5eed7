/**
 * Primary config encodings. JSON and TOML share one record layout and one
 * decoding path; only the text codec differs.
 *
 * @module primaryAdapter
 */

import { addressFromPublicKey, decodePublicKey } from '@suiconf/crypto';
import {
  type Group,
  type GroupRecord,
  GroupRecordSchema,
  type Identity,
  type IdentityRecord,
  IdentityRecordSchema,
  PRIMARY_SCHEMA_VERSIONS,
  PrimaryConfigFileSchema,
  type PrimaryDocument,
  type Profile,
  type ProfileRecord,
  ProfileRecordSchema
} from '@suiconf/data-model';
import { LoadError, type LoadResult, describeError } from '@suiconf/types';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { enforceActiveInvariant } from '../invariants';
import {
  type FormatAdapter,
  describeIssues,
  firstDuplicate,
  isRecord,
  malformed,
  splitExtras,
  stripBom,
  unserializable
} from './adapter';
import { findDuplicateJsonKey } from './jsonKeys';

const FILE_KEYS = Object.keys(PrimaryConfigFileSchema.shape);
const GROUP_KEYS = Object.keys(GroupRecordSchema.shape);
const PROFILE_KEYS = Object.keys(ProfileRecordSchema.shape);
const IDENTITY_KEYS = Object.keys(IdentityRecordSchema.shape);

const SUPPORTED_VERSIONS: readonly string[] = PRIMARY_SCHEMA_VERSIONS;

// ── Records → model ────────────────────────────────────────────────

function toProfile(record: ProfileRecord): Profile {
  return {
    name: record.name,
    rpcUrl: record.rpc_url,
    ...(record.graphql_url ? { graphqlUrl: record.graphql_url } : {}),
    ...(record.grpc_url ? { grpcUrl: record.grpc_url } : {}),
    active: record.active,
    extras: splitExtras(record, PROFILE_KEYS)
  };
}

function toIdentity(record: IdentityRecord): Identity {
  return {
    alias: record.alias,
    publicKey: record.public_key,
    curve: record.curve,
    address: record.address.toLowerCase(),
    active: record.active,
    extras: splitExtras(record, IDENTITY_KEYS)
  };
}

function toGroup(record: GroupRecord): Group {
  return {
    name: record.name,
    active: record.active,
    profiles: record.profiles.map(toProfile),
    identities: record.identities.map(toIdentity),
    extras: splitExtras(record, GROUP_KEYS)
  };
}

/** First structural problem the schema cannot express, or null. */
function groupProblem(group: GroupRecord): string | null {
  const profile = firstDuplicate(group.profiles.map((entry) => entry.name));
  if (profile !== null) {
    return `duplicate profile name '${profile}' in group '${group.name}'`;
  }

  const alias = firstDuplicate(group.identities.map((entry) => entry.alias));
  if (alias !== null) {
    return `duplicate identity alias '${alias}' in group '${group.name}'`;
  }

  for (const identity of group.identities) {
    const where = `identity '${identity.alias}' in group '${group.name}'`;
    const decoded = decodePublicKey(identity.public_key);
    if (!decoded) {
      return `${where} has an invalid public key`;
    }
    if (decoded.curve !== identity.curve) {
      return `${where} is declared ${identity.curve} but its public key is ${decoded.curve}`;
    }
    const derived = addressFromPublicKey(decoded.curve, decoded.publicKey);
    if (derived !== identity.address.toLowerCase()) {
      return `${where} has address ${identity.address} but its public key derives ${derived}`;
    }
  }
  return null;
}

/** Validates a decoded primary config value and builds the canonical document. */
export function decodePrimary(value: unknown): LoadResult<PrimaryDocument> {
  if (isRecord(value) && typeof value.version === 'string' && !SUPPORTED_VERSIONS.includes(value.version)) {
    return {
      ok: false,
      error: new LoadError(
        'UnsupportedVersion',
        `config version '${value.version}' is not supported (supported: ${SUPPORTED_VERSIONS.join(', ')})`
      )
    };
  }

  const parsed = PrimaryConfigFileSchema.safeParse(value);
  if (!parsed.success) {
    return malformed(describeIssues(parsed.error), parsed.error);
  }

  const file = parsed.data;
  const group = firstDuplicate(file.groups.map((entry) => entry.name));
  if (group !== null) {
    return malformed(`duplicate group name '${group}'`);
  }

  for (const record of file.groups) {
    const problem = groupProblem(record);
    if (problem) {
      return malformed(problem);
    }
  }

  return {
    ok: true,
    document: enforceActiveInvariant<PrimaryDocument>({
      kind: 'primary',
      ...(file.version ? { version: file.version } : {}),
      groups: file.groups.map(toGroup),
      extras: splitExtras(file, FILE_KEYS)
    })
  };
}

// ── Model → records ────────────────────────────────────────────────

function profileRecord(profile: Profile): Record<string, unknown> {
  return {
    name: profile.name,
    active: profile.active,
    rpc_url: profile.rpcUrl,
    ...(profile.graphqlUrl ? { graphql_url: profile.graphqlUrl } : {}),
    ...(profile.grpcUrl ? { grpc_url: profile.grpcUrl } : {}),
    ...profile.extras
  };
}

function identityRecord(identity: Identity): Record<string, unknown> {
  return {
    alias: identity.alias,
    active: identity.active,
    public_key: identity.publicKey,
    curve: identity.curve,
    address: identity.address,
    ...identity.extras
  };
}

/** On-disk record layout shared by both primary encodings. */
export function encodePrimary(document: PrimaryDocument): Record<string, unknown> {
  return {
    ...(document.version ? { version: document.version } : {}),
    groups: document.groups.map((group) => ({
      name: group.name,
      active: group.active,
      profiles: group.profiles.map(profileRecord),
      identities: group.identities.map(identityRecord),
      ...group.extras
    })),
    ...document.extras
  };
}

// ── Codecs ─────────────────────────────────────────────────────────

/** Dotted path of the first null in `value`, or null when there is none. */
function findNull(value: unknown, path: readonly (string | number)[]): string | null {
  if (value === null) {
    return path.join('.');
  }
  const entries: [string | number, unknown][] = Array.isArray(value)
    ? value.map((item, index): [number, unknown] => [index, item])
    : isRecord(value)
      ? Object.entries(value)
      : [];
  for (const [key, item] of entries) {
    const found = findNull(item, [...path, key]);
    if (found !== null) {
      return found;
    }
  }
  return null;
}

export const primaryJsonAdapter: FormatAdapter<PrimaryDocument> = {
  format: 'primary-json',
  kind: 'primary',

  parse(source) {
    const text = stripBom(source);
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      return malformed(`invalid JSON: ${describeError(error)}`, error);
    }

    const duplicate = findDuplicateJsonKey(text);
    if (duplicate !== null) {
      return malformed(`duplicate key '${duplicate}'`);
    }
    return decodePrimary(value);
  },

  serialize(document) {
    try {
      return `${JSON.stringify(encodePrimary(document), null, 2)}\n`;
    } catch (error) {
      throw unserializable('primary-json', error);
    }
  }
};

export const primaryTomlAdapter: FormatAdapter<PrimaryDocument> = {
  format: 'primary-toml',
  kind: 'primary',

  parse(text) {
    let value: unknown;
    try {
      // integers past 2^53 in unknown keys load as bigint instead of failing
      value = parseToml(stripBom(text), { integersAsBigInt: 'asNeeded' });
    } catch (error) {
      // TOML errors carry a multi-line code excerpt after the first line
      return malformed(`invalid TOML: ${describeError(error).split('\n')[0]}`, error);
    }
    return decodePrimary(value);
  },

  serialize(document) {
    const record = encodePrimary(document);
    const nullAt = findNull(record, []);
    if (nullAt !== null) {
      throw unserializable('primary-toml', `'${nullAt}' is null and TOML has no null value`);
    }
    try {
      return stringifyToml(record);
    } catch (error) {
      throw unserializable('primary-toml', error);
    }
  }
};
