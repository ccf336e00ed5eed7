import { ValidationError } from '@suiconf/types';
import {
  type ClientDocument,
  type ClientKey,
  type ConfigDocument,
  type Environment,
  type Group,
  type Identity,
  type IdentityScope,
  type KeyEntry,
  type PrimaryDocument,
  type Profile,
  describeScope
} from './model';

function notFound(message: string): ValidationError {
  return new ValidationError('NotFound', message);
}

export function findGroup(document: PrimaryDocument, name: string): Group {
  const group = document.groups.find((candidate) => candidate.name === name);
  if (!group) {
    throw notFound(`group '${name}' does not exist`);
  }
  return group;
}

export function findProfile(document: PrimaryDocument, groupName: string, name: string): Profile {
  const profile = findGroup(document, groupName).profiles.find((candidate) => candidate.name === name);
  if (!profile) {
    throw notFound(`profile '${name}' does not exist in group '${groupName}'`);
  }
  return profile;
}

/** Identities (primary) or keys (client) addressed by a scope. */
export function keysInScope(document: ConfigDocument, scope: IdentityScope): readonly KeyEntry[] {
  if (scope.kind === 'group') {
    if (document.kind !== 'primary') {
      throw notFound(`${describeScope(scope)} does not exist in a client config`);
    }
    return findGroup(document, scope.group).identities;
  }

  if (document.kind !== 'client') {
    throw notFound('a primary config has no document-level keystore; name a group');
  }
  return document.keys;
}

export function findIdentity(document: ConfigDocument, scope: IdentityScope, alias: string): KeyEntry {
  const entry = keysInScope(document, scope).find((candidate) => candidate.alias === alias);
  if (!entry) {
    throw notFound(`identity '${alias}' does not exist in ${describeScope(scope)}`);
  }
  return entry;
}

export function findEnvironment(document: ClientDocument, alias: string): Environment {
  const env = document.envs.find((candidate) => candidate.alias === alias);
  if (!env) {
    throw notFound(`environment '${alias}' does not exist`);
  }
  return env;
}

export function findKey(document: ClientDocument, alias: string): ClientKey {
  const key = document.keys.find((candidate) => candidate.alias === alias);
  if (!key) {
    throw notFound(`key '${alias}' does not exist`);
  }
  return key;
}

// ── Active selections ──────────────────────────────────────────────

export function activeGroup(document: PrimaryDocument): Group | undefined {
  return document.groups.find((group) => group.active);
}

export function activeProfile(group: Group): Profile | undefined {
  return group.profiles.find((profile) => profile.active);
}

export function activeIdentity(group: Group): Identity | undefined {
  return group.identities.find((identity) => identity.active);
}

export function activeEnvironment(document: ClientDocument): Environment | undefined {
  return document.envs.find((env) => env.active);
}

export function activeKey(document: ClientDocument): ClientKey | undefined {
  return document.keys.find((key) => key.active);
}
