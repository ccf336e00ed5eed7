/**
 * Mutation engine: validated edits over the canonical model.
 *
 * Every command is checked in full before a new document is built; since
 * documents are immutable, a rejected command leaves the caller holding the
 * exact document it passed in. Successful results always pass through
 * `enforceActiveInvariant`, so no command has to remember to fix up active
 * flags on its own.
 *
 * @module mutations
 */

import { type KeyMaterial, type KeyMaterialGenerator, createKeyMaterialGenerator } from '@suiconf/crypto';
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
} from '@suiconf/data-model';
import { KeyGenerationError, ValidationError, type ValidationErrorCode } from '@suiconf/types';
import type { EnvironmentField, MutationCommand, MutationCommandType, ProfileField } from './commands';
import { activateAt, enforceActiveInvariant } from './invariants';
import { type UrlKind, checkAlias, checkName, checkUrl } from './validation';

// ── Result types ───────────────────────────────────────────────────

export interface AppliedChange {
  readonly command: MutationCommandType | 'none';
  readonly description: string;
}

export type MutationError = ValidationError | KeyGenerationError;

export type MutationResult =
  | { readonly ok: true; readonly document: ConfigDocument; readonly change: AppliedChange }
  | { readonly ok: false; readonly document: ConfigDocument; readonly error: MutationError };

interface Step {
  readonly document: ConfigDocument;
  readonly description: string;
}

// ── Guards ─────────────────────────────────────────────────────────

function reject(code: ValidationErrorCode, message: string): never {
  throw new ValidationError(code, message);
}

function ensure(error: ValidationError | null): void {
  if (error) {
    throw error;
  }
}

function requirePrimary(document: ConfigDocument, command: MutationCommandType): PrimaryDocument {
  if (document.kind !== 'primary') {
    reject('WrongDocumentKind', `'${command}' applies to primary configs only`);
  }
  return document;
}

function requireClient(document: ConfigDocument, command: MutationCommandType): ClientDocument {
  if (document.kind !== 'client') {
    reject('WrongDocumentKind', `'${command}' applies to client configs only`);
  }
  return document;
}

function indexWhere<T>(items: readonly T[], label: string, match: (item: T) => boolean): number {
  const index = items.findIndex(match);
  if (index < 0) {
    reject('NotFound', `${label} does not exist`);
  }
  return index;
}

function ensureUnique<T>(items: readonly T[], label: string, match: (item: T) => boolean): void {
  if (items.some(match)) {
    reject('DuplicateName', `${label} already exists`);
  }
}

function ensureRemovable(items: readonly unknown[], message: string): void {
  if (items.length <= 1) {
    reject('WouldEmptyRequiredCollection', message);
  }
}

function replaceAt<T>(items: readonly T[], index: number, item: T): T[] {
  return items.map((current, position) => (position === index ? item : current));
}

function removeAt<T>(items: readonly T[], index: number): T[] {
  return items.filter((_, position) => position !== index);
}

function appendMaybeActive<T extends { readonly active: boolean }>(
  items: readonly T[],
  item: T,
  active: boolean | undefined
): T[] {
  const next = [...items, item];
  return active ? activateAt(next, next.length - 1) : next;
}

// ── Groups ─────────────────────────────────────────────────────────

function groupIndex(document: PrimaryDocument, name: string): number {
  return indexWhere(document.groups, `group '${name}'`, (group) => group.name === name);
}

function withGroups(document: PrimaryDocument, groups: readonly Group[]): PrimaryDocument {
  return { ...document, groups };
}

function addGroup(document: PrimaryDocument, name: string, active: boolean | undefined): Step {
  ensure(checkName(name, 'group'));
  ensureUnique(document.groups, `group '${name}'`, (group) => group.name === name);

  const group: Group = { name, active: false, profiles: [], identities: [], extras: {} };
  return {
    document: withGroups(document, appendMaybeActive(document.groups, group, active)),
    description: `Added group '${name}'`
  };
}

function renameGroup(document: PrimaryDocument, from: string, to: string): Step {
  const index = groupIndex(document, from);
  if (from === to) {
    return { document, description: `Group '${from}' unchanged` };
  }
  ensure(checkName(to, 'group'));
  ensureUnique(document.groups, `group '${to}'`, (group) => group.name === to);

  const group = document.groups[index];
  return {
    document: withGroups(document, replaceAt(document.groups, index, { ...group, name: to })),
    description: `Renamed group '${from}' to '${to}'`
  };
}

function setGroupActive(document: PrimaryDocument, name: string): Step {
  const index = groupIndex(document, name);
  return {
    document: withGroups(document, activateAt(document.groups, index)),
    description: `Group '${name}' is now active`
  };
}

function deleteGroup(document: PrimaryDocument, name: string): Step {
  const index = groupIndex(document, name);
  ensureRemovable(document.groups, `cannot delete group '${name}': a config must keep at least one group`);

  const group = document.groups[index];
  return {
    document: withGroups(document, removeAt(document.groups, index)),
    description: `Deleted group '${name}' with ${group.profiles.length} profile(s) and ${group.identities.length} identity(ies)`
  };
}

function updateGroup(document: PrimaryDocument, index: number, patch: Partial<Pick<Group, 'profiles' | 'identities'>>): PrimaryDocument {
  return withGroups(document, replaceAt(document.groups, index, { ...document.groups[index], ...patch }));
}

// ── Profiles ───────────────────────────────────────────────────────

interface ProfileFields {
  readonly name: string;
  readonly rpcUrl: string;
  readonly graphqlUrl?: string;
  readonly grpcUrl?: string;
  readonly active: boolean;
  readonly extras: Profile['extras'];
}

function buildProfile(fields: ProfileFields): Profile {
  const { graphqlUrl, grpcUrl } = fields;
  return {
    name: fields.name,
    rpcUrl: fields.rpcUrl,
    ...(graphqlUrl ? { graphqlUrl } : {}),
    ...(grpcUrl ? { grpcUrl } : {}),
    active: fields.active,
    extras: fields.extras
  };
}

function checkOptionalUrl(value: string | undefined, kind: UrlKind): void {
  if (value !== undefined && value !== '') {
    ensure(checkUrl(value, kind));
  }
}

function profileIndex(group: Group, name: string): number {
  return indexWhere(group.profiles, `profile '${name}' in group '${group.name}'`, (profile) => profile.name === name);
}

function addProfile(
  document: PrimaryDocument,
  command: Extract<MutationCommand, { type: 'add_profile' }>
): Step {
  const index = groupIndex(document, command.group);
  const group = document.groups[index];
  ensure(checkName(command.name, 'profile'));
  ensureUnique(
    group.profiles,
    `profile '${command.name}' in group '${group.name}'`,
    (profile) => profile.name === command.name
  );
  ensure(checkUrl(command.rpcUrl, 'rpc'));
  checkOptionalUrl(command.graphqlUrl, 'graphql');
  checkOptionalUrl(command.grpcUrl, 'grpc');

  const profile = buildProfile({
    name: command.name,
    rpcUrl: command.rpcUrl,
    graphqlUrl: command.graphqlUrl,
    grpcUrl: command.grpcUrl,
    active: false,
    extras: {}
  });
  return {
    document: updateGroup(document, index, {
      profiles: appendMaybeActive(group.profiles, profile, command.active)
    }),
    description: `Added profile '${command.name}' to group '${group.name}'`
  };
}

function editedProfile(group: Group, profile: Profile, field: ProfileField, value: string | null): Profile {
  switch (field) {
    case 'name': {
      if (value === null) {
        reject('InvalidName', 'profile name cannot be cleared');
      }
      if (value === profile.name) {
        return profile;
      }
      ensure(checkName(value, 'profile'));
      ensureUnique(group.profiles, `profile '${value}' in group '${group.name}'`, (other) => other.name === value);
      return { ...profile, name: value };
    }
    case 'rpc_url': {
      if (value === null) {
        reject('InvalidUrl', 'rpc url cannot be cleared');
      }
      ensure(checkUrl(value, 'rpc'));
      return { ...profile, rpcUrl: value };
    }
    case 'graphql_url': {
      const graphqlUrl = value ?? undefined;
      checkOptionalUrl(graphqlUrl, 'graphql');
      return buildProfile({ ...profile, graphqlUrl });
    }
    case 'grpc_url': {
      const grpcUrl = value ?? undefined;
      checkOptionalUrl(grpcUrl, 'grpc');
      return buildProfile({ ...profile, grpcUrl });
    }
  }
}

function editProfileField(
  document: PrimaryDocument,
  command: Extract<MutationCommand, { type: 'edit_profile_field' }>
): Step {
  const index = groupIndex(document, command.group);
  const group = document.groups[index];
  const position = profileIndex(group, command.name);
  const profile = editedProfile(group, group.profiles[position], command.field, command.value);

  const shown = command.value === null || command.value === '' ? 'cleared' : `set to '${command.value}'`;
  return {
    document: updateGroup(document, index, { profiles: replaceAt(group.profiles, position, profile) }),
    description: `Profile '${command.name}' ${command.field} ${shown}`
  };
}

function setProfileActive(document: PrimaryDocument, groupName: string, name: string): Step {
  const index = groupIndex(document, groupName);
  const group = document.groups[index];
  const position = profileIndex(group, name);
  return {
    document: updateGroup(document, index, { profiles: activateAt(group.profiles, position) }),
    description: `Profile '${name}' is now active in group '${groupName}'`
  };
}

function deleteProfile(document: PrimaryDocument, groupName: string, name: string): Step {
  const index = groupIndex(document, groupName);
  const group = document.groups[index];
  const position = profileIndex(group, name);
  ensureRemovable(
    group.profiles,
    `cannot delete profile '${name}': group '${groupName}' must keep at least one profile`
  );
  return {
    document: updateGroup(document, index, { profiles: removeAt(group.profiles, position) }),
    description: `Deleted profile '${name}' from group '${groupName}'`
  };
}

// ── Identities / keys ──────────────────────────────────────────────

interface KeyCollection<T extends KeyEntry> {
  readonly entries: readonly T[];
  readonly label: string;
  /** Whether the scope must keep at least one entry. */
  readonly required: boolean;
  create(alias: string, generated: KeyMaterial): T;
  replace(entries: readonly T[]): ConfigDocument;
}

interface KeyOperation {
  run<T extends KeyEntry>(collection: KeyCollection<T>): Step;
}

function withKeys(document: ConfigDocument, scope: IdentityScope, command: MutationCommandType, operation: KeyOperation): Step {
  const label = describeScope(scope);

  if (scope.kind === 'group') {
    const primary = requirePrimary(document, command);
    const index = groupIndex(primary, scope.group);
    const group = primary.groups[index];
    return operation.run<Identity>({
      entries: group.identities,
      label,
      required: true,
      create: (alias, generated) => ({
        alias,
        publicKey: generated.publicKeyBase64,
        curve: generated.curve,
        address: generated.address,
        active: false,
        extras: {}
      }),
      replace: (identities) => updateGroup(primary, index, { identities })
    });
  }

  const client = requireClient(document, command);
  return operation.run<ClientKey>({
    entries: client.keys,
    label,
    required: false,
    create: (alias, generated) => ({ alias, publicKey: generated.publicKeyBase64, active: false, extras: {} }),
    replace: (keys) => ({ ...client, keys })
  });
}

function keyIndex<T extends KeyEntry>(collection: KeyCollection<T>, alias: string): number {
  return indexWhere(collection.entries, `identity '${alias}' in ${collection.label}`, (entry) => entry.alias === alias);
}

function ensureFreeAlias<T extends KeyEntry>(collection: KeyCollection<T>, alias: string): void {
  ensure(checkAlias(alias));
  ensureUnique(collection.entries, `identity '${alias}' in ${collection.label}`, (entry) => entry.alias === alias);
}

// ── Client environments ────────────────────────────────────────────

function envIndex(document: ClientDocument, alias: string): number {
  return indexWhere(document.envs, `environment '${alias}'`, (env) => env.alias === alias);
}

function withEnvs(document: ClientDocument, envs: readonly Environment[]): ClientDocument {
  return { ...document, envs };
}

function addEnvironment(document: ClientDocument, alias: string, rpc: string, active: boolean | undefined): Step {
  ensure(checkName(alias, 'environment'));
  ensureUnique(document.envs, `environment '${alias}'`, (env) => env.alias === alias);
  ensure(checkUrl(rpc, 'rpc'));

  const env: Environment = { alias, rpc, active: false, extras: {} };
  return {
    document: withEnvs(document, appendMaybeActive(document.envs, env, active)),
    description: `Added environment '${alias}'`
  };
}

function editEnvironment(document: ClientDocument, alias: string, field: EnvironmentField, value: string): Step {
  const index = envIndex(document, alias);
  const env = document.envs[index];
  let next: Environment = env;

  if (field === 'alias' && value !== alias) {
    ensure(checkName(value, 'environment'));
    ensureUnique(document.envs, `environment '${value}'`, (other) => other.alias === value);
    next = { ...env, alias: value };
  } else if (field === 'rpc') {
    ensure(checkUrl(value, 'rpc'));
    next = { ...env, rpc: value };
  }

  return {
    document: withEnvs(document, replaceAt(document.envs, index, next)),
    description: `Environment '${alias}' ${field} set to '${value}'`
  };
}

function setEnvironmentActive(document: ClientDocument, alias: string): Step {
  const index = envIndex(document, alias);
  return {
    document: withEnvs(document, activateAt(document.envs, index)),
    description: `Environment '${alias}' is now active`
  };
}

function deleteEnvironment(document: ClientDocument, alias: string): Step {
  const index = envIndex(document, alias);
  ensureRemovable(document.envs, `cannot delete environment '${alias}': a client config must keep at least one environment`);
  return {
    document: withEnvs(document, removeAt(document.envs, index)),
    description: `Deleted environment '${alias}'`
  };
}

// ── Engine ─────────────────────────────────────────────────────────

export class MutationEngine {
  private readonly keys: KeyMaterialGenerator;

  constructor(keys: KeyMaterialGenerator = createKeyMaterialGenerator()) {
    this.keys = keys;
  }

  apply(document: ConfigDocument, command: MutationCommand): MutationResult {
    let step: Step;
    try {
      step = this.run(document, command);
    } catch (error) {
      if (error instanceof ValidationError || error instanceof KeyGenerationError) {
        return { ok: false, document, error };
      }
      throw error;
    }

    return {
      ok: true,
      document: enforceActiveInvariant(step.document),
      change: { command: command.type, description: step.description }
    };
  }

  private run(document: ConfigDocument, command: MutationCommand): Step {
    switch (command.type) {
      case 'add_group':
        return addGroup(requirePrimary(document, command.type), command.name, command.active);
      case 'rename_group':
        return renameGroup(requirePrimary(document, command.type), command.from, command.to);
      case 'set_group_active':
        return setGroupActive(requirePrimary(document, command.type), command.name);
      case 'delete_group':
        return deleteGroup(requirePrimary(document, command.type), command.name);
      case 'add_profile':
        return addProfile(requirePrimary(document, command.type), command);
      case 'edit_profile_field':
        return editProfileField(requirePrimary(document, command.type), command);
      case 'set_profile_active':
        return setProfileActive(requirePrimary(document, command.type), command.group, command.name);
      case 'delete_profile':
        return deleteProfile(requirePrimary(document, command.type), command.group, command.name);
      case 'add_identity':
        return this.addIdentity(document, command);
      case 'edit_identity_alias':
        return this.renameIdentity(document, command);
      case 'set_identity_active': {
        const { alias } = command;
        return withKeys(document, command.scope, command.type, {
          run<T extends KeyEntry>(collection: KeyCollection<T>): Step {
            const index = keyIndex(collection, alias);
            return {
              document: collection.replace(activateAt(collection.entries, index)),
              description: `Identity '${alias}' is now active in ${collection.label}`
            };
          }
        });
      }
      case 'delete_identity': {
        const { alias } = command;
        return withKeys(document, command.scope, command.type, {
          run<T extends KeyEntry>(collection: KeyCollection<T>): Step {
            const index = keyIndex(collection, alias);
            if (collection.required) {
              ensureRemovable(
                collection.entries,
                `cannot delete identity '${alias}': ${collection.label} must keep at least one identity`
              );
            }
            return {
              document: collection.replace(removeAt(collection.entries, index)),
              description: `Deleted identity '${alias}' from ${collection.label}`
            };
          }
        });
      }
      case 'add_environment':
        return addEnvironment(requireClient(document, command.type), command.alias, command.rpc, command.active);
      case 'edit_environment':
        return editEnvironment(requireClient(document, command.type), command.alias, command.field, command.value);
      case 'set_environment_active':
        return setEnvironmentActive(requireClient(document, command.type), command.alias);
      case 'delete_environment':
        return deleteEnvironment(requireClient(document, command.type), command.alias);
      default: {
        const unknown: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private renameIdentity(
    document: ConfigDocument,
    command: Extract<MutationCommand, { type: 'edit_identity_alias' }>
  ): Step {
    const { from, to } = command;
    return withKeys(document, command.scope, command.type, {
      run<T extends KeyEntry>(collection: KeyCollection<T>): Step {
        const index = keyIndex(collection, from);
        if (from === to) {
          return { document, description: `Identity '${from}' unchanged` };
        }
        ensureFreeAlias(collection, to);
        const entry = collection.entries[index];
        return {
          document: collection.replace(replaceAt(collection.entries, index, { ...entry, alias: to })),
          description: `Renamed identity '${from}' to '${to}' in ${collection.label}`
        };
      }
    });
  }

  private addIdentity(document: ConfigDocument, command: Extract<MutationCommand, { type: 'add_identity' }>): Step {
    const keys = this.keys;
    const { alias, curve, active } = command;
    return withKeys(document, command.scope, command.type, {
      run<T extends KeyEntry>(collection: KeyCollection<T>): Step {
        ensureFreeAlias(collection, alias);
        const generated = keys.generate(curve);
        const entry = collection.create(alias, generated);
        return {
          document: collection.replace(appendMaybeActive(collection.entries, entry, active)),
          description: `Added ${generated.curve} identity '${alias}' (${generated.address}) to ${collection.label}`
        };
      }
    });
  }
}
