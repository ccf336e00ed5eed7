/**
 * Read-only table projections for the presentation layer: one row per
 * Group, Profile or Identity, flattened to display strings.
 */

import { deriveAddress } from '@suiconf/crypto';
import type { ClientDocument, ConfigDocument, IdentityScope, PrimaryDocument } from './model';
import { findGroup, keysInScope } from './queries';

export interface GroupRow {
  readonly name: string;
  readonly active: boolean;
  readonly profileCount: number;
  readonly identityCount: number;
}

export interface ProfileRow {
  readonly name: string;
  readonly active: boolean;
  readonly url: string;
  readonly graphqlUrl: string | null;
  readonly grpcUrl: string | null;
}

export interface IdentityRow {
  readonly alias: string;
  readonly active: boolean;
  readonly publicKey: string;
  /** null when a client key's material cannot be decoded */
  readonly address: string | null;
}

export function groupRows(document: PrimaryDocument): GroupRow[] {
  return document.groups.map((group) => ({
    name: group.name,
    active: group.active,
    profileCount: group.profiles.length,
    identityCount: group.identities.length
  }));
}

export function profileRows(document: PrimaryDocument, groupName: string): ProfileRow[] {
  return findGroup(document, groupName).profiles.map((profile) => ({
    name: profile.name,
    active: profile.active,
    url: profile.rpcUrl,
    graphqlUrl: profile.graphqlUrl ?? null,
    grpcUrl: profile.grpcUrl ?? null
  }));
}

export function environmentRows(document: ClientDocument): ProfileRow[] {
  return document.envs.map((env) => ({
    name: env.alias,
    active: env.active,
    url: env.rpc,
    graphqlUrl: null,
    grpcUrl: null
  }));
}

export function identityRows(document: ConfigDocument, scope: IdentityScope): IdentityRow[] {
  return keysInScope(document, scope).map((entry) => ({
    alias: entry.alias,
    active: entry.active,
    publicKey: entry.publicKey,
    address: 'address' in entry ? entry.address : deriveAddress(entry.publicKey)
  }));
}
