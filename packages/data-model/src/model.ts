/**
 * Canonical configuration model.
 *
 * Both on-disk formats map onto this tagged union. Documents are immutable
 * values: Groups own their Profiles and Identities by value, so removing a
 * Group removes everything it owns in one structural step.
 *
 * `extras` holds keys found in the source file that the model does not
 * understand; adapters re-emit them unchanged.
 *
 * @module model
 */

import type { Curve } from '@suiconf/types';

export type Extras = Readonly<Record<string, unknown>>;

// ── Primary schema ─────────────────────────────────────────────────

export interface Profile {
  readonly name: string;
  readonly rpcUrl: string;
  readonly graphqlUrl?: string;
  readonly grpcUrl?: string;
  readonly active: boolean;
  readonly extras: Extras;
}

export interface Identity {
  readonly alias: string;
  /** base64 of `flag || publicKey` */
  readonly publicKey: string;
  readonly curve: Curve;
  readonly address: string;
  readonly active: boolean;
  readonly extras: Extras;
}

export interface Group {
  readonly name: string;
  readonly active: boolean;
  readonly profiles: readonly Profile[];
  readonly identities: readonly Identity[];
  readonly extras: Extras;
}

export interface PrimaryDocument {
  readonly kind: 'primary';
  readonly version?: string;
  readonly groups: readonly Group[];
  readonly extras: Extras;
}

// ── Client schema ──────────────────────────────────────────────────

export interface Environment {
  readonly alias: string;
  readonly rpc: string;
  readonly active: boolean;
  readonly extras: Extras;
}

export interface ClientKey {
  readonly alias: string;
  /** base64 of `flag || publicKey` */
  readonly publicKey: string;
  readonly active: boolean;
  readonly extras: Extras;
}

export interface ClientDocument {
  readonly kind: 'client';
  readonly envs: readonly Environment[];
  readonly keys: readonly ClientKey[];
  readonly extras: Extras;
}

export type ConfigDocument = PrimaryDocument | ClientDocument;

/** Key entries addressed by an identity scope: group identities or client keys. */
export type KeyEntry = Identity | ClientKey;

/**
 * Where identities live: inside a named Group of a primary document, or at
 * the top level of a client document.
 */
export type IdentityScope =
  | { readonly kind: 'group'; readonly group: string }
  | { readonly kind: 'document' };

export function groupScope(group: string): IdentityScope {
  return { kind: 'group', group };
}

export const DOCUMENT_SCOPE: IdentityScope = { kind: 'document' };

export function describeScope(scope: IdentityScope): string {
  return scope.kind === 'group' ? `group '${scope.group}'` : 'the keystore';
}
