/**
 * Active-flag invariant shared by every mutation and every parse.
 *
 * Each sibling collection (groups, profiles of a group, identities of a
 * group, client envs, client keys) has exactly one active member when
 * non-empty. `enforceActiveInvariant` is the single post-condition that
 * establishes this; callers that want a particular member active call
 * `activateAt` first.
 *
 * @module invariants
 */

import type { ConfigDocument, Group } from '@suiconf/data-model';

export interface Activatable {
  readonly active: boolean;
}

/** Marks `index` active and every other member inactive. */
export function activateAt<T extends Activatable>(items: readonly T[], index: number): T[] {
  return items.map((item, position) => {
    const active = position === index;
    return item.active === active ? item : { ...item, active };
  });
}

/**
 * Keeps the first active member, or promotes the first member when none is
 * active. Returns the input array when it already satisfies the invariant.
 */
export function normalizeActive<T extends Activatable>(items: readonly T[]): readonly T[] {
  if (items.length === 0) {
    return items;
  }

  const activeCount = items.filter((item) => item.active).length;
  if (activeCount === 1) {
    return items;
  }

  const keep = activeCount === 0 ? 0 : items.findIndex((item) => item.active);
  return activateAt(items, keep);
}

function normalizeGroup(group: Group): Group {
  const profiles = normalizeActive(group.profiles);
  const identities = normalizeActive(group.identities);
  if (profiles === group.profiles && identities === group.identities) {
    return group;
  }
  return { ...group, profiles, identities };
}

export function enforceActiveInvariant<TDocument extends ConfigDocument>(document: TDocument): TDocument;
export function enforceActiveInvariant(document: ConfigDocument): ConfigDocument {
  if (document.kind === 'client') {
    const envs = normalizeActive(document.envs);
    const keys = normalizeActive(document.keys);
    return envs === document.envs && keys === document.keys ? document : { ...document, envs, keys };
  }

  const groups = normalizeActive(document.groups.map(normalizeGroup));
  const unchanged = groups.every((group, index) => group === document.groups[index]);
  return unchanged ? document : { ...document, groups };
}

/**
 * Collections that break the invariant, described for diagnostics. Empty for
 * any document produced by the engine or an adapter.
 */
export function activeViolations(document: ConfigDocument): string[] {
  const violations: string[] = [];
  const check = (label: string, items: readonly Activatable[]) => {
    const count = items.filter((item) => item.active).length;
    if (items.length > 0 && count !== 1) {
      violations.push(`${label} has ${count} active members`);
    }
  };

  if (document.kind === 'client') {
    check('envs', document.envs);
    check('keystore', document.keys);
    return violations;
  }

  check('groups', document.groups);
  for (const group of document.groups) {
    check(`group '${group.name}' profiles`, group.profiles);
    check(`group '${group.name}' identities`, group.identities);
  }
  return violations;
}
