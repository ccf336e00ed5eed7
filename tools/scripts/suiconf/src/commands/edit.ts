import {
  type ConfigDocument,
  DOCUMENT_SCOPE,
  type IdentityScope,
  groupScope
} from '@suiconf/data-model';
import { DocumentController, type MutationCommand } from '@suiconf/config-engine';
import { type CommandOutcome, UsageError, failed, line, succeeded } from '../output';
import { type CommandHandler, type CommandInput, configPath, expectArgs } from './context';

const ENTITY_KINDS = ['group', 'profile', 'identity', 'env'] as const;

type EntityKind = (typeof ENTITY_KINDS)[number];

function entityKind(value: string): EntityKind {
  const kind = ENTITY_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new UsageError(`unknown entity '${value}'; expected one of: ${ENTITY_KINDS.join(', ')}`);
  }
  return kind;
}

function requireGroup(input: CommandInput): string {
  if (!input.flags.group) {
    throw new UsageError('--group is required for profiles and primary-config identities');
  }
  return input.flags.group;
}

function identityScope(document: ConfigDocument, input: CommandInput): IdentityScope {
  if (document.kind === 'client') {
    if (input.flags.group) {
      throw new UsageError('--group applies to primary configs only');
    }
    return DOCUMENT_SCOPE;
  }
  return groupScope(requireGroup(input));
}

/** Loads the config, applies one command through an edit session and saves. */
async function editConfig(
  input: CommandInput,
  build: (document: ConfigDocument) => MutationCommand
): Promise<CommandOutcome> {
  const path = configPath(input);
  const controller = new DocumentController({ keys: input.context.keys });

  const loaded = await controller.load(path);
  if (!loaded.ok) {
    return failed(loaded.error);
  }

  const session = controller.beginSession();
  session.stage(build(loaded.document));
  const result = session.commit();
  if (!result.ok) {
    session.discard();
    return failed(result.error);
  }

  const saved = await controller.save();
  if (!saved.ok) {
    return failed(saved.error);
  }
  return succeeded(line.success(result.change.description), line.info(`saved ${saved.path}`));
}

export const addGroup: CommandHandler = (input) => {
  const [name] = expectArgs(input, ['name']);
  return editConfig(input, () => ({ type: 'add_group', name, active: input.flags.active }));
};

export const addProfile: CommandHandler = (input) => {
  const [name, rpcUrl] = expectArgs(input, ['name', 'rpc-url']);
  const group = requireGroup(input);
  return editConfig(input, () => ({
    type: 'add_profile',
    group,
    name,
    rpcUrl,
    graphqlUrl: input.flags.graphqlUrl,
    grpcUrl: input.flags.grpcUrl,
    active: input.flags.active
  }));
};

export const addIdentity: CommandHandler = (input) => {
  const [alias] = expectArgs(input, ['alias']);
  return editConfig(input, (document) => ({
    type: 'add_identity',
    scope: identityScope(document, input),
    alias,
    curve: input.flags.curve ?? input.context.config.curve,
    active: input.flags.active
  }));
};

export const addEnvironment: CommandHandler = (input) => {
  const [alias, rpc] = expectArgs(input, ['alias', 'rpc-url']);
  return editConfig(input, () => ({ type: 'add_environment', alias, rpc, active: input.flags.active }));
};

export const activate: CommandHandler = (input) => {
  const [kindArg, name] = expectArgs(input, ['entity', 'name']);
  const kind = entityKind(kindArg);
  return editConfig(input, (document): MutationCommand => {
    switch (kind) {
      case 'group':
        return { type: 'set_group_active', name };
      case 'profile':
        return { type: 'set_profile_active', group: requireGroup(input), name };
      case 'identity':
        return { type: 'set_identity_active', scope: identityScope(document, input), alias: name };
      case 'env':
        return { type: 'set_environment_active', alias: name };
    }
  });
};

export const rename: CommandHandler = (input) => {
  const [kindArg, from, to] = expectArgs(input, ['entity', 'from', 'to']);
  const kind = entityKind(kindArg);
  return editConfig(input, (document): MutationCommand => {
    switch (kind) {
      case 'group':
        return { type: 'rename_group', from, to };
      case 'profile':
        return { type: 'edit_profile_field', group: requireGroup(input), name: from, field: 'name', value: to };
      case 'identity':
        return { type: 'edit_identity_alias', scope: identityScope(document, input), from, to };
      case 'env':
        return { type: 'edit_environment', alias: from, field: 'alias', value: to };
    }
  });
};

export const remove: CommandHandler = (input) => {
  const [kindArg, name] = expectArgs(input, ['entity', 'name']);
  const kind = entityKind(kindArg);
  return editConfig(input, (document): MutationCommand => {
    switch (kind) {
      case 'group':
        return { type: 'delete_group', name };
      case 'profile':
        return { type: 'delete_profile', group: requireGroup(input), name };
      case 'identity':
        return { type: 'delete_identity', scope: identityScope(document, input), alias: name };
      case 'env':
        return { type: 'delete_environment', alias: name };
    }
  });
};
