import { parseArgs } from 'node:util';
import { describeError } from '@suiconf/types';
import { activate, addEnvironment, addGroup, addIdentity, addProfile, remove, rename } from './commands/edit';
import type { CliContext, CliFlags, CommandHandler } from './commands/context';
import { keygen } from './commands/keygen';
import { newConfig } from './commands/newConfig';
import { show } from './commands/show';
import { type CommandOutcome, EXIT_OK, EXIT_USAGE, UsageError, line } from './output';

const COMMANDS: Readonly<Record<string, CommandHandler>> = {
  new: newConfig,
  show,
  keygen,
  'add-group': addGroup,
  'add-profile': addProfile,
  'add-identity': addIdentity,
  'add-env': addEnvironment,
  activate,
  rename,
  remove
};

export const USAGE = [
  'usage: suiconf <command> [options]',
  '',
  '  new <path> [--graphql] [--grpc] [--network <name>] [--curve <curve>] [--force]',
  '  show [path]',
  '  keygen [--curve <curve>]',
  '  add-group <name> [--active]',
  '  add-profile <name> <rpc-url> --group <group> [--graphql-url <url>] [--grpc-url <url>] [--active]',
  '  add-identity <alias> [--group <group>] [--curve <curve>] [--active]',
  '  add-env <alias> <rpc-url> [--active]',
  '  activate <group|profile|identity|env> <name> [--group <group>]',
  '  rename <group|profile|identity|env> <from> <to> [--group <group>]',
  '  remove <group|profile|identity|env> <name> [--group <group>]',
  '',
  'Commands that edit a config take --file <path>, or SUICONF_FILE.'
];

const OPTIONS = {
  file: { type: 'string', short: 'f' },
  group: { type: 'string', short: 'g' },
  curve: { type: 'string' },
  network: { type: 'string' },
  'graphql-url': { type: 'string' },
  'grpc-url': { type: 'string' },
  graphql: { type: 'boolean', default: false },
  grpc: { type: 'boolean', default: false },
  active: { type: 'boolean', default: false },
  force: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false }
} as const;

function usage(exitCode: number, problem?: string): CommandOutcome {
  return {
    exitCode,
    lines: [...(problem ? [line.error(problem)] : []), ...USAGE.map((text) => line.info(text))]
  };
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

export async function runCli(argv: readonly string[], context: CliContext): Promise<CommandOutcome> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    return usage(EXIT_USAGE, describeError(error));
  }

  const { values, positionals } = parsed;
  const [name, ...args] = positionals;
  if (values.help === true) {
    return usage(EXIT_OK);
  }
  if (!name) {
    return usage(EXIT_USAGE, 'missing command');
  }

  const handler = COMMANDS[name];
  if (!handler) {
    return usage(EXIT_USAGE, `unknown command '${name}'`);
  }

  const flags: CliFlags = {
    file: values.file,
    group: values.group,
    curve: values.curve,
    network: values.network,
    graphqlUrl: values['graphql-url'],
    grpcUrl: values['grpc-url'],
    graphql: values.graphql ?? false,
    grpc: values.grpc ?? false,
    active: values.active ?? false,
    force: values.force ?? false
  };

  try {
    return await handler({ args, flags, context });
  } catch (error) {
    if (error instanceof UsageError) {
      return usage(EXIT_USAGE, `${name}: ${error.message}`);
    }
    throw error;
  }
}
