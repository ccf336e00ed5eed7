import path from 'node:path';
import type { KeyMaterialGenerator } from '@suiconf/crypto';
import type { RuntimeConfig } from '../env';
import { type CommandOutcome, UsageError } from '../output';

export interface CliFlags {
  readonly file?: string;
  readonly group?: string;
  readonly curve?: string;
  readonly network?: string;
  readonly graphqlUrl?: string;
  readonly grpcUrl?: string;
  readonly graphql: boolean;
  readonly grpc: boolean;
  readonly active: boolean;
  readonly force: boolean;
}

export interface CliContext {
  readonly config: RuntimeConfig;
  readonly cwd?: string;
  /** Overrides the secure key generator; tests pass a deterministic one. */
  readonly keys?: KeyMaterialGenerator;
}

export interface CommandInput {
  readonly args: readonly string[];
  readonly flags: CliFlags;
  readonly context: CliContext;
}

export type CommandHandler = (input: CommandInput) => Promise<CommandOutcome>;

export function resolvePath(input: CommandInput, target: string): string {
  return path.resolve(input.context.cwd ?? process.cwd(), target);
}

/** `--file`, else SUICONF_FILE. */
export function configPath(input: CommandInput): string {
  if (input.flags.file) {
    return resolvePath(input, input.flags.file);
  }
  if (input.context.config.file) {
    return input.context.config.file;
  }
  throw new UsageError('no config file given; pass --file or set SUICONF_FILE');
}

export function expectArgs(input: CommandInput, names: readonly string[]): readonly string[] {
  if (input.args.length !== names.length) {
    throw new UsageError(`expected ${names.map((name) => `<${name}>`).join(' ')}`);
  }
  return input.args;
}
