import { DocumentController, formatForPath } from '@suiconf/config-engine';
import { KeyGenerationError, NETWORK_NAMES, NetworkNameSchema, isCurve } from '@suiconf/types';
import { pathExists } from '../env';
import { EXIT_FAILURE, UsageError, failed, line, succeeded } from '../output';
import { type CommandHandler, expectArgs, resolvePath } from './context';

/**
 * `new <path> [--graphql] [--grpc] [--network n] [--curve c] [--force]`:
 * seeds a config in the format the extension names.
 */
export const newConfig: CommandHandler = async (input) => {
  const [target] = expectArgs(input, ['path']);
  const path = resolvePath(input, target);
  const format = formatForPath(path);
  if (!format) {
    throw new UsageError(`'${target}' must end in .json, .toml, .yaml or .yml`);
  }

  const network = NetworkNameSchema.safeParse(input.flags.network ?? input.context.config.network);
  if (!network.success) {
    throw new UsageError(`unknown network '${input.flags.network}'; expected one of: ${NETWORK_NAMES.join(', ')}`);
  }
  const curve = input.flags.curve ?? input.context.config.curve;
  if (!isCurve(curve)) {
    throw new UsageError(`unsupported curve '${curve}'`);
  }

  if (!input.flags.force && (await pathExists(path))) {
    return { exitCode: EXIT_FAILURE, lines: [line.error(`${path} already exists; pass --force to replace it`)] };
  }

  const controller = new DocumentController({ keys: input.context.keys });
  try {
    controller.newDocument(format, {
      network: network.data,
      curve,
      graphql: input.flags.graphql,
      grpc: input.flags.grpc
    });
  } catch (error) {
    if (error instanceof KeyGenerationError) {
      return failed(error);
    }
    throw error;
  }

  const saved = await controller.saveAs(path);
  if (!saved.ok) {
    return failed(saved.error);
  }
  return succeeded(line.success(`created ${saved.path} (${format})`));
};
