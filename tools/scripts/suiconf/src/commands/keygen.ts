import { createKeyMaterialGenerator } from '@suiconf/crypto';
import { KeyGenerationError } from '@suiconf/types';
import { failed, line, succeeded } from '../output';
import { type CommandHandler, expectArgs } from './context';

/** `keygen [--curve c]`: prints fresh key material without touching any file. */
export const keygen: CommandHandler = async (input) => {
  expectArgs(input, []);
  const keys = input.context.keys ?? createKeyMaterialGenerator();

  try {
    const material = keys.generate(input.flags.curve ?? input.context.config.curve);
    return succeeded(
      line.success(`curve: ${material.curve}`),
      line.info(`public key: ${material.publicKeyBase64}`),
      line.info(`address: ${material.address}`)
    );
  } catch (error) {
    if (error instanceof KeyGenerationError) {
      return failed(error);
    }
    throw error;
  }
};
