import path from 'node:path';
import { promises as fs } from 'node:fs';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { type Curve, CurveSchema, type NetworkName, NetworkNameSchema } from '@suiconf/types';

export const ENV_FILE_NAME = '.env';

const RuntimeEnvSchema = z.object({
  SUICONF_FILE: z.string().min(1).optional(),
  SUICONF_CURVE: CurveSchema.default('ed25519'),
  SUICONF_NETWORK: NetworkNameSchema.default('devnet')
});

export interface RuntimeConfig {
  /** Absolute path of the config file commands operate on by default. */
  readonly file?: string;
  readonly curve: Curve;
  readonly network: NetworkName;
}

export interface RuntimeConfigSource {
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

function setValues(env: Readonly<Record<string, string | undefined>>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Reads SUICONF_* settings from the process environment, falling back to a
 * `.env` file in the working directory. Process values win.
 */
export async function loadRuntimeConfig(source: RuntimeConfigSource = {}): Promise<RuntimeConfig> {
  const cwd = source.cwd ?? process.cwd();
  const envFile = path.join(cwd, ENV_FILE_NAME);
  const fromFile = (await pathExists(envFile)) ? parseDotenv(await fs.readFile(envFile, 'utf8')) : {};

  const parsed = RuntimeEnvSchema.safeParse({ ...setValues(fromFile), ...setValues(source.env ?? process.env) });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid suiconf environment: ${problems.join('; ')}`);
  }

  const { SUICONF_FILE: file, SUICONF_CURVE: curve, SUICONF_NETWORK: network } = parsed.data;
  return {
    ...(file ? { file: path.resolve(cwd, file) } : {}),
    curve,
    network
  };
}
