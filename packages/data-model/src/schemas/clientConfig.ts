import { z } from 'zod';

export const EnvironmentRecordSchema = z
  .object({
    alias: z.string().min(1),
    rpc: z.string().min(1),
    active: z.boolean()
  })
  .passthrough();

export const KeyRecordSchema = z
  .object({
    alias: z.string().min(1),
    public_key: z.string().min(1),
    active: z.boolean()
  })
  .passthrough();

export const ClientConfigFileSchema = z
  .object({
    envs: z.array(EnvironmentRecordSchema).min(1),
    keystore: z.array(KeyRecordSchema)
  })
  .passthrough();

export type EnvironmentRecord = z.infer<typeof EnvironmentRecordSchema>;
export type KeyRecord = z.infer<typeof KeyRecordSchema>;
export type ClientConfigFile = z.infer<typeof ClientConfigFileSchema>;
