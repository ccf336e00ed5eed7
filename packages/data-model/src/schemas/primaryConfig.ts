import { z } from 'zod';
import { CurveSchema } from '@suiconf/types';

/** Schema versions this editor reads and writes. */
export const PRIMARY_SCHEMA_VERSIONS = ['1.0.0'] as const;

export const CURRENT_PRIMARY_SCHEMA_VERSION = PRIMARY_SCHEMA_VERSIONS[0];

export const ProfileRecordSchema = z
  .object({
    name: z.string().min(1),
    active: z.boolean(),
    rpc_url: z.string().min(1),
    graphql_url: z.string().min(1).optional(),
    grpc_url: z.string().min(1).optional()
  })
  .passthrough();

export const IdentityRecordSchema = z
  .object({
    alias: z.string().min(1),
    active: z.boolean(),
    public_key: z.string().min(1),
    curve: CurveSchema,
    address: z.string().min(1)
  })
  .passthrough();

export const GroupRecordSchema = z
  .object({
    name: z.string().min(1),
    active: z.boolean(),
    profiles: z.array(ProfileRecordSchema),
    identities: z.array(IdentityRecordSchema)
  })
  .passthrough();

export const PrimaryConfigFileSchema = z
  .object({
    version: z.string().min(1).optional(),
    groups: z.array(GroupRecordSchema).min(1)
  })
  .passthrough();

export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;
export type IdentityRecord = z.infer<typeof IdentityRecordSchema>;
export type GroupRecord = z.infer<typeof GroupRecordSchema>;
export type PrimaryConfigFile = z.infer<typeof PrimaryConfigFileSchema>;
