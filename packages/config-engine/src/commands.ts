import type { IdentityScope } from '@suiconf/data-model';

export type ProfileField = 'name' | 'rpc_url' | 'graphql_url' | 'grpc_url';

export type EnvironmentField = 'alias' | 'rpc';

/**
 * Every edit the presentation layer can request. Primary-document commands
 * address groups by name; identity commands take a scope so they cover both
 * group identities and client keys.
 */
export type MutationCommand =
  | { readonly type: 'add_group'; readonly name: string; readonly active?: boolean }
  | { readonly type: 'rename_group'; readonly from: string; readonly to: string }
  | { readonly type: 'set_group_active'; readonly name: string }
  | { readonly type: 'delete_group'; readonly name: string }
  | {
      readonly type: 'add_profile';
      readonly group: string;
      readonly name: string;
      readonly rpcUrl: string;
      readonly graphqlUrl?: string;
      readonly grpcUrl?: string;
      readonly active?: boolean;
    }
  | {
      readonly type: 'edit_profile_field';
      readonly group: string;
      readonly name: string;
      readonly field: ProfileField;
      /** null clears an optional URL */
      readonly value: string | null;
    }
  | { readonly type: 'set_profile_active'; readonly group: string; readonly name: string }
  | { readonly type: 'delete_profile'; readonly group: string; readonly name: string }
  | {
      readonly type: 'add_identity';
      readonly scope: IdentityScope;
      readonly alias: string;
      readonly curve: string;
      readonly active?: boolean;
    }
  | { readonly type: 'edit_identity_alias'; readonly scope: IdentityScope; readonly from: string; readonly to: string }
  | { readonly type: 'set_identity_active'; readonly scope: IdentityScope; readonly alias: string }
  | { readonly type: 'delete_identity'; readonly scope: IdentityScope; readonly alias: string }
  | { readonly type: 'add_environment'; readonly alias: string; readonly rpc: string; readonly active?: boolean }
  | {
      readonly type: 'edit_environment';
      readonly alias: string;
      readonly field: EnvironmentField;
      readonly value: string;
    }
  | { readonly type: 'set_environment_active'; readonly alias: string }
  | { readonly type: 'delete_environment'; readonly alias: string };

export type MutationCommandType = MutationCommand['type'];
