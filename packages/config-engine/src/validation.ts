import { ValidationError } from '@suiconf/types';

// Syntax rules follow the editor's input fields: names are short slugs,
// aliases are Sui keystore aliases.
const NAME_PATTERN = /^[A-Za-z_-]{3,32}$/;
const ALIAS_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{2,63}$/;

const HTTP_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:']);
const GRPC_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:', 'grpc:', 'grpcs:']);

export type UrlKind = 'rpc' | 'graphql' | 'grpc';

export function checkName(name: string, entity: string): ValidationError | null {
  if (NAME_PATTERN.test(name)) {
    return null;
  }
  return new ValidationError(
    'InvalidName',
    `${entity} name '${name}' must be 3-32 characters of letters, '_' or '-'`
  );
}

export function checkAlias(alias: string): ValidationError | null {
  if (ALIAS_PATTERN.test(alias)) {
    return null;
  }
  return new ValidationError(
    'InvalidAlias',
    `alias '${alias}' must be 3-64 characters, start with a letter and contain only letters, digits, '_' or '-'`
  );
}

export function checkUrl(value: string, kind: UrlKind): ValidationError | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return new ValidationError('InvalidUrl', `${kind} url '${value}' is not an absolute URL`);
  }

  const allowed = kind === 'grpc' ? GRPC_PROTOCOLS : HTTP_PROTOCOLS;
  if (!allowed.has(url.protocol) || url.hostname.length === 0) {
    return new ValidationError(
      'InvalidUrl',
      `${kind} url '${value}' must use one of: ${[...allowed].map((p) => p.slice(0, -1)).join(', ')}`
    );
  }
  return null;
}
