import { extname } from 'node:path';
import type { ConfigDocument } from '@suiconf/data-model';
import { type DocumentFormat, LoadError, type LoadResult, SaveError } from '@suiconf/types';
import { clientYamlAdapter } from './clientAdapter';
import { primaryJsonAdapter, primaryTomlAdapter } from './primaryAdapter';

const FORMATS_BY_EXTENSION: Readonly<Record<string, DocumentFormat>> = {
  '.json': 'primary-json',
  '.toml': 'primary-toml',
  '.yaml': 'client-yaml',
  '.yml': 'client-yaml'
};

export function formatForPath(path: string): DocumentFormat | null {
  return FORMATS_BY_EXTENSION[extname(path).toLowerCase()] ?? null;
}

export function kindOfFormat(format: DocumentFormat): ConfigDocument['kind'] {
  return format === 'client-yaml' ? 'client' : 'primary';
}

export function unrecognizedFormat(path: string): LoadError {
  return new LoadError(
    'UnrecognizedFormat',
    `cannot tell the config format of '${path}' (expected .json, .toml, .yaml or .yml)`,
    { path }
  );
}

export function parseConfig(text: string, format: DocumentFormat): LoadResult<ConfigDocument> {
  switch (format) {
    case 'primary-json':
      return primaryJsonAdapter.parse(text);
    case 'primary-toml':
      return primaryTomlAdapter.parse(text);
    case 'client-yaml':
      return clientYamlAdapter.parse(text);
  }
}

/** Throws SaveError `IncompatibleFormat` or `Unserializable`. */
export function serializeConfig(document: ConfigDocument, format: DocumentFormat): string {
  if (kindOfFormat(format) !== document.kind) {
    throw new SaveError('IncompatibleFormat', `a ${document.kind} config cannot be written as ${format}`);
  }

  if (document.kind === 'client') {
    return clientYamlAdapter.serialize(document);
  }
  return format === 'primary-toml' ? primaryTomlAdapter.serialize(document) : primaryJsonAdapter.serialize(document);
}
