import type { ConfigDocument, Extras } from '@suiconf/data-model';
import { type DocumentFormat, LoadError, type LoadResult, SaveError, describeError } from '@suiconf/types';
import type { ZodError } from 'zod';

/** Reads and writes one on-disk encoding of a document kind. */
export interface FormatAdapter<TDocument extends ConfigDocument> {
  readonly format: DocumentFormat;
  readonly kind: TDocument['kind'];
  parse(text: string): LoadResult<TDocument>;
  /** Throws SaveError `Unserializable` when extras cannot be encoded. */
  serialize(document: TDocument): string;
}

export function malformed(message: string, cause?: unknown): LoadResult<never> {
  return { ok: false, error: new LoadError('MalformedDocument', message, { cause }) };
}

export function unserializable(format: DocumentFormat, cause: unknown): SaveError {
  return new SaveError('Unserializable', `document cannot be written as ${format}: ${describeError(cause)}`, {
    cause
  });
}

/** Drops a leading UTF-8 byte order mark left by some editors. */
export function stripBom(text: string): string {
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Keys of `record` outside `known`, in source order. */
export function splitExtras(record: Readonly<Record<string, unknown>>, known: readonly string[]): Extras {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !known.includes(key)));
}

export function firstDuplicate(values: readonly string[]): string | null {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      return value;
    }
    seen.add(value);
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
