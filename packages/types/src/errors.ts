export type ValidationErrorCode =
  | 'DuplicateName'
  | 'NotFound'
  | 'WouldEmptyRequiredCollection'
  | 'InvalidUrl'
  | 'InvalidAlias'
  | 'InvalidName'
  | 'WrongDocumentKind';

export type KeyGenerationErrorCode = 'UnsupportedCurve' | 'EntropyUnavailable';

export type LoadErrorCode = 'MalformedDocument' | 'UnsupportedVersion' | 'UnrecognizedFormat' | 'Io';

export type SaveErrorCode = 'Io' | 'NoDocument' | 'NoPathSet' | 'IncompatibleFormat' | 'Unserializable';

export class ValidationError extends Error {
  constructor(
    public readonly code: ValidationErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class KeyGenerationError extends Error {
  constructor(
    public readonly code: KeyGenerationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'KeyGenerationError';
  }
}

interface FileErrorOptions {
  path?: string;
  cause?: unknown;
}

export class LoadError extends Error {
  readonly path?: string;

  constructor(
    public readonly code: LoadErrorCode,
    message: string,
    options: FileErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'LoadError';
    this.path = options.path;
  }

  /** Same error, attributed to the file it was read from. */
  atPath(path: string): LoadError {
    return new LoadError(this.code, `${path}: ${this.message}`, { path, cause: this.cause });
  }
}

export class SaveError extends Error {
  readonly path?: string;

  constructor(
    public readonly code: SaveErrorCode,
    message: string,
    options: FileErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'SaveError';
    this.path = options.path;
  }

  atPath(path: string): SaveError {
    return new SaveError(this.code, `${path}: ${this.message}`, { path, cause: this.cause });
  }
}

export class NoDocumentOpenError extends Error {
  constructor() {
    super('No document is open; create or load one first');
    this.name = 'NoDocumentOpenError';
  }
}

export class SessionAlreadyOpenError extends Error {
  constructor() {
    super('An edit session is already open for this document');
    this.name = 'SessionAlreadyOpenError';
  }
}

export class SessionClosedError extends Error {
  constructor() {
    super('The edit session has already been committed or discarded');
    this.name = 'SessionClosedError';
  }
}

export type LoadResult<TDocument> =
  | { readonly ok: true; readonly document: TDocument }
  | { readonly ok: false; readonly error: LoadError };

export type SaveResult =
  | { readonly ok: true; readonly path: string }
  | { readonly ok: false; readonly error: SaveError };

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
