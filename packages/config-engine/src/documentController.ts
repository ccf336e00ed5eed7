/**
 * Owns the single open document: which file it came from, in which format,
 * and whether it has unsaved edits. All disk access in the core happens here.
 *
 * @module documentController
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { type KeyMaterialGenerator, createKeyMaterialGenerator } from '@suiconf/crypto';
import type { ConfigDocument } from '@suiconf/data-model';
import {
  type DocumentFormat,
  LoadError,
  type LoadResult,
  NoDocumentOpenError,
  SaveError,
  type SaveResult,
  SessionAlreadyOpenError,
  describeError
} from '@suiconf/types';
import { formatForPath, parseConfig, serializeConfig, unrecognizedFormat } from './adapters/formats';
import type { MutationCommand } from './commands';
import { type NewDocumentOptions, defaultDocument } from './defaults';
import { EditSession } from './editSession';
import { MutationEngine, type MutationResult } from './mutations';

const LOG_TAG = '[suiconf:document]';

export interface DocumentControllerOptions {
  /** Key generator for seeded documents and `add_identity`. */
  readonly keys?: KeyMaterialGenerator;
}

export class DocumentController {
  private readonly keys: KeyMaterialGenerator;
  private readonly engine: MutationEngine;
  private current: ConfigDocument | null = null;
  private currentFormat: DocumentFormat | null = null;
  private path: string | null = null;
  private modified = false;
  private session: EditSession | null = null;

  constructor(options: DocumentControllerOptions = {}) {
    this.keys = options.keys ?? createKeyMaterialGenerator();
    this.engine = new MutationEngine(this.keys);
  }

  /** The open document, or null until `newDocument` or `load` succeeds. */
  get document(): ConfigDocument | null {
    return this.current;
  }

  get format(): DocumentFormat | null {
    return this.currentFormat;
  }

  get filePath(): string | null {
    return this.path;
  }

  /** True after a successful edit, until the next save, load or new. */
  get dirty(): boolean {
    return this.modified;
  }

  /**
   * Replaces the open document with a seeded one that has no file yet.
   * Throws KeyGenerationError when the seeded key cannot be generated.
   */
  newDocument(format: DocumentFormat = 'primary-json', options: NewDocumentOptions = {}): ConfigDocument {
    const document = defaultDocument(format, options, this.keys);
    this.replace(document, format, null);
    return document;
  }

  /** Reads and parses `path`. On failure the open document is kept. */
  async load(path: string): Promise<LoadResult<ConfigDocument>> {
    const format = formatForPath(path);
    if (!format) {
      return this.loadFailed(unrecognizedFormat(path));
    }

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      return this.loadFailed(new LoadError('Io', `could not read ${path}: ${describeError(error)}`, { path, cause: error }));
    }

    const result = parseConfig(text, format);
    if (!result.ok) {
      return this.loadFailed(result.error.atPath(path));
    }

    this.replace(result.document, format, path);
    console.info(`${LOG_TAG} loaded ${path} (${format})`);
    return result;
  }

  async save(): Promise<SaveResult> {
    if (this.current === null) {
      return this.saveFailed(noDocument());
    }
    if (this.path === null || this.currentFormat === null) {
      return this.saveFailed(new SaveError('NoPathSet', 'document has no file yet; use save-as'));
    }
    return this.write(this.current, this.path, this.currentFormat);
  }

  /**
   * Writes to `path` and makes it the tracked file. JSON and TOML paths
   * convert a primary document between encodings.
   */
  async saveAs(path: string): Promise<SaveResult> {
    if (this.current === null) {
      return this.saveFailed(noDocument());
    }
    const format = formatForPath(path);
    if (!format) {
      return this.saveFailed(
        new SaveError('IncompatibleFormat', `cannot tell the config format of '${path}'`, { path })
      );
    }
    return this.write(this.current, path, format);
  }

  /**
   * Applies one command outside any session. Throws NoDocumentOpenError
   * before a document is created or loaded.
   */
  apply(command: MutationCommand): MutationResult {
    const document = this.openDocument();
    const result = this.engine.apply(document, command);
    if (result.ok && result.document !== document) {
      this.current = result.document;
      this.modified = true;
    }
    return result;
  }

  beginSession(): EditSession {
    this.openDocument();
    if (this.session?.isOpen) {
      throw new SessionAlreadyOpenError();
    }

    const session = new EditSession({
      current: () => this.openDocument(),
      apply: (command) => this.apply(command)
    });
    this.session = session;
    return session;
  }

  private openDocument(): ConfigDocument {
    if (this.current === null) {
      throw new NoDocumentOpenError();
    }
    return this.current;
  }

  private replace(document: ConfigDocument, format: DocumentFormat, path: string | null): void {
    this.session?.close();
    this.session = null;
    this.current = document;
    this.currentFormat = format;
    this.path = path;
    this.modified = false;
  }

  private async write(snapshot: ConfigDocument, path: string, format: DocumentFormat): Promise<SaveResult> {
    let text: string;
    try {
      text = serializeConfig(snapshot, format);
    } catch (error) {
      if (error instanceof SaveError) {
        return this.saveFailed(error.atPath(path));
      }
      throw error;
    }

    // a sibling temp file keeps the target intact if the write fails
    const temp = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await writeFile(temp, text, 'utf8');
      await rename(temp, path);
    } catch (error) {
      await rm(temp, { force: true });
      return this.saveFailed(new SaveError('Io', `could not write ${path}: ${describeError(error)}`, { path, cause: error }));
    }

    this.path = path;
    this.currentFormat = format;
    // edits applied while the write was in flight stay unsaved
    if (this.current === snapshot) {
      this.modified = false;
    }
    console.info(`${LOG_TAG} saved ${path} (${format})`);
    return { ok: true, path };
  }

  private loadFailed(error: LoadError): LoadResult<never> {
    console.warn(`${LOG_TAG} load failed [${error.code}]: ${error.message}`);
    return { ok: false, error };
  }

  private saveFailed(error: SaveError): SaveResult {
    console.warn(`${LOG_TAG} save failed [${error.code}]: ${error.message}`);
    return { ok: false, error };
  }
}

function noDocument(): SaveError {
  return new SaveError('NoDocument', 'no document is open; create or load one first');
}
