import type { ConfigDocument } from '@suiconf/data-model';
import { SessionClosedError } from '@suiconf/types';
import type { MutationCommand } from './commands';
import type { MutationResult } from './mutations';

/** What a session needs from the controller that opened it. */
export interface SessionHost {
  current(): ConfigDocument;
  apply(command: MutationCommand): MutationResult;
}

/**
 * A modal edit: one command is staged, then committed through the host or
 * discarded. A successful commit or a discard closes the session; a failed
 * commit leaves it open so the staged command can be corrected.
 */
export class EditSession {
  private staged: MutationCommand | null = null;
  private open = true;

  constructor(private readonly host: SessionHost) {}

  get isOpen(): boolean {
    return this.open;
  }

  /** Buffers a command, replacing any staged earlier. */
  stage(command: MutationCommand): void {
    this.assertOpen();
    this.staged = command;
  }

  commit(): MutationResult {
    this.assertOpen();

    if (!this.staged) {
      this.close();
      return {
        ok: true,
        document: this.host.current(),
        change: { command: 'none', description: 'Nothing to commit' }
      };
    }

    const result = this.host.apply(this.staged);
    if (result.ok) {
      this.close();
    }
    return result;
  }

  discard(): void {
    this.assertOpen();
    this.close();
  }

  /** Ends the session without applying anything. Safe to call twice. */
  close(): void {
    this.open = false;
    this.staged = null;
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new SessionClosedError();
    }
  }
}
