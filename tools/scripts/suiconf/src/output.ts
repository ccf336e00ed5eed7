export type Tone = 'info' | 'success' | 'error';

export interface OutputLine {
  readonly tone: Tone;
  readonly text: string;
}

/** What a command printed and how the process should exit. Rendering is left to the entry point. */
export interface CommandOutcome {
  readonly exitCode: number;
  readonly lines: readonly OutputLine[];
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const line = {
  info: (text: string): OutputLine => ({ tone: 'info', text }),
  success: (text: string): OutputLine => ({ tone: 'success', text }),
  error: (text: string): OutputLine => ({ tone: 'error', text })
};

/** Bad arguments; reported with the usage text and exit status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function succeeded(...lines: OutputLine[]): CommandOutcome {
  return { exitCode: EXIT_OK, lines };
}

/** Core errors all carry a string code. */
export function failed(error: { readonly code: string; readonly message: string }): CommandOutcome {
  return { exitCode: EXIT_FAILURE, lines: [line.error(`[${error.code}] ${error.message}`)] };
}
