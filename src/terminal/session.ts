import type { KeyInput } from './keyboard.js';

export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';
export const CLEAR_SCREEN = '\x1b[2J';

export class TerminalSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalSetupError';
  }
}

export interface RawInput extends KeyInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

/**
 * Owns the terminal while the animation runs: raw, unechoed input and a hidden
 * cursor. `restore` is safe to call from any exit path, any number of times.
 */
export class TerminalSession {
  private restored = false;

  private constructor(
    readonly input: RawInput,
    readonly output: TerminalOutput,
  ) {}

  static open(input: RawInput, output: TerminalOutput): TerminalSession {
    if (!input.isTTY || typeof input.setRawMode !== 'function') {
      throw new TerminalSetupError('[terminal] stdin is not a terminal; use --once to print a single frame.');
    }
    try {
      input.setRawMode(true);
    } catch (error) {
      throw new TerminalSetupError('[terminal] failed to enable raw mode.', { cause: error });
    }
    input.resume();
    output.write(HIDE_CURSOR);
    output.write(CLEAR_SCREEN);
    return new TerminalSession(input, output);
  }

  restore(): void {
    if (this.restored) return;
    this.restored = true;
    this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write(SHOW_CURSOR);
  }
}
