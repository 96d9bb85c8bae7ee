export const ESCAPE = '\x1b';
export const CTRL_C = '\x03';

/** Non-blocking key query: returns at once whether or not a key is waiting. */
export interface KeySource {
  pollKey(): string | null;
  close(): void;
}

export interface KeyInput {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
}

// Raw mode turns off ISIG, so Ctrl+C arrives as a plain byte.
export const isQuitKey = (key: string | null): boolean =>
  key === 'q' || key === 'Q' || key === ESCAPE || key === CTRL_C;

export class StdinKeySource implements KeySource {
  private readonly input: KeyInput;
  private readonly pending: string[] = [];
  private failure: Error | null = null;
  private closed = false;

  private readonly onData = (chunk: Buffer | string) => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const key of text) {
      this.pending.push(key);
    }
  };

  private readonly onError = (error: Error) => {
    this.failure = error;
  };

  constructor(input: KeyInput) {
    this.input = input;
    input.on('data', this.onData);
    input.on('error', this.onError);
  }

  pollKey(): string | null {
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw new Error(`[terminal] reading keyboard input failed: ${failure.message}`, {
        cause: failure,
      });
    }
    return this.pending.shift() ?? null;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    // stdin stays open after close, and an 'error' with no listener throws; keep onError.
    this.input.removeListener('data', this.onData);
    this.pending.length = 0;
  }
}
