/**
 * Terminal boundary used by the UI.
 *
 * The UI never touches process streams directly: it writes text, reads one
 * input token at a time and clears the screen through a Terminal. NodeTerminal
 * is the implementation for Node streams; tests supply their own.
 */

import readline, { type Interface } from 'node:readline';
import chalk, { type ChalkInstance } from 'chalk';
import { TerminalClosedError, TerminalInterruptedError } from './errors.js';

export interface Terminal {
  /** Append text to the output. */
  write(text: string): void;
  /**
   * Wait for one input token: a single navigation key, or a line of text
   * (without its line ending) once the user starts typing a number.
   */
  readToken(): Promise<string>;
  /** Reset the visible terminal area. */
  clearScreen(): void;
  /** Block until the user confirms they have read the output. */
  acknowledge(): Promise<void>;
}

/** Readable side of a terminal; process.stdin satisfies it. */
export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface NodeTerminalOptions {
  colors?: ChalkInstance;
  /** Shown by acknowledge(). */
  acknowledgeHint?: string;
}

const CTRL_C = '\x03';
const ESC = '\x1b';
const BACKSPACE = new Set(['\x7f', '\b']);

type Outcome<T> = { value: T } | { error: Error };

/**
 * What a raw-mode reader made of the input it was given: either it needs
 * more (`carry` is replayed in front of the next chunk, e.g. half an escape
 * sequence), or it is done and `rest` is kept for the next read.
 */
type RawStep<T> =
  | { done: false; carry: string }
  | { done: true; outcome: Outcome<T>; rest: string };

/**
 * Length of the escape sequence at the start of `text`, or null while it is
 * incomplete. Recognises CSI (`ESC [ ... final`) and SS3 (`ESC O x`); ESC
 * followed by anything else is a two-character Alt+key sequence.
 */
export function escapeSequenceLength(text: string): number | null {
  if (text.length < 2) return null;
  const kind = text[1];
  if (kind === '[') {
    for (let i = 2; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code >= 0x40 && code <= 0x7e) return i + 1;
    }
    return null;
  }
  if (kind === 'O') return text.length >= 3 ? 3 : null;
  return 2;
}

/**
 * Split the first key off raw input: an escape sequence, CR LF (as `\r`) or
 * one code point. Null when `text` is empty or holds part of a sequence.
 */
export function takeKey(text: string): { key: string; rest: string } | null {
  if (text.startsWith(ESC)) {
    const length = escapeSequenceLength(text);
    return length === null ? null : { key: text.slice(0, length), rest: text.slice(length) };
  }
  if (text.startsWith('\r\n')) return { key: '\r', rest: text.slice(2) };
  const codePoint = text.codePointAt(0);
  if (codePoint === undefined) return null;
  const key = String.fromCodePoint(codePoint);
  return { key, rest: text.slice(key.length) };
}

interface LineWaiter {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

export class NodeTerminal implements Terminal {
  private readonly colors: ChalkInstance;
  private readonly acknowledgeHint: string;

  // Line mode (non-TTY input) state.
  private lineReader: Interface | null = null;
  private readonly bufferedLines: string[] = [];
  private readonly lineWaiters: LineWaiter[] = [];
  private inputClosed = false;
  // Raw input read past the end of the last token, consumed by the next read.
  private pendingInput = '';
  // Rejects the raw-mode read in progress, if any.
  private abortRawRead: (() => void) | null = null;

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    options: NodeTerminalOptions = {},
  ) {
    this.colors = options.colors ?? chalk;
    this.acknowledgeHint = options.acknowledgeHint ?? 'Press any key to continue...';
  }

  /** True when keys can be read one at a time. */
  get isInteractive(): boolean {
    return Boolean(this.input.isTTY) && typeof this.input.setRawMode === 'function';
  }

  write(text: string): void {
    this.output.write(text);
  }

  clearScreen(): void {
    readline.cursorTo(this.output, 0, 0);
    readline.clearScreenDown(this.output);
  }

  readToken(): Promise<string> {
    if (!this.isInteractive) return this.readLine();

    let line = '';
    return this.withRawInput<string>((data) => {
      let rest = data;
      for (let next = takeKey(rest); next; next = takeKey(rest)) {
        const { key } = next;
        rest = next.rest;
        if (key.startsWith(ESC)) {
          // Arrow keys are tokens of their own; inside a number they are dropped.
          if (line === '') return { done: true, outcome: { value: key }, rest };
          continue;
        }
        if (key === CTRL_C) {
          return { done: true, outcome: { error: new TerminalInterruptedError() }, rest };
        }
        if (key === '\r' || key === '\n') {
          this.write('\n');
          return { done: true, outcome: { value: line }, rest };
        }
        if (line === '' && !/^[0-9]$/.test(key)) {
          return { done: true, outcome: { value: key }, rest };
        }
        if (BACKSPACE.has(key)) {
          line = Array.from(line).slice(0, -1).join('');
          this.write('\b \b');
          continue;
        }
        line += key;
        this.write(key);
      }
      return { done: false, carry: rest };
    });
  }

  async acknowledge(): Promise<void> {
    this.write(this.colors.dim(this.acknowledgeHint));
    if (!this.isInteractive) {
      await this.readLine();
      return;
    }
    await this.withRawInput<void>((data) => {
      const next = takeKey(data);
      if (!next) return { done: false, carry: data };
      const outcome: Outcome<void> =
        next.key === CTRL_C ? { error: new TerminalInterruptedError() } : { value: undefined };
      return { done: true, outcome, rest: next.rest };
    });
  }

  /** Stop reading input. Pending and later reads fail with TerminalClosedError. */
  close(): void {
    this.abortRawRead?.();
    if (this.lineReader) {
      this.lineReader.close();
    } else {
      this.markClosed();
    }
  }

  // ---------- raw (TTY) mode ----------

  /**
   * Feed raw input to `feed` until it is done: first whatever the previous
   * read left unconsumed, then chunks read with the input in raw mode.
   * Raw mode and listeners are always released afterwards.
   */
  private withRawInput<T>(feed: (data: string) => RawStep<T>): Promise<T> {
    let carry = '';
    const pending = this.pendingInput;
    this.pendingInput = '';
    if (pending !== '') {
      const step = feed(pending);
      if (step.done) {
        this.pendingInput = step.rest;
        const { outcome } = step;
        return 'error' in outcome ? Promise.reject(outcome.error) : Promise.resolve(outcome.value);
      }
      carry = step.carry;
    }
    if (this.inputClosed) return Promise.reject(new TerminalClosedError());

    const input = this.input;
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const release = () => {
        this.abortRawRead = null;
        input.removeListener('data', handleData);
        input.removeListener('end', handleEnd);
        input.setRawMode?.(false);
        input.pause();
      };

      const settle = (outcome: Outcome<T>) => {
        if (settled) return;
        settled = true;
        release();
        if ('error' in outcome) reject(outcome.error);
        else resolve(outcome.value);
      };

      const handleData = (chunk: string | Buffer) => {
        const step = feed(carry + (typeof chunk === 'string' ? chunk : chunk.toString('utf8')));
        carry = '';
        if (step.done) {
          this.pendingInput = step.rest;
          settle(step.outcome);
        } else {
          carry = step.carry;
        }
      };

      const handleEnd = () => {
        this.inputClosed = true;
        settle({ error: new TerminalClosedError() });
      };

      this.abortRawRead = () => settle({ error: new TerminalClosedError() });
      input.setRawMode?.(true);
      input.setEncoding('utf8');
      input.on('data', handleData);
      input.on('end', handleEnd);
      input.resume();
    });
  }

  // ---------- line (piped) mode ----------

  private readLine(): Promise<string> {
    this.ensureLineReader();
    const buffered = this.bufferedLines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.inputClosed) return Promise.reject(new TerminalClosedError());
    return new Promise((resolve, reject) => {
      this.lineWaiters.push({ resolve, reject });
    });
  }

  private ensureLineReader(): void {
    if (this.lineReader || this.inputClosed) return;
    const rl = readline.createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
    rl.on('line', (line) => {
      const waiter = this.lineWaiters.shift();
      if (waiter) waiter.resolve(line);
      else this.bufferedLines.push(line);
    });
    rl.on('close', () => this.markClosed());
    this.lineReader = rl;
  }

  private markClosed(): void {
    this.inputClosed = true;
    for (const waiter of this.lineWaiters.splice(0)) {
      waiter.reject(new TerminalClosedError());
    }
  }
}
