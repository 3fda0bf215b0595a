/**
 * Tests for NodeTerminal, driven through in-memory streams so no real TTY is needed.
 */
import { describe, expect, it, vi } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { Chalk } from 'chalk';
import { TerminalClosedError, TerminalInterruptedError } from '../errors.js';
import { NodeTerminal, escapeSequenceLength, takeKey } from '../terminal.js';

// ---------- stream stand-ins ----------

class FakeTTYInput extends PassThrough {
  isTTY = true;
  setRawMode = vi.fn((_mode: boolean) => this);
}

function captureOutput() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function ttyTerminal() {
  const input = new FakeTTYInput();
  const output = captureOutput();
  const terminal = new NodeTerminal(input, output.stream, { colors: new Chalk({ level: 0 }) });
  return { input, output, terminal };
}

function pipedTerminal() {
  const input = new PassThrough();
  const output = captureOutput();
  const terminal = new NodeTerminal(input, output.stream, { colors: new Chalk({ level: 0 }) });
  return { input, output, terminal };
}

// ---------- tests ----------

describe('NodeTerminal output', () => {
  it('writes text as-is', () => {
    const { terminal, output } = pipedTerminal();
    terminal.write('hello\n');
    expect(output.text()).toBe('hello\n');
  });

  it('clears by moving home and erasing below the cursor', () => {
    const { terminal, output } = pipedTerminal();
    terminal.clearScreen();
    expect(output.text()).toBe('\x1b[1;1H\x1b[0J');
  });
});

describe('NodeTerminal in raw (TTY) mode', () => {
  it('is interactive', () => {
    expect(ttyTerminal().terminal.isInteractive).toBe(true);
    expect(pipedTerminal().terminal.isInteractive).toBe(false);
  });

  it('returns a non-digit key immediately and restores cooked mode', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('d');
    await expect(token).resolves.toBe('d');
    expect(input.setRawMode.mock.calls).toEqual([[true], [false]]);
  });

  it('returns arrow-key escape sequences whole', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('\x1b[D');
    await expect(token).resolves.toBe('\x1b[D');
  });

  it('collects digits until Enter and echoes them', async () => {
    const { input, output, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('1');
    input.write('2');
    input.write('\r');
    await expect(token).resolves.toBe('12');
    expect(output.text()).toBe('12\n');
  });

  it('keeps reading any character once a number was started', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('1x\r');
    await expect(token).resolves.toBe('1x');
  });

  it('supports backspace while typing a number', async () => {
    const { input, output, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('13\x7f2\r');
    await expect(token).resolves.toBe('12');
    expect(output.text()).toBe('13\b \b2\n');
  });

  it('returns an empty token for a bare Enter', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('\r');
    await expect(token).resolves.toBe('');
  });

  it('rejects with TerminalInterruptedError on Ctrl+C', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('4\x03');
    await expect(token).rejects.toBeInstanceOf(TerminalInterruptedError);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
  });

  it('reads consecutive tokens', async () => {
    const { input, terminal } = ttyTerminal();
    const first = terminal.readToken();
    input.write('a');
    await expect(first).resolves.toBe('a');

    const second = terminal.readToken();
    input.write('3\r');
    await expect(second).resolves.toBe('3');
    expect(input.listenerCount('data')).toBe(0);
  });

  it('rejects with TerminalClosedError when input ends', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.end();
    await expect(token).rejects.toBeInstanceOf(TerminalClosedError);
    await expect(terminal.readToken()).rejects.toBeInstanceOf(TerminalClosedError);
  });

  it('close() rejects the read in progress and restores cooked mode', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    terminal.close();
    await expect(token).rejects.toBeInstanceOf(TerminalClosedError);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
    await expect(terminal.readToken()).rejects.toBeInstanceOf(TerminalClosedError);
  });

  it('keeps keys that arrive in one chunk for the next read', async () => {
    const { input, output, terminal } = ttyTerminal();
    const first = terminal.readToken();
    input.write('d2\r');
    await expect(first).resolves.toBe('d');
    await expect(terminal.readToken()).resolves.toBe('2');
    expect(output.text()).toBe('2\n');
    expect(input.setRawMode.mock.calls).toEqual([[true], [false]]);
  });

  it('treats a pasted CR LF as a single Enter', async () => {
    const { input, terminal } = ttyTerminal();
    const first = terminal.readToken();
    input.write('1\r\n2\r\n');
    await expect(first).resolves.toBe('1');
    await expect(terminal.readToken()).resolves.toBe('2');
  });

  it('waits for the rest of an escape sequence split across chunks', async () => {
    const { input, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('\x1b');
    input.write('[D');
    await expect(token).resolves.toBe('\x1b[D');
  });

  it('drops escape sequences typed in the middle of a number', async () => {
    const { input, output, terminal } = ttyTerminal();
    const token = terminal.readToken();
    input.write('1');
    input.write('\x1b[D');
    input.write('2\r');
    await expect(token).resolves.toBe('12');
    expect(output.text()).toBe('12\n');
  });

  it('acknowledge rejects with TerminalInterruptedError on Ctrl+C', async () => {
    const { input, terminal } = ttyTerminal();
    const done = terminal.acknowledge();
    input.write('\x03');
    await expect(done).rejects.toBeInstanceOf(TerminalInterruptedError);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
  });

  it('acknowledge consumes a single key', async () => {
    const { input, terminal } = ttyTerminal();
    const done = terminal.acknowledge();
    input.write('q3\r');
    await done;
    await expect(terminal.readToken()).resolves.toBe('3');
  });

  it('acknowledge shows a hint and waits for any key', async () => {
    const { input, output, terminal } = ttyTerminal();
    const done = terminal.acknowledge();
    input.write('q');
    await expect(done).resolves.toBeUndefined();
    expect(output.text()).toBe('Press any key to continue...');
  });
});

describe('NodeTerminal in line (piped) mode', () => {
  it('returns one token per line', async () => {
    const { input, terminal } = pipedTerminal();
    input.write('2\nd\n');
    await expect(terminal.readToken()).resolves.toBe('2');
    await expect(terminal.readToken()).resolves.toBe('d');
  });

  it('waits for a line that has not arrived yet', async () => {
    const { input, terminal } = pipedTerminal();
    const token = terminal.readToken();
    input.write('3\n');
    await expect(token).resolves.toBe('3');
  });

  it('rejects pending and later reads once input ends', async () => {
    const { input, terminal } = pipedTerminal();
    const token = terminal.readToken();
    input.end();
    await expect(token).rejects.toBeInstanceOf(TerminalClosedError);
    await expect(terminal.readToken()).rejects.toBeInstanceOf(TerminalClosedError);
  });

  it('acknowledge consumes one line', async () => {
    const { input, output, terminal } = pipedTerminal();
    input.write('\n1\n');
    await terminal.acknowledge();
    await expect(terminal.readToken()).resolves.toBe('1');
    expect(output.text()).toBe('Press any key to continue...');
  });

  it('close() rejects reads in progress', async () => {
    const { terminal } = pipedTerminal();
    const token = terminal.readToken();
    terminal.close();
    await expect(token).rejects.toBeInstanceOf(TerminalClosedError);
  });
});

describe('escapeSequenceLength', () => {
  it('measures CSI and SS3 sequences', () => {
    expect(escapeSequenceLength('\x1b[D')).toBe(3);
    expect(escapeSequenceLength('\x1b[1;5Cx')).toBe(6);
    expect(escapeSequenceLength('\x1bOC')).toBe(3);
    expect(escapeSequenceLength('\x1bx')).toBe(2);
  });

  it('returns null while the sequence is incomplete', () => {
    expect(escapeSequenceLength('\x1b')).toBeNull();
    expect(escapeSequenceLength('\x1b[')).toBeNull();
    expect(escapeSequenceLength('\x1b[1;5')).toBeNull();
    expect(escapeSequenceLength('\x1bO')).toBeNull();
  });
});

describe('takeKey', () => {
  it('splits off one key at a time', () => {
    expect(takeKey('d2')).toEqual({ key: 'd', rest: '2' });
    expect(takeKey('\x1b[Cd')).toEqual({ key: '\x1b[C', rest: 'd' });
    expect(takeKey('\r\n1')).toEqual({ key: '\r', rest: '1' });
    expect(takeKey('😀x')).toEqual({ key: '😀', rest: 'x' });
  });

  it('returns null for empty input and partial sequences', () => {
    expect(takeKey('')).toBeNull();
    expect(takeKey('\x1b[')).toBeNull();
  });
});
