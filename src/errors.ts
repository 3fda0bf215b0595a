/**
 * Error types surfaced by the menu model and the terminal boundary.
 */

/** Thrown when a page or element is requested by a position outside its bounds. */
export class OutOfRangeError extends RangeError {
  constructor(
    readonly what: 'element' | 'page',
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? `No ${what} at ${index}: there are none`
        : `No ${what} at ${index} (valid range is ${what === 'element' ? `1..${size}` : `0..${size - 1}`})`,
    );
    this.name = 'OutOfRangeError';
  }
}

/** Input stream ended; no further tokens can be read. */
export class TerminalClosedError extends Error {
  constructor(message = 'Terminal input was closed') {
    super(message);
    this.name = 'TerminalClosedError';
  }
}

/** The user pressed Ctrl+C while the terminal was in raw mode. */
export class TerminalInterruptedError extends Error {
  constructor(message = 'Interrupted') {
    super(message);
    this.name = 'TerminalInterruptedError';
  }
}
