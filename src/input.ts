/**
 * Pure interpretation of one input token read from the terminal.
 *
 * Kept apart from the UI so the rules can be unit-tested without a terminal:
 *   navigation key (previous) — move to the previous page
 *   navigation key (next)     — move to the next page
 *   1..elementCount           — select that element of the current page
 *   anything else             — ignored
 */

export type InputAction =
  | { type: 'previous' }
  | { type: 'next' }
  | { type: 'select'; position: number }
  | { type: 'none' };

export interface NavigationKeys {
  /** Tokens that move to the previous page. */
  previous: string[];
  /** Tokens that move to the next page. */
  next: string[];
}

/** `a` / left arrow and `d` / right arrow. */
export const DEFAULT_NAVIGATION_KEYS: NavigationKeys = {
  previous: ['a', '\x1b[D', '\x1bOD'],
  next: ['d', '\x1b[C', '\x1bOC'],
};

export function resolveNavigationKeys(keys: Partial<NavigationKeys> = {}): NavigationKeys {
  return {
    previous: keys.previous ?? DEFAULT_NAVIGATION_KEYS.previous,
    next: keys.next ?? DEFAULT_NAVIGATION_KEYS.next,
  };
}

/**
 * Parse a selection token. Surrounding whitespace is allowed, everything else
 * must be decimal digits. Returns null for anything that is not a number.
 */
export function parseSelection(token: string): number | null {
  const trimmed = token.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

export function interpretInput(
  token: string,
  keys: NavigationKeys,
  elementCount: number,
): InputAction {
  // Navigation keys are compared untrimmed: escape sequences are exact.
  if (keys.previous.includes(token)) return { type: 'previous' };
  if (keys.next.includes(token)) return { type: 'next' };

  const position = parseSelection(token);
  if (position === null || position < 1 || position > elementCount) {
    return { type: 'none' };
  }
  return { type: 'select', position };
}
