/**
 * A single selectable line of a page.
 */

import { Style } from './style.js';

/** Any callable an element can be bound to. A returned promise is awaited by the UI. */
export type Command<A extends unknown[] = unknown[]> = (...args: A) => unknown;

/**
 * Trailing `addElement` arguments: nothing, a command taking no arguments,
 * or a command together with its argument list (e.g. `add, [2, 3]`).
 */
export type ActionArgs<A extends unknown[]> =
  | []
  | [command: Command<[]>]
  | [command: Command<A>, params: A];

/** Arguments bound to an element. */
export type Payload =
  | { kind: 'none' }
  | { kind: 'single'; value: unknown }
  | { kind: 'sequence'; values: readonly unknown[] };

export interface BoundAction {
  readonly payload: Payload;
  /** Calls the command with the payload spread as positional arguments. */
  readonly call: () => unknown;
}

/**
 * Classify an argument list. Empty means no arguments, one value is a single
 * argument, anything longer is a sequence.
 */
export function toPayload(params: readonly unknown[]): Payload {
  if (params.length === 0) return { kind: 'none' };
  if (params.length === 1) return { kind: 'single', value: params[0] };
  return { kind: 'sequence', values: Object.freeze([...params]) };
}

/** Positional arguments a payload expands to. */
export function payloadArgs(payload: Payload): unknown[] {
  switch (payload.kind) {
    case 'none':     return [];
    case 'single':   return [payload.value];
    case 'sequence': return [...payload.values];
  }
}

/** A fresh array holding the same arguments, typed as the same tuple. */
function snapshot<A extends unknown[]>(...args: A): A {
  return args;
}

/**
 * Bind a command to its arguments, or return undefined when there is no command.
 * The arguments are copied at bind time: changing the caller's array later
 * affects neither the payload nor the call.
 */
export function bindAction<A extends unknown[]>(...action: ActionArgs<A>): BoundAction | undefined {
  if (action.length === 0) return undefined;
  if (action.length === 1) {
    const [command] = action;
    return { payload: { kind: 'none' }, call: () => command() };
  }
  const [command, params] = action;
  const args = snapshot<A>(...params);
  return { payload: toPayload(args), call: () => command(...args) };
}

export class MenuElement {
  label: string;
  style: Style;
  readonly action: BoundAction | undefined;

  constructor(label: string, style: Style = Style.REGULAR, action?: BoundAction) {
    this.label = label;
    this.style = style;
    this.action = action;
  }

  get hasCommand(): boolean {
    return this.action !== undefined;
  }

  get payload(): Payload {
    return this.action?.payload ?? { kind: 'none' };
  }

  /**
   * Run the bound command and return its result (a promise stays a promise).
   * Does nothing without a command. Exceptions are not caught.
   */
  invoke(): unknown {
    return this.action?.call();
  }
}
