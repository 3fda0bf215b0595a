/**
 * termpages: paged, keyboard-navigable terminal menus.
 */

export { UI, DEFAULT_PROMPT, DEFAULT_UI_NAME } from './ui.js';
export type { LoopOptions, UIOptions } from './ui.js';
export { Page, DEFAULT_PAGE_NAME } from './page.js';
export { MenuElement, bindAction, payloadArgs, toPayload } from './element.js';
export type { ActionArgs, BoundAction, Command, Payload } from './element.js';
export { Style, combineStyles, describeStyle, hasStyle, paint } from './style.js';
export type { StyleName } from './style.js';
export {
  DEFAULT_NAVIGATION_KEYS,
  interpretInput,
  parseSelection,
  resolveNavigationKeys,
} from './input.js';
export type { InputAction, NavigationKeys } from './input.js';
export { NodeTerminal } from './terminal.js';
export type { NodeTerminalOptions, Terminal, TerminalInput } from './terminal.js';
export { OutOfRangeError, TerminalClosedError, TerminalInterruptedError } from './errors.js';
