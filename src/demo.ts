/**
 * The sample menu shown by the `termpages-demo` executable.
 */

import { Style, combineStyles, describeStyle } from './style.js';
import type { UI } from './ui.js';

export type Log = (message: string) => void;

const SHOWCASE_STYLES: Style[] = [
  Style.BOLD,
  Style.DIMMED,
  Style.ITALIC,
  Style.SELECTED,
  Style.UNDERSCORE_INTERSECT,
  Style.FRAMED,
];

/**
 * Adds three pages to `ui`:
 *   Fruits     — Banana, Apple, Orange (each reports the pick)
 *   Groceries  — Bread, Milk, and a command bound to two arguments
 *   Styles     — one element per showcase style, plus a jump back to Fruits
 */
export function buildDemoMenu(ui: UI, log: Log = console.log): UI {
  const pick = (fruit: string) => log(`You picked ${fruit}.`);

  const fruits = ui.addPage('Fruits');
  fruits.addElement('Banana', Style.YELLOW, pick, ['banana']);
  fruits.addElement('Apple', Style.RED, pick, ['apple']);
  fruits.addElement('Orange', combineStyles(Style.YELLOW_BRIGHT, Style.BOLD), pick, ['orange']);

  // Top-level addElement targets the page added last.
  ui.addPage('Groceries');
  ui.addElement('Bread', Style.REGULAR, () => log('Bread added to the list.'));
  ui.addElement('Milk', Style.UNDERSCORE, () => log('Milk added to the list.'));
  ui.addElement('2 + 3', Style.GREEN, (a: number, b: number) => log(`${a} + ${b} = ${a + b}`), [2, 3]);

  const styles = ui.addPage('Styles');
  for (const style of SHOWCASE_STYLES) {
    styles.addElement(describeStyle(style).join(' + '), style);
  }
  styles.addElement('Back to Fruits', Style.PURPLE_BRIGHT, () => ui.setPage(fruits));

  return ui;
}
