import type { ActionArgs } from './element.js';
import { MenuElement, bindAction } from './element.js';
import { OutOfRangeError } from './errors.js';
import { Style } from './style.js';

export const DEFAULT_PAGE_NAME = 'Untitled page';

/**
 * Named, ordered list of elements.
 *
 * Positions are 1-based (position 1 is the first element added), matching
 * what the user types to select an element.
 */
export class Page {
  name: string;
  private readonly items: MenuElement[] = [];

  constructor(name: string = DEFAULT_PAGE_NAME) {
    this.name = name;
  }

  get elements(): readonly MenuElement[] {
    return this.items;
  }

  get elementCount(): number {
    return this.items.length;
  }

  /**
   * Append an element and return it so the caller can restyle it later.
   *
   *   page.addElement('Banana');
   *   page.addElement('Hello', Style.GREEN, hello);
   *   page.addElement('2 + 3', Style.BOLD, add, [2, 3]);
   */
  addElement<A extends unknown[]>(label: string, style: Style = Style.REGULAR, ...action: ActionArgs<A>): MenuElement {
    const element = new MenuElement(label, style, bindAction<A>(...action));
    this.items.push(element);
    return element;
  }

  /** Element at a 1-based position. */
  getElement(position: number): MenuElement {
    const element = Number.isInteger(position) ? this.items[position - 1] : undefined;
    if (!element) {
      throw new OutOfRangeError('element', position, this.items.length);
    }
    return element;
  }
}
