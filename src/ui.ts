/**
 * Top-level menu: an ordered set of pages, the current-page cursor and the
 * render → read → dispatch loop.
 *
 * Key bindings (defaults, see input.ts):
 *   a / Left   — previous page (wraps around)
 *   d / Right  — next page (wraps around)
 *   1..n Enter — select element n of the current page and run its command
 *
 * There is no exit key. The loop ends when the terminal stops providing
 * input (Ctrl+C, end of input) or a command throws.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { ActionArgs, MenuElement } from './element.js';
import { OutOfRangeError } from './errors.js';
import type { NavigationKeys } from './input.js';
import { interpretInput, resolveNavigationKeys } from './input.js';
import { DEFAULT_PAGE_NAME, Page } from './page.js';
import { Style, paint } from './style.js';
import type { Terminal } from './terminal.js';
import { NodeTerminal } from './terminal.js';

export const DEFAULT_UI_NAME = 'Untitled UI';
export const DEFAULT_PROMPT = '>>> ';

export interface UIOptions {
  /** Show the UI name in the header. Default true. */
  showName?: boolean;
  /** Show `<current>/<total>` page numbers in the header. Default true. */
  showCurrentPage?: boolean;
  /** Show `P: <page name>` in the header. Default true. */
  showCurrentPageName?: boolean;
  /** Fixed header text replacing the generated one. */
  header?: string;
  /** Input prompt written after the element list. Default `'>>> '`. */
  prompt?: string;
  /** Override the page navigation keys. */
  keys?: Partial<NavigationKeys>;
  /** Where to render and read from. Default: a NodeTerminal on stdin/stdout. */
  terminal?: Terminal;
  /** Chalk instance used to paint element styles. */
  colors?: ChalkInstance;
}

export interface LoopOptions {
  /**
   * After a selection that ran a command, wait for the user to acknowledge
   * before clearing the screen, so the command's output stays visible.
   */
  stop?: boolean;
}

export class UI {
  name: string;
  header: string | undefined;
  showName: boolean;
  showCurrentPage: boolean;
  showCurrentPageName: boolean;
  prompt: string;
  readonly keys: NavigationKeys;

  private readonly pageList: Page[] = [];
  private lastAddedPage: Page | undefined;
  private pageIndex = 0;
  private readonly terminal: Terminal;
  private readonly colors: ChalkInstance;
  private running = false;

  constructor(name: string = DEFAULT_UI_NAME, options: UIOptions = {}) {
    this.name = name;
    this.header = options.header;
    this.showName = options.showName ?? true;
    this.showCurrentPage = options.showCurrentPage ?? true;
    this.showCurrentPageName = options.showCurrentPageName ?? true;
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.keys = resolveNavigationKeys(options.keys);
    this.terminal = options.terminal ?? new NodeTerminal();
    this.colors = options.colors ?? chalk;
  }

  // ---------- pages ----------

  get pages(): readonly Page[] {
    return this.pageList;
  }

  get pageCount(): number {
    return this.pageList.length;
  }

  get currentPageIndex(): number {
    return this.pageIndex;
  }

  get currentPage(): Page | undefined {
    return this.pageList[this.pageIndex];
  }

  /** Append a page. The first page added becomes the current page. */
  addPage(name: string = DEFAULT_PAGE_NAME): Page {
    const page = new Page(name);
    this.pageList.push(page);
    this.lastAddedPage = page;
    if (this.pageList.length === 1) {
      this.pageIndex = 0;
    }
    return page;
  }

  /**
   * Append an element to the most recently added page, creating an untitled
   * page first when there is none.
   */
  addElement<A extends unknown[]>(label: string, style: Style = Style.REGULAR, ...action: ActionArgs<A>): MenuElement {
    const page = this.lastAddedPage ?? this.addPage();
    return page.addElement<A>(label, style, ...action);
  }

  /** Page at a 0-based index. */
  getPage(index: number): Page {
    const page = Number.isInteger(index) ? this.pageList[index] : undefined;
    if (!page) {
      throw new OutOfRangeError('page', index, this.pageList.length);
    }
    return page;
  }

  setPageIndex(index: number): void {
    this.getPage(index);
    this.pageIndex = index;
  }

  /** Make `page` current. Pages that belong to another UI are ignored. */
  setPage(page: Page): void {
    const index = this.pageList.indexOf(page);
    if (index >= 0) this.pageIndex = index;
  }

  nextPage(): void {
    if (this.pageList.length === 0) return;
    this.pageIndex = (this.pageIndex + 1) % this.pageList.length;
  }

  prevPage(): void {
    if (this.pageList.length === 0) return;
    this.pageIndex = (this.pageIndex - 1 + this.pageList.length) % this.pageList.length;
  }

  // ---------- rendering ----------

  /**
   * The header override if set, otherwise:
   *
   *   P: <current page name>
   *   <ui name> <current>/<total>
   *
   * Each field appears only when its flag is on; empty lines are dropped.
   */
  buildHeader(): string {
    if (this.header !== undefined) return this.header;

    const lines: string[] = [];
    const page = this.currentPage;
    if (this.showCurrentPageName && page) {
      lines.push(`P: ${page.name}`);
    }

    const summary: string[] = [];
    if (this.showName) summary.push(this.name);
    if (this.showCurrentPage) {
      const position = this.pageList.length === 0 ? 0 : this.pageIndex + 1;
      summary.push(`${position}/${this.pageList.length}`);
    }
    if (summary.length > 0) lines.push(summary.join(' '));

    return lines.join('\n');
  }

  /** One element line, e.g. ` 2: Apple`, painted with the element's style. */
  formatElement(element: MenuElement, position: number): string {
    return paint(`${String(position).padStart(2)}: ${element.label}`, element.style, this.colors);
  }

  /** Header, element list and prompt as a single string. */
  formatScreen(page: Page | undefined = this.currentPage): string {
    const body = (page?.elements ?? []).map((element, i) => this.formatElement(element, i + 1) + '\n');
    return `${this.buildHeader()}\n\n${body.join('')}\n${this.prompt}`;
  }

  render(page: Page | undefined = this.currentPage): void {
    this.terminal.write(this.formatScreen(page));
  }

  // ---------- input ----------

  /**
   * Read one token and act on it. Returns the selected 1-based position, or
   * null for navigation and ignored input. A selected element's command is
   * run (and awaited) before this resolves; its errors propagate.
   */
  async askInput(): Promise<number | null> {
    return (await this.handleInput()).position;
  }

  /**
   * Run the menu: render, read, act, clear, forever. Resolves never; rejects
   * with the terminal's or a command's error.
   */
  async loop(options: LoopOptions = {}): Promise<never> {
    if (this.running) {
      throw new Error('UI loop is already running');
    }
    this.running = true;
    if (this.pageList.length === 0) this.addPage();

    try {
      for (;;) {
        this.render();
        const { dispatched } = await this.handleInput();
        if (options.stop && dispatched) {
          await this.terminal.acknowledge();
        }
        this.terminal.clearScreen();
      }
    } finally {
      this.running = false;
    }
  }

  private async handleInput(): Promise<{ position: number | null; dispatched: boolean }> {
    const token = await this.terminal.readToken();
    const page = this.currentPage;
    const action = interpretInput(token, this.keys, page?.elementCount ?? 0);

    switch (action.type) {
      case 'previous':
        this.prevPage();
        return { position: null, dispatched: false };
      case 'next':
        this.nextPage();
        return { position: null, dispatched: false };
      case 'none':
        return { position: null, dispatched: false };
      case 'select': {
        const element = this.getCurrentElement(action.position);
        if (!element.hasCommand) {
          return { position: action.position, dispatched: false };
        }
        await element.invoke();
        return { position: action.position, dispatched: true };
      }
    }
  }

  private getCurrentElement(position: number): MenuElement {
    const page = this.currentPage;
    if (!page) {
      throw new OutOfRangeError('element', position, 0);
    }
    return page.getElement(position);
  }
}
