/**
 * Style flags for menu element labels.
 *
 * A Style is a plain integer bit set: every base attribute owns one bit, so
 * styles compose with `|` (see combineStyles) and are tested with `&`
 * (see hasStyle). Any integer is a valid style; bits without an attribute
 * are ignored when painting.
 *
 * Painting goes through chalk, which also decides the colour level
 * (NO_COLOR, FORCE_COLOR, non-TTY output).
 */

import chalk, {
  type BackgroundColorName,
  type ChalkInstance,
  type ForegroundColorName,
  type ModifierName,
} from 'chalk';

export type Style = number;

export const Style = {
  REGULAR: 0,

  // ---------- modifiers ----------
  BOLD: 1 << 0,
  DIMMED: 1 << 1,
  ITALIC: 1 << 2,
  UNDERSCORE: 1 << 3,
  OVERLINE: 1 << 4,
  INVERTED: 1 << 5,
  STRIKETHROUGH: 1 << 6,

  // ---------- foreground ----------
  BLACK: 1 << 7,
  RED: 1 << 8,
  GREEN: 1 << 9,
  YELLOW: 1 << 10,
  BLUE: 1 << 11,
  PURPLE: 1 << 12,
  LIGHTBLUE: 1 << 13,
  WHITE: 1 << 14,

  // ---------- bright foreground ----------
  GRAY: 1 << 15,
  RED_BRIGHT: 1 << 16,
  GREEN_BRIGHT: 1 << 17,
  YELLOW_BRIGHT: 1 << 18,
  BLUE_BRIGHT: 1 << 19,
  PURPLE_BRIGHT: 1 << 20,
  TURQUOISE: 1 << 21,
  WHITE_BRIGHT: 1 << 22,

  // ---------- bright background ----------
  BG_GRAY: 1 << 23,
  BG_RED: 1 << 24,
  BG_GREEN: 1 << 25,
  BG_YELLOW: 1 << 26,
  BG_BLUE: 1 << 27,
  BG_PURPLE: 1 << 28,
  BG_TURQUOISE: 1 << 29,
  BG_WHITE: 1 << 30,

  // ---------- composites ----------
  UNDERSCORE_INTERSECT: (1 << 3) | (1 << 6),
  SELECTED: (1 << 5) | (1 << 0),
  FRAMED: (1 << 3) | (1 << 4),
} as const;

export type StyleName = keyof typeof Style;

type Painter = ModifierName | ForegroundColorName | BackgroundColorName;

interface Attribute {
  name: StyleName;
  painter: Painter;
}

/** Base attributes in bit order. Painting applies them in this order. */
const ATTRIBUTES: readonly Attribute[] = [
  { name: 'BOLD', painter: 'bold' },
  { name: 'DIMMED', painter: 'dim' },
  { name: 'ITALIC', painter: 'italic' },
  { name: 'UNDERSCORE', painter: 'underline' },
  { name: 'OVERLINE', painter: 'overline' },
  { name: 'INVERTED', painter: 'inverse' },
  { name: 'STRIKETHROUGH', painter: 'strikethrough' },
  { name: 'BLACK', painter: 'black' },
  { name: 'RED', painter: 'red' },
  { name: 'GREEN', painter: 'green' },
  { name: 'YELLOW', painter: 'yellow' },
  { name: 'BLUE', painter: 'blue' },
  { name: 'PURPLE', painter: 'magenta' },
  { name: 'LIGHTBLUE', painter: 'cyan' },
  { name: 'WHITE', painter: 'white' },
  { name: 'GRAY', painter: 'gray' },
  { name: 'RED_BRIGHT', painter: 'redBright' },
  { name: 'GREEN_BRIGHT', painter: 'greenBright' },
  { name: 'YELLOW_BRIGHT', painter: 'yellowBright' },
  { name: 'BLUE_BRIGHT', painter: 'blueBright' },
  { name: 'PURPLE_BRIGHT', painter: 'magentaBright' },
  { name: 'TURQUOISE', painter: 'cyanBright' },
  { name: 'WHITE_BRIGHT', painter: 'whiteBright' },
  { name: 'BG_GRAY', painter: 'bgGray' },
  { name: 'BG_RED', painter: 'bgRedBright' },
  { name: 'BG_GREEN', painter: 'bgGreenBright' },
  { name: 'BG_YELLOW', painter: 'bgYellowBright' },
  { name: 'BG_BLUE', painter: 'bgBlueBright' },
  { name: 'BG_PURPLE', painter: 'bgMagentaBright' },
  { name: 'BG_TURQUOISE', painter: 'bgCyanBright' },
  { name: 'BG_WHITE', painter: 'bgWhiteBright' },
];

/** Union of all given styles. No arguments yields Style.REGULAR. */
export function combineStyles(...styles: Style[]): Style {
  return styles.reduce((acc, style) => acc | style, Style.REGULAR);
}

/** True when `style` shares at least one bit with `attribute`. */
export function hasStyle(style: Style, attribute: Style): boolean {
  return (style & attribute) !== 0;
}

/** Names of the base attributes set in `style`, in bit order. */
export function describeStyle(style: Style): StyleName[] {
  return ATTRIBUTES.filter((attr) => hasStyle(style, Style[attr.name])).map((attr) => attr.name);
}

/**
 * Apply `style` to `text` with the given chalk instance.
 * Later colours in bit order nest inside earlier ones, so the terminal shows
 * the last foreground/background set.
 */
export function paint(text: string, style: Style, colors: ChalkInstance = chalk): string {
  let painter = colors;
  let applied = false;
  for (const attr of ATTRIBUTES) {
    if (hasStyle(style, Style[attr.name])) {
      painter = painter[attr.painter];
      applied = true;
    }
  }
  return applied ? painter(text) : text;
}
