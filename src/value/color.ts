/**
 * Colors are static property values. They never flow through the
 * evaluator; materialization passes them through untouched.
 */

export interface Color {
  readonly kind: 'color';
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export function rgba(r: number, g: number, b: number, a = 255): Color {
  return { kind: 'color', r, g, b, a };
}

const NAMED: Readonly<Record<string, Color>> = {
  transparent: rgba(0, 0, 0, 0),
  white: rgba(255, 255, 255),
  black: rgba(0, 0, 0),
  gray: rgba(128, 128, 128),
  light_gray: rgba(200, 200, 200),
  dark_gray: rgba(64, 64, 64),
  red: rgba(244, 67, 54),
  green: rgba(76, 175, 80),
  blue: rgba(33, 150, 243),
  yellow: rgba(255, 235, 59),
  orange: rgba(255, 152, 0),
  purple: rgba(156, 39, 176),
  cyan: rgba(0, 188, 212),
  pink: rgba(233, 30, 99),
};

const HEX = /^[0-9a-f]+$/i;

function channel(hex: string): number {
  // Shorthand digits expand by repetition: "f" -> "ff"
  return parseInt(hex.length === 1 ? hex + hex : hex, 16);
}

export function parseHexColor(input: string): Color | null {
  const hex = input.startsWith('#') ? input.slice(1) : input;
  if (!HEX.test(hex)) return null;
  switch (hex.length) {
    case 3:
    case 4: {
      const [r, g, b, a] = hex.split('').map(channel);
      return rgba(r, g, b, a ?? 255);
    }
    case 6:
    case 8:
      return rgba(
        channel(hex.slice(0, 2)),
        channel(hex.slice(2, 4)),
        channel(hex.slice(4, 6)),
        hex.length === 8 ? channel(hex.slice(6, 8)) : 255
      );
    default:
      return null;
  }
}

/** Hex (`#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`) or a palette name. */
export function parseColor(input: string): Color | null {
  if (input.startsWith('#')) return parseHexColor(input);
  return NAMED[input.toLowerCase()] ?? null;
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

export function toCssColor(c: Color): string {
  const alpha = Math.round((c.a / 255) * 1000) / 1000;
  return `rgba(${c.r}, ${c.g}, ${c.b}, ${alpha})`;
}
