/**
 * Symbolic config tokens → typed values.
 */

import { ConfigurationError } from '../errors/index.js';
import type { Alignment, PageSize, RGBAColor } from './types.js';

const INCH = 72;
const MM = INCH / 25.4;

export const PAGE_SIZES: Readonly<Record<string, PageSize>> = {
  A3: [297 * MM, 420 * MM],
  A4: [210 * MM, 297 * MM],
  A5: [148 * MM, 210 * MM],
  LETTER: [8.5 * INCH, 11 * INCH],
  LEGAL: [8.5 * INCH, 14 * INCH],
};

const ALIGNMENTS: Readonly<Record<string, Alignment>> = {
  LEFT: 'start',
  START: 'start',
  CENTER: 'center',
  CENTRE: 'center',
  RIGHT: 'end',
  END: 'end',
  JUSTIFY: 'justify',
};

export const DEFAULT_ALIGNMENT: Alignment = 'justify';

const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '#000000',
  silver: '#C0C0C0',
  gray: '#808080',
  grey: '#808080',
  white: '#FFFFFF',
  maroon: '#800000',
  red: '#FF0000',
  purple: '#800080',
  fuchsia: '#FF00FF',
  green: '#008000',
  lime: '#00FF00',
  olive: '#808000',
  yellow: '#FFFF00',
  navy: '#000080',
  blue: '#0000FF',
  teal: '#008080',
  aqua: '#00FFFF',
};

/**
 * Unknown keywords fall back to justify rather than failing, so config files
 * written for newer versions still load.
 */
export function parseAlignment(token: string): Alignment {
  return ALIGNMENTS[token.trim().toUpperCase()] ?? DEFAULT_ALIGNMENT;
}

/** `#RRGGBB`, `#RRGGBBAA`, `0xRRGGBB` or a basic CSS colour name. */
export function parseColor(token: string): RGBAColor {
  const trimmed = token.trim();
  const named = NAMED_COLORS[trimmed.toLowerCase()];
  const hex = (named ?? trimmed).replace(/^(#|0x)/i, '');

  if (!/^[0-9a-f]{6}([0-9a-f]{2})?$/i.test(hex)) {
    throw new ConfigurationError(`Invalid colour: "${token}"`, { token });
  }

  const channel = (i: number): number => parseInt(hex.slice(i, i + 2), 16);
  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    a: hex.length === 8 ? channel(6) / 255 : 1,
  };
}

/** A named size (`A4`, `letter`, …) or a `"W,H"` literal in points. */
export function parsePageSize(token: string): PageSize {
  const named = PAGE_SIZES[token.trim().toUpperCase()];
  if (named) return named;

  const parts = token.split(',').map((p) => Number(p.trim()));
  if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n) || n <= 0)) {
    throw new ConfigurationError(`Invalid page size: "${token}"`, { token });
  }
  return [parts[0], parts[1]];
}

/** CSS colour string for canvas fill/stroke styles. */
export function toCssColor(color: RGBAColor): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.a})`;
}
