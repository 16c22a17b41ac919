/**
 * Inline markup reader for typesetting units.
 *
 * Understands `<br/>`, `<font color="…">…</font>` and the entities the text
 * normalizer produces. Any other tag is dropped, its text kept.
 */

import { parseColor } from '../config/tokens.js';
import type { RGBAColor } from '../config/types.js';

export type InlineToken =
  | { kind: 'text'; text: string; color?: RGBAColor }
  | { kind: 'break' };

const TAG = /<\s*(\/?)\s*([a-zA-Z]+)([^>]*)>/g;
const COLOR_ATTR = /color\s*=\s*["']?([^"'\s>]+)/i;

const ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00A0',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, name: string) => {
    if (name[0] === '#') {
      const code = name[1] === 'x' || name[1] === 'X'
        ? parseInt(name.slice(2), 16)
        : parseInt(name.slice(1), 10);
      return Number.isFinite(code) ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[name.toLowerCase()] ?? match;
  });
}

function fontColor(attrs: string): RGBAColor | undefined {
  const match = COLOR_ATTR.exec(attrs);
  if (!match) return undefined;
  try {
    return parseColor(match[1]);
  } catch {
    // unreadable colour: keep the surrounding colour
    return undefined;
  }
}

export function parseInline(markup: string): InlineToken[] {
  const tokens: InlineToken[] = [];
  const colors: Array<RGBAColor | undefined> = [];
  let last = 0;

  const pushText = (raw: string): void => {
    if (!raw) return;
    const text = decodeEntities(raw);
    const color = colors[colors.length - 1];
    tokens.push(color ? { kind: 'text', text, color } : { kind: 'text', text });
  };

  TAG.lastIndex = 0;
  for (let match = TAG.exec(markup); match; match = TAG.exec(markup)) {
    pushText(markup.slice(last, match.index));
    last = TAG.lastIndex;

    const closing = match[1] === '/';
    const name = match[2].toLowerCase();
    if (name === 'br') {
      tokens.push({ kind: 'break' });
    } else if (name === 'font') {
      if (closing) colors.pop();
      else colors.push(fontColor(match[3]) ?? colors[colors.length - 1]);
    }
  }
  pushText(markup.slice(last));
  return tokens;
}
