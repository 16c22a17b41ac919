/**
 * Flow Layout
 *
 * Breaks typesetting units into lines and flows them onto fixed-size pages.
 * The page count falls out of the content, the style and the geometry; it is
 * never an input.
 *
 * Pure: all font knowledge comes through the `TextMeasurer`.
 */

import type { RGBAColor } from '../config/types.js';
import { parseInline, type InlineToken } from './markup.js';
import type {
  PageGeometry,
  ParagraphStyle,
  TextMeasurer,
  TypesetDocument,
  TypesetPage,
} from './types.js';

interface Piece {
  text: string;
  color: RGBAColor;
  width: number;
}

/** An unbreakable run of pieces; `spaceBefore` marks a breakable space in front of it. */
interface Word {
  pieces: Piece[];
  width: number;
  spaceBefore: boolean;
}

interface Line {
  words: Word[];
  width: number;
  /** Ended by an explicit line break rather than by running out of width. */
  hardBreak: boolean;
  first: boolean;
}

const EPSILON = 1e-6;
const CJK_CHAR = /[\u4E00-\u9FFF]/;

export class FlowLayout {
  private readonly frameWidth: number;
  private readonly top: number;
  private readonly bottom: number;
  private readonly spaceWidth: number;
  private readonly widthCache = new Map<string, number>();

  private pages: TypesetPage[] = [];
  private page: TypesetPage = { index: 1, boxes: [], runs: [] };
  private cursor = 0;
  private pageHasContent = false;

  constructor(
    private readonly measurer: TextMeasurer,
    private readonly style: ParagraphStyle,
    private readonly geometry: PageGeometry
  ) {
    this.frameWidth = geometry.width - 2 * geometry.marginX;
    this.top = geometry.marginY;
    this.bottom = geometry.height - geometry.marginY;
    this.spaceWidth = this.measure(' ');
  }

  layout(units: readonly string[]): TypesetDocument {
    this.pages = [];
    this.newPage();

    for (const unit of units) {
      this.flowUnit(this.breakLines(parseInline(unit)));
    }

    return {
      pageWidth: this.geometry.width,
      pageHeight: this.geometry.height,
      background: this.geometry.background,
      fontName: this.style.fontName,
      fontSize: this.style.fontSize,
      pages: this.pages,
    };
  }

  // ─── Line breaking ──────────────────────────────────────────────────────────

  private availableWidth(first: boolean): number {
    const { leftIndent, rightIndent, firstLineIndent, fontSize } = this.style;
    const width = this.frameWidth - leftIndent - rightIndent - (first ? firstLineIndent : 0);
    return Math.max(fontSize, width);
  }

  private breakLines(tokens: InlineToken[]): Line[] {
    const lines: Line[] = [];
    let current: Word[] = [];
    let width = 0;

    const avail = (): number => this.availableWidth(lines.length === 0);

    const finish = (hardBreak: boolean): void => {
      lines.push({ words: current, width, hardBreak, first: lines.length === 0 });
      current = [];
      width = 0;
    };

    const append = (word: Word): void => {
      const glue = current.length > 0 && word.spaceBefore ? this.spaceWidth : 0;
      current.push(word);
      width += glue + word.width;
    };

    const place = (word: Word): void => {
      if (current.length > 0) {
        const glue = word.spaceBefore ? this.spaceWidth : 0;
        if (width + glue + word.width <= avail() + EPSILON) {
          append(word);
          return;
        }
        finish(false);
      }
      if (word.width <= avail() + EPSILON) {
        append(word);
        return;
      }
      // Wider than a whole line: split between characters.
      let fragment: Piece[] = [];
      let fragmentWidth = 0;
      for (const piece of word.pieces) {
        for (const ch of piece.text) {
          const w = this.measure(ch);
          if (fragmentWidth > 0 && fragmentWidth + w > avail() + EPSILON) {
            append({ pieces: fragment, width: fragmentWidth, spaceBefore: false });
            finish(false);
            fragment = [];
            fragmentWidth = 0;
          }
          appendChar(fragment, ch, piece.color, w);
          fragmentWidth += w;
        }
      }
      if (fragment.length > 0) append({ pieces: fragment, width: fragmentWidth, spaceBefore: false });
    };

    const events = this.collectWords(tokens);
    for (const event of events) {
      if (event === 'break') finish(true);
      else place(event);
    }
    if (current.length > 0 || events[events.length - 1] === 'break') finish(false);

    return lines;
  }

  private collectWords(tokens: InlineToken[]): Array<Word | 'break'> {
    const events: Array<Word | 'break'> = [];
    const cjk = this.style.wordWrap === 'cjk';
    let pieces: Piece[] = [];
    let spaceBefore = false;
    let buffer = '';
    let bufferColor = this.style.textColor;

    const flushPiece = (): void => {
      if (!buffer) return;
      pieces.push({ text: buffer, color: bufferColor, width: this.measure(buffer) });
      buffer = '';
    };

    const flushWord = (): void => {
      flushPiece();
      if (pieces.length === 0) return;
      const width = pieces.reduce((sum, p) => sum + p.width, 0);
      events.push({ pieces, width, spaceBefore });
      pieces = [];
      spaceBefore = false;
    };

    for (const token of tokens) {
      if (token.kind === 'break') {
        flushWord();
        events.push('break');
        spaceBefore = false;
        continue;
      }

      const color = token.color ?? this.style.textColor;
      if (color !== bufferColor) {
        flushPiece();
        bufferColor = color;
      }

      for (const ch of token.text) {
        if (ch === ' ' || ch === '\t') {
          flushWord();
          spaceBefore = true;
        } else if (cjk && CJK_CHAR.test(ch)) {
          flushWord();
          buffer = ch;
          flushWord();
        } else {
          buffer += ch;
        }
      }
    }
    flushWord();

    return events;
  }

  // ─── Pagination ─────────────────────────────────────────────────────────────

  private newPage(): void {
    this.page = { index: this.pages.length + 1, boxes: [], runs: [] };
    this.pages.push(this.page);
    this.cursor = this.top;
    this.pageHasContent = false;
  }

  private flowUnit(lines: Line[]): void {
    if (lines.length === 0) return;
    const { leading, fontSize, spaceBefore, spaceAfter } = this.style;

    // Space before is dropped at the top of a page.
    if (this.pageHasContent) this.cursor += spaceBefore;

    let fragmentTop = this.cursor;
    lines.forEach((line, i) => {
      if (this.pageHasContent && this.cursor + leading > this.bottom + EPSILON) {
        this.decorate(fragmentTop, this.cursor);
        this.newPage();
        fragmentTop = this.cursor;
      }
      this.placeLine(line, this.cursor + fontSize, i === lines.length - 1);
      this.cursor += leading;
      this.pageHasContent = true;
    });
    this.decorate(fragmentTop, this.cursor);

    this.cursor += spaceAfter;
  }

  private placeLine(line: Line, baseline: number, lastOfUnit: boolean): void {
    const { leftIndent, firstLineIndent, alignment } = this.style;
    const avail = this.availableWidth(line.first);
    const extra = Math.max(0, avail - line.width);

    let x = this.geometry.marginX + leftIndent + (line.first ? firstLineIndent : 0);
    let gap = this.spaceWidth;

    if (alignment === 'center') {
      x += extra / 2;
    } else if (alignment === 'end') {
      x += extra;
    } else if (alignment === 'justify' && !lastOfUnit && !line.hardBreak) {
      const glues = line.words.filter((w, i) => i > 0 && w.spaceBefore).length;
      if (glues > 0) gap += extra / glues;
    }

    line.words.forEach((word, i) => {
      if (i > 0 && word.spaceBefore) x += gap;
      for (const piece of word.pieces) {
        this.page.runs.push({ text: piece.text, x, y: baseline, color: piece.color });
        x += piece.width;
      }
    });
  }

  /** Paragraph background and border for the part of a unit on this page. */
  private decorate(top: number, bottom: number): void {
    if (bottom <= top) return;
    const { leftIndent, rightIndent, borderPadding, borderWidth, backColor, borderColor } = this.style;
    this.page.boxes.push({
      x: this.geometry.marginX + leftIndent - borderPadding,
      y: top - borderPadding,
      width: this.frameWidth - leftIndent - rightIndent + 2 * borderPadding,
      height: bottom - top + 2 * borderPadding,
      fill: backColor,
      stroke: borderWidth > 0 ? borderColor : undefined,
      lineWidth: borderWidth,
    });
  }

  private measure(text: string): number {
    let width = this.widthCache.get(text);
    if (width === undefined) {
      width = this.measurer.measure(text);
      this.widthCache.set(text, width);
    }
    return width;
  }
}

function appendChar(pieces: Piece[], ch: string, color: RGBAColor, width: number): void {
  const last = pieces[pieces.length - 1];
  if (last && last.color === color) {
    last.text += ch;
    last.width += width;
  } else {
    pieces.push({ text: ch, color, width });
  }
}
