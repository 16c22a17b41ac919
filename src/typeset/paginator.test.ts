/**
 * Paginator: unit grouping and hand-off to the flow engine
 */

import { describe, it, expect, vi } from 'vitest';
import { groupLines, paragraphStyle, pageGeometry, paginate } from './paginator.js';
import { finalizeConfig } from '../config/resolver.js';
import { FlowLayout } from './flow-layout.js';
import type { FlowEngine, TypesetDocument } from './types.js';

const config = finalizeConfig({
  fontPath: '/fonts/Body.ttf',
  pageSize: [200, 300],
  linesPerUnit: 2,
  spaceAfter: 3,
});

describe('groupLines', () => {
  it('joins consecutive lines in groups with the break marker', () => {
    expect(groupLines(['a', 'b', 'c'], 2)).toEqual(['a<br/>b', 'c']);
  });

  it('keeps empty lines as empty slots', () => {
    expect(groupLines(['a', '', 'b'], 30)).toEqual(['a<br/><br/>b']);
  });

  it('uses a custom marker', () => {
    expect(groupLines(['a', 'b'], 5, '<BR>')).toEqual(['a<BR>b']);
  });

  it('returns no units for no lines', () => {
    expect(groupLines([])).toEqual([]);
  });
});

describe('paragraphStyle / pageGeometry', () => {
  it('maps the render config', () => {
    const s = paragraphStyle(config, ['plain']);
    expect(s.fontName).toBe('Body');
    expect(s.leading).toBe(10);
    expect(s.spaceAfter).toBe(3);
    expect(s.wordWrap).toBe('word');
    expect(pageGeometry(config)).toEqual({
      width: 200,
      height: 300,
      marginX: 20,
      marginY: 20,
      background: { r: 255, g: 255, b: 255, a: 1 },
    });
  });

  it('switches to per-character wrapping when any line has CJK', () => {
    expect(paragraphStyle(config, ['latin', '汉字']).wordWrap).toBe('cjk');
  });
});

describe('paginate', () => {
  it('registers the font before handing grouped units to the engine', () => {
    const doc: TypesetDocument = {
      pageWidth: 200,
      pageHeight: 300,
      background: config.pageBgColor,
      fontName: 'Body',
      fontSize: 9,
      pages: [{ index: 1, boxes: [], runs: [] }],
    };
    const engine: FlowEngine = {
      registerFont: vi.fn(),
      paginate: vi.fn(() => doc),
    };

    expect(paginate(['a', 'b', 'c'], config, engine)).toBe(doc);
    expect(engine.registerFont).toHaveBeenCalledWith('/fonts/Body.ttf', 'Body');
    expect(engine.paginate).toHaveBeenCalledWith(
      ['a<br/>b', 'c'],
      expect.objectContaining({ fontName: 'Body', wordWrap: 'word' }),
      expect.objectContaining({ width: 200, height: 300 })
    );
  });

  it('propagates font registration failures', () => {
    const engine: FlowEngine = {
      registerFont: () => {
        throw new Error('cannot load font');
      },
      paginate: vi.fn(),
    };
    expect(() => paginate(['a'], config, engine)).toThrow('cannot load font');
    expect(engine.paginate).not.toHaveBeenCalled();
  });
});

describe('paginate determinism', () => {
  const layoutEngine: FlowEngine = {
    registerFont: () => {},
    paginate: (units, style, geometry) =>
      new FlowLayout({ measure: (text) => text.length * 5 }, style, geometry).layout(units),
  };
  const lines = Array.from({ length: 60 }, (_, i) => `line ${i} of a longer body of text that wraps`);

  it('gives the same pages and run positions on every run', () => {
    const first = paginate(lines, config, layoutEngine);
    const second = paginate(lines, config, layoutEngine);

    expect(first.pages.length).toBeGreaterThan(1);
    expect(second.pages.length).toBe(first.pages.length);
    expect(second.pages).toEqual(first.pages);
  });
});
