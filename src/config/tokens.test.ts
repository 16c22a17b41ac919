/**
 * Config token parsing: colours, alignments, page sizes
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors/index.js';
import { parseAlignment, parseColor, parsePageSize, toCssColor, PAGE_SIZES } from './tokens.js';

describe('parseColor', () => {
  it('parses #RRGGBB with full opacity', () => {
    expect(parseColor('#FF8000')).toEqual({ r: 255, g: 128, b: 0, a: 1 });
  });

  it('parses #RRGGBBAA alpha as a fraction', () => {
    expect(parseColor('#00000000')).toEqual({ r: 0, g: 0, b: 0, a: 0 });
    expect(parseColor('#102030FF')).toEqual({ r: 16, g: 32, b: 48, a: 1 });
  });

  it('parses 0x-prefixed hex', () => {
    expect(parseColor('0x0000ff')).toEqual({ r: 0, g: 0, b: 255, a: 1 });
  });

  it('accepts basic colour names case-insensitively', () => {
    expect(parseColor('Navy')).toEqual({ r: 0, g: 0, b: 128, a: 1 });
    expect(parseColor('white')).toEqual({ r: 255, g: 255, b: 255, a: 1 });
  });

  it('rejects malformed colours with ConfigurationError', () => {
    expect(() => parseColor('#12345')).toThrow(ConfigurationError);
    expect(() => parseColor('notacolour')).toThrow('Invalid colour: "notacolour"');
  });
});

describe('parseAlignment', () => {
  it('maps the keyword synonyms', () => {
    expect(parseAlignment('LEFT')).toBe('start');
    expect(parseAlignment('start')).toBe('start');
    expect(parseAlignment('Centre')).toBe('center');
    expect(parseAlignment('RIGHT')).toBe('end');
    expect(parseAlignment(' justify ')).toBe('justify');
  });

  it('falls back to justify for unknown keywords', () => {
    expect(parseAlignment('DIAGONAL')).toBe('justify');
  });
});

describe('parsePageSize', () => {
  it('resolves named sizes case-insensitively', () => {
    expect(parsePageSize('letter')).toEqual([612, 792]);
    expect(parsePageSize('A4')).toBe(PAGE_SIZES.A4);
  });

  it('A4 is 210 x 297 mm in points', () => {
    const [w, h] = PAGE_SIZES.A4;
    expect(w).toBeCloseTo(595.28, 2);
    expect(h).toBeCloseTo(841.89, 2);
  });

  it('parses a "W,H" literal', () => {
    expect(parsePageSize('200, 300')).toEqual([200, 300]);
  });

  it('rejects non-positive or malformed sizes', () => {
    expect(() => parsePageSize('0,300')).toThrow('Invalid page size: "0,300"');
    expect(() => parsePageSize('B7')).toThrow(ConfigurationError);
    expect(() => parsePageSize('1,2,3')).toThrow(ConfigurationError);
  });
});

describe('toCssColor', () => {
  it('formats an rgba() string', () => {
    expect(toCssColor({ r: 1, g: 2, b: 3, a: 0.5 })).toBe('rgba(1, 2, 3, 0.5)');
  });
});
