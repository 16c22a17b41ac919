/**
 * Text normalizer
 */

import { describe, it, expect } from 'vitest';
import { normalizeText, escapeMarkup, preserveSpaceRuns, containsCJK, NBSP_MARKER } from './normalizer.js';

describe('normalizeText', () => {
  it('splits on every newline convention', () => {
    expect(normalizeText('a\r\nb\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('keeps empty lines', () => {
    expect(normalizeText('one\n\nthree\n')).toEqual(['one', '', 'three', '']);
  });

  it('removes soft hyphens and zero-width spaces', () => {
    expect(normalizeText('hy\u00ADphen\u200Bated')).toEqual(['hyphenated']);
  });

  it('escapes markup characters so they render literally', () => {
    expect(normalizeText('<b> & </b>')).toEqual(['&lt;b&gt; &amp; &lt;/b&gt;']);
  });

  it('turns space runs into as many non-breaking markers', () => {
    const [line] = normalizeText('a  b   c');
    expect(line).toBe(`a${NBSP_MARKER.repeat(2)}b${NBSP_MARKER.repeat(3)}c`);
    expect(line.split(NBSP_MARKER).length - 1).toBe(5);
  });
});

describe('helpers', () => {
  it('escapeMarkup escapes the ampersand first', () => {
    expect(escapeMarkup('&lt;')).toBe('&amp;lt;');
  });

  it('preserveSpaceRuns leaves single spaces breakable', () => {
    expect(preserveSpaceRuns('a b')).toBe('a b');
  });

  it('containsCJK detects unified ideographs', () => {
    expect(containsCJK('hello 中文')).toBe(true);
    expect(containsCJK('hello')).toBe(false);
  });
});
