/**
 * Text Normalizer
 *
 * Prepares raw text for the inline markup the flow engine reads.
 */

export type NormalizedText = readonly string[];

/** Marker the flow engine reads as one non-breaking space. */
export const NBSP_MARKER = '&nbsp;';

// U+00AD soft hyphen, U+200B zero-width space
const INVISIBLES = /[\u00AD\u200B]/g;
const SPACE_RUN = / {2,}/g;
const LINE_BREAK = /\r\n|\n|\r/;
const CJK = /[\u4E00-\u9FFF]/;

export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Runs of two or more spaces become the same number of non-breaking markers;
 * a lone space stays breakable.
 */
export function preserveSpaceRuns(text: string): string {
  return text.replace(SPACE_RUN, (run) => NBSP_MARKER.repeat(run.length));
}

export function normalizeText(raw: string): NormalizedText {
  const stripped = raw.replace(INVISIBLES, '');
  return preserveSpaceRuns(escapeMarkup(stripped)).split(LINE_BREAK);
}

/** CJK text wraps per character instead of per word. */
export function containsCJK(text: string): boolean {
  return CJK.test(text);
}
