export { normalizeText, escapeMarkup, preserveSpaceRuns, containsCJK, NBSP_MARKER } from './normalizer.js';
export type { NormalizedText } from './normalizer.js';
