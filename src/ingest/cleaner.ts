/**
 * Text normalization for fetched sections.
 *
 * Removes inline citation markers, squeezes whitespace, and drops sections
 * too short to be worth embedding (captions, stray fragments).
 */

import type { Section } from '../source/types.js';

/** Default minimum cleaned length in characters. */
export const DEFAULT_MIN_CHARS = 80;

const BRACKETED_CITATION = /\[(?:\d+|citation needed)\]/gi;
const EXTRA_SPACE = /[ \t ]+/g;
const MULTI_NEWLINE = /\n{3,}/g;

/**
 * Clean one block of text.
 */
export function cleanText(text: string): string {
  if (!text) return '';
  return text
    .replace(BRACKETED_CITATION, '')
    .replace(EXTRA_SPACE, ' ')
    .replace(MULTI_NEWLINE, '\n\n')
    .trim();
}

/**
 * Clean every section, keeping title and url, and drop the ones whose
 * cleaned text is shorter than `minChars`.
 */
export function cleanSections(sections: Section[], minChars: number = DEFAULT_MIN_CHARS): Section[] {
  const cleaned: Section[] = [];
  for (const section of sections) {
    const text = cleanText(section.text);
    if (text.length < minChars) continue;
    cleaned.push({ title: section.title, text, url: section.url });
  }
  return cleaned;
}
