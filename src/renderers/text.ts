/**
 * doxygen-md - Text Helpers
 *
 * Paragraph-text extraction and anchor slugs shared by every renderer.
 */

import type { Description } from '../types';

/**
 * Return a description's text as Markdown-ready prose.
 *
 * Non-empty paragraphs are trimmed and joined by a blank line. A description
 * with no non-empty paragraph falls back to its whole trimmed text.
 */
export function extractText(description?: Description): string {
  if (!description) {
    return '';
  }

  const paragraphs = description.paragraphs
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);

  if (paragraphs.length > 0) {
    return paragraphs.join('\n\n');
  }

  return description.text.trim();
}

/**
 * Lowercase URL-fragment slug: runs of non-alphanumerics become one hyphen
 *
 * @example
 * slugify('add (int a, int b)'); // 'add-int-a-int-b'
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
