/**
 * Text Normalization Utilities
 *
 * Provides functions for normalizing text to ensure consistent processing
 * across job postings and resumes, plus the term matchers every extractor
 * and the scorer share.
 */

const BLOCK_TAG = /<\/?(?:br|p|div|li|h[1-6]|tr)\b[^>]*>/gi;

const NAMED_ENTITIES = new Map<string, string>([
  ['nbsp', ' '],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['ndash', '-'],
  ['mdash', '--'],
  ['bull', '\u2022'],
  ['hellip', '...']
]);

function decodeCodePoint(entity: string, code: number): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff
    ? String.fromCodePoint(code)
    : entity;
}

/**
 * Removes HTML markup: script and style blocks disappear, block-level tags
 * become line breaks, other tags are dropped and common entities decoded.
 */
export function stripMarkup(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(BLOCK_TAG, '\n')
    .replace(/<\/?[a-z][^>]*>/gi, '')
    .replace(/&#(\d+);/g, (entity: string, code: string) => decodeCodePoint(entity, Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (entity: string, code: string) => decodeCodePoint(entity, parseInt(code, 16)))
    .replace(/&([a-z]+);/gi, (entity: string, name: string) => NAMED_ENTITIES.get(name.toLowerCase()) ?? entity)
    .replace(/&amp;/gi, '&');
}

/**
 * Handles encoding issues by converting to plain ASCII punctuation.
 * Line feeds, carriage returns and tabs survive for cleanWhitespace.
 */
export function handleEncoding(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/[\u2018\u2019]/g, "'") // Smart quotes to regular quotes
    .replace(/[\u201C\u201D]/g, '"') // Smart double quotes
    .replace(/\u2013/g, '-') // En dash to hyphen
    .replace(/\u2014/g, '--') // Em dash to double hyphen
    .replace(/\u2026/g, '...') // Ellipsis
    .replace(/\u00A0/g, ' ') // Non-breaking space
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '');
}

/**
 * Cleans whitespace from text while preserving line structure.
 */
export function cleanWhitespace(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\r\n/g, '\n') // Normalize line endings
    .replace(/\r/g, '\n')
    .replace(/\t/g, ' ')
    .replace(/ +/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n') // Replace 3+ newlines with 2
    .trim();
}

/**
 * Prepares text for section scanning: markup removed, encoding fixed,
 * whitespace cleaned, lines kept.
 */
export function prepareForParsing(text: string): string {
  if (!text) {
    return '';
  }

  return cleanWhitespace(handleEncoding(stripMarkup(text)));
}

/**
 * Collapses the prepared text onto one line. Case is preserved so the
 * renderer can still use the original spelling.
 */
export function normalize(text: string): string {
  if (!text) {
    return '';
  }

  return prepareForParsing(text).replace(/\s+/g, ' ').trim();
}

/**
 * Lower-cased view used for matching
 */
export function matchView(text: string): string {
  return text.toLowerCase();
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-term pattern. A boundary is any position not touching [a-z0-9_], so
 * terms such as "c++", "c#" and "node.js" still match as whole words.
 */
export function termPattern(term: string, flags = ''): RegExp {
  const body = escapeRegex(term.trim()).replace(/ +/g, '\\s+');
  return new RegExp(`(?<![a-z0-9_])${body}(?![a-z0-9_])`, `i${flags}`);
}

/**
 * Case-insensitive whole-term containment
 */
export function containsTerm(haystack: string, term: string): boolean {
  if (!haystack || !term.trim()) {
    return false;
  }
  return termPattern(term).test(haystack);
}

/**
 * Case-insensitive whole-term occurrence count
 */
export function countTerm(haystack: string, term: string): number {
  if (!haystack || !term.trim()) {
    return 0;
  }
  return Array.from(haystack.matchAll(termPattern(term, 'g'))).length;
}

/**
 * Non-overlapping case-insensitive substring count
 */
export function countLiteral(haystack: string, needle: string): number {
  if (!haystack || !needle) {
    return 0;
  }

  const text = haystack.toLowerCase();
  const target = needle.toLowerCase();
  let count = 0;
  let index = text.indexOf(target);
  while (index !== -1) {
    count++;
    index = text.indexOf(target, index + target.length);
  }
  return count;
}

/**
 * Whitespace-token count
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
