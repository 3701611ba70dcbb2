/**
 * Section Scanner
 *
 * Marker-delimited span extraction for job postings and header-based section
 * location for resumes. Operates on prepareForParsing output, where lines are
 * kept and blank lines separate paragraphs.
 */

import { escapeRegex } from './textNormalizer';

export const REQUIRED_MARKERS = ['required', 'requirements', 'must have', 'essential'] as const;
export const PREFERRED_MARKERS = ['preferred', 'nice to have', 'bonus'] as const;
export const RESPONSIBILITY_MARKERS = ['responsibilities', 'duties', 'you will'] as const;
export const RESPONSIBILITY_END_MARKERS = [
  'requirements',
  'required',
  'qualifications',
  'preferred',
  'nice to have'
] as const;

const MIN_PHRASE_LENGTH = 3;
const MAX_PHRASE_LENGTH = 50;

/**
 * Alternation of whole-term markers, longest first so "requirements" is
 * preferred over its prefix "required".
 */
function markerPattern(markers: readonly string[], flags = ''): RegExp {
  const body = [...markers]
    .sort((a, b) => b.length - a.length)
    .map(marker => escapeRegex(marker).replace(/ +/g, '\\s+'))
    .join('|');
  return new RegExp(`(?<![a-z0-9_])(?:${body})(?![a-z0-9_])`, `i${flags}`);
}

/**
 * Text after the first start marker, up to the earliest end marker, blank
 * line or end of text. Empty when no start marker occurs.
 */
export function extractMarkedSpan(
  text: string,
  startMarkers: readonly string[],
  endMarkers: readonly string[]
): string {
  if (!text || startMarkers.length === 0) {
    return '';
  }

  const start = markerPattern(startMarkers).exec(text);
  if (!start) {
    return '';
  }

  let spanStart = start.index + start[0].length;
  while (spanStart < text.length && /[:\s]/.test(text[spanStart])) {
    spanStart++;
  }

  const rest = text.slice(spanStart);
  let spanEnd = rest.length;

  const blankLine = /\n\s*\n/.exec(rest);
  if (blankLine) {
    spanEnd = blankLine.index;
  }

  if (endMarkers.length > 0) {
    const end = markerPattern(endMarkers).exec(rest);
    if (end && end.index < spanEnd) {
      spanEnd = end.index;
    }
  }

  return rest.slice(0, spanEnd).trim();
}

/**
 * Strip surrounding punctuation, keeping balanced parentheses
 */
export function trimPhrase(phrase: string): string {
  let result = phrase
    .trim()
    .replace(/^[\s\-*.:;,!?'"`]+/, '')
    .replace(/[\s\-*.:;,!?'"`]+$/, '');

  if (result.startsWith('(') && !result.includes(')')) {
    result = result.slice(1).trim();
  }
  if (result.endsWith(')') && !result.includes('(')) {
    result = result.slice(0, -1).trim();
  }
  return result;
}

/**
 * Split a span into candidate phrases on comma, semicolon, bullet, newline,
 * sentence end and free-standing dash. Pieces keep 3-50 characters.
 */
export function splitPhrases(span: string): string[] {
  if (!span) {
    return [];
  }

  return span
    .split(/[,;•*|\n]|\.(?:\s+|$)|(?:^|\s)-+(?=\s)/)
    .map(trimPhrase)
    .filter(piece => piece.length >= MIN_PHRASE_LENGTH && piece.length <= MAX_PHRASE_LENGTH);
}

/**
 * Case-insensitive de-duplication; the first spelling wins and blank entries
 * are dropped.
 */
export function dedupeCaseInsensitive(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const item of items) {
    const key = item.trim().toLowerCase();
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(item.trim());
  }

  return result;
}

// ============================================================================
// Resume sections
// ============================================================================

export type ResumeSectionKind =
  | 'summary'
  | 'experience'
  | 'education'
  | 'skills'
  | 'certifications'
  | 'projects';

const SECTION_KEYWORDS: Record<string, ResumeSectionKind> = {
  summary: 'summary',
  objective: 'summary',
  profile: 'summary',
  experience: 'experience',
  history: 'experience',
  education: 'education',
  skills: 'skills',
  technologies: 'skills',
  certifications: 'certifications',
  certificates: 'certifications',
  projects: 'projects'
};

const SECTION_HEADER = new RegExp(
  '^(?:(?:professional|work|technical|relevant|employment|key|career)\\s+)?' +
  `(${Object.keys(SECTION_KEYWORDS).join('|')})` +
  '\\s*(?::\\s*(.*))?$',
  'i'
);

export interface SectionHeader {
  kind: ResumeSectionKind;
  inline: string;
}

/**
 * Recognise a section header line, alone or followed by ":" and content
 */
export function parseSectionHeader(line: string): SectionHeader | null {
  const match = SECTION_HEADER.exec(line.trim());
  if (!match) {
    return null;
  }
  const kind = SECTION_KEYWORDS[match[1].toLowerCase()];
  return { kind, inline: (match[2] ?? '').trim() };
}

export interface ResumeLayout {
  /** All lines of the prepared text */
  lines: string[];
  /** Lines per section, in document order; repeated headers append */
  sections: Map<ResumeSectionKind, string[]>;
}

/**
 * Split prepared resume text into its header-delimited sections
 */
export function locateResumeSections(text: string): ResumeLayout {
  const lines = text ? text.split('\n') : [];
  const sections = new Map<ResumeSectionKind, string[]>();
  let current: string[] | null = null;

  for (const line of lines) {
    const header = parseSectionHeader(line);
    if (header) {
      const existing = sections.get(header.kind);
      if (existing) {
        existing.push('');
        current = existing;
      } else {
        current = [];
        sections.set(header.kind, current);
      }
      if (header.inline) {
        current.push(header.inline);
      }
      continue;
    }
    if (current) {
      current.push(line);
    }
  }

  return { lines, sections };
}
