/**
 * Resume Content Extractor
 *
 * Turns free-text resumes into ResumeContent records. Each section extractor
 * is an independent pure function over the prepared text or one section's
 * lines; extractResumeContent runs them under graceful degradation so a
 * failing section yields its empty value instead of an error.
 */

import type {
  Education,
  FormattingAnalysis,
  Project,
  ResumeContent,
  ResumeSections,
  WorkExperience
} from '../types';
import { prepareForParsing, matchView, countWords } from './textNormalizer';
import {
  locateResumeSections,
  dedupeCaseInsensitive,
  trimPhrase,
  type ResumeLayout,
  type ResumeSectionKind
} from './sectionScanner';
import { matchVocabulary } from '../config/vocabulary';
import { DEFAULT_CONFIG, type FormattingConfig } from '../config';
import { composeResumeText } from '../scoring/matchScorer';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { ATSErrorFactory } from '../errors/types';
import { toError } from '../../shared/errors';
import { ATSLogger } from '../logging/logger';

export const SUMMARY_MAX_LENGTH = 500;
const NAME_SEARCH_LINES = 5;
const MIN_ENTRY_LENGTH = 20;

// ============================================================================
// Contact details
// ============================================================================

/**
 * First of the first five non-blank lines made of 2-4 alphabetic tokens
 */
export function extractName(lines: readonly string[]): string {
  const candidates = lines.map(line => line.trim()).filter(Boolean).slice(0, NAME_SEARCH_LINES);
  for (const line of candidates) {
    const tokens = line.split(/\s+/);
    if (tokens.length >= 2 && tokens.length <= 4 && tokens.every(token => /^\p{L}+$/u.test(token))) {
      return tokens.join(' ');
    }
  }
  return '';
}

export function extractEmail(text: string): string {
  const match = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/.exec(text);
  return match ? match[0] : '';
}

/**
 * First run of digits, spaces and "().-+" holding at least 10 digits
 */
export function extractPhone(text: string): string {
  for (const match of text.matchAll(/[+(]?\d[\d ().-]*\d/g)) {
    const digits = match[0].replace(/\D/g, '').length;
    if (digits >= 10) {
      return match[0].trim();
    }
  }
  return '';
}

export function extractLinkedinUrl(text: string): string {
  const match = /linkedin\.com\/in\/[\w-]+/i.exec(text);
  return match ? `https://${match[0]}` : '';
}

export function extractGithubUrl(text: string): string {
  const match = /github\.com\/[\w-]+/i.exec(text);
  return match ? `https://${match[0]}` : '';
}

/**
 * First http(s) URL that is not a LinkedIn or GitHub profile
 */
export function extractPortfolioUrl(text: string): string {
  for (const match of text.matchAll(/https?:\/\/[^\s,;<>()[\]]+/gi)) {
    const url = match[0].replace(/[.:!?'"]+$/, '');
    if (!/linkedin\.com|github\.com/i.test(url)) {
      return url;
    }
  }
  return '';
}

export function extractLocation(text: string): string {
  const match = /^(?:location|address)\s*:\s*(.+)$/im.exec(text);
  return match ? match[1].trim() : '';
}

// ============================================================================
// Sections
// ============================================================================

/**
 * Summary lines up to the first blank line, joined and capped
 */
export function extractSummary(sectionLines: readonly string[]): string {
  const collected: string[] = [];
  for (const line of sectionLines) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (collected.length > 0) {
        break;
      }
      continue;
    }
    collected.push(trimmed);
  }
  return collected.join(' ').slice(0, SUMMARY_MAX_LENGTH).trim();
}

const YEAR = /\d{4}/;
const DURATION_START = /\s+(?=(?:(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.?\s+)?\d{4})/i;
const BULLET = /^[-•*]\s*/;

/**
 * Split an entry's first line into title and duration at the first
 * whitespace before an (optionally month-prefixed) year
 */
export function splitTitleAndDuration(line: string): { title: string; duration: string } {
  if (!YEAR.test(line)) {
    return { title: line.trim(), duration: '' };
  }
  const match = DURATION_START.exec(line);
  if (!match) {
    return { title: '', duration: line.trim() };
  }
  return {
    title: line.slice(0, match.index).trim().replace(/[\s,|@(-]+$/, ''),
    duration: line.slice(match.index).trim()
  };
}

function parseExperienceEntry(lines: readonly string[]): WorkExperience | null {
  const { title, duration } = splitTitleAndDuration(lines[0]);
  if (!title) {
    return null;
  }

  const rest = lines.slice(1);
  const companyAt = rest
    .slice(0, 2)
    .findIndex(line => !YEAR.test(line) && !BULLET.test(line) && line.length > 3);
  const company = companyAt === -1 ? '' : rest[companyAt];

  const description = rest
    .filter((line, index) => index !== companyAt && !/^\d{4}/.test(line))
    .map(line => line.replace(BULLET, ''))
    .filter(Boolean)
    .join(' ');

  return { title, company, duration, description };
}

/**
 * Experience entries start at each non-first line that begins with a word
 * character and contains a four-digit year
 */
export function extractWorkExperience(sectionLines: readonly string[]): WorkExperience[] {
  const lines = sectionLines.map(line => line.trim()).filter(Boolean);
  const groups: string[][] = [];

  lines.forEach((line, index) => {
    const current = groups[groups.length - 1];
    if (!current || (index > 0 && /^\w/.test(line) && YEAR.test(line))) {
      groups.push([line]);
    } else {
      current.push(line);
    }
  });

  return groups
    .filter(group => group.join('\n').length > MIN_ENTRY_LENGTH)
    .map(parseExperienceEntry)
    .filter((entry): entry is WorkExperience => entry !== null);
}

const DEGREE = /(?<![a-z])(bachelor(?:'s)?|master(?:'s)?|ph\.?d\.?|doctorate|associate(?:'s)?|mba|b\.s\.?|m\.s\.?|b\.a\.?|m\.a\.?|b\.sc\.?|m\.sc\.?|bs|ms|ba)(?![a-z])/i;
const FIELD = /(?:^|\s)in\s+([a-z][a-z &/+-]*?)(?=\s*(?:[,;|()]|\s[-]\s|\s(?:from|at)\s|\d|\.?$))/i;
const INSTITUTION = /(?:[A-Z][A-Za-z&.'-]*\s+)*(?:University|College|Institute|School)(?:\s+of(?:\s+[A-Z][A-Za-z&.'-]*)+)?/;
const ALL_YEARS = /(?:19|20)\d{2}/g;

function lastYear(text: string): string {
  const years = text.match(ALL_YEARS);
  return years ? years[years.length - 1] : '';
}

/**
 * One entry per line naming a degree; institution and year come from the same
 * line, or from the next line when it names no degree of its own
 */
export function extractEducation(sectionLines: readonly string[]): Education[] {
  const lines = sectionLines.map(line => line.trim()).filter(Boolean);
  const entries: Education[] = [];

  lines.forEach((line, index) => {
    const degree = DEGREE.exec(line);
    if (!degree) {
      return;
    }

    const rest = line.slice(degree.index + degree[0].length);
    const field = FIELD.exec(rest);
    const next = index + 1 < lines.length && !DEGREE.test(lines[index + 1]) ? lines[index + 1] : '';
    const institution = INSTITUTION.exec(line) ?? (next ? INSTITUTION.exec(next) : null);

    entries.push({
      degree: degree[1],
      field: field ? field[1].trim() : '',
      institution: institution ? institution[0].trim() : '',
      year: lastYear(line) || lastYear(next)
    });
  });

  return entries;
}

const LIST_DELIMITERS = /[,;•|\n]|\s[-]\s/;

/**
 * Certification names: delimited pieces longer than three characters
 */
export function extractCertifications(sectionLines: readonly string[]): string[] {
  return dedupeCaseInsensitive(
    sectionLines
      .join('\n')
      .split(LIST_DELIMITERS)
      .map(trimPhrase)
      .filter(piece => piece.length > 3)
  );
}

/**
 * Non-bullet lines open a project ("Name: description" or "Name - description");
 * bullet lines extend the current description
 */
export function extractProjects(sectionLines: readonly string[]): Project[] {
  const projects: { name: string; description: string }[] = [];

  for (const raw of sectionLines) {
    const line = raw.trim();
    if (!line) {
      continue;
    }

    const current = projects[projects.length - 1];
    if (BULLET.test(line) && current) {
      const text = line.replace(BULLET, '');
      current.description = [current.description, text].filter(Boolean).join(' ');
      continue;
    }

    const split = /^(.+?)\s*(?::|\s[-]\s)\s*(.*)$/.exec(line.replace(BULLET, ''));
    const name = (split ? split[1] : line.replace(BULLET, '')).trim();
    if (name) {
      projects.push({ name, description: split ? split[2].trim() : '' });
    }
  }

  return projects;
}

/**
 * Skills section entries with "Label:" prefixes stripped, 2-29 characters
 */
export function extractTechnicalSkills(sectionLines: readonly string[]): string[] {
  const pieces = sectionLines
    .map(line => line.trim().replace(/^[A-Za-z][A-Za-z &/]{0,30}:\s*/, ''))
    .join('\n')
    .split(LIST_DELIMITERS)
    .map(trimPhrase)
    .filter(piece => piece.length >= 2 && piece.length < 30);
  return dedupeCaseInsensitive(pieces);
}

// ============================================================================
// Formatting analysis
// ============================================================================

/**
 * Job-independent ATS readability score with issues and suggestions
 */
export function analyzeFormatting(
  resume: ResumeSections & { readonly wordCount: number },
  bounds: FormattingConfig = DEFAULT_CONFIG.formatting
): FormattingAnalysis {
  const issues: string[] = [];
  const suggestions: string[] = [];
  let score = 0;

  if (resume.wordCount >= bounds.minWordCount && resume.wordCount <= bounds.maxWordCount) {
    score += 20;
  } else if (resume.wordCount < bounds.minWordCount) {
    issues.push(`Resume is too short (${resume.wordCount} words, aim for ${bounds.minWordCount}-${bounds.maxWordCount})`);
  } else {
    issues.push(`Resume is too long (${resume.wordCount} words, aim for ${bounds.minWordCount}-${bounds.maxWordCount})`);
  }

  if (resume.name) {
    score += 10;
  } else {
    issues.push('Missing candidate name');
  }

  if (resume.email) {
    score += 10;
  } else {
    issues.push('Missing email address');
  }

  if (resume.workExperience.length > 0) {
    score += 20;
  } else {
    issues.push('Missing work experience section');
  }

  if (resume.technicalSkills.length > 0 || resume.programmingLanguages.length > 0) {
    score += 20;
  } else {
    issues.push('Missing skills section');
  }

  if (resume.education.length > 0) {
    score += 10;
  } else {
    suggestions.push('Add an education section');
  }

  if (
    resume.technicalSkills.length > 0 ||
    resume.programmingLanguages.length > 0 ||
    resume.frameworksTools.length > 0
  ) {
    score += 20;
  } else {
    suggestions.push('List technical skills such as languages, frameworks and tools');
  }

  if (!resume.phone) {
    suggestions.push('Add a phone number');
  }
  if (!resume.summary) {
    suggestions.push('Add a professional summary');
  }
  if (!resume.linkedinUrl) {
    suggestions.push('Add a LinkedIn profile URL');
  }

  return {
    atsScore: Math.min(100, score),
    formattingIssues: issues,
    optimizationSuggestions: suggestions
  };
}

/**
 * Recompute the derived fields (word count, ATS score, diagnostics) from
 * the record's own sections
 */
export function finalizeResume(
  sections: ResumeSections,
  bounds: FormattingConfig = DEFAULT_CONFIG.formatting
): ResumeContent {
  const wordCount = countWords(composeResumeText(sections));
  const analysis = analyzeFormatting({ ...sections, wordCount }, bounds);
  return {
    ...sections,
    wordCount,
    atsScore: analysis.atsScore,
    formattingIssues: analysis.formattingIssues,
    optimizationSuggestions: analysis.optimizationSuggestions
  };
}

/**
 * Stripped copy of the sections without any derived fields
 */
export function toSections(resume: ResumeSections): ResumeSections {
  return {
    name: resume.name,
    email: resume.email,
    phone: resume.phone,
    location: resume.location,
    linkedinUrl: resume.linkedinUrl,
    githubUrl: resume.githubUrl,
    portfolioUrl: resume.portfolioUrl,
    summary: resume.summary,
    technicalSkills: resume.technicalSkills,
    programmingLanguages: resume.programmingLanguages,
    frameworksTools: resume.frameworksTools,
    softSkills: resume.softSkills,
    workExperience: resume.workExperience,
    education: resume.education,
    certifications: resume.certifications,
    projects: resume.projects
  };
}

// ============================================================================
// Extraction
// ============================================================================

export interface ResumeExtractionOptions {
  formatting?: FormattingConfig;
}

function section<T>(operation: () => T, empty: () => T, name: string): T {
  return GracefulDegradation.withGracefulDegradationSync(
    () => {
      try {
        return operation();
      } catch (error) {
        throw ATSErrorFactory.parsingFailed('resume', toError(error).message, { section: name });
      }
    },
    empty,
    `resume_extraction:${name}`
  );
}

/**
 * Extract structured content from resume text. Never throws for string
 * input; unrecognisable text yields an empty-field record.
 */
export function extractResumeContent(
  rawResume: string,
  options: ResumeExtractionOptions = {}
): ResumeContent {
  const start = Date.now();
  const raw = typeof rawResume === 'string' ? rawResume : '';
  const prepared = section(() => prepareForParsing(raw), () => '', 'prepare');
  const flat = matchView(prepared.replace(/\s+/g, ' '));
  const layout = section(
    (): ResumeLayout => locateResumeSections(prepared),
    (): ResumeLayout => ({ lines: prepared.split('\n'), sections: new Map() }),
    'sections'
  );
  const lines = (kind: ResumeSectionKind): string[] => layout.sections.get(kind) ?? [];

  const sections: ResumeSections = {
    name: section(() => extractName(layout.lines), () => '', 'name'),
    email: section(() => extractEmail(prepared), () => '', 'email'),
    phone: section(() => extractPhone(prepared), () => '', 'phone'),
    location: section(() => extractLocation(prepared), () => '', 'location'),
    linkedinUrl: section(() => extractLinkedinUrl(prepared), () => '', 'linkedin'),
    githubUrl: section(() => extractGithubUrl(prepared), () => '', 'github'),
    portfolioUrl: section(() => extractPortfolioUrl(prepared), () => '', 'portfolio'),
    summary: section(() => extractSummary(lines('summary')), () => '', 'summary'),
    technicalSkills: section(() => extractTechnicalSkills(lines('skills')), (): string[] => [], 'technical_skills'),
    programmingLanguages: section(() => matchVocabulary(flat, 'programmingLanguages'), (): string[] => [], 'programming_languages'),
    frameworksTools: section(() => matchVocabulary(flat, 'frameworksTools'), (): string[] => [], 'frameworks_tools'),
    softSkills: section(() => matchVocabulary(flat, 'softSkills'), (): string[] => [], 'soft_skills'),
    workExperience: section(() => extractWorkExperience(lines('experience')), (): WorkExperience[] => [], 'experience'),
    education: section(() => extractEducation(lines('education')), (): Education[] => [], 'education'),
    certifications: section(() => extractCertifications(lines('certifications')), (): string[] => [], 'certifications'),
    projects: section(() => extractProjects(lines('projects')), (): Project[] => [], 'projects')
  };

  const resume = finalizeResume(sections, options.formatting);
  ATSLogger.logResumeExtraction(resume, Date.now() - start);
  return resume;
}
