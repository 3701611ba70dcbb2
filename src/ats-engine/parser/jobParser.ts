/**
 * Job Requirement Extractor
 *
 * Turns free-text job postings into JobRequirements records. Extraction is
 * deterministic and total: every section extractor is a pure function over
 * the prepared (line-preserving) or flat (lower-cased, single-line) text, and
 * a section that fails contributes its empty value.
 *
 * The optional enhancement step asks the text enhancer for extra skills and
 * industry terms and only ever adds to the deterministic result.
 */

import type { ExperienceLevel, JobHints, JobRequirements } from '../types';
import {
  prepareForParsing,
  normalize,
  matchView,
  containsTerm,
  countTerm
} from './textNormalizer';
import {
  extractMarkedSpan,
  splitPhrases,
  dedupeCaseInsensitive,
  REQUIRED_MARKERS,
  PREFERRED_MARKERS,
  RESPONSIBILITY_MARKERS,
  RESPONSIBILITY_END_MARKERS
} from './sectionScanner';
import {
  EDUCATION_TERMS,
  EXPERIENCE_LEVELS,
  JOB_TYPES,
  CERTIFICATIONS,
  matchTerms,
  matchVocabulary,
  type SkillCategory
} from '../config/vocabulary';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { ATSErrorFactory } from '../errors/types';
import { toError } from '../../shared/errors';
import { ATSLogger } from '../logging/logger';
import { parseJsonResponse } from '../../shared/llm/client';
import { JobEnhancementReplySchema, type JobEnhancementReply } from '../validation/schemas';
import { requestEnhancement, type TextEnhancer } from '../enhancement/textEnhancer';

// ============================================================================
// Section extractors
// ============================================================================

export interface SkillRequirements {
  requiredSkills: string[];
  preferredSkills: string[];
}

/**
 * Required and preferred skill phrases. A phrase found in both spans stays
 * only in requiredSkills.
 */
export function extractSkillRequirements(prepared: string): SkillRequirements {
  const requiredSpan = extractMarkedSpan(prepared, REQUIRED_MARKERS, [
    ...PREFERRED_MARKERS,
    ...RESPONSIBILITY_MARKERS
  ]);
  const preferredSpan = extractMarkedSpan(prepared, PREFERRED_MARKERS, [
    ...REQUIRED_MARKERS,
    ...RESPONSIBILITY_MARKERS
  ]);

  const requiredSkills = dedupeCaseInsensitive(splitPhrases(requiredSpan));
  const required = new Set(requiredSkills.map(skill => skill.toLowerCase()));
  const preferredSkills = dedupeCaseInsensitive(splitPhrases(preferredSpan))
    .filter(skill => !required.has(skill.toLowerCase()));

  return { requiredSkills, preferredSkills };
}

export type CategorizedSkills = Record<SkillCategory, string[]>;

export function extractCategorizedSkills(flat: string): CategorizedSkills {
  return {
    programmingLanguages: matchVocabulary(flat, 'programmingLanguages'),
    frameworksTools: matchVocabulary(flat, 'frameworksTools'),
    databases: matchVocabulary(flat, 'databases'),
    cloudPlatforms: matchVocabulary(flat, 'cloudPlatforms'),
    softSkills: matchVocabulary(flat, 'softSkills')
  };
}

/**
 * First level, in entry -> mid -> senior -> executive order, with a matching term
 */
export function extractExperienceLevel(flat: string): ExperienceLevel | '' {
  for (const [level, terms] of EXPERIENCE_LEVELS) {
    if (terms.some(term => containsTerm(flat, term))) {
      return level;
    }
  }
  return '';
}

const YEARS_PATTERN = new RegExp(
  [
    '(?:minimum(?:\\s+of)?|at\\s+least)\\s+(\\d{1,2})\\s*\\+?\\s*years?',
    '(?<![\\d.])(\\d{1,2})\\s*\\+\\s*years?',
    '(?<![\\d.])(\\d{1,2})\\s*(?:-|to)\\s*\\d{1,2}\\s*years?',
    '(?<![\\d.])(\\d{1,2})\\s*years?'
  ].join('|'),
  'i'
);

/**
 * Years of experience from the first "N+ years", "N-M years", "N to M years",
 * "minimum N years" or "N years" in text order
 */
export function extractYearsExperience(flat: string): number | null {
  const match = YEARS_PATTERN.exec(flat);
  if (!match) {
    return null;
  }
  const digits = match.slice(1).find(group => group !== undefined);
  return digits === undefined ? null : Number(digits);
}

/**
 * Education terms found as substrings
 */
export function extractEducationRequirements(flat: string): string[] {
  return EDUCATION_TERMS.filter(term => flat.includes(term));
}

export function extractResponsibilities(prepared: string): string[] {
  const span = extractMarkedSpan(prepared, RESPONSIBILITY_MARKERS, RESPONSIBILITY_END_MARKERS);
  return dedupeCaseInsensitive(splitPhrases(span));
}

const LOCATION_PATTERNS: readonly RegExp[] = [
  /(?<![a-z0-9_])location\s*:\s*([^,\n]+)/i,
  /(?<![a-z0-9_])based in\s+([^,\n]+)/i,
  /(?<![a-z0-9_])office in\s+([^,\n]+)/i,
  /(?<![a-z0-9_])(remote)(?![a-z0-9_])/i,
  /(?<![a-z0-9_])(hybrid)(?![a-z0-9_])/i
];

/**
 * Location from the first matching pattern, checked in pattern order
 */
export function extractLocation(prepared: string): string {
  for (const pattern of LOCATION_PATTERNS) {
    const match = pattern.exec(prepared);
    if (match) {
      const value = match[1].trim().replace(/[.;:]+$/, '').trim();
      if (value) {
        return value;
      }
    }
  }
  return '';
}

export function extractJobType(flat: string): string {
  return JOB_TYPES.find(jobType => containsTerm(flat, jobType)) ?? '';
}

/**
 * Certification names in vocabulary (display) spelling
 */
export function extractCertifications(flat: string): string[] {
  return matchTerms(flat, CERTIFICATIONS);
}

// ============================================================================
// Keyword set
// ============================================================================

type KeywordSources = Pick<
  JobRequirements,
  | 'requiredSkills'
  | 'preferredSkills'
  | 'programmingLanguages'
  | 'frameworksTools'
  | 'databases'
  | 'cloudPlatforms'
  | 'softSkills'
  | 'educationRequirements'
  | 'certifications'
  | 'responsibilities'
  | 'title'
  | 'experienceLevel'
>;

/**
 * Keep the first spelling of each keyword and drop tokens of length <= 1
 */
export function finalizeKeywords(keywords: readonly string[]): string[] {
  return dedupeCaseInsensitive(keywords).filter(keyword => keyword.length > 1);
}

/**
 * Ordered, de-duplicated union of every collection, then title and level
 */
export function buildAtsKeywords(sources: KeywordSources): string[] {
  return finalizeKeywords([
    ...sources.requiredSkills,
    ...sources.preferredSkills,
    ...sources.programmingLanguages,
    ...sources.frameworksTools,
    ...sources.databases,
    ...sources.cloudPlatforms,
    ...sources.softSkills,
    ...sources.educationRequirements,
    ...sources.certifications,
    ...sources.responsibilities,
    sources.title,
    sources.experienceLevel
  ]);
}

/**
 * Whole-word occurrence count of each keyword in the flat posting text
 */
export function computeKeywordFrequency(
  flat: string,
  keywords: readonly string[]
): Record<string, number> {
  return Object.fromEntries(keywords.map(keyword => [keyword, countTerm(flat, keyword)]));
}

// ============================================================================
// Extraction
// ============================================================================

function section<T>(operation: () => T, empty: () => T, name: string): T {
  return GracefulDegradation.withGracefulDegradationSync(
    () => {
      try {
        return operation();
      } catch (error) {
        throw ATSErrorFactory.parsingFailed('job', toError(error).message, { section: name });
      }
    },
    empty,
    `job_extraction:${name}`
  );
}

/**
 * Extract structured requirements from a job posting. Never throws for
 * string input; unrecognisable text yields empty collections.
 */
export function extractJobRequirements(rawPosting: string, hints: JobHints = {}): JobRequirements {
  const start = Date.now();
  const raw = typeof rawPosting === 'string' ? rawPosting : '';
  const prepared = section(() => prepareForParsing(raw), () => '', 'prepare');
  const flat = section(() => matchView(normalize(raw)), () => '', 'normalize');

  const title = (hints.title ?? '').trim();
  const company = (hints.company ?? '').trim();

  const { requiredSkills, preferredSkills } = section(
    () => extractSkillRequirements(prepared),
    (): SkillRequirements => ({ requiredSkills: [], preferredSkills: [] }),
    'skill_requirements'
  );
  const categories = section(
    () => extractCategorizedSkills(flat),
    (): CategorizedSkills => ({
      programmingLanguages: [],
      frameworksTools: [],
      databases: [],
      cloudPlatforms: [],
      softSkills: []
    }),
    'categories'
  );

  const experienceLevel = section(() => extractExperienceLevel(flat), (): ExperienceLevel | '' => '', 'experience_level');
  const yearsExperience = section(() => extractYearsExperience(flat), (): number | null => null, 'years');
  const educationRequirements = section(() => extractEducationRequirements(flat), (): string[] => [], 'education');
  const responsibilities = section(() => extractResponsibilities(prepared), (): string[] => [], 'responsibilities');
  const location = section(() => extractLocation(prepared), () => '', 'location');
  const jobType = section(() => extractJobType(flat), () => '', 'job_type');
  const certifications = section(() => extractCertifications(flat), (): string[] => [], 'certifications');

  const sources: KeywordSources = {
    requiredSkills,
    preferredSkills,
    ...categories,
    educationRequirements,
    certifications,
    responsibilities,
    title,
    experienceLevel
  };
  const atsKeywords = buildAtsKeywords(sources);

  const job: JobRequirements = {
    title,
    company,
    location,
    jobType,
    experienceLevel,
    yearsExperience,
    requiredSkills,
    preferredSkills,
    ...categories,
    educationRequirements,
    certifications,
    industryKeywords: [],
    responsibilities,
    atsKeywords,
    keywordFrequency: computeKeywordFrequency(flat, atsKeywords)
  };

  ATSLogger.logJobExtraction(job, Date.now() - start);
  return job;
}

// ============================================================================
// Optional enhancement
// ============================================================================

export interface JobEnhancementOptions {
  timeoutMs: number;
  maxTokens: number;
}

const ENHANCEMENT_TEXT_LIMIT = 2000;

export function buildJobEnhancementPrompt(job: JobRequirements, normalizedPosting: string): string {
  return [
    'Analyze this job posting and extract additional insights.',
    '',
    'Job posting:',
    normalizedPosting.slice(0, ENHANCEMENT_TEXT_LIMIT),
    '',
    `Keywords already extracted: ${job.atsKeywords.join(', ') || '(none)'}`,
    '',
    'Identify:',
    '1. Technical skills or tools not already captured',
    '2. Industry-specific terminology',
    '3. Hidden requirements or qualifications',
    '4. Key responsibilities that indicate required experience',
    '',
    'Respond in JSON format with these fields, each a list of short strings:',
    '{"additional_skills": [], "industry_terms": [], "hidden_requirements": [], "key_responsibilities": []}'
  ].join('\n');
}

function cleanReplyList(items: readonly string[]): string[] {
  return finalizeKeywords(items.map(item => item.trim()));
}

/**
 * Merge a validated enhancement reply into the requirements. Purely additive:
 * every existing keyword survives and atsKeywords stays a superset of the
 * required and preferred skills.
 */
export function mergeJobEnhancement(
  job: JobRequirements,
  reply: JobEnhancementReply,
  rawPosting: string
): JobRequirements {
  const additionalSkills = cleanReplyList(reply.additional_skills);
  const hiddenRequirements = cleanReplyList(reply.hidden_requirements);
  const industryTerms = cleanReplyList(reply.industry_terms);
  const industryKeywords = dedupeCaseInsensitive([...job.industryKeywords, ...industryTerms]);
  const responsibilities = dedupeCaseInsensitive([
    ...job.responsibilities,
    ...cleanReplyList(reply.key_responsibilities)
  ]);

  const atsKeywords = finalizeKeywords([
    ...buildAtsKeywords({ ...job, responsibilities }),
    ...job.atsKeywords,
    ...additionalSkills,
    ...hiddenRequirements,
    ...industryKeywords
  ]);

  return {
    ...job,
    industryKeywords,
    responsibilities,
    atsKeywords,
    keywordFrequency: computeKeywordFrequency(matchView(normalize(rawPosting)), atsKeywords)
  };
}

/**
 * Ask the enhancer for extra keywords. Any error, timeout, empty reply or
 * schema mismatch returns the input unchanged.
 */
export async function enhanceJobRequirements(
  job: JobRequirements,
  rawPosting: string,
  enhancer: TextEnhancer,
  options: JobEnhancementOptions
): Promise<JobRequirements> {
  const operation = 'job_requirements';
  const prompt = buildJobEnhancementPrompt(job, normalize(rawPosting));
  const reply = await requestEnhancement(enhancer, prompt, {
    operation,
    maxTokens: options.maxTokens,
    timeoutMs: options.timeoutMs
  });

  if (reply === null) {
    return job;
  }

  return GracefulDegradation.withGracefulDegradationSync(
    () => {
      const parsed = JobEnhancementReplySchema.safeParse(parseJsonResponse(reply));
      if (!parsed.success) {
        throw ATSErrorFactory.enhancementMalformed(
          operation,
          parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        );
      }
      const enhanced = mergeJobEnhancement(job, parsed.data, rawPosting);
      ATSLogger.logEnhancement(operation, 'accepted', {
        addedKeywords: enhanced.atsKeywords.length - job.atsKeywords.length
      });
      return enhanced;
    },
    () => {
      ATSLogger.logEnhancement(operation, 'rejected');
      return job;
    },
    `enhancement:${operation}`
  );
}
