/**
 * Skill Vocabulary
 *
 * Category tables loaded once from vocabulary.json, validated and frozen.
 * Both the job and resume extractors match against the same tables so skill
 * overlap can be computed category by category.
 */

import { z } from 'zod';
import vocabularyData from './vocabulary.json';
import { containsTerm } from '../parser/textNormalizer';
import type { ExperienceLevel } from '../types';

export const SKILL_CATEGORIES = [
  'programmingLanguages',
  'frameworksTools',
  'databases',
  'cloudPlatforms',
  'softSkills'
] as const;

export type SkillCategory = typeof SKILL_CATEGORIES[number];

const termList = z.array(z.string().trim().min(1));

const VocabularySchema = z.object({
  skills: z.object({
    programmingLanguages: termList,
    frameworksTools: termList,
    databases: termList,
    cloudPlatforms: termList,
    softSkills: termList
  }),
  education: termList,
  technicalIndicators: termList,
  experienceLevels: z.object({
    entry: termList,
    mid: termList,
    senior: termList,
    executive: termList
  }),
  jobTypes: termList,
  certifications: termList
});

const vocabulary = VocabularySchema.parse(vocabularyData);

function freeze(terms: string[]): readonly string[] {
  return Object.freeze([...terms]);
}

export const SKILL_VOCABULARY: Readonly<Record<SkillCategory, readonly string[]>> = Object.freeze({
  programmingLanguages: freeze(vocabulary.skills.programmingLanguages),
  frameworksTools: freeze(vocabulary.skills.frameworksTools),
  databases: freeze(vocabulary.skills.databases),
  cloudPlatforms: freeze(vocabulary.skills.cloudPlatforms),
  softSkills: freeze(vocabulary.skills.softSkills)
});

export const EDUCATION_TERMS = freeze(vocabulary.education);
export const TECHNICAL_INDICATORS = freeze(vocabulary.technicalIndicators);
export const JOB_TYPES = freeze(vocabulary.jobTypes);
export const CERTIFICATIONS = freeze(vocabulary.certifications);

/** Checked in this order; the first level with a matching term wins */
export const EXPERIENCE_LEVELS: readonly (readonly [ExperienceLevel, readonly string[]])[] = Object.freeze([
  ['entry', freeze(vocabulary.experienceLevels.entry)],
  ['mid', freeze(vocabulary.experienceLevels.mid)],
  ['senior', freeze(vocabulary.experienceLevels.senior)],
  ['executive', freeze(vocabulary.experienceLevels.executive)]
] as const);

const TECHNICAL_TERMS: ReadonlySet<string> = new Set([
  ...SKILL_VOCABULARY.programmingLanguages,
  ...SKILL_VOCABULARY.frameworksTools,
  ...SKILL_VOCABULARY.databases,
  ...SKILL_VOCABULARY.cloudPlatforms
]);

/**
 * Terms from a list that occur in the text as whole terms, in list order
 */
export function matchTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter(term => containsTerm(text, term));
}

/**
 * Vocabulary hits for one skill category, in vocabulary order
 */
export function matchVocabulary(text: string, category: SkillCategory): string[] {
  return matchTerms(text, SKILL_VOCABULARY[category]);
}

/**
 * A skill is technical when it names a known language, framework, database
 * or cloud platform, or contains one of the technical indicator words.
 */
export function isTechnicalSkill(skill: string): boolean {
  const lowered = skill.trim().toLowerCase();
  if (!lowered) {
    return false;
  }
  return TECHNICAL_TERMS.has(lowered) ||
    TECHNICAL_INDICATORS.some(indicator => lowered.includes(indicator));
}
