/**
 * Match Scorer
 *
 * Scores a resume against job requirements. Pure and deterministic: the same
 * pair always yields the same MatchScore.
 *
 * Dimensions (default weights):
 * - keyword (0.4): share of job keywords present in the resume text
 * - skill (0.3): overlap of technical/language/framework skill sets
 * - experience (0.2): 60 baseline plus up to 40 for top job keywords found
 *   in the experience descriptions; 30 with no experience
 * - formatting (0.1): the resume's own ATS score
 */

import type { JobRequirements, MatchScore, ResumeSections, ScoringWeights } from '../types';
import { DEFAULT_CONFIG } from '../config';
import { containsTerm, countLiteral } from '../parser/textNormalizer';
import { ATSErrorFactory } from '../errors/types';
import { ATSLogger } from '../logging/logger';

/** Defined score when the job offers nothing to compare against */
export const NEUTRAL_SCORE = 50;
export const NO_EXPERIENCE_SCORE = 30;
export const EXPERIENCE_BASELINE = 60;
export const EXPERIENCE_BONUS = 40;
export const TOP_KEYWORD_COUNT = 10;

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * The text a resume record presents to an ATS: name, summary, skill lists,
 * experience, education, certifications and projects, one part per line.
 */
export function composeResumeText(resume: ResumeSections): string {
  const parts = [
    resume.name,
    resume.summary,
    resume.technicalSkills.join(', '),
    resume.programmingLanguages.join(', '),
    resume.frameworksTools.join(', '),
    resume.softSkills.join(', '),
    ...resume.workExperience.map(entry =>
      [entry.title, entry.company, entry.description].filter(Boolean).join(' ')
    ),
    ...resume.education.map(entry =>
      [entry.degree, entry.field, entry.institution, entry.year].filter(Boolean).join(' ')
    ),
    resume.certifications.join(', '),
    ...resume.projects.map(project =>
      [project.name, project.description].filter(Boolean).join(' ')
    )
  ];

  return parts.filter(part => part.trim()).join('\n');
}

function keywordFrequencyOf(job: JobRequirements, keyword: string): number {
  return Object.hasOwn(job.keywordFrequency, keyword) ? job.keywordFrequency[keyword] : 0;
}

/**
 * Job keywords by descending frequency; ties keep atsKeywords order
 */
export function rankKeywordsByFrequency(job: JobRequirements): string[] {
  return job.atsKeywords
    .map((keyword, index) => ({ keyword, index, frequency: keywordFrequencyOf(job, keyword) }))
    .sort((a, b) => b.frequency - a.frequency || a.index - b.index)
    .map(entry => entry.keyword);
}

function lowerSet(...lists: (readonly string[])[]): Set<string> {
  const result = new Set<string>();
  for (const list of lists) {
    for (const item of list) {
      const key = item.trim().toLowerCase();
      if (key) {
        result.add(key);
      }
    }
  }
  return result;
}

export function calculateKeywordScore(resumeText: string, job: JobRequirements): number {
  if (job.atsKeywords.length === 0) {
    return NEUTRAL_SCORE;
  }
  const found = job.atsKeywords.filter(keyword => containsTerm(resumeText, keyword)).length;
  return (100 * found) / job.atsKeywords.length;
}

export function calculateSkillScore(resume: ResumeSections, job: JobRequirements): number {
  const jobSkills = lowerSet(job.requiredSkills, job.programmingLanguages, job.frameworksTools);
  if (jobSkills.size === 0) {
    return NEUTRAL_SCORE;
  }
  const resumeSkills = lowerSet(resume.technicalSkills, resume.programmingLanguages, resume.frameworksTools);
  let overlap = 0;
  for (const skill of jobSkills) {
    if (resumeSkills.has(skill)) {
      overlap++;
    }
  }
  return (100 * overlap) / jobSkills.size;
}

export function calculateExperienceScore(resume: ResumeSections, job: JobRequirements): number {
  if (resume.workExperience.length === 0) {
    return NO_EXPERIENCE_SCORE;
  }
  const descriptions = resume.workExperience.map(entry => entry.description).join(' ');
  const hits = rankKeywordsByFrequency(job)
    .slice(0, TOP_KEYWORD_COUNT)
    .filter(keyword => containsTerm(descriptions, keyword)).length;
  return Math.min(100, EXPERIENCE_BASELINE + (EXPERIENCE_BONUS * hits) / TOP_KEYWORD_COUNT);
}

/**
 * Literal occurrence count of each job keyword, zeros omitted
 */
export function findMatchedKeywords(resumeText: string, job: JobRequirements): Record<string, number> {
  return Object.fromEntries(
    job.atsKeywords
      .map((keyword): [string, number] => [keyword, countLiteral(resumeText, keyword)])
      .filter(([, count]) => count > 0)
  );
}

/**
 * Score a resume against job requirements
 *
 * @throws ATSError INVALID_INPUT when either record is missing
 */
export function scoreMatch(
  resume: ResumeSections & { readonly atsScore: number },
  job: JobRequirements,
  weights: ScoringWeights = DEFAULT_CONFIG.scoring.weights
): MatchScore {
  if (!resume) {
    throw ATSErrorFactory.invalidInput('resume', 'scoreMatch requires a resume record', resume);
  }
  if (!job) {
    throw ATSErrorFactory.invalidInput('job', 'scoreMatch requires a job requirements record', job);
  }

  const resumeText = composeResumeText(resume);

  const keywordScore = calculateKeywordScore(resumeText, job);
  const skillScore = calculateSkillScore(resume, job);
  const experienceScore = calculateExperienceScore(resume, job);
  const formattingScore = clampScore(resume.atsScore);

  const overall = clampScore(
    weights.keyword * keywordScore +
    weights.skill * skillScore +
    weights.experience * experienceScore +
    weights.formatting * formattingScore
  );

  const score: MatchScore = {
    overall,
    keywordScore,
    skillScore,
    experienceScore,
    formattingScore,
    matchedKeywords: findMatchedKeywords(resumeText, job)
  };

  ATSLogger.logScoring(score, job.atsKeywords.length);
  return score;
}
