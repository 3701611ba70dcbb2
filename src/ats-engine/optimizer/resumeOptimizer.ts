/**
 * Resume Optimizer
 *
 * Produces a revised resume tuned to a job's requirements. Each section has
 * its own optimizer working from the original record; the collaborator
 * (TextEnhancer) is optional and every call to it has a deterministic
 * fallback. A final guard guarantees the optimized resume never scores below
 * the original.
 */

import type {
  JobRequirements,
  MatchScore,
  OptimizationResult,
  OptimizedSection,
  Project,
  ResumeContent,
  ResumeSections,
  ScoringWeights,
  WorkExperience
} from '../types';
import { OPTIMIZED_SECTIONS } from '../types';
import { DEFAULT_CONFIG, type FormattingConfig, type OptimizationTuning } from '../config';
import { isTechnicalSkill } from '../config/vocabulary';
import { containsTerm } from '../parser/textNormalizer';
import { finalizeResume, toSections } from '../parser/resumeParser';
import { composeResumeText, rankKeywordsByFrequency, scoreMatch } from '../scoring/matchScorer';
import { NoopTextEnhancer, requestEnhancement, type TextEnhancer } from '../enhancement/textEnhancer';
import { ATSErrorFactory } from '../errors/types';
import { ATSLogger } from '../logging/logger';

export interface OptimizeOptions {
  enhancer?: TextEnhancer;
  /** Per-call enhancer timeout */
  timeoutMs?: number;
  weights?: ScoringWeights;
  /** Clock used for the result timestamp */
  now?: () => Date;
  tuning?: OptimizationTuning;
  formatting?: FormattingConfig;
  summaryMaxTokens?: number;
  experienceMaxTokens?: number;
}

interface OptimizerContext {
  job: JobRequirements;
  /** Composed text of the original resume, used for the implication check */
  originalText: string;
  enhancer: TextEnhancer;
  timeoutMs: number;
  tuning: OptimizationTuning;
  summaryMaxTokens: number;
  experienceMaxTokens: number;
}

type SkillLists = Pick<
  ResumeSections,
  'technicalSkills' | 'programmingLanguages' | 'frameworksTools' | 'softSkills'
>;

/** The optimized content of every section the guard can roll back */
interface SectionCandidates {
  summary: string;
  skills: SkillLists;
  experience: readonly WorkExperience[];
  certifications: readonly string[];
  projects: readonly Project[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Append a sentence, closing the text with a period first when it has no
 * terminal punctuation
 */
export function appendSentence(text: string, sentence: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    return sentence;
  }
  const closed = /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
  return `${closed} ${sentence}`;
}

function truncateWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/).filter(Boolean);
  return words.length > maxWords ? words.slice(0, maxWords).join(' ') : words.join(' ');
}

function lowerSet(items: readonly string[]): Set<string> {
  return new Set(items.map(item => item.trim().toLowerCase()));
}

const SUMMARY_LEAD = 'Experienced with';
const EXPERIENCE_LEAD = 'Worked with';
const PROJECT_LEAD = 'Technologies used include';

/**
 * Whether the text already ends in a sentence starting with the given lead,
 * as left by an earlier optimization pass
 */
export function endsWithAppended(text: string, lead: string): boolean {
  const trimmed = text.trim();
  const at = trimmed.lastIndexOf(`${lead} `);
  if (at === -1 || !trimmed.endsWith('.') || /[.!?]\s/.test(trimmed.slice(at))) {
    return false;
  }
  return at === 0 || /[.!?]\s$/.test(trimmed.slice(0, at));
}

/**
 * The posting's own spelling of a vocabulary term when the job lists it as a
 * required or preferred skill
 */
export function displaySpelling(term: string, job: JobRequirements): string {
  const key = term.trim().toLowerCase();
  return [...job.requiredSkills, ...job.preferredSkills].find(skill => skill.trim().toLowerCase() === key) ?? term;
}

/**
 * Lower-cased job skills of every technical kind; responsibilities, level,
 * title and education terms are not skills
 */
function jobSkillSet(job: JobRequirements): Set<string> {
  return lowerSet([
    ...job.requiredSkills,
    ...job.preferredSkills,
    ...job.programmingLanguages,
    ...job.frameworksTools,
    ...job.databases,
    ...job.cloudPlatforms
  ]);
}

/**
 * Stable sort placing entries that are job keywords first
 */
export function prioritizeByKeywords(items: readonly string[], keywords: readonly string[]): string[] {
  const wanted = lowerSet(keywords);
  const inJob = items.filter(item => wanted.has(item.toLowerCase()));
  const rest = items.filter(item => !wanted.has(item.toLowerCase()));
  return [...inJob, ...rest];
}

// ============================================================================
// Summary
// ============================================================================

export function buildSummaryPrompt(summary: string, job: JobRequirements, maxWords: number): string {
  return [
    'Optimize this professional summary for the following job.',
    '',
    `Job Title: ${job.title || 'Not specified'}`,
    `Company: ${job.company || 'Not specified'}`,
    `Key Requirements: ${job.requiredSkills.slice(0, 10).join(', ')}`,
    '',
    'Original Summary:',
    summary,
    '',
    'Create an optimized summary that:',
    '1. Incorporates relevant keywords naturally',
    '2. Highlights matching skills and experience',
    '3. Keeps a professional tone',
    `4. Stays under ${maxWords} words`,
    '',
    'Return only the optimized summary text.'
  ].join('\n');
}

/**
 * Deterministic summary path: one "Experienced with X." clause for each of
 * the first required skills the summary does not mention yet
 */
export function appendSkillClauses(summary: string, job: JobRequirements, maxClauses: number): string {
  if (!summary.trim() || endsWithAppended(summary, SUMMARY_LEAD)) {
    return summary;
  }
  return job.requiredSkills
    .filter(skill => !containsTerm(summary, skill))
    .slice(0, maxClauses)
    .reduce((text, skill) => appendSentence(text, `${SUMMARY_LEAD} ${skill}.`), summary);
}

export async function optimizeSummary(summary: string, context: OptimizerContext): Promise<string> {
  const { job, tuning } = context;
  if (!summary.trim()) {
    return summary;
  }

  const reply = await requestEnhancement(
    context.enhancer,
    buildSummaryPrompt(summary, job, tuning.summaryMaxWords),
    { operation: 'summary', maxTokens: context.summaryMaxTokens, timeoutMs: context.timeoutMs }
  );

  if (reply === null) {
    return appendSkillClauses(summary, job, tuning.maxSummaryClauses);
  }
  if (reply.length < tuning.summaryMinLength) {
    ATSLogger.logEnhancement('summary', 'rejected', { replyLength: reply.length });
    return summary;
  }

  ATSLogger.logEnhancement('summary', 'accepted', { replyLength: reply.length });
  return truncateWords(reply, tuning.summaryMaxWords);
}

// ============================================================================
// Skills
// ============================================================================

function extendList(
  original: readonly string[],
  candidates: readonly string[],
  accept: (skill: string) => boolean
): string[] {
  const seen = lowerSet(original);
  const result = [...original];
  for (const candidate of candidates) {
    const key = candidate.trim().toLowerCase();
    if (key && !seen.has(key) && accept(candidate)) {
      seen.add(key);
      result.push(candidate.trim());
    }
  }
  return result;
}

/**
 * Add job skills the original resume already implies, then put job keywords
 * first. Technical entries must pass isTechnicalSkill; soft skills only the
 * implication check.
 */
export function optimizeSkills(resume: SkillLists, context: Pick<OptimizerContext, 'job' | 'originalText'>): SkillLists {
  const { job, originalText } = context;
  const implied = (skill: string): boolean => containsTerm(originalText, skill);
  const technical = (skill: string): boolean => isTechnicalSkill(skill) && implied(skill);
  const order = (items: string[]): string[] => prioritizeByKeywords(items, job.atsKeywords);
  const spelled = (terms: readonly string[]): string[] => terms.map(term => displaySpelling(term, job));

  return {
    technicalSkills: order(extendList(
      resume.technicalSkills,
      [...job.requiredSkills, ...job.preferredSkills],
      technical
    )),
    programmingLanguages: order(extendList(resume.programmingLanguages, spelled(job.programmingLanguages), technical)),
    frameworksTools: order(extendList(resume.frameworksTools, spelled(job.frameworksTools), technical)),
    softSkills: order(extendList(resume.softSkills, job.softSkills, implied))
  };
}

// ============================================================================
// Experience
// ============================================================================

/**
 * Technical job skills among the ATS keywords, most frequent first, that the
 * text does not mention
 */
export function findUnusedKeywords(text: string, job: JobRequirements, limit: number): string[] {
  const skills = jobSkillSet(job);
  return rankKeywordsByFrequency(job)
    .filter(keyword =>
      keyword.length > 2 &&
      skills.has(keyword.toLowerCase()) &&
      isTechnicalSkill(keyword) &&
      !containsTerm(text, keyword)
    )
    .slice(0, limit);
}

export function buildExperiencePrompt(description: string, keywords: readonly string[]): string {
  return [
    `Enhance this job description by naturally incorporating these relevant keywords: ${keywords.join(', ')}`,
    '',
    'Original description:',
    description,
    '',
    'Return an enhanced version that:',
    '1. Naturally incorporates 2-3 of the keywords',
    '2. Keeps the original meaning and tone',
    '3. Does not invent responsibilities or results',
    '4. Keeps roughly the same length',
    '',
    'Return only the enhanced description.'
  ].join('\n');
}

async function optimizeEntry(entry: WorkExperience, context: OptimizerContext): Promise<WorkExperience> {
  const { description } = entry;
  if (!description.trim() || endsWithAppended(description, EXPERIENCE_LEAD)) {
    return entry;
  }

  const unused = findUnusedKeywords(description, context.job, context.tuning.maxUnusedKeywords);
  if (unused.length === 0) {
    return entry;
  }

  const reply = await requestEnhancement(
    context.enhancer,
    buildExperiencePrompt(description, unused),
    { operation: 'experience', maxTokens: context.experienceMaxTokens, timeoutMs: context.timeoutMs }
  );

  if (reply !== null) {
    if (reply.length >= context.tuning.experienceMinLengthRatio * description.length) {
      ATSLogger.logEnhancement('experience', 'accepted', { title: entry.title });
      return { ...entry, description: reply };
    }
    ATSLogger.logEnhancement('experience', 'rejected', { title: entry.title, replyLength: reply.length });
  }

  return { ...entry, description: appendSentence(description, `${EXPERIENCE_LEAD} ${unused[0]}.`) };
}

export async function optimizeExperience(
  entries: readonly WorkExperience[],
  context: OptimizerContext
): Promise<WorkExperience[]> {
  return Promise.all(entries.map(entry => optimizeEntry(entry, context)));
}

// ============================================================================
// Certifications & projects
// ============================================================================

export function optimizeCertifications(certifications: readonly string[], job: JobRequirements): string[] {
  return extendList(certifications, job.certifications, () => true);
}

export function optimizeProjects(projects: readonly Project[], job: JobRequirements): Project[] {
  const technologies = [...job.frameworksTools, ...job.programmingLanguages];
  return projects.map(project => {
    const { description } = project;
    if (!description.trim() || endsWithAppended(description, PROJECT_LEAD)) {
      return project;
    }
    const missing = technologies.find(tech => !containsTerm(description, tech));
    return missing
      ? { ...project, description: appendSentence(description, `${PROJECT_LEAD} ${displaySpelling(missing, job)}.`) }
      : project;
  });
}

// ============================================================================
// Improvement tracking
// ============================================================================

function totalLength(items: readonly { description: string }[]): number {
  return items.reduce((sum, item) => sum + item.description.length, 0);
}

/**
 * Human-readable list of what changed between two resumes
 */
export function trackImprovements(original: ResumeSections, optimized: ResumeSections): string[] {
  const improvements: string[] = [];

  const originalSkills = lowerSet([
    ...original.technicalSkills,
    ...original.programmingLanguages,
    ...original.frameworksTools
  ]);
  const newSkills: string[] = [];
  for (const skill of [...optimized.technicalSkills, ...optimized.programmingLanguages, ...optimized.frameworksTools]) {
    const key = skill.toLowerCase();
    if (!originalSkills.has(key)) {
      originalSkills.add(key);
      newSkills.push(skill);
    }
  }
  if (newSkills.length > 0) {
    improvements.push(`Added ${newSkills.length} relevant technical skills: ${newSkills.join(', ')}`);
  }

  if (optimized.summary.length > original.summary.length) {
    improvements.push('Enhanced professional summary with job-specific keywords');
  }

  if (totalLength(optimized.workExperience) > totalLength(original.workExperience)) {
    improvements.push('Enhanced work experience descriptions');
  }

  const originalCerts = lowerSet(original.certifications);
  const newCerts = optimized.certifications.filter(cert => !originalCerts.has(cert.toLowerCase()));
  if (newCerts.length > 0) {
    improvements.push(`Added ${newCerts.length} certification(s): ${newCerts.join(', ')}`);
  }

  if (totalLength(optimized.projects) > totalLength(original.projects)) {
    improvements.push('Enhanced project descriptions with relevant technologies');
  }

  return improvements;
}

// ============================================================================
// Guard
// ============================================================================

function applySections(
  original: ResumeSections,
  candidates: SectionCandidates,
  applied: ReadonlySet<OptimizedSection>
): ResumeSections {
  return {
    ...toSections(original),
    summary: applied.has('summary') ? candidates.summary : original.summary,
    ...(applied.has('skills') ? candidates.skills : {}),
    workExperience: applied.has('experience') ? candidates.experience : original.workExperience,
    certifications: applied.has('certifications') ? candidates.certifications : original.certifications,
    projects: applied.has('projects') ? candidates.projects : original.projects
  };
}

interface GuardOutcome {
  resume: ResumeContent;
  score: MatchScore;
  reverted: OptimizedSection[];
}

/**
 * Roll back sections until the optimized resume scores at least as well as
 * the original: one section at a time in OPTIMIZED_SECTIONS order, keeping a
 * revert only when it raises the score, then everything if still below.
 */
export function guard(
  original: ResumeContent,
  beforeScore: MatchScore,
  candidates: SectionCandidates,
  job: JobRequirements,
  weights: ScoringWeights,
  formatting: FormattingConfig
): GuardOutcome {
  const build = (applied: ReadonlySet<OptimizedSection>): ResumeContent =>
    finalizeResume(applySections(original, candidates, applied), formatting);

  let applied = new Set<OptimizedSection>(OPTIMIZED_SECTIONS);
  let resume = build(applied);
  let score = scoreMatch(resume, job, weights);

  if (score.overall >= beforeScore.overall) {
    return { resume, score, reverted: [] };
  }

  const candidateScore = score.overall;
  const reverted: OptimizedSection[] = [];

  for (const section of OPTIMIZED_SECTIONS) {
    const trial = new Set(applied);
    trial.delete(section);
    const trialResume = build(trial);
    const trialScore = scoreMatch(trialResume, job, weights);
    if (trialScore.overall > score.overall) {
      applied = trial;
      resume = trialResume;
      score = trialScore;
      reverted.push(section);
    }
  }

  if (score.overall < beforeScore.overall) {
    ATSLogger.logGuard(beforeScore.overall, candidateScore, OPTIMIZED_SECTIONS);
    return { resume: original, score: beforeScore, reverted: [...OPTIMIZED_SECTIONS] };
  }

  ATSLogger.logGuard(beforeScore.overall, candidateScore, reverted);
  return { resume, score, reverted };
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Optimize a resume for a job. Never rejects for data-quality reasons:
 * collaborator failures fall back per field and score regressions are
 * rolled back by the guard.
 *
 * @throws ATSError INVALID_INPUT when either record is missing
 */
export async function optimizeResume(
  resume: ResumeContent,
  job: JobRequirements,
  options: OptimizeOptions = {}
): Promise<OptimizationResult> {
  if (!resume) {
    throw ATSErrorFactory.invalidInput('resume', 'optimizeResume requires a resume record', resume);
  }
  if (!job) {
    throw ATSErrorFactory.invalidInput('job', 'optimizeResume requires a job requirements record', job);
  }

  const weights = options.weights ?? DEFAULT_CONFIG.scoring.weights;
  const formatting = options.formatting ?? DEFAULT_CONFIG.formatting;
  const now = options.now ?? (() => new Date());

  const context: OptimizerContext = {
    job,
    originalText: composeResumeText(resume),
    enhancer: options.enhancer ?? new NoopTextEnhancer(),
    timeoutMs: options.timeoutMs ?? DEFAULT_CONFIG.enhancement.timeoutMs,
    tuning: options.tuning ?? DEFAULT_CONFIG.optimization,
    summaryMaxTokens: options.summaryMaxTokens ?? DEFAULT_CONFIG.enhancement.summaryMaxTokens,
    experienceMaxTokens: options.experienceMaxTokens ?? DEFAULT_CONFIG.enhancement.experienceMaxTokens
  };

  const beforeScore = scoreMatch(resume, job, weights);

  const [summary, experience] = await Promise.all([
    optimizeSummary(resume.summary, context),
    optimizeExperience(resume.workExperience, context)
  ]);

  const candidates: SectionCandidates = {
    summary,
    skills: optimizeSkills(resume, context),
    experience,
    certifications: optimizeCertifications(resume.certifications, job),
    projects: optimizeProjects(resume.projects, job)
  };

  const outcome = guard(resume, beforeScore, candidates, job, weights, formatting);

  const result: OptimizationResult = {
    originalResume: resume,
    optimizedResume: outcome.resume,
    beforeScore,
    afterScore: outcome.score,
    improvementsMade: trackImprovements(resume, outcome.resume),
    revertedSections: outcome.reverted,
    timestamp: now().toISOString()
  };

  ATSLogger.logOptimizationComplete(result);
  return result;
}
