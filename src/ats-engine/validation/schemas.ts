/**
 * ATS Engine Validation Schemas
 *
 * Zod schemas for the engine's records (as read back from JSON) and for the
 * structured reply of the job enhancement prompt.
 */

import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Entries must not be empty');
const stringList = z.array(nonEmptyString);
const score = z.number().min(0, 'Scores are at least 0').max(100, 'Scores are at most 100');

// ============================================================================
// Job Schemas
// ============================================================================

export const ExperienceLevelSchema = z.enum(['entry', 'mid', 'senior', 'executive', '']);

export const JobRequirementsSchema = z.object({
  title: z.string(),
  company: z.string(),
  location: z.string(),
  jobType: z.string(),
  experienceLevel: ExperienceLevelSchema,
  yearsExperience: z.number().int().nonnegative().nullable(),
  requiredSkills: stringList,
  preferredSkills: stringList,
  programmingLanguages: stringList,
  frameworksTools: stringList,
  databases: stringList,
  cloudPlatforms: stringList,
  softSkills: stringList,
  educationRequirements: stringList,
  certifications: stringList,
  industryKeywords: stringList,
  responsibilities: stringList,
  atsKeywords: stringList,
  keywordFrequency: z.record(z.number().int().nonnegative())
});

// ============================================================================
// Resume Schemas
// ============================================================================

export const WorkExperienceSchema = z.object({
  title: z.string(),
  company: z.string(),
  duration: z.string(),
  description: z.string()
});

export const EducationSchema = z.object({
  degree: z.string(),
  field: z.string(),
  institution: z.string(),
  year: z.string()
});

export const ProjectSchema = z.object({
  name: z.string(),
  description: z.string()
});

export const ResumeContentSchema = z.object({
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  location: z.string(),
  linkedinUrl: z.string(),
  githubUrl: z.string(),
  portfolioUrl: z.string(),
  summary: z.string(),
  technicalSkills: stringList,
  programmingLanguages: stringList,
  frameworksTools: stringList,
  softSkills: stringList,
  workExperience: z.array(WorkExperienceSchema),
  education: z.array(EducationSchema),
  certifications: stringList,
  projects: z.array(ProjectSchema),
  wordCount: z.number().int().nonnegative(),
  atsScore: score,
  formattingIssues: z.array(z.string()),
  optimizationSuggestions: z.array(z.string())
});

// ============================================================================
// Scoring & Optimization Schemas
// ============================================================================

export const ScoringWeightsSchema = z.object({
  keyword: z.number().nonnegative(),
  skill: z.number().nonnegative(),
  experience: z.number().nonnegative(),
  formatting: z.number().nonnegative()
}).refine(
  weights => Math.abs(weights.keyword + weights.skill + weights.experience + weights.formatting - 1) <= 0.01,
  { message: 'Weights must sum to 1.0' }
);

export const MatchScoreSchema = z.object({
  overall: score,
  keywordScore: score,
  skillScore: score,
  experienceScore: score,
  formattingScore: score,
  matchedKeywords: z.record(z.number().int().positive())
});

export const OptimizedSectionSchema = z.enum(['summary', 'skills', 'experience', 'certifications', 'projects']);

export const OptimizationResultSchema = z.object({
  originalResume: ResumeContentSchema,
  optimizedResume: ResumeContentSchema,
  beforeScore: MatchScoreSchema,
  afterScore: MatchScoreSchema,
  improvementsMade: z.array(z.string()),
  revertedSections: z.array(OptimizedSectionSchema),
  timestamp: z.string().datetime({ message: 'Timestamp must be ISO-8601' })
}).refine(
  result => result.afterScore.overall >= result.beforeScore.overall,
  { message: 'afterScore.overall must not be below beforeScore.overall', path: ['afterScore', 'overall'] }
);

// ============================================================================
// Enhancement Reply Schema
// ============================================================================

const replyList = z.array(z.string()).default([]);

/**
 * Reply to the job enhancement prompt. Missing lists default to empty;
 * anything that is not a list of strings is rejected.
 */
export const JobEnhancementReplySchema = z.object({
  additional_skills: replyList,
  industry_terms: replyList,
  hidden_requirements: replyList,
  key_responsibilities: replyList
});

export type JobEnhancementReply = z.infer<typeof JobEnhancementReplySchema>;
