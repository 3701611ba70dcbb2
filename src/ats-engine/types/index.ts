/**
 * ATS Engine Core Type Definitions
 *
 * Data model shared by the extractors, the scorer, the optimizer and the
 * renderers. Every record is a plain serializable value: extractors build
 * them once and nothing downstream mutates them.
 */

// ============================================================================
// Job side
// ============================================================================

export type ExperienceLevel = 'entry' | 'mid' | 'senior' | 'executive';

/**
 * Structured requirements derived from one job posting
 */
export interface JobRequirements {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly jobType: string;
  readonly experienceLevel: ExperienceLevel | '';
  readonly yearsExperience: number | null;

  /** Disjoint from preferredSkills; required wins on overlap */
  readonly requiredSkills: readonly string[];
  readonly preferredSkills: readonly string[];

  readonly programmingLanguages: readonly string[];
  readonly frameworksTools: readonly string[];
  readonly databases: readonly string[];
  readonly cloudPlatforms: readonly string[];
  readonly softSkills: readonly string[];

  readonly educationRequirements: readonly string[];
  readonly certifications: readonly string[];
  /** Filled only by the optional enhancement step */
  readonly industryKeywords: readonly string[];
  readonly responsibilities: readonly string[];

  readonly atsKeywords: readonly string[];
  readonly keywordFrequency: Readonly<Record<string, number>>;
}

export interface JobHints {
  title?: string;
  company?: string;
}

// ============================================================================
// Resume side
// ============================================================================

export interface WorkExperience {
  readonly title: string;
  readonly company: string;
  readonly duration: string;
  readonly description: string;
}

export interface Education {
  readonly degree: string;
  readonly field: string;
  readonly institution: string;
  readonly year: string;
}

export interface Project {
  readonly name: string;
  readonly description: string;
}

/**
 * Structured content derived from one resume
 */
export interface ResumeContent {
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly location: string;
  readonly linkedinUrl: string;
  readonly githubUrl: string;
  readonly portfolioUrl: string;

  readonly summary: string;

  readonly technicalSkills: readonly string[];
  readonly programmingLanguages: readonly string[];
  readonly frameworksTools: readonly string[];
  readonly softSkills: readonly string[];

  readonly workExperience: readonly WorkExperience[];
  readonly education: readonly Education[];
  readonly certifications: readonly string[];
  readonly projects: readonly Project[];

  readonly wordCount: number;
  /** Job-independent formatting quality, 0-100 */
  readonly atsScore: number;
  readonly formattingIssues: readonly string[];
  readonly optimizationSuggestions: readonly string[];
}

/**
 * The editable part of a resume: everything except the derived fields that
 * finalizeResume recomputes.
 */
export type ResumeSections = Omit<
  ResumeContent,
  'wordCount' | 'atsScore' | 'formattingIssues' | 'optimizationSuggestions'
>;

export interface FormattingAnalysis {
  readonly atsScore: number;
  readonly formattingIssues: readonly string[];
  readonly optimizationSuggestions: readonly string[];
}

// ============================================================================
// Scoring
// ============================================================================

export interface ScoringWeights {
  keyword: number;
  skill: number;
  experience: number;
  formatting: number;
}

export interface MatchScore {
  readonly overall: number;
  readonly keywordScore: number;
  readonly skillScore: number;
  readonly experienceScore: number;
  readonly formattingScore: number;
  /** Keyword -> literal occurrence count in the resume text, zeros omitted */
  readonly matchedKeywords: Readonly<Record<string, number>>;
}

// ============================================================================
// Optimization
// ============================================================================

export type OptimizedSection = 'summary' | 'skills' | 'experience' | 'certifications' | 'projects';

export const OPTIMIZED_SECTIONS: readonly OptimizedSection[] = [
  'summary',
  'skills',
  'experience',
  'certifications',
  'projects'
] as const;

export interface OptimizationResult {
  readonly originalResume: ResumeContent;
  readonly optimizedResume: ResumeContent;
  readonly beforeScore: MatchScore;
  readonly afterScore: MatchScore;
  readonly improvementsMade: readonly string[];
  /** Sections the monotonicity guard rolled back to their original content */
  readonly revertedSections: readonly OptimizedSection[];
  /** ISO-8601 */
  readonly timestamp: string;
}

// ============================================================================
// Rendering
// ============================================================================

export interface RenderResult {
  success: boolean;
  path?: string;
  error?: string;
}
