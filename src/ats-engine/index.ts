/**
 * ATS Engine
 *
 * Resume–job matching and optimization: extraction, scoring, optimization,
 * rendering and record persistence.
 */

export * from './types';
export { ATSEngine } from './engine';
export type { ATSEngineOptions, RunInput, RunResult, RunStage } from './engine';

export {
  stripMarkup,
  handleEncoding,
  cleanWhitespace,
  prepareForParsing,
  normalize,
  matchView,
  containsTerm,
  countTerm,
  countLiteral,
  countWords
} from './parser/textNormalizer';
export { locateResumeSections, splitPhrases } from './parser/sectionScanner';
export {
  extractJobRequirements,
  enhanceJobRequirements,
  mergeJobEnhancement
} from './parser/jobParser';
export {
  extractResumeContent,
  analyzeFormatting,
  finalizeResume
} from './parser/resumeParser';
export { scoreMatch, composeResumeText, rankKeywordsByFrequency } from './scoring/matchScorer';
export { optimizeResume, trackImprovements } from './optimizer/resumeOptimizer';
export type { OptimizeOptions } from './optimizer/resumeOptimizer';

export {
  NoopTextEnhancer,
  LLMTextEnhancer,
  createTextEnhancerFromEnv
} from './enhancement/textEnhancer';
export type { TextEnhancer } from './enhancement/textEnhancer';

export {
  resumeToMarkdown,
  MarkdownResumeRenderer,
  DocxResumeRenderer,
  createRenderer
} from './renderer';
export type { DocumentRenderer, RenderFormat } from './renderer';

export {
  saveRecord,
  serializeRecord,
  loadJobRequirements,
  loadResumeContent,
  loadOptimizationResult
} from './records';

export {
  ConfigManager,
  DEFAULT_CONFIG,
  initializeConfig,
  getConfig,
  resetConfig
} from './config';
export type { ATSEngineConfig, ATSEngineConfigOverrides } from './config';

export { ATSError, ATSErrorCode, ATSErrorFactory, isATSError } from './errors/types';
export { ATSLogger, LogType } from './logging/logger';
export type { LogEntry } from './logging/logger';
