/**
 * ATS Engine
 *
 * Facade over the extraction, scoring, optimization and rendering stages,
 * bound to one configuration and one text enhancer.
 *
 * ```
 * posting ─▶ extractJob ─▶ (enhanceJob) ─┐
 *                                        ├─▶ optimize ─▶ render
 * resume  ─▶ extractResume ──────────────┘
 * ```
 *
 * Usage:
 * ```typescript
 * const engine = new ATSEngine({ config: { enhancement: { enabled: false } } });
 * const { optimization } = await engine.run({ posting, resume });
 * console.log(optimization.afterScore.overall);
 * ```
 */

import type {
  JobHints,
  JobRequirements,
  MatchScore,
  OptimizationResult,
  RenderResult,
  ResumeContent
} from './types';
import { ConfigManager, type ATSEngineConfig, type ATSEngineConfigOverrides } from './config';
import { extractJobRequirements, enhanceJobRequirements } from './parser/jobParser';
import { extractResumeContent } from './parser/resumeParser';
import { scoreMatch } from './scoring/matchScorer';
import { optimizeResume } from './optimizer/resumeOptimizer';
import {
  NoopTextEnhancer,
  createTextEnhancerFromEnv,
  type TextEnhancer
} from './enhancement/textEnhancer';
import { createRenderer, type RenderFormat } from './renderer';
import { ATSErrorFactory } from './errors/types';
import { ATSLogger } from './logging/logger';

export interface ATSEngineOptions {
  /**
   * A ready ConfigManager, or overrides applied over defaults and environment.
   * Its logging section configures the process-wide ATSLogger, so the engine
   * constructed last decides whether audit entries are kept and how many.
   */
  config?: ConfigManager | ATSEngineConfigOverrides;
  /** Defaults to the environment's enhancer; ignored when enhancement is disabled */
  enhancer?: TextEnhancer;
  now?: () => Date;
}

export type RunStage = 'extract_job' | 'enhance_job' | 'extract_resume' | 'optimize' | 'render';

export interface RunInput {
  posting: string;
  resume: string;
  hints?: JobHints;
  /** Render the optimized resume when given */
  output?: { format: RenderFormat; path: string };
  signal?: AbortSignal;
}

export interface RunResult {
  job: JobRequirements;
  resume: ResumeContent;
  optimization: OptimizationResult;
  render?: RenderResult;
}

function throwIfAborted(signal: AbortSignal | undefined, stage: RunStage): void {
  if (signal?.aborted) {
    ATSLogger.logInfo(`Run cancelled before ${stage}`, { stage });
    throw ATSErrorFactory.cancelled(stage);
  }
}

export class ATSEngine {
  private readonly config: ATSEngineConfig;
  private readonly enhancer: TextEnhancer;
  private readonly now?: () => Date;

  constructor(options: ATSEngineOptions = {}) {
    const manager = options.config instanceof ConfigManager
      ? options.config
      : new ConfigManager(options.config);
    this.config = manager.getConfig();
    this.now = options.now;

    // ATSLogger is static: these settings apply to every engine in the process
    ATSLogger.setEnabled(this.config.logging.enabled);
    ATSLogger.setMaxLogs(this.config.logging.maxLogs);

    this.enhancer = this.config.enhancement.enabled
      ? options.enhancer ?? createTextEnhancerFromEnv(true)
      : new NoopTextEnhancer();
  }

  getConfig(): ATSEngineConfig {
    return this.config;
  }

  extractJob(posting: string, hints?: JobHints): JobRequirements {
    return extractJobRequirements(posting, hints);
  }

  /**
   * Additive enhancement of extracted requirements; the input comes back
   * unchanged when the enhancer is absent or fails
   */
  enhanceJob(job: JobRequirements, posting: string): Promise<JobRequirements> {
    return enhanceJobRequirements(job, posting, this.enhancer, {
      timeoutMs: this.config.enhancement.timeoutMs,
      maxTokens: this.config.enhancement.jobMaxTokens
    });
  }

  extractResume(text: string): ResumeContent {
    return extractResumeContent(text, { formatting: this.config.formatting });
  }

  score(resume: ResumeContent, job: JobRequirements): MatchScore {
    return scoreMatch(resume, job, this.config.scoring.weights);
  }

  optimize(resume: ResumeContent, job: JobRequirements): Promise<OptimizationResult> {
    const { enhancement } = this.config;
    return optimizeResume(resume, job, {
      enhancer: this.enhancer,
      timeoutMs: enhancement.timeoutMs,
      weights: this.config.scoring.weights,
      tuning: this.config.optimization,
      formatting: this.config.formatting,
      summaryMaxTokens: enhancement.summaryMaxTokens,
      experienceMaxTokens: enhancement.experienceMaxTokens,
      now: this.now
    });
  }

  render(resume: ResumeContent, format: RenderFormat, outputPath: string): Promise<RenderResult> {
    return createRenderer(format).render(resume, outputPath);
  }

  /**
   * Full pipeline from raw texts. The signal is checked between stages.
   *
   * @throws ATSError CANCELLED when the signal aborts before a stage
   */
  async run(input: RunInput): Promise<RunResult> {
    const { signal } = input;

    throwIfAborted(signal, 'extract_job');
    let job = this.extractJob(input.posting, input.hints);

    if (this.config.enhancement.enabled) {
      throwIfAborted(signal, 'enhance_job');
      job = await this.enhanceJob(job, input.posting);
    }

    throwIfAborted(signal, 'extract_resume');
    const resume = this.extractResume(input.resume);

    throwIfAborted(signal, 'optimize');
    const optimization = await this.optimize(resume, job);

    if (!input.output) {
      return { job, resume, optimization };
    }

    throwIfAborted(signal, 'render');
    const render = await this.render(optimization.optimizedResume, input.output.format, input.output.path);
    return { job, resume, optimization, render };
  }
}
