/**
 * ATS Engine Logger
 *
 * Audit trail for extraction, scoring and optimization decisions. Entries are
 * kept in memory for inspection and mirrored to the pino `ats-engine` logger.
 */

import { AppError } from '../../shared/errors/types';
import { loggers } from '../../shared/logger';
import type {
  JobRequirements,
  MatchScore,
  OptimizationResult,
  OptimizedSection,
  ResumeContent
} from '../types';

/**
 * Log entry types
 */
export enum LogType {
  EXTRACTION = 'EXTRACTION',
  SCORING = 'SCORING',
  OPTIMIZATION = 'OPTIMIZATION',
  ENHANCEMENT = 'ENHANCEMENT',
  GUARD = 'GUARD',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

/**
 * Log entry interface
 */
export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  context?: Record<string, unknown>;
}

export type EnhancementOutcome = 'accepted' | 'rejected' | 'unavailable' | 'failed';

/**
 * ATS Engine Logger class
 */
export class ATSLogger {
  private static logs: LogEntry[] = [];
  private static maxLogs = 5000;
  private static enabled = true;

  /**
   * Enable or disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static isEnabled(): boolean {
    return this.enabled;
  }

  static setMaxLogs(maxLogs: number): void {
    this.maxLogs = maxLogs;
    if (this.logs.length > maxLogs) {
      this.logs = this.logs.slice(-maxLogs);
    }
  }

  /**
   * Log a job posting extraction
   */
  static logJobExtraction(job: JobRequirements, durationMs?: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.EXTRACTION,
      timestamp: new Date(),
      message: `Extracted job requirements: ${job.atsKeywords.length} keywords`,
      context: {
        kind: 'job',
        title: job.title,
        requiredCount: job.requiredSkills.length,
        preferredCount: job.preferredSkills.length,
        keywordCount: job.atsKeywords.length,
        experienceLevel: job.experienceLevel,
        yearsExperience: job.yearsExperience,
        durationMs
      }
    });
  }

  /**
   * Log a resume extraction
   */
  static logResumeExtraction(resume: ResumeContent, durationMs?: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.EXTRACTION,
      timestamp: new Date(),
      message: `Extracted resume content: ${resume.wordCount} words, ATS score ${resume.atsScore}`,
      context: {
        kind: 'resume',
        wordCount: resume.wordCount,
        atsScore: resume.atsScore,
        experienceCount: resume.workExperience.length,
        educationCount: resume.education.length,
        issueCount: resume.formattingIssues.length,
        durationMs
      }
    });
  }

  /**
   * Log scoring calculation with full breakdown
   */
  static logScoring(score: MatchScore, keywordCount: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.SCORING,
      timestamp: new Date(),
      message: `Match score calculated: ${score.overall.toFixed(1)}`,
      context: {
        overall: score.overall,
        breakdown: {
          keywordScore: score.keywordScore,
          skillScore: score.skillScore,
          experienceScore: score.experienceScore,
          formattingScore: score.formattingScore
        },
        matchedCount: Object.keys(score.matchedKeywords).length,
        keywordCount
      }
    });
  }

  /**
   * Log a call to the text enhancement collaborator
   */
  static logEnhancement(
    operation: string,
    outcome: EnhancementOutcome,
    context?: Record<string, unknown>
  ): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.ENHANCEMENT,
      timestamp: new Date(),
      message: `Enhancement ${operation}: ${outcome}`,
      context: { operation, outcome, ...context }
    });
  }

  /**
   * Log a monotonicity guard intervention
   */
  static logGuard(
    beforeScore: number,
    candidateScore: number,
    reverted: readonly OptimizedSection[]
  ): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.GUARD,
      timestamp: new Date(),
      message: `Guard reverted ${reverted.length} section(s)`,
      context: {
        beforeScore,
        candidateScore,
        reverted: [...reverted]
      }
    });
  }

  /**
   * Log optimization completion
   */
  static logOptimizationComplete(result: OptimizationResult): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.OPTIMIZATION,
      timestamp: new Date(),
      message: `Optimization complete: ${result.beforeScore.overall.toFixed(1)} -> ${result.afterScore.overall.toFixed(1)}`,
      context: {
        beforeScore: result.beforeScore.overall,
        afterScore: result.afterScore.overall,
        improvements: [...result.improvementsMade],
        revertedSections: [...result.revertedSections]
      }
    });
  }

  /**
   * Log an error. The pino error log receives it even while the audit
   * trail is disabled.
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    loggers.errors.error(
      { ...context, error: error instanceof AppError ? error.toRecord() : { name: error.name, details: error.message } },
      error.message
    );

    if (!this.enabled) return;

    this.addLog({
      type: LogType.ERROR,
      timestamp: new Date(),
      message: error.message,
      context: {
        ...context,
        error: error instanceof AppError ? {
          category: error.category,
          severity: error.severity,
          recoverable: error.recoverable
        } : {
          name: error.name
        }
      }
    });
  }

  /**
   * Log general information
   */
  static logInfo(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      message,
      context
    });
  }

  /**
   * Get all logs
   */
  static getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs by type
   */
  static getLogsByType(type: LogType): LogEntry[] {
    return this.logs.filter(log => log.type === type);
  }

  /**
   * Get recent logs
   */
  static getRecentLogs(count: number): LogEntry[] {
    return this.logs.slice(-count);
  }

  /**
   * Clear all logs
   */
  static clearLogs(): void {
    this.logs = [];
  }

  /**
   * Export logs as JSON
   */
  static exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  private static addLog(entry: LogEntry): void {
    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    // Errors already went to the error log
    if (entry.type !== LogType.ERROR) {
      loggers.engine.debug({ type: entry.type, ...entry.context }, entry.message);
    }
  }
}
