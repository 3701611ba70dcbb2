/**
 * Error Types
 *
 * Base error shape for the engine and its collaborators. Every error carries
 * a message fit for an end user, the technical cause, and whether the caller
 * can expect a retry to help.
 */

/**
 * Where a failure originated
 */
export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  PARSING = 'PARSING',
  COLLABORATOR = 'COLLABORATOR',
  FILE_IO = 'FILE_IO',
  CONFIGURATION = 'CONFIGURATION',
  CANCELLATION = 'CANCELLATION',
  UNEXPECTED = 'UNEXPECTED'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface AppErrorOptions {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  context?: Record<string, unknown>;
  recoverable?: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

/**
 * Plain form written to structured logs
 */
export interface ErrorRecord {
  name: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: string;
  timestamp: string;
  recoverable: boolean;
  context?: Record<string, unknown>;
  suggestedAction?: string;
}

export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(options: AppErrorOptions) {
    super(options.userMessage, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.category = options.category;
    this.severity = options.severity;
    this.userMessage = options.userMessage;
    this.technicalDetails = options.technicalDetails;
    this.timestamp = new Date();
    this.context = options.context;
    this.recoverable = options.recoverable ?? false;
    this.suggestedAction = options.suggestedAction;
  }

  /**
   * "user message: technical details"
   */
  describe(): string {
    return `${this.userMessage}: ${this.technicalDetails}`;
  }

  toRecord(): ErrorRecord {
    return {
      name: this.name,
      category: this.category,
      severity: this.severity,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      context: this.context,
      suggestedAction: this.suggestedAction
    };
  }
}

/**
 * Normalise anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
