/**
 * ATS Engine Error Types
 *
 * Coded errors raised by the matching engine, built on AppError.
 */

import { AppError, ErrorCategory, ErrorSeverity, type ErrorRecord } from '../../shared/errors/types';

export enum ATSErrorCode {
  // Contract violations
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_JOB_REQUIREMENTS = 'INVALID_JOB_REQUIREMENTS',
  INVALID_RESUME = 'INVALID_RESUME',

  // Parsing errors
  JOB_PARSING_FAILED = 'JOB_PARSING_FAILED',
  RESUME_PARSING_FAILED = 'RESUME_PARSING_FAILED',

  // Enhancement collaborator
  ENHANCEMENT_FAILED = 'ENHANCEMENT_FAILED',
  ENHANCEMENT_TIMEOUT = 'ENHANCEMENT_TIMEOUT',
  ENHANCEMENT_MALFORMED = 'ENHANCEMENT_MALFORMED',

  // Output
  RENDER_FAILED = 'RENDER_FAILED',
  RECORD_IO_FAILED = 'RECORD_IO_FAILED',

  // General errors
  CANCELLED = 'CANCELLED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * One invalid field of a record
 */
export interface ValidationError {
  field: string;
  message: string;
  received?: unknown;
}

export class ATSError extends AppError {
  public readonly code: ATSErrorCode;
  public readonly validationErrors?: ValidationError[];

  constructor(
    code: ATSErrorCode,
    userMessage: string,
    technicalDetails: string,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      validationErrors?: ValidationError[];
      recoverable?: boolean;
      suggestedAction?: string;
    } = {}
  ) {
    super({
      category: options.category ?? ErrorCategory.UNEXPECTED,
      severity: options.severity ?? ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      context: options.context,
      recoverable: options.recoverable,
      suggestedAction: options.suggestedAction
    });

    this.name = 'ATSError';
    this.code = code;
    this.validationErrors = options.validationErrors;
  }

  toRecord(): ErrorRecord & { code: ATSErrorCode; validationErrors?: ValidationError[] } {
    return { ...super.toRecord(), code: this.code, validationErrors: this.validationErrors };
  }
}

/**
 * Type guard for ATSError with an optional code check
 */
export function isATSError(error: unknown, code?: ATSErrorCode): error is ATSError {
  return error instanceof ATSError && (code === undefined || error.code === code);
}

/**
 * Factory functions for common error types
 */
export class ATSErrorFactory {
  /**
   * Create invalid input error
   */
  static invalidInput(
    field: string,
    message: string,
    received?: unknown
  ): ATSError {
    return new ATSError(
      ATSErrorCode.INVALID_INPUT,
      `Invalid input: ${field}`,
      message,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors: [{ field, message, received }],
        recoverable: false,
        suggestedAction: 'Pass a record produced by the matching extractor'
      }
    );
  }

  /**
   * Create job requirements validation error
   */
  static invalidJobRequirements(
    validationErrors: ValidationError[]
  ): ATSError {
    return new ATSError(
      ATSErrorCode.INVALID_JOB_REQUIREMENTS,
      'Job requirements validation failed',
      'Job requirements record is missing fields or has invalid data',
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors,
        recoverable: false,
        suggestedAction: 'Re-extract the requirements from the job posting'
      }
    );
  }

  /**
   * Create resume validation error
   */
  static invalidResume(
    validationErrors: ValidationError[]
  ): ATSError {
    return new ATSError(
      ATSErrorCode.INVALID_RESUME,
      'Resume validation failed',
      'Resume record is missing fields or has invalid data',
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors,
        recoverable: false,
        suggestedAction: 'Re-extract the resume content from its text'
      }
    );
  }

  /**
   * Create parsing error
   */
  static parsingFailed(
    type: 'job' | 'resume',
    reason: string,
    context?: Record<string, unknown>
  ): ATSError {
    return new ATSError(
      type === 'job' ? ATSErrorCode.JOB_PARSING_FAILED : ATSErrorCode.RESUME_PARSING_FAILED,
      `Failed to parse ${type}`,
      reason,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.LOW,
        context,
        recoverable: false,
        suggestedAction: 'Check text format and encoding'
      }
    );
  }

  /**
   * Create enhancement failure error
   */
  static enhancementFailed(
    operation: string,
    reason: string
  ): ATSError {
    return new ATSError(
      ATSErrorCode.ENHANCEMENT_FAILED,
      'Text enhancement failed',
      reason,
      {
        category: ErrorCategory.COLLABORATOR,
        severity: ErrorSeverity.LOW,
        context: { operation },
        recoverable: true,
        suggestedAction: 'Deterministic optimization is used instead'
      }
    );
  }

  /**
   * Create enhancement timeout error
   */
  static enhancementTimeout(
    operation: string,
    timeoutMs: number
  ): ATSError {
    return new ATSError(
      ATSErrorCode.ENHANCEMENT_TIMEOUT,
      `Text enhancement for ${operation} timed out`,
      `No response received within ${timeoutMs}ms`,
      {
        category: ErrorCategory.COLLABORATOR,
        severity: ErrorSeverity.LOW,
        context: { operation, timeoutMs },
        recoverable: true,
        suggestedAction: 'Increase ATS_ENHANCEMENT_TIMEOUT_MS or disable enhancement'
      }
    );
  }

  /**
   * Create malformed enhancement reply error
   */
  static enhancementMalformed(
    operation: string,
    reason: string
  ): ATSError {
    return new ATSError(
      ATSErrorCode.ENHANCEMENT_MALFORMED,
      'Text enhancement returned an unusable reply',
      reason,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.LOW,
        context: { operation },
        recoverable: false
      }
    );
  }

  /**
   * Create render failure error
   */
  static renderFailed(
    format: string,
    outputPath: string,
    reason: string
  ): ATSError {
    return new ATSError(
      ATSErrorCode.RENDER_FAILED,
      `Failed to render ${format} document`,
      reason,
      {
        category: ErrorCategory.FILE_IO,
        severity: ErrorSeverity.MEDIUM,
        context: { format, outputPath },
        recoverable: false,
        suggestedAction: 'Check that the output directory exists and is writable'
      }
    );
  }

  /**
   * Create record read/write error
   */
  static recordIOFailed(
    filePath: string,
    reason: string
  ): ATSError {
    return new ATSError(
      ATSErrorCode.RECORD_IO_FAILED,
      'Failed to read or write record file',
      reason,
      {
        category: ErrorCategory.FILE_IO,
        severity: ErrorSeverity.MEDIUM,
        context: { filePath },
        recoverable: false
      }
    );
  }

  /**
   * Create cancellation error
   */
  static cancelled(stage: string): ATSError {
    return new ATSError(
      ATSErrorCode.CANCELLED,
      'Operation cancelled',
      `Run aborted before stage: ${stage}`,
      {
        category: ErrorCategory.CANCELLATION,
        severity: ErrorSeverity.LOW,
        context: { stage },
        recoverable: true
      }
    );
  }

  /**
   * Create configuration error
   */
  static configurationError(
    field: string,
    reason: string
  ): ATSError {
    return new ATSError(
      ATSErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        recoverable: false,
        suggestedAction: 'Check configuration settings'
      }
    );
  }
}
