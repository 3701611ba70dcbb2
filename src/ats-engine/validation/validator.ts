/**
 * ATS Engine Validator Utilities
 *
 * Validation of engine records read from untrusted sources (JSON files,
 * callers outside TypeScript). validate* report every invalid field;
 * parse* return the typed record or throw an ATSError.
 */

import { z } from 'zod';
import { ATSErrorFactory, type ValidationError } from '../errors/types';
import {
  JobRequirementsSchema,
  ResumeContentSchema,
  OptimizationResultSchema,
  ScoringWeightsSchema
} from './schemas';
import type {
  JobRequirements,
  ResumeContent,
  OptimizationResult,
  ScoringWeights
} from '../types';

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Converts Zod validation errors to ValidationResult
 */
function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  const errors: ValidationError[] = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

function validateWith(schema: z.ZodTypeAny, value: unknown): ValidationResult {
  const result = schema.safeParse(value);
  return result.success ? { isValid: true, errors: [] } : zodErrorToValidationResult(result.error);
}

export function validateJobRequirements(value: unknown): ValidationResult {
  return validateWith(JobRequirementsSchema, value);
}

export function validateResumeContent(value: unknown): ValidationResult {
  return validateWith(ResumeContentSchema, value);
}

export function validateOptimizationResult(value: unknown): ValidationResult {
  return validateWith(OptimizationResultSchema, value);
}

export function validateScoringWeights(value: unknown): ValidationResult {
  return validateWith(ScoringWeightsSchema, value);
}

/**
 * Validates and parses job requirements
 * @throws ATSError INVALID_JOB_REQUIREMENTS listing every invalid field
 */
export function parseJobRequirements(value: unknown): JobRequirements {
  const result = JobRequirementsSchema.safeParse(value);
  if (!result.success) {
    throw ATSErrorFactory.invalidJobRequirements(zodErrorToValidationResult(result.error).errors);
  }
  return result.data;
}

/**
 * Validates and parses resume content
 * @throws ATSError INVALID_RESUME listing every invalid field
 */
export function parseResumeContent(value: unknown): ResumeContent {
  const result = ResumeContentSchema.safeParse(value);
  if (!result.success) {
    throw ATSErrorFactory.invalidResume(zodErrorToValidationResult(result.error).errors);
  }
  return result.data;
}

/**
 * Validates and parses an optimization result
 * @throws ATSError INVALID_INPUT
 */
export function parseOptimizationResult(value: unknown): OptimizationResult {
  const result = OptimizationResultSchema.safeParse(value);
  if (!result.success) {
    const { errors } = zodErrorToValidationResult(result.error);
    throw ATSErrorFactory.invalidInput(
      'optimizationResult',
      errors.map(error => `${error.field}: ${error.message}`).join('; ')
    );
  }
  return result.data;
}

export function parseScoringWeights(value: unknown): ScoringWeights {
  const result = ScoringWeightsSchema.safeParse(value);
  if (!result.success) {
    throw ATSErrorFactory.configurationError(
      'scoring.weights',
      result.error.errors.map(error => error.message).join('; ')
    );
  }
  return result.data;
}
