/**
 * Record persistence
 *
 * Saves extracted job requirements, resume analyses and optimization results
 * as pretty-printed JSON and loads them back through the Zod validators.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { JobRequirements, OptimizationResult, ResumeContent } from './types';
import { parseJobRequirements, parseOptimizationResult, parseResumeContent } from './validation/validator';
import { ATSErrorFactory } from './errors/types';
import { toError } from '../shared/errors';
import { loggers } from '../shared/logger';

export type EngineRecord = JobRequirements | ResumeContent | OptimizationResult;

export function serializeRecord(record: EngineRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * @throws ATSError RECORD_IO_FAILED when the file cannot be written
 */
export async function saveRecord(filePath: string, record: EngineRecord): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, serializeRecord(record), 'utf-8');
  } catch (error) {
    throw ATSErrorFactory.recordIOFailed(filePath, toError(error).message);
  }
  loggers.engine.debug({ filePath }, 'Record saved');
}

async function readJson(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw ATSErrorFactory.recordIOFailed(filePath, toError(error).message);
  }

  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw ATSErrorFactory.recordIOFailed(filePath, `Invalid JSON: ${toError(error).message}`);
  }
}

/**
 * @throws ATSError RECORD_IO_FAILED or INVALID_JOB_REQUIREMENTS
 */
export async function loadJobRequirements(filePath: string): Promise<JobRequirements> {
  return parseJobRequirements(await readJson(filePath));
}

/**
 * @throws ATSError RECORD_IO_FAILED or INVALID_RESUME
 */
export async function loadResumeContent(filePath: string): Promise<ResumeContent> {
  return parseResumeContent(await readJson(filePath));
}

/**
 * @throws ATSError RECORD_IO_FAILED or INVALID_INPUT
 */
export async function loadOptimizationResult(filePath: string): Promise<OptimizationResult> {
  return parseOptimizationResult(await readJson(filePath));
}
