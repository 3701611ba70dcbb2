/**
 * Integration tests for the engine facade
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ATSEngine } from '../../ats-engine/engine';
import { ConfigManager, DEFAULT_CONFIG } from '../../ats-engine/config';
import { extractJobRequirements } from '../../ats-engine/parser/jobParser';
import { extractResumeContent } from '../../ats-engine/parser/resumeParser';
import { ATSErrorCode, isATSError } from '../../ats-engine/errors/types';
import { ATSLogger } from '../../ats-engine/logging/logger';
import type { TextEnhancer } from '../../ats-engine/enhancement/textEnhancer';
import { SAMPLE_RESUME, SENIOR_PYTHON_POSTING, FIXED_NOW, StubEnhancer } from './fixtures';

const OFFLINE = { enhancement: { enabled: false } };

/**
 * Aborts the run from inside the first enhancement call
 */
class AbortingEnhancer implements TextEnhancer {
  constructor(private readonly controller: AbortController) {}

  async generate(): Promise<string | null> {
    this.controller.abort();
    return null;
  }
}

async function cancelledStage(run: Promise<unknown>): Promise<unknown> {
  try {
    await run;
  } catch (error) {
    return isATSError(error, ATSErrorCode.CANCELLED) ? error.context?.stage : error;
  }
  return undefined;
}

describe('ATSEngine', () => {
  let dir: string;

  beforeEach(async () => {
    ATSLogger.clearLogs();
    dir = await mkdtemp(join(tmpdir(), 'ats-engine-'));
  });

  afterEach(async () => {
    ATSLogger.setEnabled(true);
    ATSLogger.setMaxLogs(DEFAULT_CONFIG.logging.maxLogs);
    await rm(dir, { recursive: true, force: true });
  });

  it('should run the whole pipeline offline', async () => {
    const engine = new ATSEngine({ config: OFFLINE, now: () => FIXED_NOW });
    const result = await engine.run({ posting: SENIOR_PYTHON_POSTING, resume: SAMPLE_RESUME });

    expect(result.job).toEqual(extractJobRequirements(SENIOR_PYTHON_POSTING));
    expect(result.resume).toEqual(extractResumeContent(SAMPLE_RESUME));
    expect(result.optimization.beforeScore.overall).toBeCloseTo(35 + 0.3 * (400 / 7) + 14.4 + 9, 10);
    expect(result.optimization.afterScore.overall).toBeGreaterThanOrEqual(result.optimization.beforeScore.overall);
    expect(result.optimization.timestamp).toBe('2026-01-15T12:00:00.000Z');
    expect(result.render).toBeUndefined();
  });

  it('should render the optimized resume when an output is given', async () => {
    const engine = new ATSEngine({ config: OFFLINE });
    const outputPath = join(dir, 'resume.md');
    const result = await engine.run({
      posting: SENIOR_PYTHON_POSTING,
      resume: SAMPLE_RESUME,
      output: { format: 'markdown', path: outputPath }
    });

    expect(result.render).toEqual({ success: true, path: outputPath });
    const markdown = await readFile(outputPath, 'utf-8');
    expect(markdown.split('\n')[4]).toBe('## Professional Summary');
    expect(markdown.split('\n')[5]).toBe(result.optimization.optimizedResume.summary);
  });

  it('should apply configured formatting bounds to extraction', () => {
    const engine = new ATSEngine({ config: { ...OFFLINE, formatting: { minWordCount: 0, maxWordCount: 100 } } });
    expect(engine.extractResume(SAMPLE_RESUME).atsScore).toBe(100);
  });

  it('should apply configured weights to scoring', () => {
    const engine = new ATSEngine({
      config: { ...OFFLINE, scoring: { weights: { keyword: 1, skill: 0, experience: 0, formatting: 0 } } }
    });
    const score = engine.score(engine.extractResume(SAMPLE_RESUME), engine.extractJob(SENIOR_PYTHON_POSTING));
    expect(score.overall).toBe(87.5);
  });

  it('should accept a ready ConfigManager', () => {
    const manager = new ConfigManager({ ...OFFLINE, logging: { enabled: false } });
    const engine = new ATSEngine({ config: manager });
    expect(engine.getConfig().logging.enabled).toBe(false);
    expect(ATSLogger.isEnabled()).toBe(false);
  });

  it('should hand the shared audit log to the engine constructed last', () => {
    const quiet = new ATSEngine({ config: { ...OFFLINE, logging: { enabled: false } } });
    new ATSEngine({ config: { ...OFFLINE, logging: { enabled: true, maxLogs: 2 } } });

    expect(quiet.getConfig().logging.enabled).toBe(false);
    expect(ATSLogger.isEnabled()).toBe(true);
    quiet.extractJob(SENIOR_PYTHON_POSTING);
    quiet.extractJob(SENIOR_PYTHON_POSTING);
    quiet.extractJob(SENIOR_PYTHON_POSTING);
    expect(ATSLogger.getLogs()).toHaveLength(2);
  });

  it('should not call the enhancer when enhancement is disabled', async () => {
    const enhancer = new StubEnhancer([]);
    const engine = new ATSEngine({ config: OFFLINE, enhancer });
    await engine.run({ posting: SENIOR_PYTHON_POSTING, resume: SAMPLE_RESUME });
    expect(enhancer.prompts).toEqual([]);
  });

  it('should consult the enhancer for the job and each section when enabled', async () => {
    const enhancer = new StubEnhancer([]);
    const engine = new ATSEngine({ config: { enhancement: { enabled: true, timeoutMs: 1000 } }, enhancer });
    const result = await engine.run({ posting: SENIOR_PYTHON_POSTING, resume: SAMPLE_RESUME });

    expect(enhancer.prompts).toHaveLength(4);
    expect(result.job).toEqual(extractJobRequirements(SENIOR_PYTHON_POSTING));
  });

  it('should stop before the first stage when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const engine = new ATSEngine({ config: OFFLINE });

    await expect(
      cancelledStage(engine.run({ posting: SENIOR_PYTHON_POSTING, resume: SAMPLE_RESUME, signal: controller.signal }))
    ).resolves.toBe('extract_job');
  });

  it('should stop at the next stage boundary after an abort', async () => {
    const controller = new AbortController();
    const engine = new ATSEngine({
      config: { enhancement: { enabled: true, timeoutMs: 1000 } },
      enhancer: new AbortingEnhancer(controller)
    });

    await expect(
      cancelledStage(engine.run({ posting: SENIOR_PYTHON_POSTING, resume: SAMPLE_RESUME, signal: controller.signal }))
    ).resolves.toBe('extract_resume');
  });
});
