/**
 * Unit tests for configuration management
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  mergeConfig,
  initializeConfig,
  getConfig,
  resetConfig
} from '../../ats-engine/config';
import { ATSErrorCode, isATSError } from '../../ats-engine/errors/types';

const ENV_KEYS = [
  'ATS_WEIGHT_KEYWORD',
  'ATS_WEIGHT_SKILL',
  'ATS_WEIGHT_EXPERIENCE',
  'ATS_WEIGHT_FORMATTING',
  'ATS_ENHANCEMENT_ENABLED',
  'ATS_ENHANCEMENT_TIMEOUT_MS',
  'ATS_LOGGING_ENABLED',
  'ATS_MAX_LOGS'
] as const;

function configurationErrorOf(build: () => unknown): boolean {
  try {
    build();
    return false;
  } catch (error) {
    return isATSError(error, ATSErrorCode.CONFIGURATION_ERROR);
  }
}

describe('ConfigManager', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    resetConfig();
  });

  function clearEnv(): void {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  }

  it('should start from the defaults', () => {
    clearEnv();
    expect(new ConfigManager().getConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should read weights and switches from the environment', () => {
    clearEnv();
    process.env.ATS_WEIGHT_KEYWORD = '0.5';
    process.env.ATS_WEIGHT_SKILL = '0.2';
    process.env.ATS_ENHANCEMENT_ENABLED = 'false';
    process.env.ATS_ENHANCEMENT_TIMEOUT_MS = '2500';
    process.env.ATS_MAX_LOGS = 'many';

    const config = new ConfigManager().getConfig();
    expect(config.scoring.weights).toEqual({ keyword: 0.5, skill: 0.2, experience: 0.2, formatting: 0.1 });
    expect(config.enhancement.enabled).toBe(false);
    expect(config.enhancement.timeoutMs).toBe(2500);
    expect(config.logging.maxLogs).toBe(DEFAULT_CONFIG.logging.maxLogs);
  });

  it('should let overrides win over the environment', () => {
    clearEnv();
    process.env.ATS_ENHANCEMENT_ENABLED = 'false';
    const config = new ConfigManager({ enhancement: { enabled: true }, formatting: { minWordCount: 100 } }).getConfig();
    expect(config.enhancement.enabled).toBe(true);
    expect(config.formatting).toEqual({ minWordCount: 100, maxWordCount: 800 });
  });

  it('should reject weights that do not sum to one', () => {
    clearEnv();
    expect(configurationErrorOf(() => new ConfigManager({ scoring: { weights: { keyword: 0.9 } } }))).toBe(true);
  });

  it('should report the weight sum rule from the weights schema', () => {
    clearEnv();
    let details = '';
    try {
      new ConfigManager({ scoring: { weights: { keyword: 0.9 } } });
    } catch (error) {
      details = isATSError(error) ? error.technicalDetails : String(error);
    }
    expect(details).toBe('Invalid configuration for scoring.weights: Weights must sum to 1.0');
  });

  it('should reject negative weights', () => {
    clearEnv();
    const weights = { keyword: 0.7, skill: -0.1, experience: 0.3, formatting: 0.1 };
    expect(configurationErrorOf(() => new ConfigManager({ scoring: { weights } }))).toBe(true);
  });

  it('should reject inverted word count bounds', () => {
    clearEnv();
    expect(configurationErrorOf(() => new ConfigManager({ formatting: { minWordCount: 900 } }))).toBe(true);
  });

  it('should reject an out-of-range length ratio and a zero timeout', () => {
    clearEnv();
    expect(configurationErrorOf(() => new ConfigManager({ optimization: { experienceMinLengthRatio: 1.5 } }))).toBe(true);
    expect(configurationErrorOf(() => new ConfigManager({ enhancement: { timeoutMs: 0 } }))).toBe(true);
  });

  it('should keep the previous configuration when an update is invalid', () => {
    clearEnv();
    const manager = new ConfigManager();
    expect(configurationErrorOf(() => manager.updateConfig({ logging: { maxLogs: 0 } }))).toBe(true);
    expect(manager.getConfig().logging.maxLogs).toBe(DEFAULT_CONFIG.logging.maxLogs);

    manager.updateConfig({ optimization: { maxSummaryClauses: 1 } });
    expect(manager.getOptimizationTuning().maxSummaryClauses).toBe(1);
  });

  it('should hand out copies', () => {
    clearEnv();
    const manager = new ConfigManager();
    manager.getScoringWeights().keyword = 1;
    expect(manager.getScoringWeights().keyword).toBe(0.4);
  });

  it('should merge section by section', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { scoring: { weights: { keyword: 0.3, skill: 0.4 } } });
    expect(merged.scoring.weights).toEqual({ keyword: 0.3, skill: 0.4, experience: 0.2, formatting: 0.1 });
    expect(merged.formatting).toEqual(DEFAULT_CONFIG.formatting);
  });

  it('should share a global instance until reset', () => {
    clearEnv();
    const manager = initializeConfig({ formatting: { maxWordCount: 1000 } });
    expect(getConfig()).toBe(manager);
    resetConfig();
    expect(getConfig().getFormattingConfig().maxWordCount).toBe(800);
  });
});
