/**
 * Configuration Management
 *
 * Centralized configuration for the ATS engine with environment variable
 * support. Precedence: defaults < environment (.env via dotenv) < overrides.
 */

import 'dotenv/config';
import { ATSErrorFactory } from '../errors/types';
import { parseScoringWeights } from '../validation/validator';
import type { ScoringWeights } from '../types';

export interface FormattingConfig {
  minWordCount: number;
  maxWordCount: number;
}

export interface OptimizationTuning {
  /** "Experienced with X." clauses appended by the deterministic summary path */
  maxSummaryClauses: number;
  /** Unused job keywords considered per experience entry */
  maxUnusedKeywords: number;
  /** Enhanced summaries shorter than this are rejected */
  summaryMinLength: number;
  summaryMaxWords: number;
  /** Enhanced descriptions must keep at least this share of the original length */
  experienceMinLengthRatio: number;
}

export interface EnhancementConfig {
  enabled: boolean;
  timeoutMs: number;
  jobMaxTokens: number;
  summaryMaxTokens: number;
  experienceMaxTokens: number;
}

/**
 * Complete ATS engine configuration
 */
export interface ATSEngineConfig {
  scoring: {
    weights: ScoringWeights;
  };
  formatting: FormattingConfig;
  optimization: OptimizationTuning;
  enhancement: EnhancementConfig;
  logging: {
    enabled: boolean;
    maxLogs: number;
  };
}

/**
 * Partial configuration accepted from callers; each section merges field by field
 */
export interface ATSEngineConfigOverrides {
  scoring?: { weights?: Partial<ScoringWeights> };
  formatting?: Partial<FormattingConfig>;
  optimization?: Partial<OptimizationTuning>;
  enhancement?: Partial<EnhancementConfig>;
  logging?: Partial<ATSEngineConfig['logging']>;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ATSEngineConfig = {
  scoring: {
    weights: {
      keyword: 0.4,
      skill: 0.3,
      experience: 0.2,
      formatting: 0.1
    }
  },
  formatting: {
    minWordCount: 300,
    maxWordCount: 800
  },
  optimization: {
    maxSummaryClauses: 3,
    maxUnusedKeywords: 5,
    summaryMinLength: 50,
    summaryMaxWords: 150,
    experienceMinLengthRatio: 0.8
  },
  enhancement: {
    enabled: true,
    timeoutMs: 15000,
    jobMaxTokens: 512,
    summaryMaxTokens: 300,
    experienceMaxTokens: 400
  },
  logging: {
    enabled: true,
    maxLogs: 5000
  }
};

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: ATSEngineConfig;

  constructor(config?: ATSEngineConfigOverrides) {
    this.config = this.loadConfig(config);
    this.validateConfig();
  }

  /**
   * Load configuration from environment variables and provided config
   */
  private loadConfig(providedConfig?: ATSEngineConfigOverrides): ATSEngineConfig {
    const defaults = DEFAULT_CONFIG;
    const envConfig: ATSEngineConfig = {
      scoring: {
        weights: {
          keyword: this.parseFloat(process.env.ATS_WEIGHT_KEYWORD, defaults.scoring.weights.keyword),
          skill: this.parseFloat(process.env.ATS_WEIGHT_SKILL, defaults.scoring.weights.skill),
          experience: this.parseFloat(process.env.ATS_WEIGHT_EXPERIENCE, defaults.scoring.weights.experience),
          formatting: this.parseFloat(process.env.ATS_WEIGHT_FORMATTING, defaults.scoring.weights.formatting)
        }
      },
      formatting: { ...defaults.formatting },
      optimization: { ...defaults.optimization },
      enhancement: {
        ...defaults.enhancement,
        enabled: process.env.ATS_ENHANCEMENT_ENABLED !== 'false',
        timeoutMs: this.parseInt(process.env.ATS_ENHANCEMENT_TIMEOUT_MS, defaults.enhancement.timeoutMs)
      },
      logging: {
        enabled: process.env.ATS_LOGGING_ENABLED !== 'false',
        maxLogs: this.parseInt(process.env.ATS_MAX_LOGS, defaults.logging.maxLogs)
      }
    };

    return mergeConfig(envConfig, providedConfig || {});
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const { scoring, formatting, optimization, enhancement, logging } = this.config;

    parseScoringWeights(scoring.weights);

    if (formatting.minWordCount < 0 || formatting.maxWordCount < formatting.minWordCount) {
      throw ATSErrorFactory.configurationError(
        'formatting',
        'Word count bounds must satisfy 0 <= minWordCount <= maxWordCount'
      );
    }

    if (optimization.experienceMinLengthRatio < 0 || optimization.experienceMinLengthRatio > 1) {
      throw ATSErrorFactory.configurationError(
        'optimization.experienceMinLengthRatio',
        'Must be between 0 and 1'
      );
    }

    if (optimization.maxSummaryClauses < 0 || optimization.maxUnusedKeywords < 0) {
      throw ATSErrorFactory.configurationError(
        'optimization',
        'Clause and keyword limits must be non-negative'
      );
    }

    if (enhancement.timeoutMs < 1) {
      throw ATSErrorFactory.configurationError(
        'enhancement.timeoutMs',
        'Must be at least 1'
      );
    }

    if (logging.maxLogs < 1) {
      throw ATSErrorFactory.configurationError(
        'logging.maxLogs',
        'Must be at least 1'
      );
    }
  }

  /**
   * Get configuration
   */
  getConfig(): ATSEngineConfig {
    return mergeConfig(this.config, {});
  }

  /**
   * Update configuration
   */
  updateConfig(updates: ATSEngineConfigOverrides): void {
    const previous = this.config;
    this.config = mergeConfig(this.config, updates);
    try {
      this.validateConfig();
    } catch (error) {
      this.config = previous;
      throw error;
    }
  }

  /**
   * Get scoring weights
   */
  getScoringWeights(): ScoringWeights {
    return { ...this.config.scoring.weights };
  }

  getFormattingConfig(): FormattingConfig {
    return { ...this.config.formatting };
  }

  getOptimizationTuning(): OptimizationTuning {
    return { ...this.config.optimization };
  }

  getEnhancementConfig(): EnhancementConfig {
    return { ...this.config.enhancement };
  }

  /**
   * Parse integer from environment variable
   */
  private parseInt(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Parse float from environment variable
   */
  private parseFloat(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }
}

/**
 * Merge overrides into a base configuration section by section
 */
export function mergeConfig(
  base: ATSEngineConfig,
  overrides: ATSEngineConfigOverrides
): ATSEngineConfig {
  return {
    scoring: {
      weights: { ...base.scoring.weights, ...overrides.scoring?.weights }
    },
    formatting: { ...base.formatting, ...overrides.formatting },
    optimization: { ...base.optimization, ...overrides.optimization },
    enhancement: { ...base.enhancement, ...overrides.enhancement },
    logging: { ...base.logging, ...overrides.logging }
  };
}

/**
 * Global configuration instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(config?: ATSEngineConfigOverrides): ConfigManager {
  globalConfig = new ConfigManager(config);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = new ConfigManager();
}
