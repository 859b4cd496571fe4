/**
 * Configuration Types
 *
 * Shape of the validated runtime configuration shared by every module.
 */

/**
 * Base URLs of the collaborating services (no trailing slash)
 */
export interface ServiceUrls {
  optimizerUrl: string;
  generatorUrl: string;
  strategistUrl: string;
}

/**
 * Record store connection and table names
 */
export interface RecordStoreConfig {
  url: string;
  apiKey: string;
  scoresTable: string;
  promptsTable: string;
  historyTable: string;
  settingsTable: string;
}

export interface LearningConfig {
  /** Likes that trigger a learning cycle (default: 25) */
  likeThreshold: number;
  /** Passed through to the generator and strategist uninterpreted (default: 0.2) */
  explorationRate: number;
  /** Maximum age of cached scores before a refetch (default: 24 hours) */
  scoreMaxAgeMs: number;
}

export interface GenerationConfig {
  defaultBatchIdeas: number;
  defaultNumPrompts: number;
  defaultRenderer: string;
  /** Prompts requested per generator call (default: 10) */
  generatorBatchSize: number;
  /** Pause between generator calls in ms (default: 2000) */
  generatorBatchDelayMs: number;
}

/**
 * Per-call timeouts in milliseconds
 */
export interface TimeoutConfig {
  trainMs: number;
  scoreMs: number;
  updateMs: number;
  strategistMs: number;
  generatorMs: number;
  recordStoreMs: number;
}

export interface RetryConfig {
  /** Total attempts for retryable calls (default: 3) */
  maxAttempts: number;
  /** Base delay for exponential backoff in ms (default: 1000) */
  baseDelayMs: number;
}

export interface AppConfig {
  port: number;
  services: ServiceUrls;
  /** Null when no record store is configured; write-back is then skipped */
  recordStore: RecordStoreConfig | null;
  learning: LearningConfig;
  generation: GenerationConfig;
  timeouts: TimeoutConfig;
  retry: RetryConfig;
  shutdownGraceMs: number;
  requestLogging: boolean;
}

/**
 * Raised at start-up when required settings are missing or malformed
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
    this.name = 'ConfigurationError';
  }
}
