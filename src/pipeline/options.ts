import { ConfigurationError } from '../utils/errors.js';

/**
 * Options passed explicitly to every stage. Each stage reads the ones it
 * needs; the rest are ignored.
 */
export interface StageOptions {
  batchSize: number;
  /** Per-request timeout for scraping, in seconds */
  timeoutSeconds: number;
  /** Attempts per item for stages that retry (1 and 4) */
  maxRetries: number;
  chunkSize: number;
  overlap: number;
  model: string;
  maxTokens: number;
  minReportability: number;
}

export const BASE_OPTIONS: StageOptions = {
  batchSize: 10,
  timeoutSeconds: 30,
  maxRetries: 3,
  chunkSize: 1000,
  overlap: 100,
  model: 'gpt-4o-mini',
  maxTokens: 500,
  minReportability: 75,
};

export type StageOptionOverrides = Partial<StageOptions>;

/**
 * Base options, then the stage's defaults, then what the caller set.
 * Overrides only carry keys the caller actually gave.
 */
export function resolveStageOptions(
  defaults: StageOptionOverrides,
  overrides: StageOptionOverrides = {}
): StageOptions {
  return { ...BASE_OPTIONS, ...defaults, ...overrides };
}

function positiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Option checks shared by every stage; stage-specific checks live with the
 * stage
 */
export function validateStageOptions(options: StageOptions): void {
  positiveInteger('batch size', options.batchSize);
  positiveInteger('timeout', options.timeoutSeconds);
  positiveInteger('max retries', options.maxRetries);
  positiveInteger('max tokens', options.maxTokens);
  if (options.minReportability < 0 || options.minReportability > 100) {
    throw new ConfigurationError(`min reportability must be between 0 and 100, got ${options.minReportability}`);
  }
  if (options.model.trim().length === 0) {
    throw new ConfigurationError('model must not be empty');
  }
}
