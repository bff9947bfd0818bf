import type { PracticeAreaClassifier } from '../classification/types.js';
import type { EmbeddingClient } from '../clients/embeddings/index.js';
import type { LLMClient } from '../clients/llm/index.js';
import type { CourtsConfig } from '../config/courts.js';
import type { Judgment, JudgmentStatus, NewJudgment } from '../models/judgment.js';
import type { StageOptionOverrides, StageOptions } from '../pipeline/options.js';
import type { JudgmentSource, ScrapeTarget } from '../scraping/SafliiScraper.js';
import type { JudgmentRepository, StageWrite } from '../storage/JudgmentRepository.js';

// ============================================================================
// Types
// ============================================================================

export interface StageScope {
  year: number;
  court?: string;
}

/**
 * Collaborators handed to every stage. Client factories are lazy so a stage
 * only builds (and only needs credentials for) what it uses.
 */
export interface StageServices {
  repository: JudgmentRepository;
  source(): JudgmentSource;
  embeddings(): EmbeddingClient;
  llm(model: string): LLMClient;
  classifier(model: string): Promise<PracticeAreaClassifier>;
  courts(): CourtsConfig;
}

export interface ItemFailure {
  itemId: string;
  error: string;
}

interface StageBase {
  number: number;
  id: string;
  description: string;
  defaults: StageOptionOverrides;
  resultStatus: JudgmentStatus;
  /** Retry transient failures up to options.maxRetries attempts per item */
  retriesItems: boolean;
  /**
   * Run before any batch work: validate options, build clients, load config.
   * Throws ConfigurationError when the stage cannot run.
   */
  prepare?(options: StageOptions, services: StageServices): Promise<void>;
}

/**
 * A stage that brings new judgments in (stage 1)
 */
export interface SourceStage extends StageBase {
  kind: 'source';
  discover(
    scope: StageScope,
    options: StageOptions,
    services: StageServices
  ): Promise<{ targets: ScrapeTarget[]; failures: ItemFailure[] }>;
  ingest(target: ScrapeTarget, options: StageOptions, services: StageServices): Promise<NewJudgment>;
}

/**
 * A stage that moves a judgment from `requiredStatus` to `resultStatus`
 */
export interface TransformStage extends StageBase {
  kind: 'transform';
  requiredStatus: JudgmentStatus;
  transform(judgment: Judgment, options: StageOptions, services: StageServices): Promise<StageWrite>;
}

export type PipelineStage = SourceStage | TransformStage;

/** Characters of judgment text sent to an LLM in one prompt */
export const MAX_PROMPT_CHARS = 100000;
