import type { BatchCheckpoint } from '../models/checkpoint.js';
import type {
  Chunk,
  ChunkDraft,
  Judgment,
  JudgmentMetadata,
  JudgmentStatus,
  NewJudgment,
  ReportabilityScore,
} from '../models/judgment.js';
import type { PracticeAreaLabel } from '../models/practiceArea.js';

/**
 * Batch selection by lifecycle state
 */
export interface StatusQuery {
  status: JudgmentStatus;
  year: number;
  court?: string;
  limit: number;
  /** Checkpoint key whose completed ids are left out */
  excludeCheckpoint?: string;
}

export interface ChunkEmbeddings {
  model: string;
  vectors: Array<{ chunkId: string; vector: number[] }>;
  /** Mean of the chunk vectors */
  judgmentVector: number[];
}

/**
 * Everything a stage may write for one judgment. Written together with the
 * status change, in one transaction.
 */
export interface StageWrite {
  metadata?: JudgmentMetadata;
  chunks?: ChunkDraft[];
  embeddings?: ChunkEmbeddings;
  shortSummary?: string;
  reportability?: ReportabilityScore;
  longSummary?: string | null;
  practiceArea?: PracticeAreaLabel;
}

export interface ClassificationQuery {
  limit: number;
  /** Include judgments that already carry a practice area */
  force: boolean;
}

/**
 * Storage access for the pipeline
 *
 * Implemented against PostgreSQL (PgJudgmentRepository). The store is the
 * system of record for lifecycle state; checkpoints live beside it.
 */
export interface JudgmentRepository {
  findById(id: string): Promise<Judgment | null>;

  /**
   * Judgments in exactly `status`, oldest first
   */
  selectByStatus(query: StatusQuery): Promise<Judgment[]>;

  sourceUrlExists(sourceUrl: string): Promise<boolean>;

  /**
   * Insert a judgment at `scraped`. Returns null when the source URL is
   * already stored.
   */
  insertScraped(input: NewJudgment): Promise<Judgment | null>;

  /**
   * Apply a stage's output and move the judgment from `from` to `to`.
   * Returns false (and writes nothing) when the judgment is no longer at
   * `from`.
   */
  advance(id: string, from: JudgmentStatus, to: JudgmentStatus, write: StageWrite): Promise<boolean>;

  getChunks(judgmentId: string): Promise<Chunk[]>;

  /**
   * Judgments with a short summary at `long_summarized` or later whose
   * practice area is unset or Not Classified (any area with `force`),
   * ordered by judgment date
   */
  selectForClassification(query: ClassificationQuery): Promise<Judgment[]>;

  setPracticeArea(id: string, area: PracticeAreaLabel): Promise<void>;

  /**
   * Highest reportability score above zero with a judgment date in [from, to]
   */
  findFeaturedCandidate(from: string, to: string): Promise<Judgment | null>;

  /**
   * Clear the featured flag everywhere, then set it on `id` (if given)
   */
  setFeatured(id: string | null): Promise<void>;

  loadCheckpoint(key: string): Promise<BatchCheckpoint | null>;
  /**
   * Add one completed id to the checkpoint, creating it when missing
   */
  appendCheckpoint(key: string, stage: number, itemId: string): Promise<void>;
  deleteCheckpoint(key: string): Promise<void>;
}
