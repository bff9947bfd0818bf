import type { PracticeAreaLabel } from './practiceArea.js';

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Lifecycle states, in pipeline order. A judgment at index n has completed
 * stage n + 1.
 */
export const JUDGMENT_LIFECYCLE = [
  'scraped',
  'metadata_fixed',
  'chunked',
  'embedded',
  'short_summarized',
  'scored',
  'long_summarized',
  'classified',
] as const;

export type JudgmentStatus = (typeof JUDGMENT_LIFECYCLE)[number];

export function isJudgmentStatus(value: unknown): value is JudgmentStatus {
  return typeof value === 'string' && JUDGMENT_LIFECYCLE.some((status) => status === value);
}

export function lifecycleIndex(status: JudgmentStatus): number {
  return JUDGMENT_LIFECYCLE.indexOf(status);
}

/**
 * True when the judgment has reached (or passed) the given state
 */
export function hasReached(status: JudgmentStatus, target: JudgmentStatus): boolean {
  return lifecycleIndex(status) >= lifecycleIndex(target);
}

// ============================================================================
// Entities
// ============================================================================

export interface JudgmentMetadata {
  neutralCitation: string | null;
  caseNumber: string | null;
  /** ISO date (YYYY-MM-DD) */
  judgmentDate: string | null;
  courtName: string | null;
  parties: string[];
  judges: string[];
}

export const EMPTY_METADATA: JudgmentMetadata = {
  neutralCitation: null,
  caseNumber: null,
  judgmentDate: null,
  courtName: null,
  parties: [],
  judges: [],
};

export interface ReportabilityCategoryScore {
  category: string;
  score: number;
  maxScore: number;
}

export interface ReportabilityScore {
  score: number;
  categories: ReportabilityCategoryScore[];
  /** Total the model reported, when it differs from the category sum */
  reportedScore: number | null;
  model: string;
  analysis: string;
}

export interface Judgment {
  id: string;
  court: string;
  year: number;
  sourceUrl: string;
  title: string;
  text: string;
  status: JudgmentStatus;
  metadata: JudgmentMetadata;
  shortSummary: string | null;
  reportability: ReportabilityScore | null;
  longSummary: string | null;
  practiceArea: PracticeAreaLabel | null;
  featured: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewJudgment {
  court: string;
  year: number;
  sourceUrl: string;
  title: string;
  text: string;
}

export interface Chunk {
  id: string;
  judgmentId: string;
  index: number;
  start: number;
  end: number;
  text: string;
}

export type ChunkDraft = Omit<Chunk, 'id' | 'judgmentId'>;

export interface Embedding {
  chunkId: string;
  vector: number[];
  model: string;
}
