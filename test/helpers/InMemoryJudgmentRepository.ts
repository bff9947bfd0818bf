import type { BatchCheckpoint } from '../../src/models/checkpoint.js';
import { EMPTY_METADATA, hasReached } from '../../src/models/judgment.js';
import type { Chunk, Judgment, JudgmentStatus, NewJudgment } from '../../src/models/judgment.js';
import { NOT_CLASSIFIED } from '../../src/models/practiceArea.js';
import type { PracticeAreaLabel } from '../../src/models/practiceArea.js';
import type {
  ClassificationQuery,
  JudgmentRepository,
  StageWrite,
  StatusQuery,
} from '../../src/storage/JudgmentRepository.js';

/**
 * JudgmentRepository kept in maps, for tests
 */
export class InMemoryJudgmentRepository implements JudgmentRepository {
  judgments: Map<string, Judgment> = new Map();
  chunks: Map<string, Chunk[]> = new Map();
  chunkVectors: Map<string, number[]> = new Map();
  judgmentVectors: Map<string, number[]> = new Map();
  checkpoints: Map<string, BatchCheckpoint> = new Map();
  failCheckpointSaves = false;
  /** Every id passed to appendCheckpoint, in order */
  checkpointAppends: string[] = [];
  private nextId = 1;

  /**
   * Insert a judgment directly, at any status
   */
  seed(overrides: Partial<Judgment> & { id: string }): Judgment {
    const judgment: Judgment = {
      court: 'ZACC',
      year: 2023,
      sourceUrl: `https://example.test/${overrides.id}`,
      title: `Judgment ${overrides.id}`,
      text: 'Judgment text.',
      status: 'scraped',
      metadata: { ...EMPTY_METADATA },
      shortSummary: null,
      reportability: null,
      longSummary: null,
      practiceArea: null,
      featured: false,
      createdAt: new Date(Date.UTC(2023, 0, this.nextId++)),
      updatedAt: new Date(Date.UTC(2023, 0, 1)),
      ...overrides,
    };
    this.judgments.set(judgment.id, judgment);
    return judgment;
  }

  async findById(id: string): Promise<Judgment | null> {
    return this.judgments.get(id) ?? null;
  }

  async selectByStatus(query: StatusQuery): Promise<Judgment[]> {
    return [...this.judgments.values()]
      .filter((j) => j.status === query.status && j.year === query.year)
      .filter((j) => !query.court || j.court === query.court)
      .filter((j) => !this.checkpointed(query.excludeCheckpoint, j.id))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, query.limit);
  }

  async sourceUrlExists(sourceUrl: string): Promise<boolean> {
    return [...this.judgments.values()].some((j) => j.sourceUrl === sourceUrl);
  }

  async insertScraped(input: NewJudgment): Promise<Judgment | null> {
    if (await this.sourceUrlExists(input.sourceUrl)) {
      return null;
    }
    return this.seed({ id: `j${this.judgments.size + 1}`, ...input, status: 'scraped' });
  }

  async advance(id: string, from: JudgmentStatus, to: JudgmentStatus, write: StageWrite): Promise<boolean> {
    const judgment = this.judgments.get(id);
    if (!judgment || judgment.status !== from) {
      return false;
    }

    if (write.chunks) {
      this.chunks.set(
        id,
        write.chunks.map((draft) => ({ ...draft, id: `${id}-c${draft.index}`, judgmentId: id }))
      );
    }
    if (write.embeddings) {
      for (const { chunkId, vector } of write.embeddings.vectors) {
        this.chunkVectors.set(chunkId, vector);
      }
      this.judgmentVectors.set(id, write.embeddings.judgmentVector);
    }

    this.judgments.set(id, {
      ...judgment,
      status: to,
      metadata: write.metadata ?? judgment.metadata,
      shortSummary: write.shortSummary ?? judgment.shortSummary,
      reportability: write.reportability ?? judgment.reportability,
      longSummary: write.longSummary !== undefined ? write.longSummary : judgment.longSummary,
      practiceArea: write.practiceArea ?? judgment.practiceArea,
      updatedAt: new Date(),
    });
    return true;
  }

  async getChunks(judgmentId: string): Promise<Chunk[]> {
    return this.chunks.get(judgmentId) ?? [];
  }

  async selectForClassification(query: ClassificationQuery): Promise<Judgment[]> {
    return [...this.judgments.values()]
      .filter((j) => hasReached(j.status, 'long_summarized') && j.shortSummary !== null)
      .filter((j) => query.force || j.practiceArea === null || j.practiceArea === NOT_CLASSIFIED)
      .sort((a, b) => (a.metadata.judgmentDate ?? '9999').localeCompare(b.metadata.judgmentDate ?? '9999'))
      .slice(0, query.limit);
  }

  async setPracticeArea(id: string, area: PracticeAreaLabel): Promise<void> {
    const judgment = this.judgments.get(id);
    if (judgment) {
      this.judgments.set(id, { ...judgment, practiceArea: area });
    }
  }

  async findFeaturedCandidate(from: string, to: string): Promise<Judgment | null> {
    const candidates = [...this.judgments.values()]
      .filter((j) => (j.reportability?.score ?? 0) > 0)
      .filter((j) => j.metadata.judgmentDate !== null && j.metadata.judgmentDate >= from && j.metadata.judgmentDate <= to)
      .sort((a, b) => (b.reportability?.score ?? 0) - (a.reportability?.score ?? 0));
    return candidates[0] ?? null;
  }

  async setFeatured(id: string | null): Promise<void> {
    for (const [key, judgment] of this.judgments) {
      this.judgments.set(key, { ...judgment, featured: key === id });
    }
  }

  async loadCheckpoint(key: string): Promise<BatchCheckpoint | null> {
    return this.checkpoints.get(key) ?? null;
  }

  async appendCheckpoint(key: string, stage: number, itemId: string): Promise<void> {
    this.checkpointAppends.push(itemId);
    if (this.failCheckpointSaves) {
      throw new Error('checkpoint store unavailable');
    }
    const existing = this.checkpoints.get(key);
    const completedIds = existing?.completedIds ?? [];
    this.checkpoints.set(key, {
      key,
      stage,
      completedIds: completedIds.includes(itemId) ? completedIds : [...completedIds, itemId],
      updatedAt: new Date(),
    });
  }

  /**
   * Store a checkpoint directly
   */
  seedCheckpoint(key: string, stage: number, completedIds: string[]): void {
    this.checkpoints.set(key, { key, stage, completedIds: [...completedIds], updatedAt: new Date(Date.UTC(2023, 0, 1)) });
  }

  private checkpointed(key: string | undefined, id: string): boolean {
    return key !== undefined && (this.checkpoints.get(key)?.completedIds.includes(id) ?? false);
  }

  async deleteCheckpoint(key: string): Promise<void> {
    this.checkpoints.delete(key);
  }
}
