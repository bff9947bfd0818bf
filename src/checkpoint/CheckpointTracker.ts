import { checkpointKey } from '../models/checkpoint.js';
import type { JudgmentRepository } from '../storage/JudgmentRepository.js';
import { StageLogger } from '../utils/logger.js';

/**
 * Checkpoint Tracker
 *
 * Keeps the set of item ids a stage has completed for one year/court scope.
 * Each success appends its id in the store; the full set is only read once,
 * at load. The checkpoint is a resume hint: a failed save is logged and the
 * run goes on.
 */
export class CheckpointTracker {
  readonly key: string;
  private completed: Set<string> = new Set();
  private logger: StageLogger;

  constructor(
    private repository: JudgmentRepository,
    private stage: number,
    year: number,
    court?: string
  ) {
    this.key = checkpointKey(stage, year, court);
    this.logger = new StageLogger(`checkpoint:${stage}`);
  }

  /**
   * Load completed ids from the store
   */
  async load(): Promise<ReadonlySet<string>> {
    const checkpoint = await this.repository.loadCheckpoint(this.key);
    this.completed = new Set(checkpoint?.completedIds ?? []);

    if (checkpoint) {
      this.logger.info('Resuming from checkpoint', {
        key: this.key,
        completed: this.completed.size,
        updatedAt: checkpoint.updatedAt.toISOString(),
      });
    }
    return this.completed;
  }

  async markCompleted(itemId: string): Promise<void> {
    this.completed.add(itemId);
    try {
      await this.repository.appendCheckpoint(this.key, this.stage, itemId);
    } catch (error) {
      this.logger.warn('Failed to save checkpoint', {
        key: this.key,
        itemId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async reset(): Promise<void> {
    await this.repository.deleteCheckpoint(this.key);
    this.completed = new Set();
    this.logger.info('Checkpoint cleared', { key: this.key });
  }
}
