import type { Judgment } from '../models/judgment.js';
import type { JudgmentRepository } from '../storage/JudgmentRepository.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('UpdateFeaturedJudgment');

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Monday and Sunday (UTC, YYYY-MM-DD) of the week containing `now`
 */
export function currentWeekRange(now: Date): { from: string; to: string } {
  const daysSinceMonday = (now.getUTCDay() + 6) % 7;
  const monday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - daysSinceMonday);
  return {
    from: new Date(monday).toISOString().slice(0, 10),
    to: new Date(monday + 6 * DAY_MS).toISOString().slice(0, 10),
  };
}

/**
 * Feature the highest-scoring judgment of this week. The flag is cleared
 * everywhere first, so at most one judgment is featured afterwards.
 */
export async function updateFeaturedJudgment(
  repository: JudgmentRepository,
  now: Date = new Date()
): Promise<Judgment | null> {
  const { from, to } = currentWeekRange(now);
  const candidate = await repository.findFeaturedCandidate(from, to);
  await repository.setFeatured(candidate?.id ?? null);

  if (candidate) {
    logger.info('Featured judgment updated', {
      judgmentId: candidate.id,
      score: candidate.reportability?.score,
      from,
      to,
    });
  } else {
    logger.warn('No scored judgment this week', { from, to });
  }
  return candidate;
}
