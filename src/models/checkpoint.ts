/**
 * Resumable batch state for one stage and scope (year + court).
 * A hint for reruns; lifecycle status in the store stays authoritative.
 */
export interface BatchCheckpoint {
  key: string;
  stage: number;
  completedIds: string[];
  updatedAt: Date;
}

export function checkpointKey(stage: number, year: number, court?: string): string {
  return `stage-${stage}:${year}:${court ?? 'all'}`;
}
