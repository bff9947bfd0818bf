import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PipelineOrchestrator } from '../../../src/pipeline/PipelineOrchestrator.js';
import { StageRunner } from '../../../src/pipeline/StageRunner.js';
import type { StatusQuery } from '../../../src/storage/JudgmentRepository.js';
import type { Judgment } from '../../../src/models/judgment.js';
import { ConfigurationError } from '../../../src/utils/errors.js';
import { StageLogger } from '../../../src/utils/logger.js';
import { fakeServices } from '../../helpers/fakes.js';
import { InMemoryJudgmentRepository } from '../../helpers/InMemoryJudgmentRepository.js';

const scope = { year: 2023 };

let repository: InMemoryJudgmentRepository;

function orchestrator(services = fakeServices(repository)): PipelineOrchestrator {
  return new PipelineOrchestrator(services, new StageRunner(services, { retryDelayMs: 0 }));
}

beforeEach(() => {
  repository = new InMemoryJudgmentRepository();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PipelineOrchestrator', () => {
  it('runs requested stages in order', async () => {
    repository.seed({ id: '1', status: 'scraped', text: 'The applicant seeks leave to appeal.' });

    const result = await orchestrator().run({ stages: [3, 2], scope });

    expect(result.summaries.map((summary) => [summary.stage, summary.succeeded])).toEqual([
      [2, 1],
      [3, 1],
    ]);
    expect(result.succeeded).toBe(2);
    expect(repository.judgments.get('1')?.status).toBe('chunked');
  });

  it('aborts on invalid options before any stage runs', async () => {
    repository.seed({ id: '1', status: 'scraped' });

    await expect(
      orchestrator().run({ stages: [2, 3], scope, overrides: { chunkSize: 100, overlap: 100 } })
    ).rejects.toThrow(ConfigurationError);
    expect(repository.judgments.get('1')?.status).toBe('scraped');
  });

  it('aborts on missing credentials before any stage runs', async () => {
    repository.seed({ id: '1', status: 'scraped' });
    const services = {
      ...fakeServices(repository),
      embeddings: () => {
        throw new ConfigurationError('No embedding provider configured');
      },
    };

    await expect(orchestrator(services).run({ stages: [2, 4], scope })).rejects.toThrow(
      'No embedding provider configured'
    );
    expect(repository.judgments.get('1')?.status).toBe('scraped');
  });

  it('rejects unknown stages and bad batch sizes', async () => {
    await expect(orchestrator().run({ stages: [9], scope })).rejects.toThrow('Unknown stage: 9 (stages are 1-8)');
    await expect(orchestrator().run({ stages: [2], scope, overrides: { batchSize: 0 } })).rejects.toThrow(
      'batch size must be a positive integer, got 0'
    );
  });

  it('stops at the first stage that aborts', async () => {
    class FlakyRepository extends InMemoryJudgmentRepository {
      async selectByStatus(query: StatusQuery): Promise<Judgment[]> {
        if (query.status === 'metadata_fixed') {
          throw new Error('connection lost');
        }
        return super.selectByStatus(query);
      }
    }
    const flaky = new FlakyRepository();
    flaky.seed({ id: '1', status: 'scraped' });
    const services = fakeServices(flaky);
    const aborted = vi.spyOn(StageLogger.prototype, 'aborted');

    await expect(
      new PipelineOrchestrator(services, new StageRunner(services, { retryDelayMs: 0 })).run({ stages: [2, 3], scope })
    ).rejects.toThrow('connection lost');
    expect(flaky.judgments.get('1')?.status).toBe('metadata_fixed');
    expect(aborted).toHaveBeenCalledTimes(1);
    expect(aborted.mock.calls[0][0]).toEqual(new Error('connection lost'));
  });

  it('clears checkpoints when asked', async () => {
    repository.seed({ id: '1', status: 'scraped' });
    repository.seedCheckpoint('stage-2:2023:all', 2, ['1']);

    const skipped = await orchestrator().run({ stages: [2], scope });
    expect(skipped.summaries[0].selected).toBe(0);

    const reset = await orchestrator().run({ stages: [2], scope, resetCheckpoint: true });
    expect(reset.summaries[0].succeeded).toBe(1);
    expect(repository.judgments.get('1')?.status).toBe('metadata_fixed');
  });
});
