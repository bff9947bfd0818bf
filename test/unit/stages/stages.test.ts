import { beforeEach, describe, expect, it } from 'vitest';
import type { ClassificationResult, PracticeAreaClassifier } from '../../../src/classification/index.js';
import type { ReportabilityScore } from '../../../src/models/judgment.js';
import { resolveStageOptions } from '../../../src/pipeline/options.js';
import type { StageOptionOverrides } from '../../../src/pipeline/options.js';
import { StageRunner } from '../../../src/pipeline/StageRunner.js';
import { chunkJudgmentsStage } from '../../../src/stages/chunk-judgments/stage.js';
import { classifyPracticeAreasStage } from '../../../src/stages/classify-practice-areas/stage.js';
import { getStage, STAGES } from '../../../src/stages/index.js';
import { longSummaryStage } from '../../../src/stages/long-summary/stage.js';
import { reportabilityStage } from '../../../src/stages/reportability/stage.js';
import type { PipelineStage } from '../../../src/stages/types.js';
import { FakeLLMClient, fakeServices } from '../../helpers/fakes.js';
import { InMemoryJudgmentRepository } from '../../helpers/InMemoryJudgmentRepository.js';

const scope = { year: 2023 };

function optionsFor(stage: PipelineStage, overrides: StageOptionOverrides = {}) {
  return resolveStageOptions(stage.defaults, overrides);
}

function scored(score: number): ReportabilityScore {
  return { score, categories: [], reportedScore: null, model: 'fake-model', analysis: '' };
}

let repository: InMemoryJudgmentRepository;

beforeEach(() => {
  repository = new InMemoryJudgmentRepository();
});

describe('stage registry', () => {
  it('chains every stage onto the previous one', () => {
    expect(STAGES.map((stage) => stage.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    for (let i = 1; i < STAGES.length; i++) {
      const stage = STAGES[i];
      expect(stage.kind).toBe('transform');
      if (stage.kind === 'transform') {
        expect(stage.requiredStatus).toBe(STAGES[i - 1].resultStatus);
      }
    }
  });

  it('retries items only in scraping and embedding', () => {
    expect(STAGES.filter((stage) => stage.retriesItems).map((stage) => stage.number)).toEqual([1, 4]);
  });

  it('carries the documented defaults', () => {
    expect(optionsFor(STAGES[0])).toMatchObject({ batchSize: 10, timeoutSeconds: 30, maxRetries: 3 });
    expect(optionsFor(STAGES[2])).toMatchObject({ batchSize: 50, chunkSize: 1000, overlap: 100 });
    expect(optionsFor(STAGES[6])).toMatchObject({ batchSize: 10, maxTokens: 500, minReportability: 75, model: 'gpt-4o-mini' });
    expect(getStage(9)).toBeUndefined();
  });
});

describe('chunk stage', () => {
  it('stores chunks and advances', async () => {
    repository.seed({ id: '1', status: 'metadata_fixed', text: 'y'.repeat(1200) });
    const runner = new StageRunner(fakeServices(repository), { retryDelayMs: 0 });

    await runner.run(chunkJudgmentsStage, scope, optionsFor(chunkJudgmentsStage, { chunkSize: 500, overlap: 50 }));

    const chunks = await repository.getChunks('1');
    expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2]);
    expect(repository.judgments.get('1')?.status).toBe('chunked');
  });

  it('rejects an overlap not smaller than the chunk size before running', async () => {
    const services = fakeServices(repository);

    await expect(
      chunkJudgmentsStage.prepare?.(optionsFor(chunkJudgmentsStage, { chunkSize: 100, overlap: 100 }), services)
    ).rejects.toThrow('overlap (100) must be smaller than chunk size (100)');
  });
});

describe('reportability stage', () => {
  it('stores the category sum as the score', async () => {
    repository.seed({ id: '1', status: 'short_summarized' });
    const llm = new FakeLLMClient([
      'Legal Significance Score: 30/35\nPrecedential Value Score: 20/25\nPractical Impact Score: 10/20\n' +
        'Quality of Reasoning Score: 10/15\nPublic Interest Score: 5/5\nReportability Score: 75',
    ]);
    const runner = new StageRunner(fakeServices(repository, { llm }), { retryDelayMs: 0 });

    await runner.run(reportabilityStage, scope, optionsFor(reportabilityStage));

    const judgment = repository.judgments.get('1');
    expect(judgment?.status).toBe('scored');
    expect(judgment?.reportability?.score).toBe(75);
    expect(judgment?.reportability?.model).toBe('fake-model');
    expect(judgment?.reportability?.categories).toHaveLength(5);
  });

  it('fails an analysis without category scores', async () => {
    repository.seed({ id: '1', status: 'short_summarized' });
    const llm = new FakeLLMClient(['This judgment is important.']);
    const runner = new StageRunner(fakeServices(repository, { llm }), { retryDelayMs: 0 });

    const summary = await runner.run(reportabilityStage, scope, optionsFor(reportabilityStage));

    expect(summary.failures).toEqual([{ itemId: '1', error: 'No category scores found in the analysis' }]);
    expect(repository.judgments.get('1')?.status).toBe('short_summarized');
  });
});

describe('long summary stage', () => {
  it('advances without a summary below min_reportability', async () => {
    repository.seed({ id: '1', status: 'scored', reportability: scored(60) });
    const llm = new FakeLLMClient([]);
    const runner = new StageRunner(fakeServices(repository, { llm }), { retryDelayMs: 0 });

    const summary = await runner.run(longSummaryStage, scope, optionsFor(longSummaryStage));

    expect(summary.succeeded).toBe(1);
    expect(llm.calls).toHaveLength(0);
    expect(repository.judgments.get('1')).toMatchObject({ status: 'long_summarized', longSummary: null });
  });

  it('summarises reportable judgments within max_tokens', async () => {
    repository.seed({ id: '1', status: 'scored', reportability: scored(80) });
    const llm = new FakeLLMClient(['## Facts\nThe applicant was evicted.']);
    const runner = new StageRunner(fakeServices(repository, { llm }), { retryDelayMs: 0 });

    await runner.run(longSummaryStage, scope, optionsFor(longSummaryStage, { maxTokens: 300 }));

    expect(llm.calls[0].settings).toEqual({ maxOutputTokens: 300 });
    expect(repository.judgments.get('1')).toMatchObject({
      status: 'long_summarized',
      longSummary: '## Facts\nThe applicant was evicted.',
    });
  });

  it('treats a judgment exactly at the threshold as reportable', async () => {
    repository.seed({ id: '1', status: 'scored', reportability: scored(75) });
    const llm = new FakeLLMClient(['Summary.']);
    const runner = new StageRunner(fakeServices(repository, { llm }), { retryDelayMs: 0 });

    await runner.run(longSummaryStage, scope, optionsFor(longSummaryStage));

    expect(llm.calls).toHaveLength(1);
  });
});

describe('classification stage', () => {
  it('classifies from the short summary', async () => {
    repository.seed({ id: '1', status: 'long_summarized', shortSummary: 'VAT assessment set aside.' });
    repository.seed({ id: '2', status: 'long_summarized', shortSummary: null });
    const seen: string[] = [];
    const classifier: PracticeAreaClassifier = {
      async classify(summary: string): Promise<ClassificationResult> {
        seen.push(summary);
        return summary
          ? { label: 'Tax Law', tier: 'rule-based', confidence: 2, attempts: [] }
          : { label: 'Not Classified', tier: null, confidence: null, attempts: [] };
      },
    };
    const runner = new StageRunner(fakeServices(repository, { classifier }), { retryDelayMs: 0 });

    await runner.run(classifyPracticeAreasStage, scope, optionsFor(classifyPracticeAreasStage));

    expect(seen).toEqual(['VAT assessment set aside.', '']);
    expect(repository.judgments.get('1')).toMatchObject({ status: 'classified', practiceArea: 'Tax Law' });
    expect(repository.judgments.get('2')).toMatchObject({ status: 'classified', practiceArea: 'Not Classified' });
  });
});
