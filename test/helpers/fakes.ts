import type { PracticeAreaClassifier } from '../../src/classification/index.js';
import type { EmbeddingBatch, EmbeddingClient } from '../../src/clients/embeddings/index.js';
import type { ChatMessage, CompletionResult, CompletionSettings, LLMClient } from '../../src/clients/llm/index.js';
import type { ZeroShotClassifierClient, ZeroShotResult } from '../../src/clients/ZeroShotClient.js';
import type { CourtsConfig } from '../../src/config/courts.js';
import type { JudgmentSource, ScrapedJudgment, ScrapeTarget } from '../../src/scraping/SafliiScraper.js';
import type { StageServices } from '../../src/stages/types.js';
import type { JudgmentRepository } from '../../src/storage/JudgmentRepository.js';

/**
 * LLM that answers from a queue (or a function of the prompt) and records
 * every call
 */
export class FakeLLMClient implements LLMClient {
  readonly model: string;
  calls: Array<{ messages: ChatMessage[]; settings: CompletionSettings }> = [];
  private responder: (messages: ChatMessage[]) => string;

  constructor(responses: string[] | ((messages: ChatMessage[]) => string), model = 'fake-model') {
    this.model = model;
    if (typeof responses === 'function') {
      this.responder = responses;
    } else {
      const queue = [...responses];
      this.responder = () => {
        const next = queue.shift();
        if (next === undefined) {
          throw new Error('FakeLLMClient has no responses left');
        }
        return next;
      };
    }
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings = {}): Promise<CompletionResult> {
    this.calls.push({ messages, settings });
    return {
      content: this.responder(messages),
      model: this.model,
      finishReason: 'stop',
      usage: { prompt: 10, completion: 5, total: 15 },
    };
  }
}

export class FailingLLMClient implements LLMClient {
  readonly model = 'failing-model';
  calls = 0;

  async complete(): Promise<CompletionResult> {
    this.calls++;
    throw new Error('LLM unavailable');
  }
}

/**
 * Embeds each text as [length, 1, 0, ...] so results are predictable
 */
export class FakeEmbeddingClient implements EmbeddingClient {
  readonly model = 'fake-embed';
  calls: string[][] = [];
  private failures: Error[];

  constructor(
    readonly dimensions = 4,
    failures: Error[] = []
  ) {
    this.failures = [...failures];
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    this.calls.push(texts);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return {
      model: this.model,
      vectors: texts.map((text) => {
        const vector = new Array<number>(this.dimensions).fill(0);
        vector[0] = text.length;
        vector[1] = 1;
        return vector;
      }),
    };
  }
}

export class FakeZeroShotClient implements ZeroShotClassifierClient {
  calls = 0;

  constructor(private result: ZeroShotResult | Error) {}

  async classify(): Promise<ZeroShotResult> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

/**
 * Judgment source over fixed listings; fetches fail with the queued errors
 * first
 */
export class FakeJudgmentSource implements JudgmentSource {
  fetched: string[] = [];

  constructor(
    private listings: Record<string, ScrapeTarget[]>,
    private fetchFailures: Record<string, Error[]> = {}
  ) {}

  async listTargets(court: string): Promise<ScrapeTarget[]> {
    const targets = this.listings[court];
    if (!targets) {
      throw new Error(`listing unavailable for ${court}`);
    }
    return targets;
  }

  async fetchJudgment(target: ScrapeTarget): Promise<ScrapedJudgment> {
    this.fetched.push(target.url);
    const failure = this.fetchFailures[target.url]?.shift();
    if (failure) {
      throw failure;
    }
    return { title: `Case ${target.citation}`, text: `Full text of ${target.citation}` };
  }
}

export const TEST_COURTS: CourtsConfig = {
  courts: [
    { code: 'ZACC', name: 'Constitutional Court of South Africa', headerPattern: 'CONSTITUTIONAL COURT OF SOUTH AFRICA' },
    { code: 'ZASCA', name: 'Supreme Court of Appeal', headerPattern: 'SUPREME COURT OF APPEAL' },
  ],
  defaultScrapeCourts: ['ZACC', 'ZASCA'],
};

/**
 * StageServices whose factories return the given fakes; any factory not
 * given throws when used
 */
export function fakeServices(
  repository: JudgmentRepository,
  overrides: {
    source?: JudgmentSource;
    embeddings?: EmbeddingClient;
    llm?: LLMClient;
    classifier?: PracticeAreaClassifier;
    courts?: CourtsConfig;
  } = {}
): StageServices {
  const missing = (name: string): never => {
    throw new Error(`No fake ${name} configured`);
  };

  return {
    repository,
    courts: () => overrides.courts ?? TEST_COURTS,
    source: () => overrides.source ?? missing('source'),
    embeddings: () => overrides.embeddings ?? missing('embeddings'),
    llm: () => overrides.llm ?? missing('llm'),
    classifier: async () => overrides.classifier ?? missing('classifier'),
  };
}
