import type OpenAI from 'openai';
import pLimit from 'p-limit';
import { OpenAIConfig } from '../../config/openai.js';
import { toUpstreamError } from '../../utils/errors.js';
import { StageLogger } from '../../utils/logger.js';
import { RateLimitGate, retryOnRateLimit } from './backoff.js';
import type { ChatMessage, CompletionResult, CompletionSettings, LLMClient } from './types.js';

export interface OpenAIChatClientOptions {
  model?: string;
  /** Maximum concurrent API calls. Default: 4 */
  maxConcurrentApiCalls?: number;
  /** Minimum spacing between requests. Default: unlimited */
  requestsPerSecond?: number;
  client?: OpenAI;
}

/**
 * OpenAI Chat Client
 *
 * Wrapper for Chat Completions with a concurrency limiter and rate-limit
 * backoff. Failures that survive the backoff are rethrown, transient ones as
 * TransientUpstreamError.
 */
export class OpenAIChatClient implements LLMClient {
  readonly model: string;
  private client: OpenAI;
  private logger: StageLogger;
  private apiLimiter: ReturnType<typeof pLimit>;
  private gate: RateLimitGate;

  constructor(jobId: string, options: OpenAIChatClientOptions = {}) {
    this.client = options.client ?? OpenAIConfig.getClient();
    this.model = options.model ?? OpenAIConfig.getModel();
    this.apiLimiter = pLimit(options.maxConcurrentApiCalls ?? 4);
    this.gate = new RateLimitGate(options.requestsPerSecond ? Math.ceil(1000 / options.requestsPerSecond) : 0);
    this.logger = new StageLogger(`OpenAI:${jobId}`);
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings = {}): Promise<CompletionResult> {
    const model = settings.model ?? this.model;

    return this.apiLimiter(async () => {
      try {
        const response = await retryOnRateLimit(
          () =>
            this.client.chat.completions.create({
              model,
              messages,
              max_tokens: settings.maxOutputTokens,
              temperature: settings.temperature,
            }),
          this.logger,
          { gate: this.gate }
        );

        const choice = response.choices[0];
        const usage = response.usage;

        return {
          content: choice?.message.content ?? '',
          model: response.model,
          finishReason:
            choice?.finish_reason === 'stop' ? 'stop' : choice?.finish_reason === 'length' ? 'length' : 'other',
          usage: {
            prompt: usage?.prompt_tokens ?? 0,
            completion: usage?.completion_tokens ?? 0,
            total: usage?.total_tokens ?? 0,
          },
        };
      } catch (error) {
        this.logger.error('API call failed', error, { model });
        throw toUpstreamError('openai', error);
      }
    });
  }
}
