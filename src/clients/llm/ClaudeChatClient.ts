import type Anthropic from '@anthropic-ai/sdk';
import pLimit from 'p-limit';
import { AnthropicConfig } from '../../config/anthropic.js';
import { toUpstreamError } from '../../utils/errors.js';
import { StageLogger } from '../../utils/logger.js';
import { RateLimitGate, retryOnRateLimit } from './backoff.js';
import type { ChatMessage, CompletionResult, CompletionSettings, LLMClient } from './types.js';

export interface ClaudeChatClientOptions {
  model?: string;
  maxConcurrentApiCalls?: number;
  /** Minimum spacing between requests. Default: unlimited */
  requestsPerSecond?: number;
  client?: Anthropic;
}

/**
 * Claude Chat Client
 *
 * Messages API behind the same LLMClient contract as OpenAIChatClient. The
 * system message is sent separately, as the Messages API requires.
 */
export class ClaudeChatClient implements LLMClient {
  readonly model: string;
  private client: Anthropic;
  private logger: StageLogger;
  private apiLimiter: ReturnType<typeof pLimit>;
  private gate: RateLimitGate;

  constructor(jobId: string, options: ClaudeChatClientOptions = {}) {
    this.client = options.client ?? AnthropicConfig.getClient();
    this.model = options.model ?? AnthropicConfig.getModel();
    this.apiLimiter = pLimit(options.maxConcurrentApiCalls ?? 4);
    this.gate = new RateLimitGate(options.requestsPerSecond ? Math.ceil(1000 / options.requestsPerSecond) : 0);
    this.logger = new StageLogger(`Claude:${jobId}`);
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings = {}): Promise<CompletionResult> {
    const model = settings.model ?? this.model;
    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const conversation = messages.flatMap((message) =>
      message.role === 'system' ? [] : [{ role: message.role, content: message.content }]
    );

    // Keep well under the SDK's long-request guard
    const maxTokens = Math.min(settings.maxOutputTokens ?? 4096, 20000);

    return this.apiLimiter(async () => {
      try {
        const response = await retryOnRateLimit(
          () =>
            this.client.messages.create({
              model,
              max_tokens: maxTokens,
              system: system || undefined,
              messages: conversation,
              temperature: settings.temperature,
            }),
          this.logger,
          { gate: this.gate }
        );

        let content = '';
        for (const block of response.content) {
          if (block.type === 'text') {
            content += block.text;
          }
        }

        return {
          content,
          model: response.model,
          finishReason:
            response.stop_reason === 'max_tokens'
              ? 'length'
              : response.stop_reason === 'end_turn' || response.stop_reason === 'stop_sequence'
                ? 'stop'
                : 'other',
          usage: {
            prompt: response.usage.input_tokens,
            completion: response.usage.output_tokens,
            total: response.usage.input_tokens + response.usage.output_tokens,
          },
        };
      } catch (error) {
        this.logger.error('API call failed', error, { model });
        throw toUpstreamError('anthropic', error);
      }
    });
  }
}
