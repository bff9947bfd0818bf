import { ClaudeChatClient } from './ClaudeChatClient.js';
import { OpenAIChatClient } from './OpenAIChatClient.js';
import type { LLMClient } from './types.js';

export type { ChatMessage, CompletionResult, CompletionSettings, LLMClient, TokenUsage } from './types.js';

export function isClaudeModel(model: string): boolean {
  return model.startsWith('claude-');
}

/**
 * Client for `model`: Anthropic for claude-* models, OpenAI otherwise
 */
export function createLLMClient(jobId: string, model: string): LLMClient {
  return isClaudeModel(model)
    ? new ClaudeChatClient(jobId, { model })
    : new OpenAIChatClient(jobId, { model });
}
