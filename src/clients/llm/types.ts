export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionSettings {
  model?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export interface CompletionResult {
  content: string;
  model: string;
  finishReason: 'stop' | 'length' | 'other';
  usage: TokenUsage;
}

/**
 * Chat-completion capability used by the summary, reportability and
 * classification stages
 */
export interface LLMClient {
  readonly model: string;
  complete(messages: ChatMessage[], settings?: CompletionSettings): Promise<CompletionResult>;
}
