import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

/**
 * OpenAI Configuration
 *
 * Chat completions for summaries, reportability and classification, and the
 * fallback embedding provider.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const model = process.env.OPENAI_MODEL || 'gpt-4o-mini';
    const embeddingModel = process.env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small';
    const timeoutMs = parseInt(process.env.OPENAI_TIMEOUT_MS || '120000', 10);

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
      model,
      embeddingModel,
      timeoutMs,
    };
  }

  /**
   * Get or create OpenAI client
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        timeout: config.timeoutMs,
        // Rate limits are retried by OpenAIChatClient
        maxRetries: 0,
      });

      console.log('🟢 OpenAI client initialized');
      console.log(`   Default Model: ${config.model}`);
    }

    return this.client;
  }

  /**
   * Get the default model name
   */
  static getModel(): string {
    return this.getConfig().model;
  }

  /**
   * Validate OpenAI configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch {
      return false;
    }
  }
}
