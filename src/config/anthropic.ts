import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

/**
 * Anthropic Configuration
 *
 * Used when a stage is run with a `claude-*` model.
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const model = process.env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-20240620';

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  /**
   * Get or create Anthropic client
   */
  static getClient(): Anthropic {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new Anthropic({
        apiKey: config.apiKey,
        timeout: 600000, // 10 minutes
        // Rate limits are retried by ClaudeChatClient
        maxRetries: 0,
      });

      console.log('🟣 Anthropic client initialized');
      console.log(`   Default Model: ${config.model}`);
    }

    return this.client;
  }

  static getModel(): string {
    return this.getConfig().model;
  }

  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch {
      return false;
    }
  }
}
