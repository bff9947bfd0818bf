import axios from 'axios';
import type { AxiosInstance } from 'axios';
import dotenv from 'dotenv';

dotenv.config();

/**
 * Hugging Face Inference API Configuration
 *
 * Zero-shot classification tier. The token is optional: anonymous calls work
 * at a lower rate limit.
 */
export class HuggingFaceConfig {
  private static client: AxiosInstance | null = null;

  static getConfig() {
    return {
      token: process.env.HF_API_TOKEN || undefined,
      baseURL: process.env.HF_INFERENCE_URL || 'https://api-inference.huggingface.co/models',
      zeroShotModel: process.env.HF_ZERO_SHOT_MODEL || 'facebook/bart-large-mnli',
      timeoutMs: parseInt(process.env.HF_TIMEOUT_MS || '60000', 10),
    };
  }

  static getClient(): AxiosInstance {
    if (!this.client) {
      const config = this.getConfig();
      this.client = axios.create({
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        headers: config.token ? { Authorization: `Bearer ${config.token}` } : {},
      });
    }
    return this.client;
  }

  /**
   * True when an API token is set (anonymous calls still work)
   */
  static validate(): boolean {
    return Boolean(this.getConfig().token);
  }
}
