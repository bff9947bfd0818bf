import axios from 'axios';
import type { AxiosInstance } from 'axios';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

/**
 * Voyage AI Configuration
 *
 * Primary embedding provider (voyage-law-2, 1024 dimensions).
 */
export class VoyageConfig {
  private static client: AxiosInstance | null = null;

  static getConfig() {
    const apiKey = process.env.VOYAGE_API_KEY;
    const baseURL = process.env.VOYAGE_BASE_URL || 'https://api.voyageai.com/v1';
    const model = process.env.VOYAGE_MODEL || 'voyage-law-2';
    const dimensions = parseInt(process.env.EMBEDDING_DIMENSIONS || '1024', 10);
    const timeoutMs = parseInt(process.env.VOYAGE_TIMEOUT_MS || '60000', 10);

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Voyage configuration. ' +
          'Please ensure VOYAGE_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      baseURL,
      model,
      dimensions,
      timeoutMs,
    };
  }

  /**
   * Axios instance with the bearer token and base URL set
   */
  static getClient(): AxiosInstance {
    if (!this.client) {
      const config = this.getConfig();
      this.client = axios.create({
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json',
        },
      });
    }
    return this.client;
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
