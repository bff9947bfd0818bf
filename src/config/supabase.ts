import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

/**
 * Supabase Configuration
 *
 * Vector search over the judgment embeddings through Postgres RPC functions.
 * Uses the service role key; this process never acts on behalf of a user.
 */
export class SupabaseConfig {
  private static client: SupabaseClient | null = null;

  static getConfig() {
    const url = process.env.SUPABASE_URL;
    const serviceRoleKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!url || !serviceRoleKey) {
      throw new ConfigurationError(
        'Missing required Supabase configuration. ' +
          'Please ensure SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are set in .env'
      );
    }

    return { url, serviceRoleKey };
  }

  static getClient(): SupabaseClient {
    if (!this.client) {
      const config = this.getConfig();
      this.client = createClient(config.url, config.serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
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
