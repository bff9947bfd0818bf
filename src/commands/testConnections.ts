import { AnthropicConfig } from '../config/anthropic.js';
import { DatabaseConfig } from '../config/database.js';
import { HuggingFaceConfig } from '../config/huggingface.js';
import { OpenAIConfig } from '../config/openai.js';
import { SupabaseConfig } from '../config/supabase.js';
import { VoyageConfig } from '../config/voyage.js';

export interface ConnectionCheck {
  service: string;
  configured: boolean;
  /** Only services with a cheap round trip are contacted */
  reachable?: boolean;
}

/**
 * Report which services are configured and whether the database answers
 */
export async function testConnections(): Promise<ConnectionCheck[]> {
  const checks: ConnectionCheck[] = [];

  const dbConfigured = DatabaseConfig.validate();
  checks.push({
    service: 'PostgreSQL',
    configured: dbConfigured,
    reachable: dbConfigured ? await DatabaseConfig.testConnection() : undefined,
  });
  checks.push({ service: 'OpenAI', configured: OpenAIConfig.validate() });
  checks.push({ service: 'Anthropic', configured: AnthropicConfig.validate() });
  checks.push({ service: 'Voyage AI', configured: VoyageConfig.validate() });
  checks.push({ service: 'Supabase', configured: SupabaseConfig.validate() });
  checks.push({ service: 'Hugging Face', configured: HuggingFaceConfig.validate() });

  return checks;
}
