import { createPracticeAreaChain } from '../classification/index.js';
import type { PracticeAreaClassifier } from '../classification/index.js';
import { loadTaxonomy } from '../classification/taxonomy.js';
import { createEmbeddingClient } from '../clients/embeddings/index.js';
import type { EmbeddingClient } from '../clients/embeddings/index.js';
import { createLLMClient } from '../clients/llm/index.js';
import type { LLMClient } from '../clients/llm/index.js';
import { HuggingFaceZeroShotClient } from '../clients/ZeroShotClient.js';
import { loadCourts } from '../config/courts.js';
import { SafliiScraper } from '../scraping/SafliiScraper.js';
import type { JudgmentSource } from '../scraping/SafliiScraper.js';
import type { StageServices } from '../stages/types.js';
import type { JudgmentRepository } from '../storage/JudgmentRepository.js';

/**
 * Production services: SAFLII, Voyage/OpenAI embeddings, OpenAI/Anthropic
 * chat and the Hugging Face zero-shot tier. Every client is built on first
 * use and reused for the rest of the run.
 */
export function createStageServices(repository: JudgmentRepository): StageServices {
  let source: JudgmentSource | null = null;
  let embeddings: EmbeddingClient | null = null;
  const llmClients = new Map<string, LLMClient>();
  const classifiers = new Map<string, PracticeAreaClassifier>();

  const llm = (model: string): LLMClient => {
    let client = llmClients.get(model);
    if (!client) {
      client = createLLMClient('pipeline', model);
      llmClients.set(model, client);
    }
    return client;
  };

  return {
    repository,
    courts: loadCourts,

    source() {
      source ??= new SafliiScraper();
      return source;
    },

    embeddings() {
      embeddings ??= createEmbeddingClient();
      return embeddings;
    },

    llm,

    async classifier(model) {
      let classifier = classifiers.get(model);
      if (!classifier) {
        const taxonomy = await loadTaxonomy();
        classifier = createPracticeAreaChain(taxonomy, { zeroShot: new HuggingFaceZeroShotClient(), llm: llm(model) });
        classifiers.set(model, classifier);
      }
      return classifier;
    },
  };
}
