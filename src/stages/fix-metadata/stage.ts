import type { TransformStage } from '../types.js';
import { MetadataParser } from './metadataParser.js';

/**
 * Stage 2: citation, case number, date, court, parties and judges
 */
export const fixMetadataStage: TransformStage = {
  kind: 'transform',
  number: 2,
  id: 'fix-metadata',
  description: 'Fix and enhance judgment metadata',
  defaults: { batchSize: 50 },
  requiredStatus: 'scraped',
  resultStatus: 'metadata_fixed',
  retriesItems: false,

  async prepare(_options, services) {
    services.courts();
  },

  async transform(judgment, _options, services) {
    const parser = new MetadataParser(judgment.text, judgment.title, services.courts().courts);
    return { metadata: parser.extractAll() };
  },
};
