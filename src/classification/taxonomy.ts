import fs from 'fs/promises';
import path from 'path';
import { PRACTICE_AREAS } from '../models/practiceArea.js';
import type { PracticeArea } from '../models/practiceArea.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { validator } from '../utils/validators.js';

const logger = createLogger('PracticeAreaTaxonomy');

export interface PracticeAreaDefinition {
  name: PracticeArea;
  description: string;
  keywords: string[];
}

/**
 * Per-deployment tuning for the fallback chain
 */
export interface ClassifierThresholds {
  /** Minimum keyword hits for the rule-based tier to accept its top area */
  ruleMinHits: number;
  /** How far the top area must lead the runner-up (0 = strictly ahead) */
  ruleMargin: number;
  /** Zero-shot score the top label must exceed */
  zeroShotMinConfidence: number;
}

export interface PracticeAreaTaxonomy {
  thresholds: ClassifierThresholds;
  zeroShotHypothesis: string;
  areas: PracticeAreaDefinition[];
}

export const DEFAULT_THRESHOLDS: ClassifierThresholds = {
  ruleMinHits: 2,
  ruleMargin: 0,
  zeroShotMinConfidence: 0.3,
};

const DEFAULT_HYPOTHESIS = 'This legal case involves matters of {}.';

interface TaxonomyFile {
  thresholds?: Partial<ClassifierThresholds>;
  zeroShotHypothesis?: string;
  areas: Array<{ name: PracticeArea; description?: string; keywords: string[] }>;
}

const validateTaxonomyFile = validator.compileSchema<TaxonomyFile>('practice-areas', {
  type: 'object',
  required: ['areas'],
  additionalProperties: false,
  properties: {
    thresholds: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ruleMinHits: { type: 'integer', minimum: 1 },
        ruleMargin: { type: 'integer', minimum: 0 },
        zeroShotMinConfidence: { type: 'number', minimum: 0, maximum: 1 },
      },
    },
    zeroShotHypothesis: { type: 'string', pattern: '\\{\\}' },
    areas: {
      type: 'array',
      minItems: PRACTICE_AREAS.length,
      maxItems: PRACTICE_AREAS.length,
      items: {
        type: 'object',
        required: ['name', 'keywords'],
        additionalProperties: false,
        properties: {
          name: { type: 'string', enum: [...PRACTICE_AREAS] },
          description: { type: 'string' },
          keywords: {
            type: 'array',
            minItems: 1,
            items: { type: 'string', minLength: 1 },
          },
        },
      },
    },
  },
});

export function defaultTaxonomyPath(): string {
  return process.env.PRACTICE_AREAS_FILE || path.join(process.cwd(), 'config', 'practice-areas.json');
}

/**
 * Validate a parsed taxonomy file and normalise it (lower-case keywords,
 * thresholds filled in from the defaults)
 */
export function parseTaxonomy(data: unknown, source: string): PracticeAreaTaxonomy {
  const file = validator.parse(validateTaxonomyFile, data, source);

  const seen = new Set<string>();
  for (const area of file.areas) {
    if (seen.has(area.name)) {
      throw new ConfigurationError(`${source} lists "${area.name}" more than once`);
    }
    seen.add(area.name);
  }

  return {
    thresholds: { ...DEFAULT_THRESHOLDS, ...file.thresholds },
    zeroShotHypothesis: file.zeroShotHypothesis ?? DEFAULT_HYPOTHESIS,
    areas: file.areas.map((area) => ({
      name: area.name,
      description: area.description ?? '',
      keywords: [...new Set(area.keywords.map((keyword) => keyword.trim().toLowerCase()))],
    })),
  };
}

/**
 * Read and validate the taxonomy file. Any problem is a ConfigurationError.
 */
export async function loadTaxonomy(filePath: string = defaultTaxonomyPath()): Promise<PracticeAreaTaxonomy> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read practice-area taxonomy at ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Practice-area taxonomy at ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const taxonomy = parseTaxonomy(data, filePath);
  logger.info(`Loaded ${taxonomy.areas.length} practice areas`, {
    filePath,
    thresholds: taxonomy.thresholds,
  });
  return taxonomy;
}
