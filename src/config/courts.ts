import fs from 'fs';
import path from 'path';
import { validator } from '../utils/validators.js';
import { ConfigurationError } from '../utils/errors.js';

export interface CourtDefinition {
  code: string;
  name: string;
  /** Case-insensitive pattern matched against the judgment header */
  headerPattern: string;
}

export interface CourtsConfig {
  courts: CourtDefinition[];
  /** Courts scraped when no --court is given */
  defaultScrapeCourts: string[];
}

const validateCourtsFile = validator.compileSchema<CourtsConfig>('courts', {
  type: 'object',
  required: ['courts', 'defaultScrapeCourts'],
  properties: {
    courts: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['code', 'name', 'headerPattern'],
        properties: {
          code: { type: 'string', pattern: '^[A-Z]+$' },
          name: { type: 'string' },
          headerPattern: { type: 'string' },
        },
      },
    },
    defaultScrapeCourts: {
      type: 'array',
      items: { type: 'string' },
    },
  },
});

let cached: CourtsConfig | null = null;

/**
 * Court codes and names (config/courts.json, or COURTS_FILE)
 */
export function loadCourts(): CourtsConfig {
  if (cached) {
    return cached;
  }

  const filePath = process.env.COURTS_FILE || path.join(process.cwd(), 'config', 'courts.json');
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot load courts config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  cached = validator.parse(validateCourtsFile, data, filePath);
  return cached;
}
