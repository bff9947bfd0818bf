/**
 * The fixed practice-area taxonomy. Keyword sets and thresholds live in
 * config/practice-areas.json; the names themselves do not change.
 */
export const PRACTICE_AREAS = [
  'Administrative Law',
  'Commercial Law',
  'Competition Law',
  'Constitutional Law',
  'Criminal Law',
  'Delictual Law',
  'Environmental Law',
  'Family Law',
  'Insurance Law',
  'Intellectual Property Law',
  'Labour Law',
  'Land and Property Law',
  'Practice and Procedure',
  'Tax Law',
  'Arbitration',
] as const;

export type PracticeArea = (typeof PRACTICE_AREAS)[number];

export const NOT_CLASSIFIED = 'Not Classified';

export type PracticeAreaLabel = PracticeArea | typeof NOT_CLASSIFIED;

export function isPracticeArea(value: unknown): value is PracticeArea {
  return typeof value === 'string' && PRACTICE_AREAS.some((area) => area === value);
}

export function isPracticeAreaLabel(value: unknown): value is PracticeAreaLabel {
  return value === NOT_CLASSIFIED || isPracticeArea(value);
}
