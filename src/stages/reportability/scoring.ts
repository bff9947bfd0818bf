import type { ReportabilityCategoryScore } from '../../models/judgment.js';

export const REPORTABILITY_CATEGORIES = [
  { category: 'Legal Significance', maxScore: 35 },
  { category: 'Precedential Value', maxScore: 25 },
  { category: 'Practical Impact', maxScore: 20 },
  { category: 'Quality of Reasoning', maxScore: 15 },
  { category: 'Public Interest', maxScore: 5 },
] as const;

/**
 * Category scores stated as "Score: 30/35" or "(30/35)" after each category
 * name. Categories the analysis never scores are left out. Scores above the
 * category's weight are capped at the weight.
 */
export function extractCategoryScores(analysis: string): ReportabilityCategoryScore[] {
  const scores: ReportabilityCategoryScore[] = [];

  for (const { category, maxScore } of REPORTABILITY_CATEGORIES) {
    const pattern = new RegExp(`${category}[\\s\\S]*?(?:Score:|\\()\\s*(\\d+)(?:/\\d+|\\s*\\))`, 'i');
    const match = pattern.exec(analysis);
    if (match) {
      scores.push({ category, score: Math.min(parseInt(match[1], 10), maxScore), maxScore });
    }
  }

  return scores;
}

export function extractReportedScore(analysis: string): number | null {
  const match = /Reportability Score:\s*(\d+)/.exec(analysis);
  return match ? parseInt(match[1], 10) : null;
}

export interface ValidatedScore {
  /** Sum of the category scores; this is the score that is stored */
  score: number;
  categories: ReportabilityCategoryScore[];
  /** Total the model stated, when present */
  reportedScore: number | null;
  /** Analysis with a "## Score Validation" section appended */
  analysis: string;
}

export function validateAndCalculateScore(analysis: string): ValidatedScore {
  const categories = extractCategoryScores(analysis);
  const score = categories.reduce((total, entry) => total + entry.score, 0);
  const reportedScore = extractReportedScore(analysis);

  const lines = ['', '', '## Score Validation', 'Category Scores:'];
  for (const entry of categories) {
    lines.push(`- ${entry.category}: ${entry.score}`);
  }
  lines.push('', `Calculated Total: ${score}`);
  if (reportedScore !== null) {
    lines.push(`Reported Score: ${reportedScore}`);
    if (reportedScore !== score) {
      lines.push(`Warning: Reported score (${reportedScore}) does not match calculated score (${score})`);
    }
  }

  return { score, categories, reportedScore, analysis: analysis + lines.join('\n') };
}
