import type { CourtDefinition } from '../../config/courts.js';
import type { JudgmentMetadata } from '../../models/judgment.js';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const JUDICIAL_TITLES = new Set(['CJ', 'DCJ', 'ADCJ', 'P', 'JP', 'DJP', 'JA', 'AJA', 'J', 'AJ']);

// Words that end up in "Coram:" sections but are not names
const NOT_NAMES = new Set([
  'court',
  'appeal',
  'judgment',
  'justice',
  'applicant',
  'respondent',
  'appellant',
  'order',
  'the',
  'and',
  'high',
  'supreme',
  'constitutional',
  'division',
]);

const HEADER_LINES = 50;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * "12 March 2023" → "2023-03-12"; null when it is not a real date
 */
export function parseLongDate(value: string): string | null {
  const match = /^(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const day = parseInt(match[1], 10);
  const month = MONTHS.indexOf(match[2].toLowerCase()) + 1;
  const year = parseInt(match[3], 10);
  if (month === 0) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

function parseIsoDate(value: string): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const date = new Date(Date.UTC(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10)));
  return Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value ? null : value;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface TitleMetadata {
  caseNumber: string | null;
  neutralCitation: string | null;
  courtCode: string | null;
  judgmentDate: string | null;
  parties: string[];
}

/**
 * Parse a SAFLII list title:
 * "Minister of X v Y and Others (CCT 12/22) [2023] ZACC 5 (14 March 2023)"
 */
export function parseTitle(title: string, knownCourts: ReadonlySet<string>): TitleMetadata {
  const caseNumber = /\(([A-Z]+\s*\d+\/\d+)\)/.exec(title)?.[1] ?? null;

  let neutralCitation: string | null = null;
  let courtCode: string | null = null;
  const citation = /\[(\d{4})\]\s+([A-Z]+)\s+(\d+)/.exec(title);
  if (citation && knownCourts.has(citation[2])) {
    courtCode = citation[2];
    neutralCitation = `[${citation[1]}] ${citation[2]} ${citation[3]}`;
  }

  const dateText = /\((\d{1,2}\s+[A-Za-z]+\s+\d{4})\)/.exec(title)?.[1];
  const judgmentDate = dateText ? parseLongDate(dateText) : null;

  return { caseNumber, neutralCitation, courtCode, judgmentDate, parties: parseParties(title) };
}

/**
 * "A v B (..." → ["A", "B"]
 */
export function parseParties(title: string): string[] {
  const caption = title.split(/\s\(|\s\[/)[0]?.trim() ?? '';
  const parts = caption.split(/\s+v\.?\s+/i);
  if (parts.length !== 2) {
    return [];
  }
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Metadata from a judgment's title and header text
 *
 * The title is tried first; anything it does not give is searched for in the
 * first 50 lines of the text.
 */
export class MetadataParser {
  private header: string;
  private codes: Set<string>;

  constructor(
    private text: string,
    private title: string,
    private courts: CourtDefinition[]
  ) {
    this.header = text.split('\n').slice(0, HEADER_LINES).join('\n');
    this.codes = new Set(courts.map((court) => court.code));
  }

  extractAll(): JudgmentMetadata {
    const fromTitle = parseTitle(this.title, this.codes);

    const neutralCitation = fromTitle.neutralCitation ?? this.extractCitation();
    const courtCode =
      fromTitle.courtCode ?? (neutralCitation ? neutralCitation.split(' ')[1] ?? null : null) ?? this.extractCourt();

    return {
      neutralCitation,
      caseNumber: fromTitle.caseNumber ?? this.extractCaseNumber(),
      judgmentDate: fromTitle.judgmentDate ?? this.extractDate(),
      courtName: this.courts.find((court) => court.code === courtCode)?.name ?? null,
      parties: fromTitle.parties,
      judges: this.extractJudges(),
    };
  }

  extractCitation(): string | null {
    const match = /\[(\d{4})\]\s+([A-Z]+)\s+(\d+)/.exec(this.header);
    if (match && this.codes.has(match[2])) {
      return `[${match[1]}] ${match[2]} ${match[3]}`;
    }
    return null;
  }

  extractCourt(): string | null {
    for (const court of this.courts) {
      if (new RegExp(`\\b${escapeRegExp(court.code)}\\b`).test(this.header)) {
        return court.code;
      }
    }
    for (const court of this.courts) {
      if (new RegExp(court.headerPattern, 'i').test(this.header)) {
        return court.code;
      }
    }
    return null;
  }

  extractCaseNumber(): string | null {
    const patterns = [
      /Case\s+(?:No|Number)[:.]?\s*(\w+\/\d+\/\d+)/,
      /Case\s+(?:No|Number)[:.]?\s*(\d+\/\d+)/,
      /\b([A-Z]+\s+\d+\/\d+)\b/,
      /\b(\d+\/\d+\/\d+)\b/,
    ];
    for (const pattern of patterns) {
      const match = pattern.exec(this.header);
      if (match) {
        return match[1].trim();
      }
    }
    return null;
  }

  extractDate(): string | null {
    const longDatePatterns = [
      /Date\s+of\s+Judgment:\s*(\d{1,2}\s+\w+\s+\d{4})/,
      /Delivered\s+on:\s*(\d{1,2}\s+\w+\s+\d{4})/,
      /Date:\s*(\d{1,2}\s+\w+\s+\d{4})/,
      /(\d{1,2}\s+\w+\s+\d{4})/,
    ];
    for (const pattern of longDatePatterns) {
      const match = pattern.exec(this.header);
      const parsed = match ? parseLongDate(match[1]) : null;
      if (parsed) {
        return parsed;
      }
    }

    const iso = /(\d{4}-\d{2}-\d{2})/.exec(this.header);
    return iso ? parseIsoDate(iso[1]) : null;
  }

  /**
   * Names listed after Coram/Before/Judgment by, kept only when they end in
   * a judicial title (e.g. "Madlanga J", "Ponnan JA")
   */
  extractJudges(): string[] {
    const sections = [
      /(?:Judges?|Bench|Panel|Coram|Present)[:.][ \t]*(.*)/i,
      /(?:Before|Heard before)[:.][ \t]*(.*)/i,
      /(?:Judgment|Order|Delivered|Written)[ \t]+by[:.]?[ \t]*(.*)/i,
    ];

    const judges = new Set<string>();
    for (const pattern of sections) {
      const match = pattern.exec(this.header);
      if (!match) {
        continue;
      }
      for (const part of match[1].split(/\s*(?:,|\band\b|&|;|\bet\s+al\b\.?)\s*/)) {
        const judge = normalizeJudgeName(part);
        if (judge) {
          judges.add(judge);
        }
      }
    }
    return [...judges].sort();
  }
}

function normalizeJudgeName(raw: string): string | null {
  const words = raw.replace(/[^A-Za-z' -]/g, ' ').split(/\s+/).filter((word) => word.length > 0);
  const title = words[words.length - 1];
  if (!title || !JUDICIAL_TITLES.has(title) || words.length < 2) {
    return null;
  }
  const names = words.slice(0, -1);
  if (names.some((word) => NOT_NAMES.has(word.toLowerCase()))) {
    return null;
  }
  const formatted = names.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
  return `${formatted.join(' ')} ${title}`;
}
