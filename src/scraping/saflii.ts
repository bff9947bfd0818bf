import * as cheerio from 'cheerio';

export const SAFLII_BASE_URL = 'https://www.saflii.org';

// Navigation lines SAFLII puts above every judgment
const HEADER_MARKERS = [
  'About SAFLII',
  'Databases',
  'Search',
  'Terms of Use',
  'RSS Feeds',
  '<!-- image -->',
  '[Home]',
  '[Databases]',
  '[Search]',
  '[Noteup]',
];

const CITATION_LINE = /^.*\[\d{4}\].*\d+.*$/;

export function courtYearUrl(court: string, year: number, baseUrl: string = SAFLII_BASE_URL): string {
  return `${baseUrl}/za/cases/${court}/${year}/`;
}

/**
 * Case page URL for a citation such as "A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)"
 */
export function caseUrlFor(
  citation: string,
  court: string,
  year: number,
  baseUrl: string = SAFLII_BASE_URL
): string | null {
  const match = new RegExp(`\\[${year}\\]\\s+${court}\\s+(\\d+)`).exec(citation);
  return match ? `${baseUrl}/za/cases/${court}/${year}/${match[1]}.html` : null;
}

/**
 * Citations listed on a court/year index page. Only entries for `court`
 * are returned.
 */
export function parseCitationList(html: string, court: string): string[] {
  const $ = cheerio.load(html);
  const citations = $('li.make-database a')
    .map((_, element) => $(element).text().trim())
    .get()
    .filter((citation) => citation.length > 0);

  return citations.filter((citation) => citation.includes(court));
}

/**
 * Title of a case page: the first non-empty <h2>, else <title>
 */
export function parseCaseTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const heading = $('h2')
    .map((_, element) => $(element).text().trim())
    .get()
    .find((text) => text.length > 0);
  const title = heading ?? $('title').text().trim();
  return title.length > 0 ? title.replace(/\s+/g, ' ') : null;
}

/**
 * Plain text of a case page, one block element per line
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  $('br').replaceWith('\n');
  $('p, h1, h2, h3, h4, h5, h6, li, tr, blockquote, div, center').each((_, element) => {
    $(element).append('\n');
  });

  return $('body')
    .text()
    .split('\n')
    .map((line) => line.replace(/[ \t ]+/g, ' ').trim())
    .join('\n');
}

/**
 * Drop the SAFLII navigation header and collapse runs of blank lines
 */
export function cleanJudgmentText(text: string): string {
  const lines = text.split('\n');

  let startIndex = 0;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (HEADER_MARKERS.some((marker) => line.includes(marker))) {
      startIndex = i + 1;
      continue;
    }
    if (CITATION_LINE.test(line)) {
      break;
    }
  }

  return lines
    .slice(startIndex)
    .join('\n')
    .replace(/\n\s*\n\s*\n+/g, '\n\n')
    .trim();
}
