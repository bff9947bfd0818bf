import axios, { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import {
  caseUrlFor,
  cleanJudgmentText,
  courtYearUrl,
  htmlToText,
  parseCaseTitle,
  parseCitationList,
} from '../../../src/scraping/saflii.js';
import { SafliiScraper } from '../../../src/scraping/SafliiScraper.js';
import { TransientUpstreamError } from '../../../src/utils/errors.js';

const LIST_HTML = `
<html><body><ul>
  <li class="make-database"><a href="12.html">A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)</a></li>
  <li class="make-database"><a href="3.html">C v D [2023] ZASCA 3 (2 June 2023)</a></li>
  <li><a href="/">Home</a></li>
</ul></body></html>`;

const CASE_HTML =
  '<html><head><title>A v B</title></head><body>' +
  '<p>[Home] [Databases]</p><p>A v B [2023] ZACC 12</p><p>The applicant seeks leave to appeal.</p>' +
  '</body></html>';

/**
 * axios instance answering from a map of URL → HTML, with a 503 for
 * anything else
 */
function fakeHttp(pages: Record<string, string>) {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const body = pages[config.url ?? ''];
      if (body === undefined) {
        const response: AxiosResponse = { data: '', status: 503, statusText: 'Service Unavailable', headers: {}, config };
        throw new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, response);
      }
      return { data: body, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}

describe('SAFLII parsing', () => {
  it('builds list and case URLs', () => {
    expect(courtYearUrl('ZACC', 2023)).toBe('https://www.saflii.org/za/cases/ZACC/2023/');
    expect(caseUrlFor('A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)', 'ZACC', 2023)).toBe(
      'https://www.saflii.org/za/cases/ZACC/2023/12.html'
    );
    expect(caseUrlFor('A v B (no citation)', 'ZACC', 2023)).toBeNull();
  });

  it('lists citations for the requested court only', () => {
    expect(parseCitationList(LIST_HTML, 'ZACC')).toEqual(['A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)']);
  });

  it('reads the page title', () => {
    expect(parseCaseTitle('<html><body><h2>  A   v B </h2></body></html>')).toBe('A v B');
    expect(parseCaseTitle('<html><head><title>Fallback</title></head><body></body></html>')).toBe('Fallback');
  });

  it('turns block elements into lines', () => {
    const html = '<html><body><p>First paragraph</p><p>Second   line</p><script>track()</script></body></html>';

    expect(htmlToText(html)).toBe('First paragraph\nSecond line\n');
  });

  it('drops the navigation header and collapses blank lines', () => {
    const text = 'About SAFLII\nDatabases\n[Home] [Databases]\nA v B [2023] ZACC 12\n\n\n\nJudgment body.\n';

    expect(cleanJudgmentText(text)).toBe('A v B [2023] ZACC 12\n\nJudgment body.');
  });
});

describe('SafliiScraper', () => {
  const baseUrl = 'https://saflii.test';

  it('lists targets and fetches a judgment', async () => {
    const scraper = new SafliiScraper({
      baseUrl,
      requestDelayMs: 0,
      http: fakeHttp({
        'https://saflii.test/za/cases/ZACC/2023/': LIST_HTML,
        'https://saflii.test/za/cases/ZACC/2023/12.html': CASE_HTML,
      }),
    });

    const targets = await scraper.listTargets('ZACC', 2023, 1000);
    expect(targets).toEqual([
      {
        url: 'https://saflii.test/za/cases/ZACC/2023/12.html',
        court: 'ZACC',
        year: 2023,
        citation: 'A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)',
      },
    ]);

    const judgment = await scraper.fetchJudgment(targets[0], 1000);
    expect(judgment).toEqual({
      title: 'A v B (CCT 1/23) [2023] ZACC 12 (1 June 2023)',
      text: 'A v B [2023] ZACC 12\nThe applicant seeks leave to appeal.',
    });
  });

  it('reports a 503 as a transient upstream error', async () => {
    const scraper = new SafliiScraper({ baseUrl, requestDelayMs: 0, http: fakeHttp({}) });

    await expect(scraper.listTargets('ZACC', 2023, 1000)).rejects.toBeInstanceOf(TransientUpstreamError);
  });
});
