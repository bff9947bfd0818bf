import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { toUpstreamError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  SAFLII_BASE_URL,
  caseUrlFor,
  cleanJudgmentText,
  courtYearUrl,
  htmlToText,
  parseCaseTitle,
  parseCitationList,
} from './saflii.js';

const logger = createLogger('SafliiScraper');

export interface ScrapeTarget {
  url: string;
  court: string;
  year: number;
  citation: string;
}

export interface ScrapedJudgment {
  title: string;
  text: string;
}

/**
 * Where stage 1 gets judgments from
 */
export interface JudgmentSource {
  listTargets(court: string, year: number, timeoutMs: number): Promise<ScrapeTarget[]>;
  fetchJudgment(target: ScrapeTarget, timeoutMs: number): Promise<ScrapedJudgment>;
}

export interface SafliiScraperOptions {
  http?: AxiosInstance;
  baseUrl?: string;
  /** Pause before each case page request. Default: 2000 */
  requestDelayMs?: number;
}

export class SafliiScraper implements JudgmentSource {
  private http: AxiosInstance;
  private baseUrl: string;
  private requestDelayMs: number;

  constructor(options: SafliiScraperOptions = {}) {
    this.baseUrl = options.baseUrl ?? SAFLII_BASE_URL;
    this.requestDelayMs = options.requestDelayMs ?? 2000;
    this.http =
      options.http ??
      axios.create({
        headers: {
          'User-Agent':
            'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
          Referer: `${SAFLII_BASE_URL}/`,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        responseType: 'text',
      });
  }

  async listTargets(court: string, year: number, timeoutMs: number): Promise<ScrapeTarget[]> {
    const listUrl = courtYearUrl(court, year, this.baseUrl);
    const html = await this.get(listUrl, timeoutMs);
    const citations = parseCitationList(html, court);

    const targets: ScrapeTarget[] = [];
    for (const citation of citations) {
      const url = caseUrlFor(citation, court, year, this.baseUrl);
      if (!url) {
        logger.warn('Could not build case URL from citation', { citation, court, year });
        continue;
      }
      targets.push({ url, court, year, citation });
    }

    logger.info(`Found ${targets.length} cases`, { court, year, listUrl });
    return targets;
  }

  async fetchJudgment(target: ScrapeTarget, timeoutMs: number): Promise<ScrapedJudgment> {
    if (this.requestDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.requestDelayMs));
    }

    const html = await this.get(target.url, timeoutMs);
    const text = cleanJudgmentText(htmlToText(html));
    if (text.length === 0) {
      throw new Error(`No judgment text found at ${target.url}`);
    }

    return {
      // The list entry carries the full citation; the page heading is the fallback
      title: target.citation || parseCaseTitle(html) || target.url,
      text,
    };
  }

  private async get(url: string, timeoutMs: number): Promise<string> {
    try {
      const response = await this.http.get<string>(url, { timeout: timeoutMs });
      return response.data;
    } catch (error) {
      throw toUpstreamError('saflii', error);
    }
  }
}
