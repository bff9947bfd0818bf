import type { ScrapeTarget } from '../../scraping/SafliiScraper.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ItemFailure, SourceStage } from '../types.js';

const logger = createLogger('ScrapeJudgments');

/**
 * Stage 1: list SAFLII cases for each court and fetch the ones not yet stored
 */
export const scrapeJudgmentsStage: SourceStage = {
  kind: 'source',
  number: 1,
  id: 'scrape-judgments',
  description: 'Scrape judgments',
  defaults: { batchSize: 10, timeoutSeconds: 30, maxRetries: 3 },
  resultStatus: 'scraped',
  retriesItems: true,

  async prepare(_options, services) {
    services.courts();
    services.source();
  },

  async discover(scope, options, services) {
    const courts = scope.court ? [scope.court] : services.courts().defaultScrapeCourts;
    const targets: ScrapeTarget[] = [];
    const failures: ItemFailure[] = [];

    for (const court of courts) {
      try {
        targets.push(...(await services.source().listTargets(court, scope.year, options.timeoutSeconds * 1000)));
      } catch (error) {
        logger.error('Could not list cases', { court, year: scope.year, error: errorMessage(error) });
        failures.push({ itemId: `${court}/${scope.year}`, error: errorMessage(error) });
      }
    }

    return { targets, failures };
  },

  async ingest(target, options, services) {
    const scraped = await services.source().fetchJudgment(target, options.timeoutSeconds * 1000);
    return {
      court: target.court,
      year: target.year,
      sourceUrl: target.url,
      title: scraped.title,
      text: scraped.text,
    };
  },
};
