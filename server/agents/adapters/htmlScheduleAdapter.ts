import type { IScheduleSource, RawGameRecord } from '../types';
import { scheduleFetcher } from '../../utils/scraping/fetcher';
import { HTMLParser } from '../../utils/scraping/parser';
import {
  extractSchedule,
  MIN_PLAUSIBLE_RECORDS,
  type ExtractionResult,
} from '../../utils/scraping/extractors';
import { ExtractionError, FetchError, toError } from '../../types/errors';
import { withSource, type Logger } from '../../logger';

export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

/**
 * HtmlScheduleAdapter
 *
 * Scrapes one website for the schedule. The site may publish it under several
 * URLs (full schedule, list view, printable page); they are tried in order and
 * the first page with a plausible number of games wins.
 */
export class HtmlScheduleAdapter implements IScheduleSource {
  private readonly log: Logger;

  constructor(
    readonly name: string,
    private readonly urls: string[],
    private readonly fetcher: PageFetcher = scheduleFetcher,
  ) {
    this.log = withSource(`source:${name}`);
  }

  async fetchRecords(): Promise<RawGameRecord[]> {
    let best: (ExtractionResult & { url: string }) | null = null;
    let fetchFailures = 0;
    const failures: string[] = [];

    for (const url of this.urls) {
      let html: string;
      try {
        html = await this.fetcher.fetch(url);
      } catch (err) {
        const error = toError(err);
        fetchFailures++;
        failures.push(`${url}: ${error.message}`);
        this.log.warn({ url, err: error.message }, 'schedule page fetch failed');
        continue;
      }

      const result = extractSchedule(HTMLParser.load(html));
      if (!result) {
        failures.push(`${url}: no schedule markup recognized`);
        this.log.warn({ url, bytes: html.length }, 'no extraction strategy matched');
        continue;
      }

      this.log.info({ url, strategy: result.strategy, count: result.records.length }, 'schedule records extracted');
      if (result.records.length >= MIN_PLAUSIBLE_RECORDS) return result.records;
      if (!best || result.records.length > best.records.length) best = { ...result, url };
    }

    if (best) {
      this.log.warn({ url: best.url, count: best.records.length }, 'only a partial schedule found');
      return best.records;
    }

    const context = { source: this.name, failures };
    if (this.urls.length > 0 && fetchFailures === this.urls.length) {
      throw new FetchError(`All ${this.urls.length} ${this.name} URLs failed to load`, context);
    }
    throw new ExtractionError(`No schedule found on any ${this.name} page`, context);
  }
}
