/**
 * Schedule Page Fetcher
 *
 * GETs schedule pages with a browser-like header set, a bounded timeout,
 * a fixed pause between attempts and a per-host request delay. Responses that
 * are really a bot-challenge page are treated as failures.
 */

import { config } from '../../config';
import { withSource } from '../../logger';
import { FetchError, toError } from '../../types/errors';

const log = withSource('fetcher');

export interface FetchOptions {
  timeout?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  headers?: Record<string, string>;
}

export interface FetcherSettings {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Minimum gap between two requests to the same host. */
  hostDelayMs: number;
}

const BOT_BLOCK_PATTERNS: RegExp[] = [
  /<title>\s*(?:just a moment|attention required|access denied)/i,
  /cf-browser-verification|cf-chl-/i,
  /px-captcha/i,
  /please verify you are a human/i,
  /request unsuccessful\. incapsula/i,
];

/**
 * Returns the matched signature when the body looks like an anti-bot page.
 */
export function detectBotBlock(body: string): string | null {
  // Real schedule pages are large; challenge pages are short and say so early.
  const head = body.slice(0, 20_000);
  for (const pattern of BOT_BLOCK_PATTERNS) {
    const m = pattern.exec(head);
    if (m) return m[0];
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ScheduleFetcher {
  private readonly settings: FetcherSettings;
  private readonly lastRequestAt = new Map<string, number>();

  constructor(settings: Partial<FetcherSettings> = {}) {
    this.settings = {
      userAgent: settings.userAgent ?? config.scraperUserAgent,
      timeoutMs: settings.timeoutMs ?? config.scraperTimeoutMs,
      maxRetries: settings.maxRetries ?? config.scraperMaxRetries,
      retryDelayMs: settings.retryDelayMs ?? config.scraperRetryDelayMs,
      hostDelayMs: settings.hostDelayMs ?? config.scraperRetryDelayMs,
    };
  }

  private async waitForHost(host: string): Promise<void> {
    const elapsed = Date.now() - (this.lastRequestAt.get(host) ?? 0);
    if (elapsed < this.settings.hostDelayMs) {
      await sleep(this.settings.hostDelayMs - elapsed);
    }
    this.lastRequestAt.set(host, Date.now());
  }

  /**
   * Fetch a page and return its HTML.
   * @throws FetchError after the last failed attempt, or at once on a bot-block page
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    const {
      timeout = this.settings.timeoutMs,
      maxRetries = this.settings.maxRetries,
      retryDelayMs = this.settings.retryDelayMs,
      headers = {},
    } = options;

    const host = new URL(url).hostname;
    let lastError: Error = new Error('no attempts made');

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      await this.waitForHost(host);

      let body: string;
      try {
        const response = await fetch(url, {
          headers: {
            'User-Agent': this.settings.userAgent,
            'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            'Accept-Language': 'en-US,en;q=0.9',
            'Cache-Control': 'no-cache',
            'Pragma': 'no-cache',
            'Upgrade-Insecure-Requests': '1',
            ...headers,
          },
          signal: AbortSignal.timeout(timeout),
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }
        body = await response.text();
      } catch (err) {
        lastError = toError(err);
        if (attempt < maxRetries) {
          log.warn({ url, attempt, retryInMs: retryDelayMs, err: lastError.message }, 'fetch attempt failed, retrying');
          await sleep(retryDelayMs);
        }
        continue;
      }

      const signature = detectBotBlock(body);
      if (signature) {
        throw new FetchError(`Bot-block page returned by ${url}`, { url, signature });
      }
      return body;
    }

    throw new FetchError(`Failed to fetch ${url} after ${maxRetries} attempts: ${lastError.message}`, {
      url,
      attempts: maxRetries,
    });
  }
}

/**
 * Shared fetcher instance configured from the environment
 */
export const scheduleFetcher = new ScheduleFetcher();
