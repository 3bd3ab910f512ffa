/**
 * Schedule Extraction Strategies
 *
 * Each strategy reads one known page shape and returns raw game records, or
 * null when the shape is not present. Strategies are tried in rank order and
 * the first one that produces a plausible number of games wins. None of them
 * interprets dates; that is the normalizer's job.
 */

import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { RawGameRecord } from '../../agents/types';
import { HTMLParser } from './parser';

export interface ExtractionStrategy {
  name: string;
  extract($: cheerio.CheerioAPI): RawGameRecord[] | null;
}

export interface ExtractionResult {
  strategy: string;
  records: RawGameRecord[];
}

// A season page lists a dozen games; fewer usually means a widget, not the schedule.
export const MIN_PLAUSIBLE_RECORDS = 5;

export function homeFromPrefix(text: string): boolean | undefined {
  const t = text.trim().toLowerCase();
  if (t.startsWith('@') || /^at(?:\s|$)/.test(t)) return false;
  if (/^(?:vs\.?|versus)(?:\s|$)/.test(t)) return true;
  return undefined;
}

export function homeFromClasses(classes: string[]): boolean | undefined {
  if (classes.some((c) => /(?:^|-)home(?:-game)?$/i.test(c))) return true;
  if (classes.some((c) => /(?:^|-)(?:away|neutral)(?:-game)?$/i.test(c))) return false;
  return undefined;
}

function withText(records: RawGameRecord[]): RawGameRecord[] | null {
  const usable = records.filter((r) => r.dateText !== '' && r.opponentText !== '');
  return usable.length > 0 ? usable : null;
}

/**
 * Classic SIDEARM list layout: li.sidearm-schedule-game items.
 */
export const sidearmListStrategy: ExtractionStrategy = {
  name: 'sidearm-list',
  extract($) {
    const items = $('.sidearm-schedule-games-container .sidearm-schedule-game, li.sidearm-schedule-game').toArray();
    if (items.length === 0) return null;

    return withText(items.map((el) => {
      const $item = $(el);
      const $date = $item.find('.sidearm-schedule-game-opponent-date').first();
      const dateText = $date.length > 0
        ? HTMLParser.textWithout($date, '.sidearm-schedule-game-time')
        : HTMLParser.firstText($item, ['.sidearm-schedule-game-date']);
      const opponentText = HTMLParser.firstText($item, ['.sidearm-schedule-game-opponent-name']);
      const vsText = HTMLParser.firstText($item, ['.sidearm-schedule-game-conference-vs']);
      const locationText = HTMLParser.firstText($item, ['.sidearm-schedule-game-location']);

      return {
        dateText,
        timeText: HTMLParser.firstText($item, ['.sidearm-schedule-game-time']),
        opponentText,
        isHome:
          homeFromClasses(HTMLParser.classList($item)) ??
          homeFromPrefix(vsText) ??
          homeFromPrefix(opponentText) ??
          /\bhome\b/i.test(locationText),
        locationText,
        broadcastText: HTMLParser.firstText($item, [
          '.sidearm-schedule-game-network',
          '.sidearm-schedule-game-coverage-tv',
          '.sidearm-schedule-game-links-tv',
        ]),
      };
    }));
  },
};

/**
 * Card layouts (newer SIDEARM game cards and similar div-based templates).
 * Fields are located by class or test-id fragments since exact names drift.
 */
export const scheduleCardStrategy: ExtractionStrategy = {
  name: 'schedule-cards',
  extract($) {
    const items = $(
      '.s-game-card, [data-test-id="s-game-card-standard__root"], .schedule-event-item, .schedule-game, .game-card',
    ).toArray();
    if (items.length === 0) return null;

    return withText(items.map((el) => {
      const $item = $(el);
      const opponentText = HTMLParser.firstText($item, [
        '[data-test-id*="opponent-name"]',
        '[class*="opponent-name"]',
        '[class*="opponent"]',
        '[class*="team-name"]',
      ]);
      const stampText = HTMLParser.firstText($item, [
        '[data-test-id*="stamp"]',
        '[class*="stamp"]',
        '[class*="vs-at"]',
      ]);
      const locationText = HTMLParser.firstText($item, [
        '[data-test-id*="location"]',
        '[class*="location"]',
        '[class*="venue"]',
      ]);

      return {
        dateText: HTMLParser.firstText($item, [
          '[data-test-id*="game-date"]',
          '[class*="game-date"]',
          '[class*="__date"]',
          '[class*="date"]',
          'time',
        ]),
        timeText: HTMLParser.firstText($item, [
          '[data-test-id*="game-time"]',
          '[class*="game-time"]',
          '[class*="__time"]',
          '[class*="time"]',
        ]),
        opponentText,
        isHome:
          homeFromClasses(HTMLParser.classList($item)) ??
          homeFromPrefix(stampText) ??
          homeFromPrefix(opponentText) ??
          /\bhome\b/i.test(locationText),
        locationText,
        broadcastText: HTMLParser.firstText($item, [
          '[data-test-id*="media"]',
          '[class*="media"]',
          '[class*="network"]',
          '[class*="broadcast"]',
          '[class*="tv"]',
        ]),
      };
    }));
  },
};

const COLUMNS = ['date', 'time', 'opponent', 'location', 'broadcast'] as const;
type Column = (typeof COLUMNS)[number];

const HEADER_PATTERNS: Record<Column, RegExp> = {
  date: /^date\b/i,
  time: /^(?:time|result)\b/i,
  opponent: /^(?:opponent|opp\.?)\b/i,
  location: /^(?:location|site|venue)\b/i,
  broadcast: /^(?:tv|network|broadcast|media)\b/i,
};

function headerColumns(cells: string[]): Partial<Record<Column, number>> | null {
  const columns: Partial<Record<Column, number>> = {};
  for (const column of COLUMNS) {
    const idx = cells.findIndex((c) => HEADER_PATTERNS[column].test(c));
    if (idx >= 0) columns[column] = idx;
  }
  return columns.date !== undefined && columns.opponent !== undefined ? columns : null;
}

/**
 * Schedule tables with a header row naming Date and Opponent columns (ESPN
 * team schedules, printable schedule pages). A header row may repeat inside
 * the table, e.g. before the postseason section.
 */
export const scheduleTableStrategy: ExtractionStrategy = {
  name: 'schedule-table',
  extract($) {
    const records: RawGameRecord[] = [];

    for (const table of $('table').toArray()) {
      let columns: Partial<Record<Column, number>> | null = null;

      for (const row of $(table).find('tr').toArray()) {
        const cells = $(row).children('th, td').toArray().map((c) => HTMLParser.spacedText($(c)));
        const header = headerColumns(cells);
        if (header) {
          columns = header;
          continue;
        }
        if (!columns) continue;

        const cell = (idx: number | undefined): string => (idx === undefined ? '' : cells[idx] ?? '');
        const opponentText = cell(columns.opponent);
        const locationText = cell(columns.location);
        records.push({
          dateText: cell(columns.date),
          timeText: cell(columns.time),
          opponentText,
          isHome: homeFromPrefix(opponentText) ?? /\bhome\b/i.test(locationText),
          locationText,
          broadcastText: cell(columns.broadcast),
        });
      }
    }

    return withText(records);
  },
};

const FREE_TEXT_RE = new RegExp(
  '^(?<date>(?:(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\\.?,?\\s*)?' +
    '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?)' +
    '\\s*(?:[-–—:|,]\\s*)?(?<prefix>vs\\.?|versus|at|@)\\s*(?<opponent>.+?)' +
    '(?:\\s*[-–—|,]\\s*(?<time>\\d{1,2}(?::\\d{2})?\\s*(?:[ap]\\.?m\\.?)?|noon|tba|tbd))?' +
    '(?:\\s*[-–—|,]\\s*(?<broadcast>[a-z][a-z0-9+ ]{1,20}))?\\s*$',
  'i',
);

const BLOCK_SELECTOR = 'li, p, tr, div, h2, h3, h4';

/**
 * Last resort: lines of prose such as "Sat, Aug 30 vs. Nevada - 3:30 PM - FOX".
 */
export const freeTextStrategy: ExtractionStrategy = {
  name: 'free-text',
  extract($) {
    const seen = new Set<string>();
    const records: RawGameRecord[] = [];

    const leaves = $(BLOCK_SELECTOR).toArray().filter((el: Element) => $(el).find(BLOCK_SELECTOR).length === 0);
    for (const el of leaves) {
      const m = FREE_TEXT_RE.exec(HTMLParser.extractText($(el)));
      const groups = m?.groups;
      if (!groups) continue;

      const dateText = groups.date ?? '';
      const opponentText = (groups.opponent ?? '').trim();
      const key = `${dateText.toLowerCase()}|${opponentText.toLowerCase()}`;
      if (seen.has(key)) continue;
      seen.add(key);

      records.push({
        dateText,
        timeText: groups.time ?? '',
        opponentText,
        isHome: homeFromPrefix(groups.prefix ?? '') ?? false,
        locationText: '',
        broadcastText: (groups.broadcast ?? '').trim(),
      });
    }

    return withText(records);
  },
};

export const DEFAULT_STRATEGIES: ExtractionStrategy[] = [
  sidearmListStrategy,
  scheduleCardStrategy,
  scheduleTableStrategy,
  freeTextStrategy,
];

/**
 * Run strategies in order. The first result with at least `minPlausible`
 * records wins; otherwise the largest non-empty result is returned.
 */
export function extractSchedule(
  $: cheerio.CheerioAPI,
  strategies: ExtractionStrategy[] = DEFAULT_STRATEGIES,
  minPlausible: number = MIN_PLAUSIBLE_RECORDS,
): ExtractionResult | null {
  let best: ExtractionResult | null = null;
  for (const strategy of strategies) {
    const records = strategy.extract($);
    if (!records || records.length === 0) continue;
    if (records.length >= minPlausible) return { strategy: strategy.name, records };
    if (!best || records.length > best.records.length) {
      best = { strategy: strategy.name, records };
    }
  }
  return best;
}
