import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { HtmlScheduleAdapter, StaticScheduleAdapter, createScheduleSources } from '@server/agents/adapters';
import { ExtractionError, FetchError, SourceDataError } from '@server/types/errors';
import { fakeFetcher, fixturePath, loadHtmlFixture } from '../helpers/scheduleTestUtils';

describe('HtmlScheduleAdapter', () => {
  it('returns the first page with a plausible schedule', async () => {
    const fetcher = fakeFetcher({
      'https://primary.example.test/schedule': loadHtmlFixture('sidearm-schedule.html'),
      'https://primary.example.test/schedule/list': loadHtmlFixture('espn-schedule.html'),
    });
    const adapter = new HtmlScheduleAdapter('primary', [
      'https://primary.example.test/schedule',
      'https://primary.example.test/schedule/list',
    ], fetcher);

    const records = await adapter.fetchRecords();
    expect(records).toHaveLength(12);
    expect(records[0].dateText).toBe('SaturdayAug 30');
    expect(fetcher.requested).toEqual(['https://primary.example.test/schedule']);
  });

  it('moves on when a URL fails to load', async () => {
    const fetcher = fakeFetcher({
      'https://secondary.example.test/a': new FetchError('HTTP 503: Service Unavailable'),
      'https://secondary.example.test/b': loadHtmlFixture('espn-schedule.html'),
    });
    const adapter = new HtmlScheduleAdapter('secondary', [
      'https://secondary.example.test/a',
      'https://secondary.example.test/b',
    ], fetcher);

    const records = await adapter.fetchRecords();
    expect(records).toHaveLength(12);
    expect(records[0].opponentText).toBe('vs Nevada');
  });

  it('falls back to the largest partial result', async () => {
    const fetcher = fakeFetcher({
      'https://primary.example.test/cards': loadHtmlFixture('cards-schedule.html'),
      'https://primary.example.test/news': loadHtmlFixture('free-text-schedule.html'),
    });
    const adapter = new HtmlScheduleAdapter('primary', [
      'https://primary.example.test/cards',
      'https://primary.example.test/news',
    ], fetcher);

    const records = await adapter.fetchRecords();
    expect(records).toHaveLength(4);
    expect(records[3].opponentText).toBe('Iowa');
  });

  it('throws FetchError when every URL fails to load', async () => {
    const adapter = new HtmlScheduleAdapter('primary', ['https://primary.example.test/missing'], fakeFetcher({}));
    await expect(adapter.fetchRecords()).rejects.toBeInstanceOf(FetchError);
    await expect(adapter.fetchRecords()).rejects.toThrow('All 1 primary URLs failed to load');
  });

  it('throws ExtractionError when pages load but hold no schedule', async () => {
    const adapter = new HtmlScheduleAdapter(
      'primary',
      ['https://primary.example.test/blocked'],
      fakeFetcher({ 'https://primary.example.test/blocked': loadHtmlFixture('bot-block.html') }),
    );
    await expect(adapter.fetchRecords()).rejects.toBeInstanceOf(ExtractionError);
    await expect(adapter.fetchRecords()).rejects.toThrow('No schedule found on any primary page');
  });
});

describe('StaticScheduleAdapter', () => {
  const dirs: string[] = [];

  function writeTemp(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fallback-schedule-'));
    dirs.push(dir);
    const file = path.join(dir, 'schedule.json');
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('maps the fallback asset into raw records', async () => {
    const records = await new StaticScheduleAdapter(fixturePath('fallback-schedule.json')).fetchRecords();
    expect(records).toHaveLength(12);
    expect(records[0]).toEqual({
      dateText: '2025-08-30',
      timeText: '3:30 PM',
      opponentText: 'Nevada',
      isHome: true,
      locationText: 'Beaver Stadium',
      broadcastText: 'FOX',
    });
    expect(records[5]).toEqual({
      dateText: '2025-10-11',
      timeText: '',
      opponentText: 'Northwestern',
      isHome: true,
      locationText: 'Beaver Stadium',
      broadcastText: '',
    });
  });

  it('rejects a missing file', async () => {
    const adapter = new StaticScheduleAdapter(path.join(os.tmpdir(), 'no-such-dir', 'schedule.json'));
    await expect(adapter.fetchRecords()).rejects.toBeInstanceOf(SourceDataError);
  });

  it('rejects invalid JSON', async () => {
    const adapter = new StaticScheduleAdapter(writeTemp('{ "version": 1,'));
    await expect(adapter.fetchRecords()).rejects.toThrow(/^Fallback schedule is not valid JSON/);
  });

  it('rejects a document with the wrong shape', async () => {
    const adapter = new StaticScheduleAdapter(writeTemp(JSON.stringify({ version: 2, season: 2025, games: [] })));
    await expect(adapter.fetchRecords()).rejects.toThrow('Fallback schedule does not match the expected format');
  });
});

describe('createScheduleSources', () => {
  it('orders primary, secondary and the static fallback', () => {
    const sources = createScheduleSources({
      primaryUrls: ['https://primary.example.test/schedule'],
      secondaryUrls: ['https://secondary.example.test/schedule'],
      fallbackScheduleFile: 'data/fallback.json',
    });
    expect(sources.map((s) => s.name)).toEqual(['primary', 'secondary', 'static']);
  });

  it('skips sources without URLs or a file', () => {
    const sources = createScheduleSources({ primaryUrls: [], secondaryUrls: ['https://secondary.example.test/schedule'] });
    expect(sources.map((s) => s.name)).toEqual(['secondary']);
  });
});
