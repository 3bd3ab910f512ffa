import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { createApp } from '@server/app';
import { ScheduleAgent } from '@server/agents/scheduleAgent';
import { CalendarStore } from '@server/calendar/calendarStore';
import { CalendarRefreshService } from '@server/calendar/refreshService';
import {
  FakeScheduleSource,
  TEST_TEAM,
  TEST_ZONE,
  makeRecord,
  makeSeasonRecords,
} from '../helpers/scheduleTestUtils';

const dirs: string[] = [];

function setup(manualRefreshEnabled = false) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'routes-'));
  dirs.push(dir);

  const records = [
    ...makeSeasonRecords(),
    makeRecord({ dateText: 'SaturdayNov 22', timeText: 'TBA', opponentText: 'vs Nebraska <b>', broadcastText: '' }),
  ];
  const agent = new ScheduleAgent([new FakeScheduleSource('primary', records)], { teamName: TEST_TEAM, zone: TEST_ZONE });
  const service = new CalendarRefreshService({
    agent,
    store: new CalendarStore(path.join(dir, 'football.ics')),
    meta: { calName: 'Penn State Football', productId: 'football-calendar-feed', zone: TEST_ZONE },
    resolveSeasonYear: () => 2025,
  });
  const app = createApp({
    service,
    calendarName: 'Penn State Football',
    publicBaseUrl: 'https://cal.example.test',
    manualRefreshEnabled,
  });
  return { app, service };
}

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('GET /calendar.ics', () => {
  it('returns 503 until a calendar is published', async () => {
    const { app } = setup();
    const res = await request(app).get('/calendar.ics');

    expect(res.status).toBe(503);
    expect(res.headers['retry-after']).toBe('60');
    expect(res.body.error.code).toBe('SERVICE_UNAVAILABLE');
    expect(res.body.error.message).toBe('Calendar has not been published yet');
  });

  it('serves the published calendar', async () => {
    const { app, service } = setup();
    await service.runCycle('startup');

    const res = await request(app).get('/calendar.ics');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/calendar/);
    expect(res.headers['content-disposition']).toBe('inline; filename="football.ics"');
    expect(res.headers['cache-control']).toBe('public, max-age=900');
    expect(res.text.startsWith('BEGIN:VCALENDAR')).toBe(true);
    expect(res.text.match(/BEGIN:VEVENT/g)).toHaveLength(13);
  });
});

describe('GET /', () => {
  it('shows the subscription URLs', async () => {
    const { app } = setup();
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.text).toContain('<code>https://cal.example.test/calendar.ics</code>');
    expect(res.text).toContain('href="webcal://cal.example.test/calendar.ics"');
    expect(res.text).toContain('The first schedule refresh has not finished yet.');
  });
});

describe('GET /debug', () => {
  it('lists parsed games with their raw text, escaped', async () => {
    const { app, service } = setup();
    await service.runCycle('startup');

    const res = await request(app).get('/debug');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<td><code>SaturdayNov 22</code></td>');
    expect(res.text).toContain('<td>Nebraska &lt;b&gt;</td>');
    expect(res.text).toContain('Sat Nov 22, 2025 (time TBA)');
    expect(res.text).toContain('Outcome: <strong>published</strong>');
  });

  it('says so when nothing has been parsed', async () => {
    const { app } = setup();
    const res = await request(app).get('/debug');
    expect(res.text).toContain('No games parsed in this process yet.');
    expect(res.text).toContain('No refresh cycle has finished yet.');
  });
});

describe('GET /api/games and /api/health', () => {
  it('returns the games as JSON', async () => {
    const { app, service } = setup();
    await service.runCycle('startup');

    const res = await request(app).get('/api/games');
    expect(res.status).toBe(200);
    expect(res.body.seasonYear).toBe(2025);
    expect(res.body.games).toHaveLength(13);
    expect(res.body.games[0]).toEqual({
      uid: '2025-2025-08-30-nevada@football-calendar-feed',
      title: 'Nevada at Penn State',
      start: '2025-08-30T15:30:00.000-04:00',
      end: '2025-08-30T19:00:00.000-04:00',
      location: 'Beaver Stadium',
      broadcast: 'FOX',
      isHome: true,
      opponent: 'Nevada',
      timeConfirmed: true,
      rawDateText: 'Aug 30',
      rawTimeText: '3:30 PM',
    });
  });

  it('reports health', async () => {
    const { app, service } = setup();
    expect((await request(app).get('/api/health')).body.status).toBe('starting');

    await service.runCycle('startup');
    const res = await request(app).get('/api/health');
    expect(res.body).toMatchObject({ status: 'ok', calendarPublished: true, gameCount: 13, lastSource: 'primary' });
  });
});

describe('POST /api/refresh', () => {
  it('is not exposed by default', async () => {
    const { app } = setup();
    const res = await request(app).post('/api/refresh');
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });

  it('runs a cycle when enabled', async () => {
    const { app } = setup(true);
    const res = await request(app).post('/api/refresh');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ trigger: 'manual', outcome: 'published', gameCount: 13 });
  });
});

describe('other routes', () => {
  it('exposes Prometheus metrics', async () => {
    const { app, service } = setup();
    await service.runCycle('startup');
    const res = await request(app).get('/metrics');
    expect(res.status).toBe(200);
    expect(res.text).toContain('calendar_refresh_cycles_total');
  });

  it('answers unknown paths with a JSON 404', async () => {
    const { app } = setup();
    const res = await request(app).get('/nope');
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('No route for GET /nope');
    expect(res.headers['x-request-id']).toBeTruthy();
  });
});
