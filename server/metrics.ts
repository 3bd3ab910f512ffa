import client, { Registry, Counter, Histogram, Gauge } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
client.collectDefaultMetrics({ register, prefix: 'app_' });

// Scrape cycles are dominated by network time; buckets run up to two minutes
const CYCLE_BUCKETS = [100, 500, 1000, 2000, 5000, 10000, 30000, 60000, 120000];
const LATENCY_BUCKETS = [5, 10, 20, 50, 100, 200, 500, 1000, 2000, 5000];

const refreshCyclesTotal = new Counter({
  name: 'calendar_refresh_cycles_total',
  help: 'Total refresh cycles by outcome',
  labelNames: ['outcome'], // published | failed | error
  registers: [register],
});

const refreshCycleDurationMs = new Histogram({
  name: 'calendar_refresh_cycle_duration_ms',
  help: 'Duration of refresh cycles in ms',
  labelNames: ['outcome'],
  buckets: CYCLE_BUCKETS,
  registers: [register],
});

const sourceAttemptsTotal = new Counter({
  name: 'schedule_source_attempts_total',
  help: 'Schedule source attempts by source and outcome',
  labelNames: ['source', 'outcome'],
  registers: [register],
});

const recordsDroppedTotal = new Counter({
  name: 'schedule_records_dropped_total',
  help: 'Scraped records dropped because their date or opponent could not be normalized',
  labelNames: ['source'],
  registers: [register],
});

const validationRejectionsTotal = new Counter({
  name: 'schedule_validation_rejections_total',
  help: 'Game batches rejected by the schedule validator',
  labelNames: ['source'],
  registers: [register],
});

const publishedGames = new Gauge({
  name: 'calendar_published_games',
  help: 'Number of games in the currently published calendar',
  registers: [register],
});

const apiRequestLatencyMs = new Histogram({
  name: 'api_request_latency_ms',
  help: 'Latency of HTTP requests in milliseconds',
  labelNames: ['endpoint', 'method', 'status'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

// Helpers
function recordCycle(outcome: 'published' | 'failed' | 'error', durationMs: number) {
  refreshCyclesTotal.labels(outcome).inc();
  refreshCycleDurationMs.labels(outcome).observe(durationMs);
}

function recordSourceAttempt(source: string, outcome: string) {
  sourceAttemptsTotal.labels(source, outcome).inc();
}

function recordDroppedRecords(source: string, count: number) {
  if (count <= 0) return;
  recordsDroppedTotal.labels(source).inc(count);
}

function recordValidationRejection(source: string) {
  validationRejectionsTotal.labels(source).inc();
}

function setPublishedGames(count: number) {
  publishedGames.set(count);
}

function observeApiRequest(endpoint: string, method: string, status: number, durationMs: number) {
  apiRequestLatencyMs.labels(endpoint, method, String(status)).observe(durationMs);
}

async function getMetricsContent(): Promise<string> {
  return await register.metrics();
}

export const metrics = {
  register,
  refreshCyclesTotal,
  refreshCycleDurationMs,
  sourceAttemptsTotal,
  recordsDroppedTotal,
  validationRejectionsTotal,
  publishedGames,
  apiRequestLatencyMs,
  recordCycle,
  recordSourceAttempt,
  recordDroppedRecords,
  recordValidationRejection,
  setPublishedGames,
  observeApiRequest,
  getMetricsContent,
};
