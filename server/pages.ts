import type { CycleReportJson, HealthJson } from "@shared/schema";
import type { ParsedGame } from "./agents/types";

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const STYLE = `
  body { font-family: system-ui, sans-serif; margin: 2rem; color: #1b1b1b; }
  table { border-collapse: collapse; margin-top: 1rem; }
  th, td { border: 1px solid #ccc; padding: 0.3rem 0.6rem; text-align: left; font-size: 0.9rem; }
  th { background: #f0f0f0; }
  code { background: #f4f4f4; padding: 0.1rem 0.3rem; }
  .muted { color: #666; }
`;

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLE}</style>
</head>
<body>
${body}
</body>
</html>`;
}

export interface LandingPageOptions {
  calendarName: string;
  feedUrl: string;
  health: HealthJson;
}

export function renderLandingPage({ calendarName, feedUrl, health }: LandingPageOptions): string {
  const webcalUrl = feedUrl.replace(/^https?:\/\//, "webcal://");
  const status = health.calendarPublished
    ? `${health.gameCount > 0 ? `${health.gameCount} games` : "Calendar"} published${
        health.lastSuccessAt ? `, last updated ${escapeHtml(health.lastSuccessAt)}` : ""
      }.`
    : "The first schedule refresh has not finished yet.";

  return layout(
    calendarName,
    `<h1>${escapeHtml(calendarName)}</h1>
<p>Subscribe in your calendar app with this URL:</p>
<p><code>${escapeHtml(feedUrl)}</code></p>
<p><a href="${escapeHtml(webcalUrl)}">Open in calendar app</a> · <a href="/calendar.ics">Download .ics</a></p>
<p class="muted">${status}</p>
<p><a href="/debug">Parsed schedule</a></p>`,
  );
}

function formatStart(game: ParsedGame): string {
  const date = game.start.toFormat("ccc LLL d, yyyy");
  return game.timeConfirmed ? `${date} ${game.start.toFormat("h:mm a ZZZZ")}` : `${date} (time TBA)`;
}

function renderGameRows(games: ParsedGame[]): string {
  return games
    .map(
      (g) => `<tr>
<td>${escapeHtml(formatStart(g))}</td>
<td>${escapeHtml(g.title)}</td>
<td>${escapeHtml(g.opponent)}</td>
<td>${g.isHome ? "Home" : "Away"}</td>
<td>${escapeHtml(g.location)}</td>
<td>${escapeHtml(g.broadcast)}</td>
<td><code>${escapeHtml(g.rawDateText)}</code></td>
<td><code>${escapeHtml(g.rawTimeText)}</code></td>
</tr>`,
    )
    .join("\n");
}

function renderReport(report: CycleReportJson | null): string {
  if (!report) return `<p class="muted">No refresh cycle has finished yet.</p>`;

  const attempts = report.attempts
    .map(
      (a) => `<tr>
<td>${escapeHtml(a.source)}</td>
<td>${escapeHtml(a.outcome)}</td>
<td>${a.recordCount}</td>
<td>${a.parsedCount}</td>
<td>${a.droppedCount}</td>
<td>${escapeHtml([...a.reasons, ...(a.error ? [a.error] : [])].join("; "))}</td>
</tr>`,
    )
    .join("\n");

  return `<p>Outcome: <strong>${escapeHtml(report.outcome)}</strong> (${escapeHtml(report.trigger)}, season ${report.seasonYear}, ${report.durationMs} ms, finished ${escapeHtml(report.finishedAt)})</p>
${report.error ? `<p>Error: ${escapeHtml(report.error)}</p>` : ""}
<table>
<thead><tr><th>Source</th><th>Outcome</th><th>Records</th><th>Parsed</th><th>Dropped</th><th>Reasons</th></tr></thead>
<tbody>
${attempts}
</tbody>
</table>`;
}

export interface DebugPageOptions {
  calendarName: string;
  games: ParsedGame[];
  report: CycleReportJson | null;
}

export function renderDebugPage({ calendarName, games, report }: DebugPageOptions): string {
  const table = games.length > 0
    ? `<table>
<thead><tr><th>Kickoff</th><th>Title</th><th>Opponent</th><th>Site</th><th>Location</th><th>Broadcast</th><th>Raw date</th><th>Raw time</th></tr></thead>
<tbody>
${renderGameRows(games)}
</tbody>
</table>`
    : `<p class="muted">No games parsed in this process yet.</p>`;

  return layout(
    `${calendarName} (debug)`,
    `<h1>${escapeHtml(calendarName)}: parsed games</h1>
${table}
<h2>Last refresh</h2>
${renderReport(report)}`,
  );
}
