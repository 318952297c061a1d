// Report Builder - renders the persisted client states as a text and HTML report
import { calendarDay, describeWindowHours, formatInstant } from './window.js';
import type { ClientStatus, MonitoredClient } from './types.js';

export interface ReportOptions {
  startHour: number;
  endHour: number;
  generatedAt: Date;
  timeZone: string;
}

export interface BackupReport {
  subject: string;
  text: string;
  html: string;
}

/** Order of the status totals line */
const TOTALS_ORDER: readonly ClientStatus[] = ['OK', 'WARNING', 'FAILED', 'MISSING'];

const NO_SUMMARY = '-';
const NO_SUBJECT = '(no matching email)';
const NEVER_CHECKED = 'never checked';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Get color code for a client status
 */
export function statusColor(status: ClientStatus): string {
  switch (status) {
    case 'OK':
      return '#28a745'; // Green
    case 'WARNING':
      return '#fd7e14'; // Orange
    case 'FAILED':
      return '#dc3545'; // Red
    case 'MISSING':
      return '#6c757d'; // Grey
  }
}

function countStatuses(clients: MonitoredClient[]): Record<ClientStatus, number> {
  const totals: Record<ClientStatus, number> = { OK: 0, WARNING: 0, FAILED: 0, MISSING: 0 };
  for (const client of clients) {
    totals[client.lastStatus]++;
  }
  return totals;
}

function lastCheckLabel(client: MonitoredClient, timeZone: string): string {
  if (!client.lastCheckedAt) {
    return NEVER_CHECKED;
  }
  const instant = new Date(client.lastCheckedAt);
  return isNaN(instant.getTime()) ? client.lastCheckedAt : formatInstant(instant, timeZone);
}

/**
 * Build the daily report. The output depends only on the arguments, so the
 * same state always renders the same bytes.
 *
 * @param clients - clients in display order (the store returns them by name)
 */
export function buildReport(clients: MonitoredClient[], options: ReportOptions): BackupReport {
  const { timeZone } = options;
  const day = calendarDay(options.generatedAt, timeZone);
  const subject = `Backup report - ${day}`;
  const generated = `${formatInstant(options.generatedAt, timeZone)} (${timeZone})`;
  const window = describeWindowHours(options.startHour, options.endHour);
  const totals = countStatuses(clients);
  const totalsLine = TOTALS_ORDER.map(status => `${status} ${totals[status]}`).join(', ');

  return {
    subject,
    text: renderText(clients, { subject, generated, window, totalsLine, timeZone }),
    html: renderHtml(clients, { subject, generated, window, totalsLine, timeZone }),
  };
}

interface RenderContext {
  subject: string;
  generated: string;
  window: string;
  totalsLine: string;
  timeZone: string;
}

function renderText(clients: MonitoredClient[], ctx: RenderContext): string {
  const lines = [
    ctx.subject,
    `Generated: ${ctx.generated}`,
    `Check window: ${ctx.window}`,
    `Status totals: ${ctx.totalsLine}`,
    '',
  ];

  if (clients.length === 0) {
    lines.push('No monitored clients.');
    return lines.join('\n');
  }

  for (const client of clients) {
    lines.push(
      `== ${client.name} ==`,
      `Status: ${client.lastStatus}`,
      `Severities: ${client.lastStatuses ?? NO_SUMMARY}`,
      `Emails: ${client.lastEmailCount}`,
      `Subject: ${client.lastSubject ?? NO_SUBJECT}`,
      `Last check: ${lastCheckLabel(client, ctx.timeZone)}`
    );
    if (client.lastNote) {
      lines.push(`Note: ${client.lastNote}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function renderHtml(clients: MonitoredClient[], ctx: RenderContext): string {
  const rows = clients.map(client => {
    const color = statusColor(client.lastStatus);
    const note = client.lastNote
      ? `<div class="note">Note: ${escapeHtml(client.lastNote)}</div>`
      : '';
    return `
      <tr>
        <td>${escapeHtml(client.name)}</td>
        <td><span class="status-badge" style="background-color: ${color};">${client.lastStatus}</span></td>
        <td>${escapeHtml(client.lastStatuses ?? NO_SUMMARY)}</td>
        <td>${client.lastEmailCount}</td>
        <td>${escapeHtml(client.lastSubject ?? NO_SUBJECT)}${note}</td>
        <td>${escapeHtml(lastCheckLabel(client, ctx.timeZone))}</td>
      </tr>`;
  });

  const body = clients.length === 0
    ? '<p>No monitored clients.</p>'
    : `<table>
      <tr><th>Client</th><th>Status</th><th>Severities</th><th>Emails</th><th>Subject</th><th>Last check</th></tr>${rows.join('')}
    </table>`;

  return `
<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #ddd; padding: 6px 10px; text-align: left; vertical-align: top; }
    .status-badge { display: inline-block; padding: 2px 8px; border-radius: 3px; font-weight: bold; color: white; }
    .note { margin-top: 4px; font-size: 12px; color: #777; }
  </style>
</head>
<body>
  <h1>${escapeHtml(ctx.subject)}</h1>
  <p>Generated: ${escapeHtml(ctx.generated)}</p>
  <p>Check window: ${escapeHtml(ctx.window)}</p>
  <p>Status totals: ${escapeHtml(ctx.totalsLine)}</p>
  ${body}
</body>
</html>
  `.trim();
}
