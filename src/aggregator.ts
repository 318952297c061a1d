// Reconciliation aggregator - folds the messages of one run into one outcome per client
import { classifySubject } from './classifier.js';
import { windowLabels } from './window.js';
import {
  SEVERITY_PRIORITY,
  type CheckWindow,
  type ClientStatus,
  type MonitoredClient,
  type RunOutcome,
  type ScannedMessage,
  type SeverityCounts,
} from './types.js';

export interface AggregationContext {
  window: CheckWindow;
  timeZone: string;
  /** ISO timestamp stamped on the outcome */
  checkedAt: string;
  /** First per-message note left by the scanner, if any */
  scanNote?: string | null;
}

export function emptyCounts(): SeverityCounts {
  return { FAILED: 0, WARNING: 0, OK: 0 };
}

/**
 * Highest severity with a non-zero count, MISSING when all counts are zero.
 */
export function overallStatus(counts: SeverityCounts): ClientStatus {
  for (const severity of SEVERITY_PRIORITY) {
    if (counts[severity] > 0) {
      return severity;
    }
  }
  return 'MISSING';
}

/**
 * "FAILED, OK ×2" style summary in precedence order, null when nothing was seen.
 */
export function summarizeCounts(counts: SeverityCounts): string | null {
  const parts: string[] = [];
  for (const severity of SEVERITY_PRIORITY) {
    const count = counts[severity];
    if (count === 1) {
      parts.push(severity);
    } else if (count > 1) {
      parts.push(`${severity} ×${count}`);
    }
  }
  return parts.length > 0 ? parts.join(', ') : null;
}

export function totalCount(counts: SeverityCounts): number {
  return SEVERITY_PRIORITY.reduce((sum, severity) => sum + counts[severity], 0);
}

/**
 * Outcome for a client when no message could be considered.
 */
export function missingOutcome(client: Pick<MonitoredClient, 'id'>, note: string, checkedAt: string): RunOutcome {
  return {
    clientId: client.id,
    status: 'MISSING',
    subject: null,
    counts: emptyCounts(),
    summary: null,
    emailCount: 0,
    note,
    checkedAt,
  };
}

/**
 * Combine every in-window message into the client's outcome.
 *
 * Messages are expected in scan order (newest first); the first one that
 * classifies becomes the representative subject. Every classified message
 * counts toward the tally, not just the first.
 */
export function aggregateOutcome(
  client: MonitoredClient,
  messages: ScannedMessage[],
  context: AggregationContext
): RunOutcome {
  const counts = emptyCounts();
  let representative: string | null = null;

  for (const message of messages) {
    const severity = classifySubject(message.subject, client);
    if (severity === null) {
      continue;
    }
    counts[severity]++;
    if (representative === null) {
      representative = message.subject;
    }
  }

  const emailCount = totalCount(counts);
  if (emailCount === 0) {
    const labels = windowLabels(context.window, context.timeZone);
    const note = context.scanNote ||
      `No message received between ${labels.start} and ${labels.end} matches the expected subjects.`;
    return missingOutcome(client, note, context.checkedAt);
  }

  return {
    clientId: client.id,
    status: overallStatus(counts),
    subject: representative,
    counts,
    summary: summarizeCounts(counts),
    emailCount,
    note: null,
    checkedAt: context.checkedAt,
  };
}
