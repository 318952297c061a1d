// Reconciliation - runs one check over every monitored client
import { aggregateOutcome, missingOutcome } from './aggregator.js';
import { MailboxScanner } from './scanner.js';
import { computeCheckWindow, windowLabels } from './window.js';
import { isMailboxConfigured, resolveWindowHours } from './settings.js';
import { describeTransportError } from './error-classifier.js';
import type { MailboxTransport } from './connector.js';
import type { MailboxSettings, MonitorRepository, OperationResult, RunOutcome } from './types.js';

export const INCOMPLETE_IMAP_NOTE = 'Incomplete IMAP configuration.';

export interface ReconciliationDeps {
  repository: MonitorRepository;
  /** Builds a transport for the current mailbox settings */
  createTransport: (settings: MailboxSettings) => MailboxTransport;
  timeZone: string;
  clock?: () => Date;
  /** Upper bound for the mailbox scan in milliseconds */
  operationTimeout?: number;
}

/**
 * ReconciliationService decides, for every client, whether the expected
 * notification arrived in today's window and with which severity.
 *
 * Every run recomputes and overwrites the output fields of all clients in one
 * commit, so a retry is always safe. Overlapping runs are not serialized; the
 * last one to commit wins.
 */
export class ReconciliationService {
  private readonly clock: () => Date;

  constructor(private readonly deps: ReconciliationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Check the mailbox now and persist one outcome per client.
   * Never throws; failures come back as `success: false`.
   */
  async reconcileNow(): Promise<OperationResult> {
    try {
      return await this.run();
    } catch (error) {
      const message = `Check failed: ${describeTransportError(error)}`;
      console.error(`[Reconciler] ${message}`);
      return { success: false, message };
    }
  }

  private async run(): Promise<OperationResult> {
    const { repository, timeZone } = this.deps;
    const now = this.clock();
    const checkedAt = now.toISOString();
    const clients = repository.listClients();
    const settings = repository.getSettings();

    if (!isMailboxConfigured(settings)) {
      console.warn('[Reconciler] IMAP settings incomplete, marking every client as missing');
      repository.saveOutcomes(clients.map(client => missingOutcome(client, INCOMPLETE_IMAP_NOTE, checkedAt)));
      return { success: false, message: INCOMPLETE_IMAP_NOTE };
    }

    const { startHour, endHour } = resolveWindowHours(settings);
    const window = computeCheckWindow(now, startHour, endHour, timeZone);
    const labels = windowLabels(window, timeZone);
    console.log(`[Reconciler] Checking ${clients.length} client(s) between ${labels.start} and ${labels.end}`);

    const scanner = new MailboxScanner(() => this.deps.createTransport(settings), {
      timeZone,
      operationTimeout: this.deps.operationTimeout,
    });
    const scan = await scanner.scan(window);

    if (!scan.ok) {
      const note = `IMAP error: ${scan.reason}`;
      repository.saveOutcomes(clients.map(client => missingOutcome(client, note, checkedAt)));
      return { success: false, message: note };
    }

    const scanNote = scan.notes.length > 0 ? scan.notes[0] : null;
    const outcomes: RunOutcome[] = clients.map(client =>
      aggregateOutcome(client, scan.messages, { window, timeZone, checkedAt, scanNote })
    );
    repository.saveOutcomes(outcomes);

    const missing = outcomes.filter(outcome => outcome.status === 'MISSING').length;
    console.log(`[Reconciler] Check completed: ${outcomes.length - missing} matched, ${missing} missing`);

    return { success: true, message: `Check completed for ${clients.length} client(s).` };
  }
}
