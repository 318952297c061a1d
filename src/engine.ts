// Monitor Engine - wires storage, mailbox, report delivery and schedules together
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { ImapMailboxTransport, toIMAPConfig, withTimeout, type MailboxTransport } from './connector.js';
import { ReconciliationService, INCOMPLETE_IMAP_NOTE } from './reconciler.js';
import { ReportDispatcher, type ReportTransport, type SmtpTransportOptions } from './dispatcher.js';
import { JobScheduler, configureSchedules } from './scheduler.js';
import { MonitorStore } from './storage.js';
import { buildReport, type BackupReport } from './report.js';
import { isMailboxConfigured, resolveWindowHours } from './settings.js';
import { describeTransportError } from './error-classifier.js';
import type { AppConfig } from './config.js';
import type { DispatchResult, MailboxSettings, MonitorOperations, OperationResult } from './types.js';

const TEST_CONNECTION_TIMEOUT = 10000;

export interface EngineOptions {
  /** Open store to use instead of the one at config.databasePath */
  store?: MonitorStore;
  createMailboxTransport?: (settings: MailboxSettings) => MailboxTransport;
  createReportTransport?: (options: SmtpTransportOptions) => ReportTransport;
  clock?: () => Date;
}

function openStore(databasePath: string): MonitorStore {
  if (databasePath !== ':memory:') {
    const dataDir = dirname(databasePath);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }
  return new MonitorStore(databasePath);
}

/**
 * MonitorEngine owns the single store and scheduler of a process and exposes
 * the operations the CLI and the HTTP API trigger.
 */
export class MonitorEngine implements MonitorOperations {
  readonly store: MonitorStore;
  readonly scheduler: JobScheduler;
  readonly timeZone: string;
  private readonly reconciler: ReconciliationService;
  private readonly dispatcher: ReportDispatcher;
  private readonly createMailboxTransport: (settings: MailboxSettings) => MailboxTransport;
  private readonly clock: () => Date;

  constructor(config: AppConfig, options: EngineOptions = {}) {
    this.timeZone = config.timeZone;
    this.clock = options.clock ?? (() => new Date());
    this.store = options.store ?? openStore(config.databasePath);
    this.createMailboxTransport = options.createMailboxTransport ??
      (settings => new ImapMailboxTransport(toIMAPConfig(settings)));

    this.reconciler = new ReconciliationService({
      repository: this.store,
      createTransport: this.createMailboxTransport,
      timeZone: this.timeZone,
      clock: this.clock,
    });
    this.dispatcher = new ReportDispatcher({
      repository: this.store,
      timeZone: this.timeZone,
      createTransport: options.createReportTransport,
      clock: this.clock,
    });
    this.scheduler = new JobScheduler(this.timeZone, this.clock);
  }

  reconcileNow(): Promise<OperationResult> {
    return this.reconciler.reconcileNow();
  }

  async sendReportNow(): Promise<OperationResult> {
    const result = await this.dispatchReport();
    return { success: result.sent, message: result.message };
  }

  dispatchReport(): Promise<DispatchResult> {
    return this.dispatcher.sendReportNow();
  }

  /**
   * Render the report from the current state without sending it
   */
  previewReport(): BackupReport {
    const { startHour, endHour } = resolveWindowHours(this.store.getSettings());
    return buildReport(this.store.listClients(), {
      startHour,
      endHour,
      generatedAt: this.clock(),
      timeZone: this.timeZone,
    });
  }

  /**
   * Open the configured mailbox once and close it again
   */
  async testMailbox(): Promise<OperationResult> {
    const settings = this.store.getSettings();
    if (!isMailboxConfigured(settings)) {
      return { success: false, message: INCOMPLETE_IMAP_NOTE };
    }

    const transport = this.createMailboxTransport(settings);
    try {
      await withTimeout(transport.open(), TEST_CONNECTION_TIMEOUT, 'Connection timeout');
      return { success: true, message: `Connected to ${settings.imapHost}:${settings.imapPort}.` };
    } catch (error) {
      return { success: false, message: `IMAP error: ${describeTransportError(error)}` };
    } finally {
      await transport.close();
    }
  }

  /**
   * (Re)arm the daily jobs from the stored settings
   */
  applySchedules(): void {
    configureSchedules(this.scheduler, this.store.getSettings(), this);
  }

  close(): void {
    this.scheduler.shutdown();
    this.store.close();
  }
}
