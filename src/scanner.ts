// Mailbox Scanner - Lists, fetches and decodes the messages of a check window
import { EmailParser, type DecodedMessage } from './parser.js';
import { ScanDiagnostics, toError } from './errors.js';
import { describeTransportError } from './error-classifier.js';
import { withTimeout, type MailboxTransport } from './connector.js';
import { calendarDay, isWithinWindow } from './window.js';
import type { CheckWindow, ScanResult, ScannedMessage } from './types.js';

export interface ScannerOptions {
  /** Zone used for dates without an explicit offset */
  timeZone: string;
  /** Upper bound for a whole scan in milliseconds (default: 120000) */
  operationTimeout?: number;
}

const DEFAULT_OPERATION_TIMEOUT = 120000;

/**
 * Date passed to the IMAP SINCE search for a window.
 * SINCE has day granularity; noon UTC of the window's first calendar day keeps
 * that day whichever zone the date gets rendered in.
 */
export function searchDateFor(window: CheckWindow, timeZone: string): Date {
  return new Date(`${calendarDay(window.start, timeZone)}T12:00:00.000Z`);
}

/**
 * MailboxScanner enumerates candidate messages newest-first, fetches each one
 * and keeps those whose receipt time falls inside the window.
 *
 * Per-message failures leave a note and are skipped. A transport failure aborts
 * the whole scan and is reported as `{ ok: false }`.
 */
export class MailboxScanner {
  private readonly parser: EmailParser;
  private readonly operationTimeout: number;

  constructor(
    private readonly createTransport: () => MailboxTransport,
    private readonly options: ScannerOptions
  ) {
    this.parser = new EmailParser(options.timeZone);
    this.operationTimeout = options.operationTimeout ?? DEFAULT_OPERATION_TIMEOUT;
  }

  async scan(window: CheckWindow): Promise<ScanResult> {
    const transport = this.createTransport();
    const diagnostics = new ScanDiagnostics();

    try {
      const messages = await withTimeout(
        this.collect(transport, window, diagnostics),
        this.operationTimeout,
        `Mailbox scan timed out after ${this.operationTimeout}ms`
      );

      if (diagnostics.hasErrors()) {
        console.warn(`[Scanner] ${diagnostics.formatSummary()}`);
      }
      console.log(`[Scanner] ${messages.length} message(s) inside the window`);

      return { ok: true, messages, notes: diagnostics.notes() };
    } catch (error) {
      const reason = describeTransportError(error);
      console.error(`[Scanner] Scan aborted: ${reason}`);
      return { ok: false, reason };
    } finally {
      await transport.close();
    }
  }

  private async collect(
    transport: MailboxTransport,
    window: CheckWindow,
    diagnostics: ScanDiagnostics
  ): Promise<ScannedMessage[]> {
    await transport.open();

    const uids = await transport.searchSince(searchDateFor(window, this.options.timeZone));
    const newestFirst = [...uids].sort((a, b) => b - a);
    console.log(`[Scanner] ${newestFirst.length} candidate message(s)`);

    const messages: ScannedMessage[] = [];

    for (const uid of newestFirst) {
      let source: Buffer | null;
      try {
        source = await transport.fetchSource(uid);
      } catch (error) {
        // A dropped connection is a transport failure, not a bad message
        if (!transport.isUsable()) {
          throw error;
        }
        diagnostics.addError(uid, 'fetch', toError(error));
        continue;
      }

      if (!source) {
        diagnostics.addError(uid, 'fetch', new Error('Empty message source'));
        continue;
      }

      let decoded: DecodedMessage;
      try {
        decoded = await this.parser.parse(source, uid);
      } catch (error) {
        diagnostics.addError(uid, 'parse', toError(error));
        continue;
      }

      if (!decoded.date) {
        diagnostics.addError(uid, 'date', new Error('Missing or unreadable Date header'));
        continue;
      }

      // Outside the window is expected, not an error
      if (!isWithinWindow(decoded.date, window)) {
        continue;
      }

      messages.push({
        uid,
        subject: decoded.subject,
        receivedAt: decoded.date,
      });
    }

    return messages;
  }
}
