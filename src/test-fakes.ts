// In-process stand-ins for the IMAP and SMTP transports, used by the tests
import type { MailboxTransport } from './connector.js';
import type { ReportMail, ReportTransport, SmtpTransportOptions } from './dispatcher.js';

export interface FakeMessage {
  uid: number;
  /** Raw source, null for an empty fetch, an Error to make the fetch throw */
  source: Buffer | null | Error;
}

export interface FakeMailboxOptions {
  openError?: Error;
  /** searchSince never settles */
  hangOnSearch?: boolean;
  /** A throwing fetch also drops the connection */
  dropOnFetchError?: boolean;
}

/**
 * Build a minimal RFC 822 message
 */
export function rawEmail(subject: string, date?: string): Buffer {
  const lines = [
    'From: backup@example.com',
    'To: monitor@example.com',
    `Subject: ${subject}`,
  ];
  if (date !== undefined) {
    lines.push(`Date: ${date}`);
  }
  lines.push('Message-ID: <fake@example.com>', '', 'Backup log attached.', '');
  return Buffer.from(lines.join('\r\n'));
}

export class FakeMailboxTransport implements MailboxTransport {
  openCalls = 0;
  closeCalls = 0;
  searchedSince: Date[] = [];
  fetched: number[] = [];
  private usable = true;

  constructor(
    private readonly messages: FakeMessage[],
    private readonly options: FakeMailboxOptions = {}
  ) {}

  async open(): Promise<void> {
    this.openCalls++;
    if (this.options.openError) {
      throw this.options.openError;
    }
  }

  searchSince(date: Date): Promise<number[]> {
    this.searchedSince.push(date);
    if (this.options.hangOnSearch) {
      return new Promise<number[]>(() => undefined);
    }
    return Promise.resolve(this.messages.map(message => message.uid));
  }

  async fetchSource(uid: number): Promise<Buffer | null> {
    this.fetched.push(uid);
    const message = this.messages.find(candidate => candidate.uid === uid);
    if (!message) {
      return null;
    }
    if (message.source instanceof Error) {
      if (this.options.dropOnFetchError) {
        this.usable = false;
      }
      throw message.source;
    }
    return message.source;
  }

  isUsable(): boolean {
    return this.usable;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.usable = false;
  }
}

export class FakeReportTransport implements ReportTransport {
  sent: ReportMail[] = [];
  closeCalls = 0;

  constructor(
    readonly options: SmtpTransportOptions,
    private readonly failWith?: Error
  ) {}

  async send(mail: ReportMail): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(mail);
    return `<report-${this.sent.length}@example.com>`;
  }

  close(): void {
    this.closeCalls++;
  }
}
