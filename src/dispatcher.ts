// Report Dispatcher - delivers the daily report over SMTP
import nodemailer from 'nodemailer';
import { buildReport } from './report.js';
import { SMTPS_PORT, isSmtpConfigured, parseRecipients, resolveWindowHours } from './settings.js';
import { describeTransportError } from './error-classifier.js';
import type { DispatchResult, MonitorRepository, ReportSettings } from './types.js';

export const NO_RECIPIENTS_MESSAGE = 'No report recipients configured.';
export const INCOMPLETE_SMTP_MESSAGE = 'Incomplete SMTP configuration.';

const SMTP_TIMEOUT = 10000;

/**
 * Options handed to nodemailer's SMTP transport
 */
export interface SmtpTransportOptions {
  host: string;
  port: number;
  /** Implicit TLS from the first byte */
  secure: boolean;
  /** Refuse to continue unless STARTTLS succeeds */
  requireTLS: boolean;
  /** Never upgrade to TLS */
  ignoreTLS: boolean;
  auth: { user: string; pass: string };
  connectionTimeout: number;
  greetingTimeout: number;
  socketTimeout: number;
}

export interface ReportMail {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

/**
 * What the dispatcher needs from an SMTP connection.
 */
export interface ReportTransport {
  /** Send one message, resolving to its message id */
  send(mail: ReportMail): Promise<string>;
  close(): void;
}

/**
 * Map the stored SMTP settings to transport options.
 * Port 465 with TLS means implicit TLS; any other port with TLS requires
 * STARTTLS; TLS off means plaintext.
 */
export function buildSmtpOptions(settings: ReportSettings): SmtpTransportOptions {
  const port = settings.smtpPort ?? 0;
  const implicitTls = settings.smtpUseTls && port === SMTPS_PORT;
  return {
    host: settings.smtpHost ?? '',
    port,
    secure: implicitTls,
    requireTLS: settings.smtpUseTls && !implicitTls,
    ignoreTLS: !settings.smtpUseTls,
    auth: {
      user: settings.smtpUsername ?? '',
      pass: settings.smtpPassword ?? '',
    },
    connectionTimeout: SMTP_TIMEOUT,
    greetingTimeout: SMTP_TIMEOUT,
    socketTimeout: SMTP_TIMEOUT,
  };
}

/**
 * ReportTransport backed by a nodemailer SMTP transporter
 */
export class SmtpReportTransport implements ReportTransport {
  private readonly transporter: nodemailer.Transporter;

  constructor(options: SmtpTransportOptions) {
    this.transporter = nodemailer.createTransport(options);
  }

  async send(mail: ReportMail): Promise<string> {
    const info = await this.transporter.sendMail({
      from: mail.from,
      to: mail.to,
      subject: mail.subject,
      text: mail.text,
      html: mail.html,
    });
    return info.messageId;
  }

  close(): void {
    this.transporter.close();
  }
}

export interface DispatcherDeps {
  repository: Pick<MonitorRepository, 'listClients' | 'getSettings'>;
  timeZone: string;
  createTransport?: (options: SmtpTransportOptions) => ReportTransport;
  clock?: () => Date;
}

/**
 * ReportDispatcher builds the report from persisted state and sends it in a
 * single envelope. One attempt per call; failures come back as results.
 */
export class ReportDispatcher {
  private readonly createTransport: (options: SmtpTransportOptions) => ReportTransport;
  private readonly clock: () => Date;

  constructor(private readonly deps: DispatcherDeps) {
    this.createTransport = deps.createTransport ?? (options => new SmtpReportTransport(options));
    this.clock = deps.clock ?? (() => new Date());
  }

  async sendReportNow(): Promise<DispatchResult> {
    let transport: ReportTransport | null = null;
    try {
      const settings = this.deps.repository.getSettings();

      const recipients = parseRecipients(settings.reportRecipients);
      if (recipients.length === 0) {
        console.warn(`[Dispatcher] ${NO_RECIPIENTS_MESSAGE}`);
        return { sent: false, message: NO_RECIPIENTS_MESSAGE };
      }
      if (!isSmtpConfigured(settings)) {
        console.warn(`[Dispatcher] ${INCOMPLETE_SMTP_MESSAGE}`);
        return { sent: false, message: INCOMPLETE_SMTP_MESSAGE };
      }

      const { startHour, endHour } = resolveWindowHours(settings);
      const report = buildReport(this.deps.repository.listClients(), {
        startHour,
        endHour,
        generatedAt: this.clock(),
        timeZone: this.deps.timeZone,
      });

      const options = buildSmtpOptions(settings);
      transport = this.createTransport(options);
      const messageId = await transport.send({
        from: options.auth.user,
        to: recipients,
        subject: report.subject,
        text: report.text,
        html: report.html,
      });

      console.log(`[Dispatcher] Report sent to ${recipients.length} recipient(s): ${messageId}`);
      return {
        sent: true,
        message: `Report sent to ${recipients.length} recipient(s).`,
        recipients,
      };
    } catch (error) {
      const message = `Report delivery failed: ${describeTransportError(error)}`;
      console.error(`[Dispatcher] ${message}`);
      return { sent: false, message };
    } finally {
      if (transport) {
        transport.close();
      }
    }
  }
}
