// Core type definitions for Backup Mail Monitor

/**
 * Severity carried by a single notification email.
 * Listed from most to least severe.
 */
export type Severity = 'FAILED' | 'WARNING' | 'OK';

/**
 * Status recorded on a monitored client after a check.
 * MISSING is never derived from a message: it means nothing matched.
 */
export type ClientStatus = Severity | 'MISSING';

/** Severities in precedence order (FAILED > WARNING > OK) */
export const SEVERITY_PRIORITY: readonly Severity[] = ['FAILED', 'WARNING', 'OK'];

/** Every status a client can hold, in precedence order */
export const CLIENT_STATUSES: readonly ClientStatus[] = ['FAILED', 'WARNING', 'OK', 'MISSING'];

/**
 * Subject prefixes announcing each severity for one client.
 * An empty prefix never matches.
 */
export interface SubjectExpectations {
  subjectOk: string;
  subjectWarning: string;
  subjectFailed: string;
}

/**
 * A backup client/job whose notification emails are tracked.
 * The last* fields are written by each reconciliation run.
 */
export interface MonitoredClient extends SubjectExpectations {
  id: number;
  name: string;
  lastStatus: ClientStatus;
  /** Subject recorded as evidence for lastStatus */
  lastSubject: string | null;
  /** Summary of every severity seen, e.g. "FAILED, OK ×2" */
  lastStatuses: string | null;
  lastEmailCount: number;
  lastNote: string | null;
  /** ISO timestamp of the last run, null when never checked */
  lastCheckedAt: string | null;
}

/**
 * Fields accepted when creating or editing a client
 */
export interface ClientInput extends SubjectExpectations {
  name: string;
}

/**
 * IMAP mailbox settings and the daily check schedule
 */
export interface MailboxSettings {
  imapHost: string | null;
  imapPort: number;
  imapUsername: string | null;
  imapPassword: string | null;
  /** Whether to use TLS/SSL encryption */
  imapUseTls: boolean;
  checkWindowStartHour: number;
  checkWindowEndHour: number;
  checkHour: number;
  checkMinute: number;
}

/**
 * Outbound SMTP settings and the daily report schedule
 */
export interface ReportSettings {
  smtpHost: string | null;
  smtpPort: number | null;
  smtpUsername: string | null;
  smtpPassword: string | null;
  smtpUseTls: boolean;
  /** Free text, addresses separated by comma, semicolon or newline */
  reportRecipients: string | null;
  reportEnabled: boolean;
  reportHour: number;
  reportMinute: number;
}

/**
 * Singleton settings record
 */
export interface MonitorSettings extends MailboxSettings, ReportSettings {
  updatedAt: string | null;
}

/**
 * Partial settings update. A password left undefined keeps the stored one.
 */
export type SettingsUpdate = Partial<Omit<MonitorSettings, 'updatedAt'>>;

/**
 * Settings as exposed over the API, without passwords
 */
export type PublicSettings = Omit<MonitorSettings, 'imapPassword' | 'smtpPassword'> & {
  hasImapPassword: boolean;
  hasSmtpPassword: boolean;
};

/**
 * Inclusive receipt-time range considered by a check
 */
export interface CheckWindow {
  start: Date;
  end: Date;
}

/**
 * A message found in the mailbox inside the check window
 */
export interface ScannedMessage {
  /** Unique identifier for the email in the mailbox */
  uid: number;
  /** Decoded subject line */
  subject: string;
  /** Receipt time taken from the Date header */
  receivedAt: Date;
}

/**
 * Outcome of a mailbox scan. A failed scan carries a readable reason.
 */
export type ScanResult =
  | { ok: true; messages: ScannedMessage[]; notes: string[] }
  | { ok: false; reason: string };

export type SeverityCounts = Record<Severity, number>;

/**
 * Outcome computed for one client during one run
 */
export interface RunOutcome {
  clientId: number;
  status: ClientStatus;
  subject: string | null;
  counts: SeverityCounts;
  summary: string | null;
  emailCount: number;
  note: string | null;
  checkedAt: string;
}

/**
 * Result of an externally triggered operation, suitable for display
 */
export interface OperationResult {
  success: boolean;
  message: string;
}

/**
 * Result of a report dispatch
 */
export type DispatchResult =
  | { sent: true; message: string; recipients: string[] }
  | { sent: false; message: string };

/**
 * Time of day for a daily trigger, in the monitor's time zone
 */
export interface ScheduleTime {
  hour: number;
  minute: number;
}

/**
 * The two operations the engine exposes to the scheduler and the API
 */
export interface MonitorOperations {
  reconcileNow(): Promise<OperationResult>;
  sendReportNow(): Promise<OperationResult>;
}

/**
 * What the engine needs from persistence
 */
export interface MonitorRepository {
  listClients(): MonitoredClient[];
  getSettings(): MonitorSettings;
  saveOutcomes(outcomes: RunOutcome[]): void;
}

/**
 * Error that occurred while scanning one message
 * Tracks which email failed and at what stage
 */
export interface ProcessingError {
  /** UID of the email that failed to process */
  emailUid: number;
  /** Processing stage where the error occurred */
  stage: 'fetch' | 'parse' | 'date';
  /** The error that occurred */
  error: Error;
  /** When the error occurred */
  timestamp: Date;
}

/**
 * Error types for classification
 * Used by ErrorClassifier to categorize transport errors
 */
export enum ErrorType {
  /** Authentication error - credentials invalid */
  AUTHENTICATION = 'authentication',
  /** Network error - connection issues */
  NETWORK = 'network',
  /** Timeout error - operation took too long */
  TIMEOUT = 'timeout',
  /** Rate limit error - too many requests */
  RATE_LIMIT = 'rate_limit',
  /** Server error - temporary server issue */
  SERVER_ERROR = 'server_error',
  /** Unknown error - unclassified error */
  UNKNOWN = 'unknown'
}
