// Storage - monitored clients and the settings singleton in SQLite
import Database from 'better-sqlite3';
import { CLIENT_STATUSES } from './types.js';
import type {
  ClientInput,
  ClientStatus,
  MonitorRepository,
  MonitorSettings,
  MonitoredClient,
  RunOutcome,
  SettingsUpdate,
} from './types.js';
import {
  DEFAULT_CHECK_TIME,
  DEFAULT_IMAP_PORT,
  DEFAULT_REPORT_TIME,
  DEFAULT_WINDOW_END_HOUR,
  DEFAULT_WINDOW_START_HOUR,
  sanitizeHour,
  sanitizeMinute,
} from './settings.js';

// Validation errors
export class StorageError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

interface ClientRow {
  id: number;
  name: string;
  subject_ok: string;
  subject_warning: string;
  subject_failed: string;
  last_status: string;
  last_subject: string | null;
  last_statuses: string | null;
  last_email_count: number;
  last_note: string | null;
  last_checked_at: string | null;
}

interface SettingsRow {
  imap_host: string | null;
  imap_port: number;
  imap_username: string | null;
  imap_password: string | null;
  imap_use_tls: number;
  check_window_start_hour: number;
  check_window_end_hour: number;
  check_hour: number;
  check_minute: number;
  smtp_host: string | null;
  smtp_port: number | null;
  smtp_username: string | null;
  smtp_password: string | null;
  smtp_use_tls: number;
  report_recipients: string | null;
  report_enabled: number;
  report_hour: number;
  report_minute: number;
  updated_at: string | null;
}

const CLIENTS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS clients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    subject_ok TEXT NOT NULL DEFAULT '',
    subject_warning TEXT NOT NULL DEFAULT '',
    subject_failed TEXT NOT NULL DEFAULT '',
    last_status TEXT NOT NULL DEFAULT 'MISSING',
    last_subject TEXT,
    last_statuses TEXT,
    last_email_count INTEGER NOT NULL DEFAULT 0,
    last_note TEXT,
    last_checked_at TEXT
  )`;

const SETTINGS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS settings (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    imap_host TEXT,
    imap_port INTEGER NOT NULL DEFAULT ${DEFAULT_IMAP_PORT},
    imap_username TEXT,
    imap_password TEXT,
    imap_use_tls INTEGER NOT NULL DEFAULT 1,
    check_window_start_hour INTEGER NOT NULL DEFAULT ${DEFAULT_WINDOW_START_HOUR},
    check_window_end_hour INTEGER NOT NULL DEFAULT ${DEFAULT_WINDOW_END_HOUR},
    check_hour INTEGER NOT NULL DEFAULT ${DEFAULT_CHECK_TIME.hour},
    check_minute INTEGER NOT NULL DEFAULT ${DEFAULT_CHECK_TIME.minute},
    smtp_host TEXT,
    smtp_port INTEGER,
    smtp_username TEXT,
    smtp_password TEXT,
    smtp_use_tls INTEGER NOT NULL DEFAULT 1,
    report_recipients TEXT,
    report_enabled INTEGER NOT NULL DEFAULT 0,
    report_hour INTEGER NOT NULL DEFAULT ${DEFAULT_REPORT_TIME.hour},
    report_minute INTEGER NOT NULL DEFAULT ${DEFAULT_REPORT_TIME.minute},
    updated_at TEXT
  )`;

function isClientStatus(value: string): value is ClientStatus {
  return CLIENT_STATUSES.some(status => status === value);
}

function rowToClient(row: ClientRow): MonitoredClient {
  return {
    id: row.id,
    name: row.name,
    subjectOk: row.subject_ok,
    subjectWarning: row.subject_warning,
    subjectFailed: row.subject_failed,
    lastStatus: isClientStatus(row.last_status) ? row.last_status : 'MISSING',
    lastSubject: row.last_subject,
    lastStatuses: row.last_statuses,
    lastEmailCount: row.last_email_count,
    lastNote: row.last_note,
    lastCheckedAt: row.last_checked_at,
  };
}

function rowToSettings(row: SettingsRow): MonitorSettings {
  return {
    imapHost: row.imap_host,
    imapPort: row.imap_port,
    imapUsername: row.imap_username,
    imapPassword: row.imap_password,
    imapUseTls: row.imap_use_tls === 1,
    checkWindowStartHour: row.check_window_start_hour,
    checkWindowEndHour: row.check_window_end_hour,
    checkHour: row.check_hour,
    checkMinute: row.check_minute,
    smtpHost: row.smtp_host,
    smtpPort: row.smtp_port,
    smtpUsername: row.smtp_username,
    smtpPassword: row.smtp_password,
    smtpUseTls: row.smtp_use_tls === 1,
    reportRecipients: row.report_recipients,
    reportEnabled: row.report_enabled === 1,
    reportHour: row.report_hour,
    reportMinute: row.report_minute,
    updatedAt: row.updated_at,
  };
}

// Input validation

function readString(d: Record<string, unknown>, field: string): string {
  const value = d[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field);
  }
  return value.trim();
}

export function validateClientInput(data: unknown): ClientInput {
  if (!data || typeof data !== 'object') {
    throw new ValidationError('Invalid client data: expected object');
  }
  const d = data as Record<string, unknown>;

  const name = readString(d, 'name');
  if (name.length === 0) {
    throw new ValidationError('Missing required field: name', 'name');
  }

  const input: ClientInput = {
    name,
    subjectOk: readString(d, 'subjectOk'),
    subjectWarning: readString(d, 'subjectWarning'),
    subjectFailed: readString(d, 'subjectFailed'),
  };

  if (!input.subjectOk && !input.subjectWarning && !input.subjectFailed) {
    throw new ValidationError('At least one expected subject is required', 'subjectOk');
  }

  return input;
}

function readOptionalText(d: Record<string, unknown>, field: string): string | null | undefined {
  const value = d[field];
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readPort(d: Record<string, unknown>, field: string): number | null | undefined {
  const value = d[field];
  if (value === undefined) {
    return undefined;
  }
  if (value === null || value === '') {
    return null;
  }
  const port = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`${field} must be an integer between 1 and 65535`, field);
  }
  return port;
}

function readBoolean(d: Record<string, unknown>, field: string): boolean | undefined {
  const value = d[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field);
  }
  return value;
}

/**
 * Validate a settings update. Hours and minutes are clamped to their defaults
 * rather than rejected; ports, booleans and text fields must have the right type.
 */
export function validateSettingsInput(data: unknown): SettingsUpdate {
  if (!data || typeof data !== 'object') {
    throw new ValidationError('Invalid settings data: expected object');
  }
  const d = data as Record<string, unknown>;
  const update: SettingsUpdate = {};

  const imapHost = readOptionalText(d, 'imapHost');
  if (imapHost !== undefined) update.imapHost = imapHost;
  const imapUsername = readOptionalText(d, 'imapUsername');
  if (imapUsername !== undefined) update.imapUsername = imapUsername;
  const imapPassword = readOptionalText(d, 'imapPassword');
  if (imapPassword !== undefined) update.imapPassword = imapPassword;
  const imapPort = readPort(d, 'imapPort');
  if (imapPort !== undefined) update.imapPort = imapPort ?? DEFAULT_IMAP_PORT;
  const imapUseTls = readBoolean(d, 'imapUseTls');
  if (imapUseTls !== undefined) update.imapUseTls = imapUseTls;

  if (d.checkWindowStartHour !== undefined) {
    update.checkWindowStartHour = sanitizeHour(d.checkWindowStartHour, DEFAULT_WINDOW_START_HOUR);
  }
  if (d.checkWindowEndHour !== undefined) {
    update.checkWindowEndHour = sanitizeHour(d.checkWindowEndHour, DEFAULT_WINDOW_END_HOUR);
  }
  if (d.checkHour !== undefined) {
    update.checkHour = sanitizeHour(d.checkHour, DEFAULT_CHECK_TIME.hour);
  }
  if (d.checkMinute !== undefined) {
    update.checkMinute = sanitizeMinute(d.checkMinute, DEFAULT_CHECK_TIME.minute);
  }

  const smtpHost = readOptionalText(d, 'smtpHost');
  if (smtpHost !== undefined) update.smtpHost = smtpHost;
  const smtpUsername = readOptionalText(d, 'smtpUsername');
  if (smtpUsername !== undefined) update.smtpUsername = smtpUsername;
  const smtpPassword = readOptionalText(d, 'smtpPassword');
  if (smtpPassword !== undefined) update.smtpPassword = smtpPassword;
  const smtpPort = readPort(d, 'smtpPort');
  if (smtpPort !== undefined) update.smtpPort = smtpPort;
  const smtpUseTls = readBoolean(d, 'smtpUseTls');
  if (smtpUseTls !== undefined) update.smtpUseTls = smtpUseTls;
  const reportRecipients = readOptionalText(d, 'reportRecipients');
  if (reportRecipients !== undefined) update.reportRecipients = reportRecipients;
  const reportEnabled = readBoolean(d, 'reportEnabled');
  if (reportEnabled !== undefined) update.reportEnabled = reportEnabled;

  if (d.reportHour !== undefined) {
    update.reportHour = sanitizeHour(d.reportHour, DEFAULT_REPORT_TIME.hour);
  }
  if (d.reportMinute !== undefined) {
    update.reportMinute = sanitizeMinute(d.reportMinute, DEFAULT_REPORT_TIME.minute);
  }

  return update;
}

/**
 * MonitorStore persists clients and settings in a SQLite database.
 * Outcomes of a run are written in a single transaction.
 */
export class MonitorStore implements MonitorRepository {
  private readonly db: Database.Database;

  /**
   * @param database - file path, ":memory:", or an open connection
   */
  constructor(database: string | Database.Database) {
    this.db = typeof database === 'string' ? new Database(database) : database;
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  /**
   * Create tables and bring older client tables up to date.
   */
  private migrate(): void {
    const columns = this.tableColumns('clients');
    if (columns.size > 0 && !columns.has('subject_ok')) {
      this.migrateLegacyClients(columns);
    }
    this.db.exec(CLIENTS_TABLE_SQL);
    this.db.exec(SETTINGS_TABLE_SQL);
  }

  private tableColumns(table: string): Set<string> {
    const rows = this.db.prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${table}')`).all();
    return new Set(rows.map(row => row.name));
  }

  /**
   * Rebuild a clients table that still carries the single expected_subject
   * column. The legacy value becomes subject_ok unless an explicit ok subject
   * already exists; legacy status labels are mapped onto the status enum.
   */
  private migrateLegacyClients(columns: Set<string>): void {
    const has = (name: string) => columns.has(name);
    const legacySubject = has('expected_subject') ? 'expected_subject' : 'NULL';

    const subjectOk = has('expected_subject_ok')
      ? `COALESCE(NULLIF(TRIM(expected_subject_ok), ''), ${legacySubject}, '')`
      : `COALESCE(${legacySubject}, '')`;
    const subjectWarning = has('expected_subject_warning') ? `COALESCE(expected_subject_warning, '')` : `''`;
    const subjectFailed = has('expected_subject_failed') ? `COALESCE(expected_subject_failed, '')` : `''`;
    const lastStatus = has('last_status')
      ? `CASE WHEN UPPER(last_status) IN ('OK', 'WARNING', 'FAILED') THEN UPPER(last_status) ELSE 'MISSING' END`
      : `'MISSING'`;
    const lastSubject = has('last_subject') ? 'last_subject' : 'NULL';
    const lastNote = has('last_note') ? 'last_note' : 'NULL';
    const lastCheckedAt = has('last_checked_at')
      ? `CASE WHEN last_checked_at IS NULL THEN NULL ELSE strftime('%Y-%m-%dT%H:%M:%fZ', last_checked_at) END`
      : 'NULL';

    const rebuild = this.db.transaction(() => {
      this.db.exec(CLIENTS_TABLE_SQL.replace('clients', 'clients_migrated'));
      this.db.exec(`
        INSERT INTO clients_migrated (id, name, subject_ok, subject_warning, subject_failed, last_status, last_subject, last_note, last_checked_at)
        SELECT id, name, ${subjectOk}, ${subjectWarning}, ${subjectFailed}, ${lastStatus}, ${lastSubject}, ${lastNote}, ${lastCheckedAt}
        FROM clients
      `);
      this.db.exec('DROP TABLE clients');
      this.db.exec('ALTER TABLE clients_migrated RENAME TO clients');
    });
    rebuild();
    console.log('[Storage] Migrated legacy clients table');
  }

  // Client operations

  listClients(): MonitoredClient[] {
    const rows = this.db
      .prepare<[], ClientRow>('SELECT * FROM clients ORDER BY name COLLATE NOCASE, id')
      .all();
    return rows.map(rowToClient);
  }

  getClient(id: number): MonitoredClient {
    const row = this.db.prepare<[number], ClientRow>('SELECT * FROM clients WHERE id = ?').get(id);
    if (!row) {
      throw new StorageError(`Resource not found: ${id}`, 'NOT_FOUND');
    }
    return rowToClient(row);
  }

  createClient(input: ClientInput): MonitoredClient {
    const validated = validateClientInput(input);
    const result = this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO clients (name, subject_ok, subject_warning, subject_failed) VALUES (?, ?, ?, ?)'
      )
      .run(validated.name, validated.subjectOk, validated.subjectWarning, validated.subjectFailed);
    return this.getClient(Number(result.lastInsertRowid));
  }

  updateClient(id: number, input: ClientInput): MonitoredClient {
    const validated = validateClientInput(input);
    const result = this.db
      .prepare<[string, string, string, string, number]>(
        'UPDATE clients SET name = ?, subject_ok = ?, subject_warning = ?, subject_failed = ? WHERE id = ?'
      )
      .run(validated.name, validated.subjectOk, validated.subjectWarning, validated.subjectFailed, id);
    if (result.changes === 0) {
      throw new StorageError(`Resource not found: ${id}`, 'NOT_FOUND');
    }
    return this.getClient(id);
  }

  deleteClient(id: number): void {
    const result = this.db.prepare<[number]>('DELETE FROM clients WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new StorageError(`Resource not found: ${id}`, 'NOT_FOUND');
    }
  }

  /**
   * Write the outcomes of one run. Either every outcome lands or none does.
   */
  saveOutcomes(outcomes: RunOutcome[]): void {
    const stmt = this.db.prepare<[string, string | null, string | null, number, string | null, string, number]>(`
      UPDATE clients
      SET last_status = ?, last_subject = ?, last_statuses = ?, last_email_count = ?, last_note = ?, last_checked_at = ?
      WHERE id = ?
    `);

    const writeAll = this.db.transaction((items: RunOutcome[]) => {
      for (const outcome of items) {
        stmt.run(
          outcome.status,
          outcome.subject,
          outcome.summary,
          outcome.emailCount,
          outcome.note,
          outcome.checkedAt,
          outcome.clientId
        );
      }
    });

    writeAll(outcomes);
  }

  // Settings operations

  getSettings(): MonitorSettings {
    this.db.prepare('INSERT OR IGNORE INTO settings (id) VALUES (1)').run();
    const row = this.db.prepare<[], SettingsRow>('SELECT * FROM settings WHERE id = 1').get();
    if (!row) {
      throw new StorageError('Settings record is missing', 'READ_ERROR');
    }
    return rowToSettings(row);
  }

  updateSettings(input: SettingsUpdate): MonitorSettings {
    const update = validateSettingsInput(input);
    const next: MonitorSettings = {
      ...this.getSettings(),
      ...update,
      updatedAt: new Date().toISOString(),
    };

    this.db.prepare(`
      UPDATE settings SET
        imap_host = @imapHost, imap_port = @imapPort, imap_username = @imapUsername,
        imap_password = @imapPassword, imap_use_tls = @imapUseTls,
        check_window_start_hour = @checkWindowStartHour, check_window_end_hour = @checkWindowEndHour,
        check_hour = @checkHour, check_minute = @checkMinute,
        smtp_host = @smtpHost, smtp_port = @smtpPort, smtp_username = @smtpUsername,
        smtp_password = @smtpPassword, smtp_use_tls = @smtpUseTls,
        report_recipients = @reportRecipients, report_enabled = @reportEnabled,
        report_hour = @reportHour, report_minute = @reportMinute,
        updated_at = @updatedAt
      WHERE id = 1
    `).run({
      ...next,
      imapUseTls: next.imapUseTls ? 1 : 0,
      smtpUseTls: next.smtpUseTls ? 1 : 0,
      reportEnabled: next.reportEnabled ? 1 : 0,
    });

    return this.getSettings();
  }
}
