// Settings sanitation - hours, schedules, completeness checks and recipients
import type { MailboxSettings, MonitorSettings, PublicSettings, ReportSettings, ScheduleTime } from './types.js';

export const DEFAULT_WINDOW_START_HOUR = 16;
export const DEFAULT_WINDOW_END_HOUR = 9;
export const DEFAULT_IMAP_PORT = 993;
/** Well-known port for SMTP over implicit TLS */
export const SMTPS_PORT = 465;

export const DEFAULT_CHECK_TIME: ScheduleTime = { hour: 9, minute: 0 };
export const DEFAULT_REPORT_TIME: ScheduleTime = { hour: 9, minute: 30 };

function sanitizeInteger(value: unknown, min: number, max: number, fallback: number): number {
  let candidate: number;
  if (typeof value === 'number') {
    candidate = value;
  } else if (typeof value === 'string' && value.trim().length > 0) {
    candidate = Number(value.trim());
  } else {
    return fallback;
  }

  if (!Number.isInteger(candidate) || candidate < min || candidate > max) {
    return fallback;
  }
  return candidate;
}

/**
 * Clamp an hour to an integer in [0,23].
 * Non-numeric or out-of-range input is replaced by the fallback.
 */
export function sanitizeHour(value: unknown, fallback: number): number {
  return sanitizeInteger(value, 0, 23, fallback);
}

/**
 * Clamp a minute to an integer in [0,59].
 */
export function sanitizeMinute(value: unknown, fallback: number): number {
  return sanitizeInteger(value, 0, 59, fallback);
}

export function resolveCheckTime(settings: Pick<MailboxSettings, 'checkHour' | 'checkMinute'>): ScheduleTime {
  return {
    hour: sanitizeHour(settings.checkHour, DEFAULT_CHECK_TIME.hour),
    minute: sanitizeMinute(settings.checkMinute, DEFAULT_CHECK_TIME.minute),
  };
}

export function resolveReportTime(settings: Pick<ReportSettings, 'reportHour' | 'reportMinute'>): ScheduleTime {
  return {
    hour: sanitizeHour(settings.reportHour, DEFAULT_REPORT_TIME.hour),
    minute: sanitizeMinute(settings.reportMinute, DEFAULT_REPORT_TIME.minute),
  };
}

/**
 * Resolve the configured window hours, falling back to 16 and 9.
 */
export function resolveWindowHours(settings: Pick<MailboxSettings, 'checkWindowStartHour' | 'checkWindowEndHour'>): { startHour: number; endHour: number } {
  return {
    startHour: sanitizeHour(settings.checkWindowStartHour, DEFAULT_WINDOW_START_HOUR),
    endHour: sanitizeHour(settings.checkWindowEndHour, DEFAULT_WINDOW_END_HOUR),
  };
}

function isPresent(value: string | null): value is string {
  return value !== null && value.trim().length > 0;
}

/**
 * Mailbox settings are usable once host, username and password are all set.
 */
export function isMailboxConfigured(settings: MailboxSettings): boolean {
  return isPresent(settings.imapHost) && isPresent(settings.imapUsername) && isPresent(settings.imapPassword);
}

/**
 * SMTP settings are usable once host, port, username and password are all set.
 */
export function isSmtpConfigured(settings: ReportSettings): boolean {
  return (
    isPresent(settings.smtpHost) &&
    settings.smtpPort !== null && settings.smtpPort > 0 &&
    isPresent(settings.smtpUsername) &&
    isPresent(settings.smtpPassword)
  );
}

/**
 * Split the free-text recipient list on comma, semicolon or newline.
 */
export function parseRecipients(raw: string | null): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(/[,;\r\n]+/)
    .map(address => address.trim())
    .filter(address => address.length > 0);
}

/**
 * Strip passwords before settings leave the process.
 */
export function toPublicSettings(settings: MonitorSettings): PublicSettings {
  const { imapPassword, smtpPassword, ...rest } = settings;
  return {
    ...rest,
    hasImapPassword: isPresent(imapPassword),
    hasSmtpPassword: isPresent(smtpPassword),
  };
}
