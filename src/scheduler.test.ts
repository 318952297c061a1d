import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  JobScheduler,
  configureSchedules,
  nextOccurrence,
  RECONCILIATION_JOB,
  REPORT_JOB,
} from './scheduler.js';
import type { MonitorOperations, MonitorSettings } from './types.js';

const HOUR = 60 * 60 * 1000;

// Let the job promise chain settle after a timer fired
async function flushJobs(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

function makeSettings(overrides: Partial<MonitorSettings> = {}): MonitorSettings {
  return {
    imapHost: null,
    imapPort: 993,
    imapUsername: null,
    imapPassword: null,
    imapUseTls: true,
    checkWindowStartHour: 16,
    checkWindowEndHour: 9,
    checkHour: 9,
    checkMinute: 0,
    smtpHost: null,
    smtpPort: null,
    smtpUsername: null,
    smtpPassword: null,
    smtpUseTls: true,
    reportRecipients: null,
    reportEnabled: false,
    reportHour: 9,
    reportMinute: 30,
    updatedAt: null,
    ...overrides,
  };
}

describe('nextOccurrence', () => {
  it('should return today when the time is still ahead', () => {
    const next = nextOccurrence(new Date('2024-03-15T08:00:00.000Z'), { hour: 9, minute: 0 }, 'UTC');
    expect(next.toISOString()).toBe('2024-03-15T09:00:00.000Z');
  });

  it('should return tomorrow when the time is now or past', () => {
    const next = nextOccurrence(new Date('2024-03-15T09:00:00.000Z'), { hour: 9, minute: 0 }, 'UTC');
    expect(next.toISOString()).toBe('2024-03-16T09:00:00.000Z');
  });

  it('should follow the zone across a daylight saving change', () => {
    // 11:00 in Paris on the day before summer time starts
    const next = nextOccurrence(new Date('2024-03-30T10:00:00.000Z'), { hour: 9, minute: 0 }, 'Europe/Paris');
    expect(next.toISOString()).toBe('2024-03-31T07:00:00.000Z');
  });
});

describe('JobScheduler', () => {
  let scheduler: JobScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-15T08:00:00.000Z'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    scheduler = new JobScheduler('UTC');
  });

  afterEach(() => {
    scheduler.shutdown();
    vi.useRealTimers();
  });

  it('should run a job at its time and re-arm it for the next day', async () => {
    const task = vi.fn().mockResolvedValue({ success: true, message: 'done' });

    const first = scheduler.schedule(RECONCILIATION_JOB, { hour: 9, minute: 0 }, task);
    expect(first.toISOString()).toBe('2024-03-15T09:00:00.000Z');

    await vi.advanceTimersByTimeAsync(HOUR - 1);
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await flushJobs();
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.getNextRun(RECONCILIATION_JOB)?.toISOString()).toBe('2024-03-16T09:00:00.000Z');

    await vi.advanceTimersByTimeAsync(24 * HOUR);
    await flushJobs();
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should replace a job scheduled under the same id', async () => {
    const original = vi.fn().mockResolvedValue(undefined);
    const replacement = vi.fn().mockResolvedValue(undefined);

    scheduler.schedule(REPORT_JOB, { hour: 9, minute: 0 }, original);
    scheduler.schedule(REPORT_JOB, { hour: 10, minute: 15 }, replacement);

    expect(scheduler.listJobs()).toHaveLength(1);
    expect(scheduler.getNextRun(REPORT_JOB)?.toISOString()).toBe('2024-03-15T10:15:00.000Z');

    await vi.advanceTimersByTimeAsync(3 * HOUR);
    await flushJobs();
    expect(original).not.toHaveBeenCalled();
    expect(replacement).toHaveBeenCalledTimes(1);
  });

  it('should not run a cancelled job', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    scheduler.schedule(REPORT_JOB, { hour: 9, minute: 0 }, task);

    expect(scheduler.cancel(REPORT_JOB)).toBe(true);
    expect(scheduler.cancel(REPORT_JOB)).toBe(false);
    expect(scheduler.has(REPORT_JOB)).toBe(false);
    expect(scheduler.getNextRun(REPORT_JOB)).toBeNull();

    await vi.advanceTimersByTimeAsync(2 * HOUR);
    expect(task).not.toHaveBeenCalled();
  });

  it('should keep a failing job scheduled', async () => {
    const task = vi.fn().mockRejectedValue(new Error('mailbox unreachable'));
    scheduler.schedule(RECONCILIATION_JOB, { hour: 9, minute: 0 }, task);

    await vi.advanceTimersByTimeAsync(HOUR);
    await flushJobs();

    expect(task).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('[Scheduler] Job "reconciliation" failed:', 'mailbox unreachable');
    expect(scheduler.getNextRun(RECONCILIATION_JOB)?.toISOString()).toBe('2024-03-16T09:00:00.000Z');
  });

  it('should drop every job on shutdown', () => {
    scheduler.schedule(RECONCILIATION_JOB, { hour: 9, minute: 0 }, vi.fn());
    scheduler.schedule(REPORT_JOB, { hour: 9, minute: 30 }, vi.fn());

    scheduler.shutdown();

    expect(scheduler.listJobs()).toEqual([]);
  });
});

describe('configureSchedules', () => {
  let scheduler: JobScheduler;
  let operations: MonitorOperations;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-15T08:00:00.000Z'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    scheduler = new JobScheduler('UTC');
    operations = {
      reconcileNow: vi.fn().mockResolvedValue({ success: true, message: 'checked' }),
      sendReportNow: vi.fn().mockResolvedValue({ success: true, message: 'sent' }),
    };
  });

  afterEach(() => {
    scheduler.shutdown();
    vi.useRealTimers();
  });

  it('should only schedule the check while reports are disabled', () => {
    configureSchedules(scheduler, makeSettings(), operations);

    expect(scheduler.has(RECONCILIATION_JOB)).toBe(true);
    expect(scheduler.has(REPORT_JOB)).toBe(false);
  });

  it('should schedule both jobs at their configured times', () => {
    configureSchedules(scheduler, makeSettings({ checkHour: 8, checkMinute: 45, reportEnabled: true, reportHour: 10, reportMinute: 15 }), operations);

    expect(scheduler.getNextRun(RECONCILIATION_JOB)?.toISOString()).toBe('2024-03-15T08:45:00.000Z');
    expect(scheduler.getNextRun(REPORT_JOB)?.toISOString()).toBe('2024-03-15T10:15:00.000Z');
  });

  it('should fall back to the default times for invalid values', () => {
    configureSchedules(scheduler, makeSettings({ checkHour: 99, checkMinute: -1, reportEnabled: true, reportHour: 24, reportMinute: 75 }), operations);

    expect(scheduler.getNextRun(RECONCILIATION_JOB)?.toISOString()).toBe('2024-03-15T09:00:00.000Z');
    expect(scheduler.getNextRun(REPORT_JOB)?.toISOString()).toBe('2024-03-15T09:30:00.000Z');
  });

  it('should remove only the report job when reports get disabled', () => {
    configureSchedules(scheduler, makeSettings({ reportEnabled: true }), operations);
    configureSchedules(scheduler, makeSettings({ reportEnabled: false }), operations);

    expect(scheduler.has(RECONCILIATION_JOB)).toBe(true);
    expect(scheduler.has(REPORT_JOB)).toBe(false);
  });

  it('should trigger the engine operations', async () => {
    configureSchedules(scheduler, makeSettings({ reportEnabled: true }), operations);

    await vi.advanceTimersByTimeAsync(2 * HOUR);
    await flushJobs();

    expect(operations.reconcileNow).toHaveBeenCalledTimes(1);
    expect(operations.sendReportNow).toHaveBeenCalledTimes(1);
  });
});
