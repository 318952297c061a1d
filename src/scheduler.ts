// Scheduler - daily triggers for reconciliation and report dispatch
import { addDays, format, parseISO } from 'date-fns';
import { atZonedTime, calendarDay, formatInstant } from './window.js';
import { resolveCheckTime, resolveReportTime } from './settings.js';
import type { MailboxSettings, MonitorOperations, ReportSettings, ScheduleTime } from './types.js';

export const RECONCILIATION_JOB = 'reconciliation';
export const REPORT_JOB = 'report';

export type JobTask = () => Promise<unknown>;

export interface JobInfo {
  id: string;
  time: ScheduleTime;
  nextRun: Date;
}

interface ScheduledJob {
  time: ScheduleTime;
  task: JobTask;
  nextRun: Date;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * First instant strictly after `from` at hour:minute in the zone.
 */
export function nextOccurrence(from: Date, time: ScheduleTime, timeZone: string): Date {
  const today = calendarDay(from, timeZone);
  const candidate = atZonedTime(today, time.hour, time.minute, timeZone);
  if (candidate.getTime() > from.getTime()) {
    return candidate;
  }
  const tomorrow = format(addDays(parseISO(today), 1), 'yyyy-MM-dd');
  return atZonedTime(tomorrow, time.hour, time.minute, timeZone);
}

/**
 * JobScheduler keeps at most one daily job per id.
 * Scheduling an id again replaces the previous job.
 */
export class JobScheduler {
  private jobs = new Map<string, ScheduledJob>();
  private readonly clock: () => Date;

  constructor(private readonly timeZone: string, clock?: () => Date) {
    this.clock = clock ?? (() => new Date());
  }

  schedule(id: string, time: ScheduleTime, task: JobTask): Date {
    this.cancel(id);
    const job: ScheduledJob = { time, task, nextRun: new Date(0), timer: null };
    this.jobs.set(id, job);
    this.arm(id, job);
    console.log(`[Scheduler] Job "${id}" next run at ${formatInstant(job.nextRun, this.timeZone)} (${this.timeZone})`);
    return job.nextRun;
  }

  cancel(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) {
      return false;
    }
    if (job.timer) {
      clearTimeout(job.timer);
    }
    this.jobs.delete(id);
    console.log(`[Scheduler] Job "${id}" cancelled`);
    return true;
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  getNextRun(id: string): Date | null {
    const job = this.jobs.get(id);
    return job ? job.nextRun : null;
  }

  listJobs(): JobInfo[] {
    return [...this.jobs.entries()].map(([id, job]) => ({
      id,
      time: job.time,
      nextRun: job.nextRun,
    }));
  }

  shutdown(): void {
    for (const id of [...this.jobs.keys()]) {
      this.cancel(id);
    }
  }

  private arm(id: string, job: ScheduledJob): void {
    job.nextRun = nextOccurrence(this.clock(), job.time, this.timeZone);
    const delay = Math.max(0, job.nextRun.getTime() - this.clock().getTime());
    job.timer = setTimeout(() => {
      void this.fire(id, job);
    }, delay);
  }

  private async fire(id: string, job: ScheduledJob): Promise<void> {
    job.timer = null;
    console.log(`[Scheduler] Running job "${id}"`);
    try {
      const result = await job.task();
      console.log(`[Scheduler] Job "${id}" finished`, result ?? '');
    } catch (error) {
      console.error(`[Scheduler] Job "${id}" failed:`, error instanceof Error ? error.message : String(error));
    }

    // Replaced or cancelled while running
    if (this.jobs.get(id) !== job) {
      return;
    }
    this.arm(id, job);
  }
}

/**
 * Apply the stored schedule. Reconciliation always runs; the report job
 * exists only while reports are enabled.
 */
export function configureSchedules(
  scheduler: JobScheduler,
  settings: MailboxSettings & ReportSettings,
  operations: MonitorOperations
): void {
  scheduler.schedule(RECONCILIATION_JOB, resolveCheckTime(settings), () => operations.reconcileNow());

  if (settings.reportEnabled) {
    scheduler.schedule(REPORT_JOB, resolveReportTime(settings), () => operations.sendReportNow());
  } else {
    scheduler.cancel(REPORT_JOB);
  }
}
