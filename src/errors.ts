// Error handling utilities for mailbox scans
import type { ProcessingError } from './types.js';

/**
 * Note recorded on a client when a message of the given stage had to be skipped
 */
export const STAGE_NOTES: Record<ProcessingError['stage'], string> = {
  fetch: 'Unable to fetch message.',
  parse: 'Unable to decode message.',
  date: 'Message skipped: unreadable date.',
};

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * ScanDiagnostics collects per-message problems met during a scan.
 * A failing message never aborts the scan; it only leaves a note behind.
 */
export class ScanDiagnostics {
  private _errors: ProcessingError[] = [];

  /**
   * Add a processing error to the collection.
   */
  add(error: ProcessingError): void {
    this._errors.push(error);
  }

  /**
   * Create and add an error from components.
   */
  addError(
    emailUid: number,
    stage: ProcessingError['stage'],
    error: Error
  ): void {
    this.add({
      emailUid,
      stage,
      error,
      timestamp: new Date(),
    });
  }

  /**
   * Get all collected errors.
   */
  get errors(): ProcessingError[] {
    return [...this._errors];
  }

  /**
   * Get the count of errors.
   */
  get count(): number {
    return this._errors.length;
  }

  hasErrors(): boolean {
    return this._errors.length > 0;
  }

  /**
   * Get errors for a specific stage.
   */
  getByStage(stage: ProcessingError['stage']): ProcessingError[] {
    return this._errors.filter(e => e.stage === stage);
  }

  /**
   * Distinct notes in the order their first error occurred.
   */
  notes(): string[] {
    const seen = new Set<string>();
    for (const error of this._errors) {
      seen.add(STAGE_NOTES[error.stage]);
    }
    return [...seen];
  }

  /**
   * Format errors as a human-readable string.
   */
  formatSummary(): string {
    if (this._errors.length === 0) {
      return 'No message errors.';
    }

    const byStage: Record<string, number> = {};
    for (const error of this._errors) {
      byStage[error.stage] = (byStage[error.stage] || 0) + 1;
    }

    const lines = [`Message errors: ${this._errors.length}`];
    for (const [stage, count] of Object.entries(byStage)) {
      lines.push(`  - ${stage}: ${count}`);
    }
    return lines.join('\n');
  }
}
