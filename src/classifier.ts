// Message classifier - maps a subject to the severity it announces for a client
import { SEVERITY_PRIORITY, type Severity, type SubjectExpectations } from './types.js';

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Expected prefix for a severity.
 */
export function expectedPrefix(expectations: SubjectExpectations, severity: Severity): string {
  switch (severity) {
    case 'FAILED':
      return expectations.subjectFailed;
    case 'WARNING':
      return expectations.subjectWarning;
    case 'OK':
      return expectations.subjectOk;
  }
}

/**
 * Classify a subject against a client's expected prefixes.
 *
 * Prefixes are tested in FAILED, WARNING, OK order and the first one the
 * normalized subject starts with wins, so a subject matching both a warning
 * prefix and a longer ok prefix is reported as WARNING. Empty prefixes never
 * match.
 *
 * @returns the severity, or null when the message is not about this client
 */
export function classifySubject(subject: string, expectations: SubjectExpectations): Severity | null {
  const normalizedSubject = normalize(subject);

  for (const severity of SEVERITY_PRIORITY) {
    const prefix = normalize(expectedPrefix(expectations, severity));
    if (prefix.length > 0 && normalizedSubject.startsWith(prefix)) {
      return severity;
    }
  }

  return null;
}

/**
 * Whether a client has at least one non-empty prefix
 */
export function hasExpectations(expectations: SubjectExpectations): boolean {
  return SEVERITY_PRIORITY.some(severity => normalize(expectedPrefix(expectations, severity)).length > 0);
}
