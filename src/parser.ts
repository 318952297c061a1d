// Email Parser - Decodes raw notification emails into subject and receipt time
import { simpleParser, type ParsedMail } from 'mailparser';
import { fromZonedTime } from 'date-fns-tz';

/**
 * A notification email reduced to what the classifier needs
 */
export interface DecodedMessage {
  uid: number;
  /** Subject decoded to a Unicode string */
  subject: string;
  /** Receipt time, null when the Date header is missing or unreadable */
  date: Date | null;
}

// Trailing numeric offset, "Z", or a named zone that Date understands
const ZONE_SUFFIX = /(?:[+-]\d{2}:?\d{2}|Z|\s(?:UT|UTC|GMT|[ECMP][SD]T))$/i;

/**
 * Parse a Date header value.
 *
 * Dates carrying a zone are taken as-is. Dates without one are read as
 * wall-clock time in `timeZone`.
 *
 * @returns the instant, or null when the value cannot be read
 */
export function parseHeaderDate(value: string, timeZone: string): Date | null {
  // Drop RFC 5322 comments such as "(UTC)" and fold whitespace
  const cleaned = value.replace(/\([^)]*\)/g, ' ').replace(/\s+/g, ' ').trim();
  if (!cleaned) {
    return null;
  }

  if (ZONE_SUFFIX.test(cleaned)) {
    const zoned = new Date(cleaned);
    return isNaN(zoned.getTime()) ? null : zoned;
  }

  // Read the wall clock as if it were UTC, then reinterpret it in the zone
  const wallClock = new Date(`${cleaned} GMT`);
  if (isNaN(wallClock.getTime())) {
    return null;
  }
  return fromZonedTime(wallClock.toISOString().slice(0, 19), timeZone);
}

/**
 * EmailParser handles parsing of raw email content using mailparser.
 * mailparser decodes RFC 2047 encoded subjects with the declared charset and
 * drops bytes it cannot decode.
 */
export class EmailParser {
  constructor(private readonly timeZone: string) {}

  /**
   * Parse raw email buffer into a DecodedMessage.
   *
   * @param raw - Raw email content as Buffer
   * @param uid - Unique identifier for the email
   */
  async parse(raw: Buffer, uid: number = 0): Promise<DecodedMessage> {
    const parsed: ParsedMail = await simpleParser(raw);

    const subject = parsed.subject || '';
    const dateHeader = this.extractDateHeader(parsed);
    const date = dateHeader === null ? null : parseHeaderDate(dateHeader, this.timeZone);

    return {
      uid,
      subject,
      date,
    };
  }

  /**
   * Raw Date header value. mailparser's own parsed date would read zone-less
   * values in the process time zone, so the raw line is used instead.
   */
  private extractDateHeader(parsed: ParsedMail): string | null {
    const line = parsed.headerLines.find(header => header.key === 'date');
    if (!line) {
      return null;
    }
    const separator = line.line.indexOf(':');
    if (separator === -1) {
      return null;
    }
    return line.line.slice(separator + 1).replace(/\r?\n[ \t]+/g, ' ').trim();
  }
}
