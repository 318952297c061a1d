import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MailboxScanner, searchDateFor } from './scanner.js';
import { FakeMailboxTransport, rawEmail } from './test-fakes.js';
import type { CheckWindow } from './types.js';

const window: CheckWindow = {
  start: new Date('2024-03-14T16:00:00.000Z'),
  end: new Date('2024-03-15T08:00:00.000Z'),
};

describe('MailboxScanner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should keep in-window messages newest first and note skipped ones', async () => {
    const transport = new FakeMailboxTransport([
      { uid: 3, source: null },
      { uid: 1, source: rawEmail('Alpha FAIL', 'Thu, 14 Mar 2024 20:00:00 +0000') },
      { uid: 5, source: rawEmail('Alpha OK', 'Fri, 15 Mar 2024 02:00:00 +0000') },
      { uid: 2, source: rawEmail('Alpha OK', 'Thu, 14 Mar 2024 10:00:00 +0000') },
      { uid: 4, source: rawEmail('Alpha OK') },
    ]);
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC' });

    const result = await scanner.scan(window);

    expect(result).toEqual({
      ok: true,
      messages: [
        { uid: 5, subject: 'Alpha OK', receivedAt: new Date('2024-03-15T02:00:00.000Z') },
        { uid: 1, subject: 'Alpha FAIL', receivedAt: new Date('2024-03-14T20:00:00.000Z') },
      ],
      notes: ['Message skipped: unreadable date.', 'Unable to fetch message.'],
    });
    expect(transport.fetched).toEqual([5, 4, 3, 2, 1]);
    expect(transport.searchedSince).toEqual([new Date('2024-03-14T12:00:00.000Z')]);
    expect(transport.closeCalls).toBe(1);
  });

  it('should isolate a failing fetch while the connection stays up', async () => {
    const transport = new FakeMailboxTransport([
      { uid: 2, source: new Error('Message body unavailable') },
      { uid: 1, source: rawEmail('Alpha OK', 'Fri, 15 Mar 2024 02:00:00 +0000') },
    ]);
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC' });

    const result = await scanner.scan(window);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.messages.map(m => m.uid)).toEqual([1]);
      expect(result.notes).toEqual(['Unable to fetch message.']);
    }
  });

  it('should abort when the connection drops during a fetch', async () => {
    const transport = new FakeMailboxTransport(
      [
        { uid: 2, source: new Error('Socket closed') },
        { uid: 1, source: rawEmail('Alpha OK', 'Fri, 15 Mar 2024 02:00:00 +0000') },
      ],
      { dropOnFetchError: true }
    );
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC' });

    const result = await scanner.scan(window);

    expect(result).toEqual({ ok: false, reason: 'Could not reach the server (Socket closed)' });
    expect(transport.fetched).toEqual([2]);
    expect(transport.closeCalls).toBe(1);
  });

  it('should report an authentication failure as a failed scan', async () => {
    const transport = new FakeMailboxTransport([], {
      openError: new Error('Authentication failed: Invalid credentials'),
    });
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC' });

    const result = await scanner.scan(window);

    expect(result).toEqual({
      ok: false,
      reason: 'Authentication failed, check the username and password (Authentication failed: Invalid credentials)',
    });
    expect(transport.searchedSince).toEqual([]);
    expect(transport.closeCalls).toBe(1);
  });

  it('should give up after the operation timeout', async () => {
    const transport = new FakeMailboxTransport([], { hangOnSearch: true });
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC', operationTimeout: 50 });

    const result = await scanner.scan(window);

    expect(result).toEqual({
      ok: false,
      reason: 'The server did not respond in time (Mailbox scan timed out after 50ms)',
    });
    expect(transport.closeCalls).toBe(1);
  });

  it('should succeed with no messages on an empty mailbox', async () => {
    const transport = new FakeMailboxTransport([]);
    const scanner = new MailboxScanner(() => transport, { timeZone: 'UTC' });

    expect(await scanner.scan(window)).toEqual({ ok: true, messages: [], notes: [] });
  });
});

describe('searchDateFor', () => {
  it('should use noon UTC of the first calendar day in the zone', () => {
    const parisWindow: CheckWindow = {
      start: new Date('2024-03-14T23:30:00.000Z'),
      end: new Date('2024-03-15T08:00:00.000Z'),
    };
    expect(searchDateFor(parisWindow, 'Europe/Paris').toISOString()).toBe('2024-03-15T12:00:00.000Z');
    expect(searchDateFor(parisWindow, 'UTC').toISOString()).toBe('2024-03-14T12:00:00.000Z');
  });
});
