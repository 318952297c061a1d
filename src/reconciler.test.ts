import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReconciliationService } from './reconciler.js';
import { MonitorStore } from './storage.js';
import { FakeMailboxTransport, rawEmail, type FakeMessage } from './test-fakes.js';
import type { MailboxSettings, MonitoredClient } from './types.js';

const NOW = new Date('2024-03-15T08:00:00.000Z');

function byName(clients: MonitoredClient[], name: string): MonitoredClient {
  const client = clients.find(candidate => candidate.name === name);
  if (!client) {
    throw new Error(`No client named ${name}`);
  }
  return client;
}

describe('ReconciliationService', () => {
  let store: MonitorStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new MonitorStore(':memory:');
    store.createClient({ name: 'Alpha', subjectOk: 'Alpha OK', subjectWarning: 'Alpha WARN', subjectFailed: 'Alpha FAIL' });
    store.createClient({ name: 'Beta', subjectOk: 'Beta OK', subjectWarning: '', subjectFailed: '' });
  });

  afterEach(() => {
    store.close();
  });

  function configureMailbox(): void {
    store.updateSettings({
      imapHost: 'imap.example.com',
      imapUsername: 'monitor@example.com',
      imapPassword: 'test-secret',
    });
  }

  function createService(messages: FakeMessage[], openError?: Error) {
    const transports: FakeMailboxTransport[] = [];
    const createTransport = vi.fn((settings: MailboxSettings) => {
      expect(settings.imapHost).toBe('imap.example.com');
      const transport = new FakeMailboxTransport(messages, { openError });
      transports.push(transport);
      return transport;
    });
    const service = new ReconciliationService({
      repository: store,
      createTransport,
      timeZone: 'UTC',
      clock: () => NOW,
    });
    return { service, createTransport, transports };
  }

  it('should mark every client missing without connecting when IMAP is not configured', async () => {
    const { service, createTransport } = createService([]);

    const result = await service.reconcileNow();

    expect(result).toEqual({ success: false, message: 'Incomplete IMAP configuration.' });
    expect(createTransport).not.toHaveBeenCalled();
    for (const client of store.listClients()) {
      expect(client.lastStatus).toBe('MISSING');
      expect(client.lastNote).toBe('Incomplete IMAP configuration.');
      expect(client.lastCheckedAt).toBe('2024-03-15T08:00:00.000Z');
    }
  });

  it('should record the transport error on every client when the scan fails', async () => {
    configureMailbox();
    const { service } = createService([], new Error('Authentication failed: Invalid credentials'));

    const result = await service.reconcileNow();

    const note = 'IMAP error: Authentication failed, check the username and password (Authentication failed: Invalid credentials)';
    expect(result).toEqual({ success: false, message: note });
    for (const client of store.listClients()) {
      expect(client.lastStatus).toBe('MISSING');
      expect(client.lastNote).toBe(note);
      expect(client.lastEmailCount).toBe(0);
    }
  });

  it('should write one outcome per client from the scanned messages', async () => {
    configureMailbox();
    const { service, transports } = createService([
      { uid: 1, source: rawEmail('Unrelated newsletter', 'Thu, 14 Mar 2024 20:00:00 +0000') },
      { uid: 2, source: rawEmail('Alpha OK nightly', 'Thu, 14 Mar 2024 22:00:00 +0000') },
      { uid: 3, source: rawEmail('Alpha FAIL nightly', 'Fri, 15 Mar 2024 01:00:00 +0000') },
    ]);

    const result = await service.reconcileNow();

    expect(result).toEqual({ success: true, message: 'Check completed for 2 client(s).' });
    expect(transports).toHaveLength(1);
    expect(transports[0].closeCalls).toBe(1);

    const clients = store.listClients();
    expect(byName(clients, 'Alpha')).toMatchObject({
      lastStatus: 'FAILED',
      lastSubject: 'Alpha FAIL nightly',
      lastStatuses: 'FAILED, OK',
      lastEmailCount: 2,
      lastNote: null,
      lastCheckedAt: '2024-03-15T08:00:00.000Z',
    });
    expect(byName(clients, 'Beta')).toMatchObject({
      lastStatus: 'MISSING',
      lastSubject: null,
      lastStatuses: null,
      lastEmailCount: 0,
      lastNote: 'No message received between 2024-03-14 16:00 and 2024-03-15 08:00 matches the expected subjects.',
    });
  });

  it('should hand the first scan note to clients without a match', async () => {
    configureMailbox();
    const { service } = createService([
      { uid: 2, source: rawEmail('Beta OK') },
      { uid: 1, source: rawEmail('Alpha OK', 'Fri, 15 Mar 2024 01:00:00 +0000') },
    ]);

    await service.reconcileNow();

    const clients = store.listClients();
    expect(byName(clients, 'Alpha').lastStatus).toBe('OK');
    expect(byName(clients, 'Alpha').lastNote).toBeNull();
    expect(byName(clients, 'Beta').lastStatus).toBe('MISSING');
    expect(byName(clients, 'Beta').lastNote).toBe('Message skipped: unreadable date.');
  });

  it('should give the same state when run twice against the same mailbox', async () => {
    configureMailbox();
    const { service } = createService([
      { uid: 1, source: rawEmail('Alpha WARN: slow', 'Fri, 15 Mar 2024 01:00:00 +0000') },
      { uid: 2, source: rawEmail('Beta OK', 'Fri, 15 Mar 2024 03:00:00 +0000') },
    ]);

    await service.reconcileNow();
    const first = store.listClients();
    await service.reconcileNow();
    const second = store.listClients();

    expect(second).toEqual(first);
    expect(byName(second, 'Alpha').lastStatus).toBe('WARNING');
    expect(byName(second, 'Beta').lastStatus).toBe('OK');
  });

  it('should overwrite the outcome of a previous run', async () => {
    configureMailbox();
    await createService([
      { uid: 1, source: rawEmail('Alpha OK', 'Fri, 15 Mar 2024 01:00:00 +0000') },
    ]).service.reconcileNow();
    expect(byName(store.listClients(), 'Alpha').lastStatus).toBe('OK');

    await createService([]).service.reconcileNow();

    const alpha = byName(store.listClients(), 'Alpha');
    expect(alpha.lastStatus).toBe('MISSING');
    expect(alpha.lastSubject).toBeNull();
    expect(alpha.lastEmailCount).toBe(0);
  });

  it('should not throw when the repository fails', async () => {
    const service = new ReconciliationService({
      repository: {
        listClients: () => {
          throw new Error('database is locked');
        },
        getSettings: () => store.getSettings(),
        saveOutcomes: () => undefined,
      },
      createTransport: () => new FakeMailboxTransport([]),
      timeZone: 'UTC',
      clock: () => NOW,
    });

    expect(await service.reconcileNow()).toEqual({
      success: false,
      message: 'Check failed: Unexpected error (database is locked)',
    });
  });
});
