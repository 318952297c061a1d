import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { enableFileLogging, formatLogMessage } from './logging.js';

describe('formatLogMessage', () => {
  it('should write one line with time and level', () => {
    const line = formatLogMessage(
      'INFO',
      ['[Scanner] done', { found: 2 }, new Error('bad date'), null],
      new Date('2024-03-15T08:00:00.000Z')
    );
    expect(line).toBe('[2024-03-15T08:00:00.000Z] [INFO] [Scanner] done {"found":2} bad date null\n');
  });
});

describe('enableFileLogging', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('should tee console output into the file until restored', async () => {
    dir = mkdtempSync(join(tmpdir(), 'monitor-log-'));
    const logFile = join(dir, 'nested', 'monitor.log');
    const originalLog = console.log;

    const restore = enableFileLogging(logFile);
    console.warn('[Test] careful');
    console.error('[Test] broken');
    await restore();
    console.log('[Test] not captured');

    expect(console.log).toBe(originalLog);
    const lines = readFileSync(logFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\S+\] \[INFO\] \[Logging\] Logging to file: .*monitor\.log$/);
    expect(lines[1]).toMatch(/^\[\S+\] \[WARN\] \[Test\] careful$/);
    expect(lines[2]).toMatch(/^\[\S+\] \[ERROR\] \[Test\] broken$/);
  });
});
