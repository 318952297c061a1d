// Logging - tees console output into a log file
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * One log file line: "[ISO time] [LEVEL] message\n".
 * Objects are written as JSON, errors by their message.
 */
export function formatLogMessage(level: LogLevel, args: unknown[], time: Date = new Date()): string {
  const message = args.map(arg => {
    if (arg instanceof Error) {
      return arg.message;
    }
    return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg);
  }).join(' ');
  return `[${time.toISOString()}] [${level}] ${message}\n`;
}

/**
 * Mirror console.log/warn/error into `logFile`, appending.
 *
 * @returns a function restoring the original console methods, resolving once the file is flushed
 */
export function enableFileLogging(logFile: string): () => Promise<void> {
  const logsDir = dirname(logFile);
  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }

  const logStream: WriteStream = createWriteStream(logFile, { flags: 'a' });

  // Override console methods to also write to file
  const originalConsoleLog = console.log;
  const originalConsoleError = console.error;
  const originalConsoleWarn = console.warn;

  console.log = (...args: unknown[]) => {
    originalConsoleLog.apply(console, args);
    logStream.write(formatLogMessage('INFO', args));
  };

  console.error = (...args: unknown[]) => {
    originalConsoleError.apply(console, args);
    logStream.write(formatLogMessage('ERROR', args));
  };

  console.warn = (...args: unknown[]) => {
    originalConsoleWarn.apply(console, args);
    logStream.write(formatLogMessage('WARN', args));
  };

  console.log(`[Logging] Logging to file: ${logFile}`);

  return () => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    console.warn = originalConsoleWarn;
    return new Promise<void>(resolve => {
      logStream.end(() => resolve());
    });
  };
}
