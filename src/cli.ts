#!/usr/bin/env node
// CLI Interface for Backup Mail Monitor
import 'dotenv/config';
import { Command } from 'commander';
import { loadAppConfig, type AppConfig } from './config.js';
import { enableFileLogging } from './logging.js';
import { MonitorEngine } from './engine.js';
import { startServer, APP_VERSION } from './server.js';

const program = new Command();

program
  .name('backup-mail-monitor')
  .description('Tracks backup notification emails and reports the status of every client')
  .version(APP_VERSION);

interface ServeOptions {
  port?: string;
  log?: string | boolean;
}

interface ReportOptions {
  dryRun?: boolean;
}

/**
 * Load the configuration or exit with a readable message
 */
function loadConfigOrExit(): AppConfig {
  try {
    return loadAppConfig(process.env);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// Check command - one reconciliation run
program
  .command('check')
  .description('Check the mailbox now and record the status of every client')
  .action(async () => {
    await runCheck();
  });

// Report command - send or print the report
program
  .command('report')
  .description('Send the status report to the configured recipients')
  .option('--dry-run', 'Print the report instead of sending it', false)
  .action(async (options: ReportOptions) => {
    await runReport(options);
  });

// Serve command - HTTP API plus daily schedules
program
  .command('serve')
  .description('Start the HTTP API and the daily check and report schedules')
  .option('-p, --port <port>', 'Port to listen on (default: PORT or 3000)')
  .option('--log [file]', 'Also write log output to a file (default: LOG_FILE or logs/monitor.log)')
  .action(async (options: ServeOptions) => {
    await runServe(options);
  });

/**
 * Run the check command
 */
async function runCheck(): Promise<void> {
  const engine = new MonitorEngine(loadConfigOrExit());
  try {
    const result = await engine.reconcileNow();
    console.log(result.message);
    for (const client of engine.store.listClients()) {
      const note = client.lastNote ? ` - ${client.lastNote}` : '';
      console.log(`  ${client.name}: ${client.lastStatus}${note}`);
    }
    process.exitCode = result.success ? 0 : 1;
  } finally {
    engine.close();
  }
}

/**
 * Run the report command
 */
async function runReport(options: ReportOptions): Promise<void> {
  const engine = new MonitorEngine(loadConfigOrExit());
  try {
    if (options.dryRun) {
      const report = engine.previewReport();
      console.log(`Subject: ${report.subject}\n`);
      console.log(report.text);
      return;
    }
    const result = await engine.sendReportNow();
    console.log(result.message);
    process.exitCode = result.success ? 0 : 1;
  } finally {
    engine.close();
  }
}

/**
 * Run the serve command
 */
async function runServe(options: ServeOptions): Promise<void> {
  const config = loadConfigOrExit();

  if (options.log) {
    const logFile = typeof options.log === 'string' ? options.log : config.logFile ?? 'logs/monitor.log';
    enableFileLogging(logFile);
  } else if (config.logFile) {
    enableFileLogging(config.logFile);
  }

  let port = config.port;
  if (options.port) {
    port = parseInt(options.port, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      console.error(`Error: Invalid port "${options.port}".`);
      process.exit(1);
    }
  }

  const engine = new MonitorEngine(config);
  engine.applySchedules();
  const server = await startServer(engine, port);

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    engine.scheduler.shutdown();
    server.close(() => {
      engine.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
