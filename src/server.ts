import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { StorageError, ValidationError, validateClientInput, validateSettingsInput } from './storage.js';
import { toPublicSettings } from './settings.js';
import type { MonitorEngine } from './engine.js';

export const APP_VERSION = '1.0.0';

function parseClientId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id < 1) {
    throw new ValidationError(`Invalid client id: ${raw}`, 'id');
  }
  return id;
}

/**
 * Map a thrown error onto a JSON response
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, field: error.field });
    return;
  }
  if (error instanceof StorageError && error.code === 'NOT_FOUND') {
    res.status(404).json({ error: 'Client not found' });
    return;
  }
  console.error(`[${context}] Error:`, error instanceof Error ? error.message : String(error));
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Build the JSON API over an engine. Listening is left to the caller.
 */
export function createApp(engine: MonitorEngine): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // ============================================
  // Health Check
  // ============================================

  // GET /health - Health check endpoint for Docker
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: APP_VERSION,
      jobs: engine.scheduler.listJobs().map(job => ({ id: job.id, nextRun: job.nextRun.toISOString() })),
    });
  });

  // ============================================
  // Client API Endpoints
  // ============================================

  // GET /api/clients - List monitored clients ordered by name
  app.get('/api/clients', (req: Request, res: Response) => {
    try {
      res.json({ clients: engine.store.listClients() });
    } catch (error) {
      sendError(res, error, 'Clients');
    }
  });

  // POST /api/clients - Create a client
  app.post('/api/clients', (req: Request, res: Response) => {
    try {
      const input = validateClientInput(req.body);
      const client = engine.store.createClient(input);
      console.log(`[Clients] Created client ${client.id} (${client.name})`);
      res.status(201).json({ client });
    } catch (error) {
      sendError(res, error, 'Clients');
    }
  });

  // GET /api/clients/:id - Get one client
  app.get('/api/clients/:id', (req: Request, res: Response) => {
    try {
      res.json({ client: engine.store.getClient(parseClientId(req.params.id)) });
    } catch (error) {
      sendError(res, error, 'Clients');
    }
  });

  // PUT /api/clients/:id - Replace a client's name and expected subjects
  app.put('/api/clients/:id', (req: Request, res: Response) => {
    try {
      const id = parseClientId(req.params.id);
      const client = engine.store.updateClient(id, validateClientInput(req.body));
      res.json({ client });
    } catch (error) {
      sendError(res, error, 'Clients');
    }
  });

  // DELETE /api/clients/:id - Remove a client
  app.delete('/api/clients/:id', (req: Request, res: Response) => {
    try {
      engine.store.deleteClient(parseClientId(req.params.id));
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Clients');
    }
  });

  // ============================================
  // Settings API Endpoints
  // ============================================

  // GET /api/settings - Settings without passwords
  app.get('/api/settings', (req: Request, res: Response) => {
    try {
      res.json({ settings: toPublicSettings(engine.store.getSettings()) });
    } catch (error) {
      sendError(res, error, 'Settings');
    }
  });

  // PUT /api/settings - Partial update, then re-arm the daily jobs
  app.put('/api/settings', (req: Request, res: Response) => {
    try {
      const update = validateSettingsInput(req.body);
      const settings = engine.store.updateSettings(update);
      engine.applySchedules();
      res.json({ settings: toPublicSettings(settings) });
    } catch (error) {
      sendError(res, error, 'Settings');
    }
  });

  // POST /api/settings/test-imap - Try the stored mailbox settings
  app.post('/api/settings/test-imap', async (req: Request, res: Response) => {
    try {
      res.json(await engine.testMailbox());
    } catch (error) {
      sendError(res, error, 'Settings');
    }
  });

  // ============================================
  // Operations
  // ============================================

  // POST /api/run-check - Reconcile now
  app.post('/api/run-check', async (req: Request, res: Response) => {
    try {
      res.json(await engine.reconcileNow());
    } catch (error) {
      sendError(res, error, 'Check');
    }
  });

  // POST /api/send-report - Send the report now
  app.post('/api/send-report', async (req: Request, res: Response) => {
    try {
      res.json(await engine.sendReportNow());
    } catch (error) {
      sendError(res, error, 'Report');
    }
  });

  // GET /api/report - Preview of the report as it would be sent
  app.get('/api/report', (req: Request, res: Response) => {
    try {
      res.json(engine.previewReport());
    } catch (error) {
      sendError(res, error, 'Report');
    }
  });

  // Malformed JSON bodies
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    next(err);
  });

  return app;
}

/**
 * Listen on `port`, resolving once the server accepts connections
 */
export function startServer(engine: MonitorEngine, port: number): Promise<Server> {
  const app = createApp(engine);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`[Server] Backup Mail Monitor running at http://localhost:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
