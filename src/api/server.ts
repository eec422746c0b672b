/**
 * Knockout Tracker API Server
 *
 * Architecture:
 * - REST API to trigger imports and read tournament results
 * - WebSocket feed of import progress (files, knockouts)
 * - ResultsLedger for persisted per-tournament results
 * - Operator key guards the endpoints that touch the disk or the ledger
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { type AppConfig } from '../config.js';
import { NoInputError } from '../import/discovery.js';
import { type KnockoutSession, type SessionEvents } from '../import/session.js';
import { type ResultsLedger } from '../ledger/results-ledger.js';
import { RATE_LIMITS, rateLimit } from './ratelimit.js';

export interface ApiDeps {
  readonly config: AppConfig;
  readonly session: KnockoutSession;
  readonly ledger: ResultsLedger;
}

export interface ApiServer {
  readonly app: Express;
  readonly server: Server;
  readonly wss: WebSocketServer;
  close(): Promise<void>;
}

/** bigint -> string for every JSON payload */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/** Validate the optional `paths` of an import request */
export function parseImportBody(body: unknown): { paths: string[] | null } | { error: string } {
  if (body === undefined || body === null) return { paths: null };
  if (typeof body !== 'object') return { error: 'Body must be a JSON object' };

  const paths: unknown = Reflect.get(body, 'paths');
  if (paths === undefined) return { paths: null };
  if (!Array.isArray(paths)) {
    return { error: 'paths must be an array of non-empty strings' };
  }
  const valid = paths.filter((p): p is string => typeof p === 'string' && p.trim() !== '');
  if (valid.length !== paths.length) {
    return { error: 'paths must be an array of non-empty strings' };
  }
  return { paths: valid.map(p => p.trim()) };
}

export function createApiServer({ config, session, ledger }: ApiDeps): ApiServer {
  const app = express();
  const server = createServer(app);
  const wss = new WebSocketServer({ server });

  app.set('json replacer', jsonReplacer);
  app.use(express.json());

  const importRateLimit = rateLimit(RATE_LIMITS.import);
  const queryRateLimit = rateLimit(RATE_LIMITS.query);
  const pruneTimer = setInterval(() => {
    importRateLimit.prune();
    queryRateLimit.prune();
  }, 60_000);
  pruneTimer.unref();

  // --- WebSocket clients ---
  const wsClients: Set<WebSocket> = new Set();

  wss.on('connection', (ws: WebSocket) => {
    wsClients.add(ws);
    ws.on('close', () => wsClients.delete(ws));
    ws.send(JSON.stringify({ event: 'connected', data: ledger.getStats(), ts: Date.now() }, jsonReplacer));
  });

  function broadcast(event: string, data: unknown): void {
    const msg = JSON.stringify({ event, data, ts: Date.now() }, jsonReplacer);
    for (const client of wsClients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  }

  // --- Wire session events to WS ---
  const onProcessed = (d: SessionEvents['file_processed']): void => broadcast('file_processed', d);
  const onSkipped = (d: SessionEvents['file_skipped']): void => broadcast('file_skipped', d);
  const onKnockout = (d: SessionEvents['knockout']): void => broadcast('knockout', d);
  const onComplete = (d: SessionEvents['import_complete']): void => broadcast('import_complete', {
    imported: d.imported,
    skipped: d.skipped,
    knockouts: d.knockouts,
  });

  session.on('file_processed', onProcessed);
  session.on('file_skipped', onSkipped);
  session.on('knockout', onKnockout);
  session.on('import_complete', onComplete);

  // --- Middleware ---
  app.use((req: Request, _res: Response, next: NextFunction) => {
    if (req.path !== '/api/health') {
      console.log(`[api] ${new Date().toISOString()} ${req.method} ${req.path}`);
    }
    next();
  });

  function requireOperator(req: Request, res: Response, next: NextFunction): void {
    if (!config.operatorKey) {
      res.status(403).json({ error: 'Operator endpoints disabled, set OPERATOR_KEY' });
      return;
    }
    if (req.get('x-operator-key') !== config.operatorKey) {
      res.status(403).json({ error: 'Unauthorized: operator key required' });
      return;
    }
    next();
  }

  // ===========================
  // PUBLIC ENDPOINTS
  // ===========================

  /** GET /api/health */
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      hero: config.heroName,
      minBigBlind: config.minBigBlind,
      finalTableSize: config.finalTableSize,
    });
  });

  /** GET /api/stats: aggregate knockout statistics */
  app.get('/api/stats', queryRateLimit, (_req: Request, res: Response) => {
    res.json(ledger.getStats());
  });

  /** GET /api/tournaments */
  app.get('/api/tournaments', queryRateLimit, (_req: Request, res: Response) => {
    res.json({ tournaments: ledger.list() });
  });

  /** GET /api/tournaments/:id */
  app.get('/api/tournaments/:id', queryRateLimit, (req: Request, res: Response) => {
    const record = ledger.get(req.params.id ?? '');
    if (!record) {
      res.status(404).json({ error: 'Tournament not found' });
      return;
    }
    res.json(record);
  });

  // ===========================
  // OPERATOR ENDPOINTS
  // ===========================

  let importing = false;

  /** POST /api/import { paths?: string[] } */
  app.post('/api/import', importRateLimit, requireOperator, async (req: Request, res: Response) => {
    const parsed = parseImportBody(req.body);
    if ('error' in parsed) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    if (importing) {
      res.status(409).json({ error: 'An import is already running' });
      return;
    }

    importing = true;
    try {
      const summary = await session.importPaths(parsed.paths ?? config.inputPaths);
      res.json(summary);
    } catch (err) {
      if (err instanceof NoInputError) {
        res.status(404).json({ error: err.message });
      } else {
        console.error('[api] Import failed:', err);
        res.status(500).json({ error: 'Import failed' });
      }
    } finally {
      importing = false;
    }
  });

  /** DELETE /api/tournaments: wipe the ledger */
  app.delete('/api/tournaments', requireOperator, (_req: Request, res: Response) => {
    const removed = ledger.clear();
    broadcast('ledger_cleared', { removed });
    res.json({ removed });
  });

  async function close(): Promise<void> {
    clearInterval(pruneTimer);
    session.off('file_processed', onProcessed);
    session.off('file_skipped', onSkipped);
    session.off('knockout', onKnockout);
    session.off('import_complete', onComplete);
    for (const client of wsClients) client.terminate();

    await new Promise<void>((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
    }
  }

  return { app, server, wss, close };
}

export function startServer(api: ApiServer, config: AppConfig): void {
  api.server.listen(config.port, () => {
    console.log(`
\x1b[32m♠♥ Knockout Tracker ♦♣\x1b[0m
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

  Server:     http://localhost:${config.port}
  WebSocket:  ws://localhost:${config.port}

  Hero:       ${config.heroName}
  Min BB:     ${config.minBigBlind}
  Inputs:     ${config.inputPaths.join(', ') || '(none)'}

  API:
  ─────────────────────────────────────────────────
  GET    /api/health            Status
  GET    /api/stats             Knockout statistics
  GET    /api/tournaments       All tournaments
  GET    /api/tournaments/:id   One tournament
  POST   /api/import            Import { paths? }   (operator)
  DELETE /api/tournaments       Clear results       (operator)

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
    `);
  });
}
