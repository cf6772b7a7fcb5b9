import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { SignalBridgeEngine } from '../core/engine.js';
import { getMessageCounts, getRecentSignals } from '../data/storage.js';
import { createChildLogger } from '../monitoring/logger.js';

const log = createChildLogger('dashboard');

export type OpsEngine = Pick<SignalBridgeEngine, 'getStatus' | 'isRunning' | 'breakEven' | 'closeAll' | 'cancelOrders'>;

export interface OpsServerOptions {
  /** Bearer token required on every route except /alive; unset means open */
  token?: string;
}

type Handler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

function buildRoutes(engine: OpsEngine): Record<string, Handler> {
  return {
    'GET /alive': async (_req, res) => {
      json(res, { alive: true, timestamp: new Date().toISOString() });
    },

    'GET /health': async (_req, res) => {
      const running = engine.isRunning();
      try {
        const status = await engine.getStatus();
        json(res, {
          status: running ? 'healthy' : 'stopped',
          running,
          broker: status.broker,
          strategy: status.strategy,
          uptimeMs: status.uptimeMs,
          openPositions: status.positions.length,
          pendingOrders: status.orders.length,
          processed: status.processed,
          timestamp: new Date().toISOString(),
        }, running ? 200 : 503);
      } catch (err) {
        log.warn({ err }, 'Health check could not reach broker');
        json(res, { status: 'degraded', running, error: 'Broker unavailable' }, 503);
      }
    },

    'GET /status': async (_req, res) => {
      json(res, await engine.getStatus());
    },

    'GET /journal': async (req, res) => {
      const url = new URL(req.url ?? '/', 'http://localhost');
      const limit = Math.min(Math.max(parseInt(url.searchParams.get('limit') ?? '20', 10) || 20, 1), 200);
      json(res, { messages: getMessageCounts(), signals: getRecentSignals(limit) });
    },

    'POST /actions/break-even': async (_req, res) => {
      log.info('Break-even requested via ops endpoint');
      const outcome = await engine.breakEven();
      json(res, { success: outcome.failed === 0, outcomes: [outcome] });
    },

    'POST /actions/close-all': async (_req, res) => {
      log.info('Close-all requested via ops endpoint');
      const outcomes = await engine.closeAll();
      json(res, { success: outcomes.every((o) => o.failed === 0), outcomes });
    },

    'POST /actions/cancel-orders': async (_req, res) => {
      log.info('Cancel-orders requested via ops endpoint');
      const outcome = await engine.cancelOrders();
      json(res, { success: outcome.failed === 0, outcomes: [outcome] });
    },
  };
}

function checkAuth(req: IncomingMessage, res: ServerResponse, pathname: string, token?: string): boolean {
  if (!token || pathname === '/alive') return true;

  const headerKey = req.headers.authorization?.replace(/^Bearer\s+/i, '');
  if (headerKey === token) return true;

  json(res, { error: 'Unauthorized. Set Authorization: Bearer <token>' }, 401);
  return false;
}

export function createOpsServer(engine: OpsEngine, options: OpsServerOptions = {}): Server {
  const routes = buildRoutes(engine);

  return createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`).pathname;

    // CORS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST',
        'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      });
      res.end();
      return;
    }

    if (!checkAuth(req, res, pathname, options.token)) return;

    const handler = routes[`${req.method ?? 'GET'} ${pathname}`];
    if (!handler) {
      const known = Object.keys(routes).some((key) => key.endsWith(` ${pathname}`));
      json(res, { error: known ? 'Method not allowed' : 'Not found' }, known ? 405 : 404);
      return;
    }

    handler(req, res).catch((err: unknown) => {
      log.error({ err, path: pathname }, 'Ops handler error');
      json(res, { error: 'Internal error' }, 500);
    });
  });
}

/** Resolves once listening; port 0 picks a free port (see `boundPort`) */
export function startDashboard(port: number, engine: OpsEngine, options: OpsServerOptions = {}): Promise<Server> {
  const server = createOpsServer(engine, options);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      server.on('error', (err) => {
        log.error({ err }, 'Dashboard server error');
      });
      log.info({ port: boundPort(server, port) }, 'Ops server started');
      resolve(server);
    });
  });
}

export function boundPort(server: Server, fallback: number): number {
  const address = server.address();
  return address !== null && typeof address === 'object' ? address.port : fallback;
}

export function stopDashboard(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
