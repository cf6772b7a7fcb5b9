import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EngineStatus } from '../../core/engine.js';
import type { CommandOutcome } from '../../core/types.js';
import { closeDb, sqliteJournal } from '../../data/storage.js';
import { boundPort, startDashboard, stopDashboard, type OpsEngine } from '../server.js';

const TOKEN = 'test-secret';

const status: EngineStatus = {
  running: true,
  uptimeMs: 1000,
  broker: 'paper',
  strategy: 'adaptive',
  processed: { commands: 1, rejected: 2, suppressed: 0, executed: 1, error: 0 },
  positions: [],
  orders: [],
};

function outcome(command: CommandOutcome['command'], failed = 0): CommandOutcome {
  return { command, touched: 1, skipped: 0, failed, details: [] };
}

function fakeEngine(): OpsEngine {
  return {
    getStatus: vi.fn(async () => status),
    isRunning: vi.fn(() => true),
    breakEven: vi.fn(async () => outcome('break_even')),
    closeAll: vi.fn(async () => [outcome('full_close'), outcome('tp_hit', 1)]),
    cancelOrders: vi.fn(async () => outcome('tp_hit')),
  };
}

let engine: OpsEngine;
let server: Server;
let baseUrl: string;

function call(path: string, init: RequestInit = {}, token: string | null = TOKEN): Promise<Response> {
  const headers: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};
  return fetch(`${baseUrl}${path}`, { ...init, headers });
}

beforeEach(async () => {
  engine = fakeEngine();
  server = await startDashboard(0, engine, { token: TOKEN });
  baseUrl = `http://127.0.0.1:${boundPort(server, 0)}`;
});

afterEach(async () => {
  await stopDashboard(server);
  closeDb();
});

describe('ops server', () => {
  it('answers liveness without a token', async () => {
    const res = await call('/alive', {}, null);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ alive: true });
  });

  it('rejects requests without the bearer token', async () => {
    const res = await call('/status', {}, null);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Unauthorized. Set Authorization: Bearer <token>' });
  });

  it('rejects a wrong token', async () => {
    const res = await call('/status', {}, 'not-the-token');
    expect(res.status).toBe(401);
  });

  it('reports health from the engine status', async () => {
    const res = await call('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'healthy',
      running: true,
      broker: 'paper',
      strategy: 'adaptive',
      openPositions: 0,
      pendingOrders: 0,
      processed: { commands: 1, rejected: 2, suppressed: 0, executed: 1, error: 0 },
    });
  });

  it('reports 503 when the engine is stopped', async () => {
    vi.mocked(engine.isRunning).mockReturnValue(false);

    const res = await call('/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'stopped', running: false });
  });

  it('reports a degraded status when the broker cannot be reached', async () => {
    vi.mocked(engine.getStatus).mockRejectedValueOnce(new Error('timeout'));

    const res = await call('/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: 'degraded', running: true, error: 'Broker unavailable' });
  });

  it('runs break-even on demand', async () => {
    const res = await call('/actions/break-even', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, outcomes: [outcome('break_even')] });
    expect(engine.breakEven).toHaveBeenCalledTimes(1);
  });

  it('reports close-all as unsuccessful when any step failed', async () => {
    const res = await call('/actions/close-all', { method: 'POST' });

    expect(await res.json()).toEqual({
      success: false,
      outcomes: [outcome('full_close'), outcome('tp_hit', 1)],
    });
  });

  it('distinguishes a wrong method from an unknown path', async () => {
    expect((await call('/actions/cancel-orders')).status).toBe(405);
    expect((await call('/nowhere')).status).toBe(404);
  });

  it('returns 500 when an action throws', async () => {
    vi.mocked(engine.cancelOrders).mockRejectedValueOnce(new Error('broker gone'));

    const res = await call('/actions/cancel-orders', { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal error' });
  });

  it('serves journal counts and recent signals', async () => {
    sqliteJournal.recordMessage('hello there everyone', 'rejected', 'no direction');

    const res = await call('/journal?limit=5');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      messages: { command: 0, signal: 0, suppressed: 0, rejected: 1, error: 0 },
      signals: [],
    });
  });
});
