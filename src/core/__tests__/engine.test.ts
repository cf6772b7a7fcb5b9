import { beforeEach, describe, expect, it, vi } from 'vitest';
import { config, type Config } from '../../config/index.js';
import type { Journal } from '../../data/storage.js';
import { PaperBroker } from '../../exchanges/paper/broker.js';
import type { Notifier } from '../../monitoring/notifier.js';
import { createEngine, type SignalBridgeEngine } from '../engine.js';

const SIGNAL = 'XAUUSD BUY 3990-3985\nSL 3980\nTP 4010';

function fakeJournal(): Journal {
  let nextId = 1;
  return {
    recordMessage: vi.fn(() => nextId++),
    recordSignal: vi.fn(() => nextId++),
    recordExecution: vi.fn(),
    recordCommandOutcomes: vi.fn(),
  };
}

let broker: PaperBroker;
let notifier: Notifier;
let journal: Journal;

function engineWith(overrides: Partial<Config> = {}): SignalBridgeEngine {
  const cfg: Config = {
    ...config,
    entryStrategy: 'midpoint',
    symbolMode: 'fixed',
    tradingSymbol: 'XAUUSD',
    defaultVolume: 0.09,
    tpHitCancelEnabled: false,
    ...overrides,
  };
  return createEngine(broker, notifier, cfg, journal);
}

function sentActions(): unknown[] {
  return vi.mocked(notifier.send).mock.calls.map(([, data]) => data?.action);
}

beforeEach(() => {
  broker = new PaperBroker();
  broker.setQuote('XAUUSD', { bid: 3999, ask: 4000 });
  broker.setSymbolInfo({ symbol: 'XAUUSD', digits: 2 });
  notifier = { send: vi.fn(async () => undefined) };
  journal = fakeJournal();
});

describe('SignalBridgeEngine', () => {
  it('connects the broker and announces start-up', async () => {
    const engine = engineWith();
    await engine.start();

    expect(engine.isRunning()).toBe(true);
    expect(sentActions()).toEqual(['system_status', 'system_status']);
    expect(notifier.send).toHaveBeenLastCalledWith(
      '<b>Signal Bridge STARTED</b>\nBroker: paper\nStrategy: midpoint\nDefault Volume: 0.09',
      { action: 'system_status', status: 'started' },
    );
  });

  it('parses, plans and places a signal', async () => {
    const engine = engineWith();
    await engine.start();

    const outcome = await engine.handleMessage(SIGNAL);

    expect(outcome.kind).toBe('executed');
    if (outcome.kind !== 'executed') return;
    expect(outcome.plan.representativePrice).toBe(3987.5);
    expect(outcome.result.status).toBe('filled');
    expect(outcome.result.legs[0].orderId).toBe('1');

    const [order] = await broker.listOpenOrders();
    expect(order).toMatchObject({ side: 'buy', price: 3987.5, volume: 0.09, stopLoss: 3980, takeProfit: 4010 });

    expect(journal.recordMessage).toHaveBeenCalledWith(SIGNAL, 'signal');
    expect(journal.recordSignal).toHaveBeenCalledWith(1, outcome.signal, outcome.plan, 'filled');
    expect(journal.recordExecution).toHaveBeenCalledWith(2, outcome.result);
    expect(sentActions().slice(2)).toEqual(['signal_received', 'entry_calculated', 'trade_executed']);
  });

  it('places every leg of a multi-leg plan', async () => {
    const engine = engineWith({ entryStrategy: 'triple_entry', defaultVolumeMulti: 0.01 });
    await engine.start();

    const outcome = await engine.handleMessage(SIGNAL);

    expect(outcome.kind).toBe('executed');
    if (outcome.kind !== 'executed') return;
    expect(outcome.result.aggregateVolume).toBe(0.06);
    expect((await broker.listOpenOrders()).map((o) => [o.price, o.volume])).toEqual([
      [3990, 0.01],
      [3987.5, 0.02],
      [3985, 0.03],
    ]);
  });

  it('ignores a new signal while trades are active', async () => {
    const engine = engineWith();
    await engine.start();

    const [first, second] = await Promise.all([engine.handleMessage(SIGNAL), engine.handleMessage(SIGNAL)]);

    expect(first.kind).toBe('executed');
    expect(second).toMatchObject({ kind: 'suppressed', orders: 1, positions: 0 });
    expect(await broker.listOpenOrders()).toHaveLength(1);
    expect(journal.recordMessage).toHaveBeenLastCalledWith(SIGNAL, 'suppressed', expect.stringContaining('Signal Ignored'));
    expect(journal.recordSignal).toHaveBeenLastCalledWith(3, expect.objectContaining({ symbol: 'XAUUSD' }), null, 'suppressed');
    expect(sentActions().filter((a) => a === 'signal_received')).toHaveLength(1);
  });

  it('routes management commands to the position manager', async () => {
    const engine = engineWith();
    await engine.start();
    await engine.handleMessage(SIGNAL);
    broker.setQuote('XAUUSD', { bid: 3986.5, ask: 3987 });

    const outcome = await engine.handleMessage('Move SL to entry');

    expect(outcome).toEqual({
      kind: 'commands',
      outcomes: [{
        command: 'break_even',
        touched: 1,
        skipped: 0,
        failed: 0,
        details: ['2: BE partial closed 0.01', '2: SL 3980 -> 3987.5'],
      }],
    });
    expect(journal.recordMessage).toHaveBeenLastCalledWith('Move SL to entry', 'command', 'break_even');
    expect(journal.recordCommandOutcomes).toHaveBeenCalledWith(3, outcome.kind === 'commands' ? outcome.outcomes : []);
    expect(notifier.send).toHaveBeenLastCalledWith(
      '<b>SL Moved to Break-Even</b>\nTouched: 1 | Skipped: 0 | Failed: 0\n  2: BE partial closed 0.01\n  2: SL 3980 -&gt; 3987.5',
      expect.objectContaining({ action: 'break_even' }),
    );
  });

  it('journals messages that are not signals without notifying', async () => {
    const engine = engineWith();
    await engine.start();
    const before = vi.mocked(notifier.send).mock.calls.length;

    const outcome = await engine.handleMessage('hello there everyone');

    expect(outcome).toEqual({ kind: 'rejected', reason: 'no direction' });
    expect(journal.recordMessage).toHaveBeenCalledWith('hello there everyone', 'rejected', 'no direction');
    expect(vi.mocked(notifier.send).mock.calls.length).toBe(before);
  });

  it('turns a processing fault into an error outcome', async () => {
    const engine = engineWith();
    await engine.start();
    vi.spyOn(broker, 'listOpenOrders').mockRejectedValueOnce(new Error('boom'));

    const outcome = await engine.handleMessage(SIGNAL);

    expect(outcome).toEqual({ kind: 'error', error: 'boom' });
    expect(journal.recordMessage).toHaveBeenLastCalledWith(SIGNAL, 'error', 'boom');
    expect(notifier.send).toHaveBeenLastCalledWith('<b>Error</b>: signal_processing\nboom', {
      action: 'error',
      message: SIGNAL,
    });

    const status = await engine.getStatus();
    expect(status.processed.error).toBe(1);
  });

  it('keeps processing when a notification target fails', async () => {
    notifier = { send: vi.fn(async () => { throw new Error('webhook down'); }) };
    const engine = engineWith();
    await engine.start();

    const outcome = await engine.handleMessage(SIGNAL);

    expect(outcome.kind).toBe('executed');
  });

  it('closes everything on a manual close-all', async () => {
    const engine = engineWith();
    await engine.start();
    await broker.submitMarketOrder({
      symbol: 'XAUUSD', side: 'buy', volume: 0.05, stopLoss: 3980, takeProfit: 4010, comment: 'manual',
    });
    await broker.submitPendingOrder({
      symbol: 'XAUUSD', side: 'buy', volume: 0.05, stopLoss: 3980, takeProfit: 4010, comment: 'manual', price: 3950,
    });

    const outcomes = await engine.closeAll();

    expect(outcomes.map((o) => [o.command, o.touched])).toEqual([['full_close', 1], ['tp_hit', 1]]);
    expect(journal.recordCommandOutcomes).toHaveBeenCalledWith(null, [outcomes[0]]);
    expect(await broker.listOpenPositions()).toEqual([]);
    expect(await broker.listOpenOrders()).toEqual([]);
  });

  it('reports status and stops cleanly', async () => {
    const engine = engineWith();
    await engine.start();
    await engine.handleMessage(SIGNAL);
    await engine.handleMessage('hello there everyone');

    const status = await engine.getStatus();
    expect(status).toMatchObject({
      running: true,
      broker: 'paper',
      strategy: 'midpoint',
      processed: { commands: 0, rejected: 1, suppressed: 0, executed: 1, error: 0 },
    });
    expect(status.orders).toHaveLength(1);

    await engine.stop();
    expect(engine.isRunning()).toBe(false);
    expect(notifier.send).toHaveBeenLastCalledWith(expect.stringContaining('Signal Bridge STOPPED'), {
      action: 'system_status',
      status: 'stopped',
    });
  });
});
