import { afterEach, describe, expect, it } from 'vitest';
import type { EntryPlan, ExecutionResult, Signal } from '../../core/types.js';
import { closeDb, getDb, getMessageCounts, getRecentSignals, sqliteJournal } from '../storage.js';

const signal: Signal = {
  symbol: 'XAUUSD',
  direction: 'buy',
  rangeStart: 3990,
  rangeEnd: 3985,
  stopLoss: 3980,
  takeProfit: 4010,
  volume: 0.03,
  rawText: 'XAUUSD BUY 3990-3985 SL 3980 TP 4010',
  timestamp: '2026-01-05T10:00:00.000Z',
};

const plan: EntryPlan = {
  strategy: 'triple_entry',
  representativePrice: 3990,
  orderKind: 'limit',
  legs: [],
  totalVolume: 0.03,
  digits: 2,
  pipSize: 0.01,
  referencePrice: null,
};

const result: ExecutionResult = {
  overallSuccess: true,
  status: 'partial',
  legs: [
    { legLabel: '1/2', accepted: true, orderType: 'limit', price: 3990, volume: 0.01, takeProfit: 4010, orderId: '1' },
    { legLabel: '2/2', accepted: false, orderType: 'limit', price: 3985, volume: 0.02, takeProfit: 4010, error: '1 - Margin' },
  ],
  aggregateVolume: 0.01,
  aggregateEntryPrices: [3990],
  warning: 'Only 1/2 orders placed successfully',
};

afterEach(() => {
  closeDb();
});

describe('sqliteJournal', () => {
  it('records a signal with its legs and final status', () => {
    const messageId = sqliteJournal.recordMessage(signal.rawText, 'signal');
    const signalId = sqliteJournal.recordSignal(messageId, signal, plan, 'failed');
    expect(signalId).not.toBeNull();
    if (signalId === null) return;

    sqliteJournal.recordExecution(signalId, result);

    const [row] = getRecentSignals(1);
    expect(row).toMatchObject({
      id: signalId,
      symbol: 'XAUUSD',
      direction: 'buy',
      strategy: 'triple_entry',
      entry_price: 3990,
      status: 'partial',
    });

    const legs = getDb()
      .prepare('SELECT leg_label, accepted, order_id, error FROM executions WHERE signal_id = ? ORDER BY id')
      .all(signalId);
    expect(legs).toEqual([
      { leg_label: '1/2', accepted: 1, order_id: '1', error: null },
      { leg_label: '2/2', accepted: 0, order_id: null, error: '1 - Margin' },
    ]);
  });

  it('keeps suppressed signals without a plan', () => {
    const messageId = sqliteJournal.recordMessage(signal.rawText, 'suppressed', 'Active trades');
    sqliteJournal.recordSignal(messageId, signal, null, 'suppressed');

    const [row] = getRecentSignals();
    expect(row.status).toBe('suppressed');
    expect(row.strategy).toBeNull();
    expect(row.entry_price).toBeNull();
  });

  it('stores command outcomes with their details', () => {
    sqliteJournal.recordCommandOutcomes(null, [
      { command: 'break_even', touched: 2, skipped: 1, failed: 0, details: ['1: SL 3980 -> 3990'] },
    ]);

    const row = getDb().prepare('SELECT command, touched, skipped, details_json FROM command_outcomes').get();
    expect(row).toEqual({
      command: 'break_even',
      touched: 2,
      skipped: 1,
      details_json: '["1: SL 3980 -> 3990"]',
    });
  });

  it('counts messages by classification', () => {
    sqliteJournal.recordMessage('hello there', 'rejected', 'no direction');
    sqliteJournal.recordMessage('hi again!!!', 'rejected', 'no direction');
    sqliteJournal.recordMessage('Move SL to entry', 'command', 'break_even');

    expect(getMessageCounts()).toEqual({ command: 1, signal: 0, suppressed: 0, rejected: 2, error: 0 });
  });

  it('returns null instead of throwing when a write fails', () => {
    getDb().exec('DROP TABLE messages');
    expect(sqliteJournal.recordMessage('text', 'signal')).toBeNull();
  });
});
