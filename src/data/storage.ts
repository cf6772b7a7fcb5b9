import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { config } from '../config/index.js';
import type { CommandOutcome, EntryPlan, ExecutionResult, Signal } from '../core/types.js';
import { createChildLogger } from '../monitoring/logger.js';

const log = createChildLogger('storage');

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    if (config.dbPath !== ':memory:') {
      mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    db = new Database(config.dbPath);
    db.pragma('journal_mode = WAL');
    initSchema(db);
    log.info({ path: config.dbPath }, 'Database initialized');
  }
  return db;
}

function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT NOT NULL,
      classification TEXT NOT NULL,
      detail TEXT,
      timestamp INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS signals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id INTEGER,
      symbol TEXT NOT NULL,
      direction TEXT NOT NULL,
      range_start REAL NOT NULL,
      range_end REAL NOT NULL,
      stop_loss REAL NOT NULL,
      take_profit REAL NOT NULL,
      volume REAL NOT NULL,
      strategy TEXT,
      entry_price REAL,
      status TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS executions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      signal_id INTEGER NOT NULL,
      leg_label TEXT NOT NULL,
      order_type TEXT NOT NULL,
      price REAL NOT NULL,
      volume REAL NOT NULL,
      take_profit REAL NOT NULL,
      accepted INTEGER NOT NULL,
      order_id TEXT,
      deal_id TEXT,
      error TEXT,
      timestamp INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS command_outcomes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id INTEGER,
      command TEXT NOT NULL,
      touched INTEGER NOT NULL,
      skipped INTEGER NOT NULL,
      failed INTEGER NOT NULL,
      details_json TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages(timestamp);
    CREATE INDEX IF NOT EXISTS idx_signals_timestamp ON signals(timestamp);
    CREATE INDEX IF NOT EXISTS idx_executions_signal ON executions(signal_id);
  `);
}

export type MessageClass = 'command' | 'signal' | 'suppressed' | 'rejected' | 'error';

export type SignalStatus = 'filled' | 'partial' | 'failed' | 'suppressed';

export interface SignalRow {
  id: number;
  symbol: string;
  direction: string;
  range_start: number;
  range_end: number;
  stop_loss: number;
  take_profit: number;
  volume: number;
  strategy: string | null;
  entry_price: number | null;
  status: SignalStatus;
  timestamp: number;
}

/**
 * Audit trail of what the bridge saw and did. Nothing reads it back to make
 * trading decisions; the broker stays the source of truth.
 */
export interface Journal {
  recordMessage(text: string, classification: MessageClass, detail?: string): number | null;
  recordSignal(messageId: number | null, signal: Signal, plan: EntryPlan | null, status: SignalStatus): number | null;
  recordExecution(signalId: number, result: ExecutionResult): void;
  recordCommandOutcomes(messageId: number | null, outcomes: CommandOutcome[]): void;
}

/** Wraps a write so a failing journal never interrupts trading */
function guarded<T>(operation: string, fallback: T, write: () => T): T {
  try {
    return write();
  } catch (err) {
    log.error({ err, operation }, 'Journal write failed');
    return fallback;
  }
}

export const sqliteJournal: Journal = {
  recordMessage(text, classification, detail) {
    return guarded('recordMessage', null, () => {
      const info = getDb().prepare(`
        INSERT INTO messages (text, classification, detail, timestamp)
        VALUES (?, ?, ?, ?)
      `).run(text, classification, detail ?? null, Date.now());
      return Number(info.lastInsertRowid);
    });
  },

  recordSignal(messageId, signal, plan, status) {
    return guarded('recordSignal', null, () => {
      const info = getDb().prepare(`
        INSERT INTO signals (message_id, symbol, direction, range_start, range_end, stop_loss, take_profit,
                             volume, strategy, entry_price, status, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        messageId,
        signal.symbol,
        signal.direction,
        signal.rangeStart,
        signal.rangeEnd,
        signal.stopLoss,
        signal.takeProfit,
        signal.volume,
        plan?.strategy ?? null,
        plan?.representativePrice ?? null,
        status,
        Date.now(),
      );
      return Number(info.lastInsertRowid);
    });
  },

  recordExecution(signalId, result) {
    guarded('recordExecution', undefined, () => {
      const database = getDb();
      const insert = database.prepare(`
        INSERT INTO executions (signal_id, leg_label, order_type, price, volume, take_profit, accepted,
                                order_id, deal_id, error, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const now = Date.now();
      const insertAll = database.transaction(() => {
        for (const leg of result.legs) {
          insert.run(
            signalId,
            leg.legLabel,
            leg.orderType,
            leg.price,
            leg.volume,
            leg.takeProfit,
            leg.accepted ? 1 : 0,
            leg.orderId ?? null,
            leg.dealId ?? null,
            leg.error ?? null,
            now,
          );
        }
        database.prepare('UPDATE signals SET status = ? WHERE id = ?').run(result.status, signalId);
      });
      insertAll();
    });
  },

  recordCommandOutcomes(messageId, outcomes) {
    guarded('recordCommandOutcomes', undefined, () => {
      const insert = getDb().prepare(`
        INSERT INTO command_outcomes (message_id, command, touched, skipped, failed, details_json, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      const now = Date.now();
      for (const o of outcomes) {
        insert.run(messageId, o.command, o.touched, o.skipped, o.failed, JSON.stringify(o.details), now);
      }
    });
  },
};

export function getRecentSignals(limit: number = 10): SignalRow[] {
  return getDb()
    .prepare('SELECT * FROM signals ORDER BY id DESC LIMIT ?')
    .all(limit) as SignalRow[];
}

export function getMessageCounts(): Record<MessageClass, number> {
  const counts: Record<MessageClass, number> = { command: 0, signal: 0, suppressed: 0, rejected: 0, error: 0 };
  const rows = getDb()
    .prepare('SELECT classification, COUNT(*) as total FROM messages GROUP BY classification')
    .all() as Array<{ classification: MessageClass; total: number }>;
  for (const row of rows) {
    counts[row.classification] = row.total;
  }
  return counts;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
