import type { BrokerOrder, BrokerPosition } from '../core/broker.js';
import type { CommandKind, CommandOutcome, EntryPlan, ExecutionResult, Signal } from '../core/types.js';

// Telegram HTML parse mode only needs these three escaped
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatSignalReceived(signal: Signal): string {
  let msg = `<b>New Signal</b>\n\n`;
  msg += `Symbol: ${escapeHtml(signal.symbol)}\n`;
  msg += `Direction: <b>${signal.direction.toUpperCase()}</b>\n`;
  msg += `Range: ${signal.rangeStart} - ${signal.rangeEnd}\n`;
  msg += `SL: ${signal.stopLoss} | TP: ${signal.takeProfit}\n`;
  msg += `Volume: ${signal.volume}`;
  return msg;
}

export function formatEntryPlan(signal: Signal, plan: EntryPlan): string {
  let msg = `<b>Entry Calculated</b>: ${escapeHtml(signal.symbol)}\n`;
  msg += `Strategy: ${plan.strategy}\n`;
  if (plan.referencePrice !== null) {
    msg += `Market (${signal.direction === 'buy' ? 'ask' : 'bid'}): ${plan.referencePrice}\n`;
  }
  if (plan.legs.length === 0) {
    msg += `Limit Price: ${plan.representativePrice}`;
    return msg;
  }

  msg += `Legs: ${plan.legs.length} | Total Volume: ${plan.totalVolume}\n`;
  for (const leg of plan.legs) {
    const tp = leg.takeProfitPips === null ? 'signal TP' : `${leg.takeProfitPips} pips`;
    msg += `  ${leg.legLabel} @ ${leg.price} x ${leg.volume} (${tp})\n`;
  }
  return msg.trimEnd();
}

export function formatExecution(signal: Signal, plan: EntryPlan, result: ExecutionResult): string {
  const header = {
    filled: 'Orders Placed',
    partial: 'Orders Partially Placed',
    failed: 'Order Placement Failed',
  }[result.status];

  let msg = `<b>${header}</b>: ${escapeHtml(signal.symbol)} ${signal.direction.toUpperCase()}\n`;
  msg += `Strategy: ${plan.strategy}\n`;

  if (result.overallSuccess) {
    msg += `Volume: ${result.aggregateVolume}\n`;
    msg += `Entry: ${result.aggregateEntryPrices.join(', ')}\n`;
    msg += `SL: ${signal.stopLoss}\n`;
  } else {
    msg += `Attempted Price: ${plan.representativePrice}\n`;
  }

  for (const leg of result.legs) {
    const mark = leg.accepted ? 'ok' : 'FAILED';
    const kind = leg.orderType === 'market' ? 'MKT' : 'LMT';
    const ref = leg.orderId ?? leg.dealId;
    msg += `  ${leg.legLabel} ${kind} ${leg.price} x ${leg.volume} TP ${leg.takeProfit}: ${mark}`;
    if (ref) msg += ` #${escapeHtml(ref)}`;
    if (leg.error) msg += ` (${escapeHtml(leg.error)})`;
    msg += '\n';
  }

  if (result.warning) msg += `Warning: ${escapeHtml(result.warning)}\n`;
  if (result.error) msg += `Error: ${escapeHtml(result.error)}\n`;
  return msg.trimEnd();
}

export function formatSuppressed(signal: Signal, orders: number, positions: number): string {
  return `<b>Signal Ignored</b>: ${escapeHtml(signal.symbol)} ${signal.direction.toUpperCase()}\n`
    + `Active trades: ${positions} positions, ${orders} pending orders`;
}

const COMMAND_TITLES: Record<CommandKind, string> = {
  break_even: 'SL Moved to Break-Even',
  partial: 'Partial Profit Taken',
  full_close: 'Positions Closed',
  tp_hit: 'Pending Orders Cancelled',
  extend_tp: 'Take Profit Extended',
};

export function formatCommandOutcome(outcome: CommandOutcome): string {
  let msg = `<b>${COMMAND_TITLES[outcome.command]}</b>\n`;
  msg += `Touched: ${outcome.touched} | Skipped: ${outcome.skipped} | Failed: ${outcome.failed}`;
  if (outcome.details.length > 0) {
    msg += '\n' + outcome.details.map((d) => `  ${escapeHtml(d)}`).join('\n');
  }
  return msg;
}

export type SystemState = 'starting' | 'started' | 'stopped';

export function formatSystemStatus(state: SystemState, details: Record<string, string | number>): string {
  let msg = `<b>Signal Bridge ${state.toUpperCase()}</b>`;
  for (const [key, value] of Object.entries(details)) {
    msg += `\n${key}: ${typeof value === 'string' ? escapeHtml(value) : value}`;
  }
  return msg;
}

export function formatError(context: string, error: string): string {
  return `<b>Error</b>: ${escapeHtml(context)}\n${escapeHtml(error)}`;
}

export interface StatusSnapshot {
  running: boolean;
  uptimeMs: number;
  broker: string;
  strategy: string;
  positions: BrokerPosition[];
  orders: BrokerOrder[];
}

export function formatEngineStatus(status: StatusSnapshot): string {
  const minutes = Math.floor(status.uptimeMs / 60_000);
  let msg = `<b>Signal Bridge Status</b>\n\n`;
  msg += `Running: ${status.running ? 'yes' : 'no'} (${minutes} min)\n`;
  msg += `Broker: ${status.broker} | Strategy: ${status.strategy}\n`;

  if (status.positions.length === 0) {
    msg += `\nNo open positions.`;
  } else {
    msg += `\n<b>Open Positions (${status.positions.length}):</b>\n`;
    for (const p of status.positions) {
      const pnl = p.profit === null ? '' : ` | P/L ${p.profit >= 0 ? '+' : ''}${p.profit.toFixed(2)}`;
      msg += `${p.side.toUpperCase()} ${escapeHtml(p.symbol)} ${p.volume} @ ${p.entryPrice}${pnl}\n`;
    }
  }

  if (status.orders.length > 0) {
    msg += `\n<b>Pending Orders (${status.orders.length}):</b>\n`;
    for (const o of status.orders) {
      msg += `${o.side.toUpperCase()} ${escapeHtml(o.symbol)} ${o.volume} @ ${o.price}\n`;
    }
  }
  return msg.trimEnd();
}
