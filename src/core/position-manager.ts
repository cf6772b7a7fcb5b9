import type { ManagementConfig } from '../config/strategies.js';
import { createChildLogger } from '../monitoring/logger.js';
import { Retcode, describeResult, rejected, type Broker, type BrokerPosition, type BrokerResult } from './broker.js';
import type { CommandKind, CommandOutcome, DetectedCommands } from './types.js';

const log = createChildLogger('positions');

export interface BreakEvenOptions {
  /** Close bePartialVolume before relocating the SL */
  closePartial: boolean;
  /** Cancel every resting order afterwards */
  cancelPending: boolean;
}

const FULL_BREAK_EVEN: BreakEvenOptions = { closePartial: true, cancelPending: true };

/**
 * Applies management commands to every live position and order. Holds no
 * state: each command re-reads the book from the broker first.
 */
export class PositionManager {
  constructor(
    private readonly broker: Broker,
    private readonly cfg: ManagementConfig,
  ) {}

  /** Runs every detected command in the fixed order BE, partial, close, TP-hit, extend */
  async run(detected: DetectedCommands): Promise<CommandOutcome[]> {
    const outcomes: CommandOutcome[] = [];

    if (detected.breakEven) {
      outcomes.push(await this.breakEven());
    }

    if (detected.partial) {
      outcomes.push(await this.partial(detected.partial.level, detected.partial.pips));
      if (detected.partial.level === '1') {
        log.info('TP1 reached, chaining SL relocation to break-even');
        outcomes.push(await this.breakEven({ closePartial: false, cancelPending: false }));
      }
    }

    if (detected.fullClose) {
      outcomes.push(await this.fullClose());
    }

    if (detected.tpHit) {
      if (this.cfg.tpHitCancelEnabled) {
        outcomes.push(await this.cancelPending());
      } else {
        log.info('TP-hit detected, pending-order cancel is disabled');
      }
    }

    if (detected.extendTp) {
      outcomes.push(await this.extendTp(detected.extendTp.price));
    }

    return outcomes;
  }

  async breakEven(options: BreakEvenOptions = FULL_BREAK_EVEN): Promise<CommandOutcome> {
    const outcome = emptyOutcome('break_even');
    const positions = await this.broker.listOpenPositions();
    if (positions.length === 0) {
      outcome.details.push('No open positions');
    }

    for (const pos of positions) {
      if (pos.stopLoss !== null && Math.abs(pos.stopLoss - pos.entryPrice) <= this.cfg.beTolerance) {
        log.info({ positionId: pos.id, stopLoss: pos.stopLoss }, 'Already at break-even');
        outcome.skipped++;
        outcome.details.push(`${pos.id}: already at break-even`);
        continue;
      }

      if (options.closePartial) {
        await this.closeBreakEvenPartial(pos, outcome);
      }

      const result = await this.attempt(() => this.broker.modifyPosition(pos.id, pos.entryPrice, pos.takeProfit));
      if (result.accepted) {
        log.info({ positionId: pos.id, from: pos.stopLoss, to: pos.entryPrice }, 'SL moved to break-even');
        outcome.touched++;
        outcome.details.push(`${pos.id}: SL ${pos.stopLoss ?? 'none'} -> ${pos.entryPrice}`);
      } else {
        log.error({ positionId: pos.id, reason: result.reason }, 'Break-even modification rejected');
        outcome.failed++;
        outcome.details.push(`${pos.id}: SL move failed (${describeResult(result)})`);
      }
    }

    if (options.cancelPending) {
      const cancelled = await this.cancelPending();
      outcome.failed += cancelled.failed;
      outcome.details.push(...cancelled.details);
    }

    logSummary(outcome);
    return outcome;
  }

  async partial(level: string | null, pips: number | null): Promise<CommandOutcome> {
    const outcome = emptyOutcome('partial');
    const volume = this.cfg.partialVolume;
    const positions = await this.broker.listOpenPositions();
    log.info({ level, pips, volume, positions: positions.length }, 'Taking partial profit');

    for (const pos of positions) {
      // Closing a position this small would close it outright
      if (pos.volume <= volume) {
        outcome.skipped++;
        outcome.details.push(`${pos.id}: volume ${pos.volume} too small for partial ${volume}`);
        continue;
      }

      const result = await this.attempt(() => this.broker.closePosition(pos.id, volume));
      if (result.accepted) {
        outcome.touched++;
        outcome.details.push(`${pos.id}: closed ${volume}${result.dealId ? ` (deal ${result.dealId})` : ''}`);
      } else {
        log.error({ positionId: pos.id, reason: result.reason }, 'Partial close rejected');
        outcome.failed++;
        outcome.details.push(`${pos.id}: partial close failed (${describeResult(result)})`);
      }
    }

    logSummary(outcome);
    return outcome;
  }

  async fullClose(): Promise<CommandOutcome> {
    const outcome = emptyOutcome('full_close');
    const positions = await this.broker.listOpenPositions();

    for (const pos of positions) {
      const result = await this.attempt(() => this.broker.closePosition(pos.id, pos.volume));
      if (result.accepted) {
        outcome.touched++;
        const profit = pos.profit === null ? '' : `, P/L ${pos.profit.toFixed(2)}`;
        outcome.details.push(`${pos.id}: closed ${pos.volume}${profit}`);
      } else {
        log.error({ positionId: pos.id, reason: result.reason }, 'Full close rejected');
        outcome.failed++;
        outcome.details.push(`${pos.id}: close failed (${describeResult(result)})`);
      }
    }

    logSummary(outcome);
    return outcome;
  }

  /** Cancels every resting order; positions are left alone */
  async cancelPending(): Promise<CommandOutcome> {
    const outcome = emptyOutcome('tp_hit');
    const orders = await this.broker.listOpenOrders();

    for (const order of orders) {
      const result = await this.attempt(() => this.broker.cancelOrder(order.id));
      if (result.accepted) {
        outcome.touched++;
      } else {
        log.error({ orderId: order.id, reason: result.reason }, 'Order cancel rejected');
        outcome.failed++;
        outcome.details.push(`order ${order.id}: cancel failed (${describeResult(result)})`);
      }
    }

    if (orders.length > 0) {
      outcome.details.push(`Cancelled ${outcome.touched}/${orders.length} pending orders`);
    }
    return outcome;
  }

  async extendTp(price: number): Promise<CommandOutcome> {
    const outcome = emptyOutcome('extend_tp');
    const positions = await this.broker.listOpenPositions();

    for (const pos of positions) {
      const result = await this.attempt(() => this.broker.modifyPosition(pos.id, pos.stopLoss, price));
      if (result.accepted) {
        outcome.touched++;
        outcome.details.push(`${pos.id}: TP ${pos.takeProfit ?? 'none'} -> ${price}`);
      } else {
        log.warn({ positionId: pos.id, reason: result.reason }, 'TP extension rejected, skipping');
        outcome.failed++;
        outcome.details.push(`${pos.id}: TP change failed (${describeResult(result)})`);
      }
    }

    logSummary(outcome);
    return outcome;
  }

  private async closeBreakEvenPartial(pos: BrokerPosition, outcome: CommandOutcome): Promise<void> {
    const volume = this.cfg.bePartialVolume;
    if (pos.volume <= volume) {
      outcome.details.push(`${pos.id}: volume ${pos.volume} too small for BE partial ${volume}`);
      return;
    }

    const result = await this.attempt(() => this.broker.closePosition(pos.id, volume));
    if (result.accepted) {
      outcome.details.push(`${pos.id}: BE partial closed ${volume}`);
    } else {
      log.error({ positionId: pos.id, reason: result.reason }, 'BE partial close rejected');
      outcome.details.push(`${pos.id}: BE partial close failed (${describeResult(result)})`);
    }
  }

  /** Broker adapters should not throw, but one bad position must not stop the rest */
  private async attempt(call: () => Promise<BrokerResult>): Promise<BrokerResult> {
    try {
      return await call();
    } catch (err) {
      log.error({ err }, 'Broker call threw');
      return rejected(Retcode.Error, err instanceof Error ? err.message : String(err));
    }
  }
}

function emptyOutcome(command: CommandKind): CommandOutcome {
  return { command, touched: 0, skipped: 0, failed: 0, details: [] };
}

function logSummary(outcome: CommandOutcome): void {
  log.info({
    command: outcome.command,
    touched: outcome.touched,
    skipped: outcome.skipped,
    failed: outcome.failed,
  }, 'Command complete');
}
