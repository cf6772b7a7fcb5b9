import { Decimal } from 'decimal.js';
import type { ExecutionConfig } from '../config/strategies.js';
import { createChildLogger } from '../monitoring/logger.js';
import { roundPrice } from '../strategies/base.js';
import { describeResult, type Broker, type BrokerResult } from './broker.js';
import type { EntryLeg, EntryPlan, ExecutionResult, LegResult, OrderType, Quote, Signal } from './types.js';

const log = createChildLogger('executor');

// MT5-style venues cap order comments at 31 chars
const MAX_COMMENT_LENGTH = 31;

export class OrderExecutor {
  constructor(
    private readonly broker: Broker,
    private readonly cfg: ExecutionConfig,
  ) {}

  /** Never throws: every fault ends up in a failed result */
  async execute(signal: Signal, plan: EntryPlan): Promise<ExecutionResult> {
    try {
      return plan.legs.length === 0
        ? await this.executeSingle(signal, plan)
        : await this.executeLegs(signal, plan);
    } catch (err) {
      log.error({ err, symbol: signal.symbol, strategy: plan.strategy }, 'Execution failed unexpectedly');
      return failed([], `Exception: ${errorMessage(err)}`);
    }
  }

  private async executeSingle(signal: Signal, plan: EntryPlan): Promise<ExecutionResult> {
    const quote = await this.fetchQuote(signal.symbol);
    if (!quote) {
      log.error({ symbol: signal.symbol }, 'No market data, aborting entry');
      return failed([], `Could not get market price for ${signal.symbol}`);
    }

    const leg: EntryLeg = {
      price: plan.representativePrice,
      volume: signal.volume,
      takeProfitPips: null,
      legLabel: '1/1',
      zoneLabel: 'single',
    };

    const result = await this.submitLeg(signal, plan, leg, quote);
    return summarize([result]);
  }

  private async executeLegs(signal: Signal, plan: EntryPlan): Promise<ExecutionResult> {
    const batchQuote = await this.fetchQuote(signal.symbol);
    if (!batchQuote) {
      log.error({ symbol: signal.symbol }, 'No market data, aborting multi-leg batch');
      return failed([], `Could not get market price for ${signal.symbol}`);
    }

    log.info({
      symbol: signal.symbol,
      direction: signal.direction,
      legs: plan.legs.length,
      totalVolume: plan.totalVolume,
      bid: batchQuote.bid,
      ask: batchQuote.ask,
    }, 'Executing multi-leg entry');

    const results: LegResult[] = [];
    let lastQuote = batchQuote;
    for (const leg of plan.legs) {
      const fresh = await this.fetchQuote(signal.symbol);
      if (fresh) {
        lastQuote = fresh;
      } else {
        log.warn({ leg: leg.legLabel }, 'Quote refresh failed, using previous quote');
      }

      try {
        results.push(await this.submitLeg(signal, plan, leg, lastQuote));
      } catch (err) {
        log.error({ err, leg: leg.legLabel }, 'Leg submission threw');
        results.push({
          legLabel: leg.legLabel,
          accepted: false,
          orderType: 'limit',
          price: leg.price,
          volume: leg.volume,
          takeProfit: this.legTakeProfit(signal, plan, leg),
          error: `Exception: ${errorMessage(err)}`,
        });
      }
    }

    return summarize(results);
  }

  private async submitLeg(signal: Signal, plan: EntryPlan, leg: EntryLeg, quote: Quote | null): Promise<LegResult> {
    const takeProfit = this.legTakeProfit(signal, plan, leg);
    const orderType = this.chooseOrderType(signal, leg.price, quote);
    const request = {
      symbol: signal.symbol,
      side: signal.direction,
      volume: leg.volume,
      stopLoss: signal.stopLoss,
      takeProfit,
      comment: this.comment(orderType, plan, leg),
    };

    const result: BrokerResult = orderType === 'market'
      ? await this.broker.submitMarketOrder(request)
      : await this.broker.submitPendingOrder({ ...request, price: leg.price });

    const logFields = { leg: leg.legLabel, orderType, price: leg.price, volume: leg.volume, takeProfit };
    if (result.accepted) {
      log.info({ ...logFields, orderId: result.orderId, dealId: result.dealId }, 'Leg accepted');
    } else {
      log.warn({ ...logFields, retcode: result.retcode, reason: result.reason }, 'Leg rejected');
    }

    return {
      legLabel: leg.legLabel,
      accepted: result.accepted,
      orderType,
      price: leg.price,
      volume: leg.volume,
      takeProfit,
      orderId: result.orderId,
      dealId: result.dealId,
      retcode: result.retcode,
      error: result.accepted ? undefined : describeResult(result),
    };
  }

  /** Pip-based TPs are measured from the leg's own entry price */
  legTakeProfit(signal: Signal, plan: EntryPlan, leg: EntryLeg): number {
    if (leg.takeProfitPips === null) return signal.takeProfit;
    const distance = new Decimal(leg.takeProfitPips).mul(plan.pipSize);
    const tp = signal.direction === 'buy'
      ? new Decimal(leg.price).plus(distance)
      : new Decimal(leg.price).minus(distance);
    return roundPrice(tp, plan.digits);
  }

  /** A resting order priced right at the market gets rejected, so take the market instead */
  chooseOrderType(signal: Signal, price: number, quote: Quote | null): OrderType {
    if (!quote) return 'limit';
    const marketSide = signal.direction === 'buy' ? quote.ask : quote.bid;
    const distance = Math.abs(price - marketSide);
    return distance <= this.cfg.minMarketDistance ? 'market' : 'limit';
  }

  private comment(orderType: OrderType, plan: EntryPlan, leg: EntryLeg): string {
    const kind = orderType === 'market' ? 'Mkt' : 'Lmt';
    return `${this.cfg.commentPrefix} ${kind} ${leg.legLabel} ${plan.strategy}`.slice(0, MAX_COMMENT_LENGTH);
  }

  private async fetchQuote(symbol: string): Promise<Quote | null> {
    try {
      return await this.broker.getQuote(symbol);
    } catch (err) {
      log.warn({ err, symbol }, 'Quote fetch failed');
      return null;
    }
  }
}

function summarize(results: LegResult[]): ExecutionResult {
  const acceptedLegs = results.filter((r) => r.accepted);
  const aggregateVolume = acceptedLegs
    .reduce((sum, r) => sum.plus(r.volume), new Decimal(0))
    .toNumber();
  const aggregateEntryPrices = [...new Set(acceptedLegs.map((r) => r.price))];

  if (acceptedLegs.length === results.length && results.length > 0) {
    return { overallSuccess: true, status: 'filled', legs: results, aggregateVolume, aggregateEntryPrices };
  }

  if (acceptedLegs.length > 0) {
    return {
      overallSuccess: true,
      status: 'partial',
      legs: results,
      aggregateVolume,
      aggregateEntryPrices,
      warning: `Only ${acceptedLegs.length}/${results.length} orders placed successfully`,
    };
  }

  const error = results.length === 1
    ? results[0].error ?? 'Order rejected'
    : `All ${results.length} orders failed`;
  return failed(results, error);
}

function failed(legs: LegResult[], error: string): ExecutionResult {
  return { overallSuccess: false, status: 'failed', legs, aggregateVolume: 0, aggregateEntryPrices: [], error };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
