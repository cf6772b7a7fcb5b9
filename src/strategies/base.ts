import { Decimal } from 'decimal.js';
import type { EntryConfig } from '../config/strategies.js';
import type { EntryLeg, EntryPlan, EntryStrategyName, MarketContext, Quote, Signal } from '../core/types.js';

/**
 * An entry strategy turns a signal (and, when available, the live quote) into an
 * EntryPlan. Implementations are pure: same inputs, same plan, no I/O.
 */
export abstract class EntryStrategy {
  abstract readonly name: EntryStrategyName;

  constructor(protected readonly cfg: EntryConfig) {}

  abstract compute(signal: Signal, market: MarketContext): EntryPlan;

  protected singlePlan(price: Decimal.Value, signal: Signal, market: MarketContext): EntryPlan {
    return {
      strategy: this.name,
      representativePrice: roundPrice(price, market.digits),
      orderKind: 'limit',
      legs: [],
      totalVolume: signal.volume,
      digits: market.digits,
      pipSize: this.pipSize(market.digits),
      referencePrice: referencePrice(signal, market.quote),
    };
  }

  protected multiPlan(price: Decimal.Value, legs: EntryLeg[], market: MarketContext, signal: Signal): EntryPlan {
    const total = legs.reduce((sum, leg) => sum.plus(leg.volume), new Decimal(0));
    return {
      strategy: this.name,
      representativePrice: roundPrice(price, market.digits),
      orderKind: 'limit',
      legs,
      totalVolume: total.toNumber(),
      digits: market.digits,
      pipSize: this.pipSize(market.digits),
      referencePrice: referencePrice(signal, market.quote),
    };
  }

  /** 3- and 5-digit quotes carry a fractional pip */
  protected pipSize(digits: number | null): number {
    if (digits === null) return this.cfg.defaultPipSize;
    const pipDigits = digits === 3 || digits === 5 ? digits - 1 : digits;
    return new Decimal(10).pow(-pipDigits).toNumber();
  }

  protected point(digits: number | null): Decimal {
    if (digits === null) return new Decimal(this.cfg.defaultPipSize);
    return new Decimal(10).pow(-digits);
  }
}

export function roundPrice(value: Decimal.Value, digits: number | null): number {
  const d = new Decimal(value);
  return digits === null ? d.toNumber() : d.toDecimalPlaces(digits).toNumber();
}

export function midpoint(signal: Signal): Decimal {
  return new Decimal(signal.rangeStart).plus(signal.rangeEnd).div(2);
}

/** Ask for buys, bid for sells */
export function referencePrice(signal: Signal, quote: Quote | null): number | null {
  if (!quote) return null;
  return signal.direction === 'buy' ? quote.ask : quote.bid;
}

/** The boundary a move into the zone reaches first: the top for buys, the bottom for sells */
export function firstFillBoundary(signal: Signal): 'start' | 'end' {
  return signal.direction === 'buy' ? 'start' : 'end';
}

export function boundaryPrice(signal: Signal, boundary: 'start' | 'end'): Decimal {
  return new Decimal(boundary === 'start' ? signal.rangeStart : signal.rangeEnd);
}
