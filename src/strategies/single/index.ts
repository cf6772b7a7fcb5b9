import { Decimal } from 'decimal.js';
import type { EntryPlan, MarketContext, Signal } from '../../core/types.js';
import { EntryStrategy, midpoint, referencePrice } from '../base.js';

export class MidpointStrategy extends EntryStrategy {
  readonly name = 'midpoint' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    return this.singlePlan(midpoint(signal), signal, market);
  }
}

/** Waits for the far side of the zone */
export class RangeBreakStrategy extends EntryStrategy {
  readonly name = 'range_break' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const price = signal.direction === 'buy' ? signal.rangeEnd : signal.rangeStart;
    return this.singlePlan(price, signal, market);
  }
}

/** Enters on the first touch of the zone */
export class MomentumStrategy extends EntryStrategy {
  readonly name = 'momentum' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const price = signal.direction === 'buy' ? signal.rangeStart : signal.rangeEnd;
    return this.singlePlan(price, signal, market);
  }
}

export class AdaptiveStrategy extends EntryStrategy {
  readonly name = 'adaptive' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const offset = this.point(market.digits).mul(this.cfg.adaptiveOffsetPoints);
    return this.singlePlan(adaptivePrice(signal, market, offset), signal, market);
  }
}

/**
 * Price relative to the live quote:
 * - no quote: zone midpoint
 * - quote past the zone on the expensive side: clamp to the nearer boundary
 * - quote past the zone on the cheap side: quote plus a small offset toward the zone
 * - quote inside the zone: the quote itself
 */
export function adaptivePrice(signal: Signal, market: MarketContext, offset: Decimal): Decimal {
  const ref = referencePrice(signal, market.quote);
  if (ref === null) return midpoint(signal);

  if (signal.direction === 'buy') {
    if (ref > signal.rangeStart) return new Decimal(signal.rangeStart);
    if (ref < signal.rangeEnd) return new Decimal(ref).plus(offset);
    return new Decimal(ref);
  }

  if (ref < signal.rangeEnd) return new Decimal(signal.rangeEnd);
  if (ref > signal.rangeStart) return new Decimal(ref).minus(offset);
  return new Decimal(ref);
}
