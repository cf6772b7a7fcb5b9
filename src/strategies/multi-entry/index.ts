import { Decimal } from 'decimal.js';
import type { EntryLeg, EntryPlan, MarketContext, Signal } from '../../core/types.js';
import { EntryStrategy, firstFillBoundary, midpoint, roundPrice } from '../base.js';

/** Two equal legs at one third and two thirds of the zone, measured up from the bottom */
export class DualEntryStrategy extends EntryStrategy {
  readonly name = 'dual_entry' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const bottom = new Decimal(signal.rangeEnd);
    const third = new Decimal(signal.rangeStart).minus(signal.rangeEnd).div(3);
    const prices = [bottom.plus(third), bottom.plus(third.mul(2))];

    const legs: EntryLeg[] = prices.map((price, i) => ({
      price: roundPrice(price, market.digits),
      volume: this.cfg.dualEntryVolume,
      takeProfitPips: null,
      legLabel: `${i + 1}/2`,
      zoneLabel: i === 0 ? 'end' : 'start',
    }));

    return this.multiPlan(prices[0], legs, market, signal);
  }
}

/**
 * Legs at the top, middle and bottom of the zone. Volume grows toward the leg
 * that fills last: for buys the top leg is smallest, for sells the bottom leg.
 */
export class TripleEntryStrategy extends EntryStrategy {
  readonly name = 'triple_entry' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const [firstMult, midMult, lastMult] = this.cfg.tripleEntryMultipliers;
    const base = new Decimal(this.cfg.tripleEntryBaseVolume);
    const buyFirst = firstFillBoundary(signal) === 'start';

    const zones: Array<{ price: Decimal; mult: number; zone: EntryLeg['zoneLabel'] }> = [
      { price: new Decimal(signal.rangeStart), mult: buyFirst ? firstMult : lastMult, zone: 'start' },
      { price: midpoint(signal), mult: midMult, zone: 'mid' },
      { price: new Decimal(signal.rangeEnd), mult: buyFirst ? lastMult : firstMult, zone: 'end' },
    ];

    const legs: EntryLeg[] = zones.map((z, i) => ({
      price: roundPrice(z.price, market.digits),
      volume: base.mul(z.mult).toNumber(),
      takeProfitPips: null,
      legLabel: `${i + 1}/3`,
      zoneLabel: z.zone,
    }));

    const representative = buyFirst ? signal.rangeStart : signal.rangeEnd;
    return this.multiPlan(representative, legs, market, signal);
  }
}
