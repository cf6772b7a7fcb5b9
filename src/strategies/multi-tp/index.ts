import type { EntryLeg, EntryPlan, MarketContext, Signal } from '../../core/types.js';
import { EntryStrategy, roundPrice } from '../base.js';
import { adaptivePrice } from '../single/index.js';

/**
 * One adaptive entry price split into legs with staggered take-profits.
 * Leg i takes multiTpPips[i]; the final leg rides to the signal TP.
 */
export class MultiTpStrategy extends EntryStrategy {
  readonly name = 'multi_tp_entry' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const offset = this.point(market.digits).mul(this.cfg.adaptiveOffsetPoints);
    const price = roundPrice(adaptivePrice(signal, market, offset), market.digits);
    const volumes = this.cfg.multiTpVolumes;

    const legs: EntryLeg[] = volumes.map((volume, i) => {
      const isLast = i === volumes.length - 1;
      return {
        price,
        volume,
        takeProfitPips: isLast ? null : (this.cfg.multiTpPips[i] ?? null),
        legLabel: `TP${i + 1}`,
        zoneLabel: 'single',
      };
    });

    return this.multiPlan(price, legs, market, signal);
  }
}
