import { Decimal } from 'decimal.js';
import type { EntryLeg, EntryPlan, MarketContext, Signal } from '../../core/types.js';
import { EntryStrategy, boundaryPrice, firstFillBoundary, midpoint, referencePrice, roundPrice } from '../base.js';

type Boundary = 'start' | 'end';

interface ZoneSlot {
  zone: EntryLeg['zoneLabel'];
  price: Decimal;
  count: number;
  tiers: Array<number | null>;
}

/**
 * Spreads N legs over three zones: the dominant boundary, the midpoint and the
 * far boundary, weighted toward the dominant one. The dominant boundary is the
 * one nearest the live quote; without a quote it is the first-fill boundary.
 * The first dominant leg carries double volume.
 */
export class MultiPositionStrategy extends EntryStrategy {
  readonly name = 'multi_position_entry' as const;

  compute(signal: Signal, market: MarketContext): EntryPlan {
    const dominant = this.dominantBoundary(signal, market);
    const far: Boundary = dominant === 'start' ? 'end' : 'start';
    const [dominantCount, middleCount, farCount] = zoneCounts(
      this.cfg.multiPositionCount,
      this.cfg.multiPositionZoneWeights,
    );
    const tiers = this.cfg.multiPositionTpTiers;

    const slots: ZoneSlot[] = [
      { zone: dominant, price: boundaryPrice(signal, dominant), count: dominantCount, tiers: tiers.dominant },
      { zone: 'mid', price: midpoint(signal), count: middleCount, tiers: tiers.middle },
      { zone: far, price: boundaryPrice(signal, far), count: farCount, tiers: tiers.far },
    ];

    const unit = new Decimal(this.cfg.multiPositionVolume);
    const total = this.cfg.multiPositionCount;
    const legs: EntryLeg[] = [];

    for (const slot of slots) {
      const price = roundPrice(slot.price, market.digits);
      for (let i = 0; i < slot.count; i++) {
        const doubled = legs.length === 0;
        legs.push({
          price,
          volume: (doubled ? unit.mul(2) : unit).toNumber(),
          takeProfitPips: pickTier(slot.tiers, i),
          legLabel: `P${legs.length + 1}/${total}`,
          zoneLabel: slot.zone,
        });
      }
    }

    return this.multiPlan(midpoint(signal), legs, market, signal);
  }

  private dominantBoundary(signal: Signal, market: MarketContext): Boundary {
    const ref = referencePrice(signal, market.quote);
    if (ref === null) return firstFillBoundary(signal);

    const toStart = Math.abs(ref - signal.rangeStart);
    const toEnd = Math.abs(ref - signal.rangeEnd);
    if (toStart === toEnd) return firstFillBoundary(signal);
    return toStart < toEnd ? 'start' : 'end';
  }
}

/** Splits `total` legs by weight; the dominant zone always gets at least one */
export function zoneCounts(total: number, weights: [number, number, number]): [number, number, number] {
  const weightSum = weights[0] + weights[1] + weights[2];
  const dominant = Math.max(1, Math.round((total * weights[0]) / weightSum));
  const middle = Math.min(total - dominant, Math.round((total * weights[1]) / weightSum));
  const far = total - dominant - middle;
  return [dominant, Math.max(0, middle), Math.max(0, far)];
}

function pickTier(tiers: Array<number | null>, index: number): number | null {
  if (tiers.length === 0) return null;
  return tiers[Math.min(index, tiers.length - 1)];
}
