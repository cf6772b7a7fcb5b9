import type { EntryConfig } from '../config/strategies.js';
import type { EntryStrategyName } from '../core/types.js';
import type { EntryStrategy } from './base.js';
import { AdaptiveStrategy, MidpointStrategy, MomentumStrategy, RangeBreakStrategy } from './single/index.js';
import { DualEntryStrategy, TripleEntryStrategy } from './multi-entry/index.js';
import { MultiTpStrategy } from './multi-tp/index.js';
import { MultiPositionStrategy } from './multi-position/index.js';

const factories: Record<EntryStrategyName, (cfg: EntryConfig) => EntryStrategy> = {
  midpoint: (cfg) => new MidpointStrategy(cfg),
  range_break: (cfg) => new RangeBreakStrategy(cfg),
  momentum: (cfg) => new MomentumStrategy(cfg),
  adaptive: (cfg) => new AdaptiveStrategy(cfg),
  dual_entry: (cfg) => new DualEntryStrategy(cfg),
  triple_entry: (cfg) => new TripleEntryStrategy(cfg),
  multi_tp_entry: (cfg) => new MultiTpStrategy(cfg),
  multi_position_entry: (cfg) => new MultiPositionStrategy(cfg),
};

/** Selected once at startup; the engine never switches strategy at runtime */
export function createEntryStrategy(name: EntryStrategyName, cfg: EntryConfig): EntryStrategy {
  return factories[name](cfg);
}

export { EntryStrategy } from './base.js';
