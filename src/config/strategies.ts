import { config, type Config, type EntryStrategyName } from './index.js';

export interface EntryConfig {
  /** Pip size assumed when the venue does not report precision */
  defaultPipSize: number;
  /** Adaptive near-market offset, in points (10^-digits) */
  adaptiveOffsetPoints: number;

  dualEntryVolume: number;

  tripleEntryBaseVolume: number;
  /** Multipliers ordered from the first-filled leg to the last-filled leg */
  tripleEntryMultipliers: [number, number, number];

  /** TP distances in pips for legs 1..n-1; the last leg uses the signal TP */
  multiTpPips: number[];
  multiTpVolumes: number[];

  multiPositionCount: number;
  multiPositionVolume: number;
  /** Relative leg counts for the dominant, middle and far zones */
  multiPositionZoneWeights: [number, number, number];
  /** Ascending TP tiers (pips) per zone; null means the signal TP */
  multiPositionTpTiers: {
    dominant: Array<number | null>;
    middle: Array<number | null>;
    far: Array<number | null>;
  };
}

export interface ParserConfig {
  minMessageLength: number;
  ignorePhrases: string[];
  rangeCeiling: number;
  defaultVolume: number;
  symbolMode: 'fixed' | 'extract';
  tradingSymbol: string;
  symbolMinLength: number;
}

export interface ManagementConfig {
  bePartialVolume: number;
  partialVolume: number;
  /** SL counts as break-even when within this distance of entry */
  beTolerance: number;
  tpHitCancelEnabled: boolean;
}

export interface ExecutionConfig {
  minMarketDistance: number;
  commentPrefix: string;
}

// Chatter, recaps and instruments we never trade
export const DEFAULT_IGNORE_PHRASES = [
  'reason for',
  'looking at',
  'weekly trading summary',
  'weekly journals',
  'elite trader',
  'analysis',
  'strategy',
  'summary',
  'haha',
  'livestream',
  'twitch',
  'how to',
  'btc',
  'btcusd',
  'bitcoin',
  'gbpjpy',
  'nzdjpy',
  'zoom',
  'recap',
  'w in the chat',
  'stream',
  'channel',
  'batch',
  'vip discussion',
  'youtube',
  'discord',
  'lol',
];

const MULTI_LEG_STRATEGIES: ReadonlySet<EntryStrategyName> = new Set([
  'dual_entry',
  'triple_entry',
  'multi_tp_entry',
  'multi_position_entry',
]);

export function isMultiLegStrategy(name: EntryStrategyName): boolean {
  return MULTI_LEG_STRATEGIES.has(name);
}

export function buildEntryConfig(cfg: Config = config): EntryConfig {
  return {
    defaultPipSize: 0.0001,
    adaptiveOffsetPoints: 2,
    dualEntryVolume: 0.07,
    tripleEntryBaseVolume: cfg.defaultVolumeMulti,
    tripleEntryMultipliers: [1, 2, 3],
    multiTpPips: [200, 400, 600, 800],
    multiTpVolumes: [0.01, 0.01, 0.01, 0.01, 0.01],
    multiPositionCount: cfg.numberPositionsMulti,
    multiPositionVolume: cfg.positionVolumeMulti,
    multiPositionZoneWeights: [4, 3, 2],
    multiPositionTpTiers: {
      dominant: [200, 400, 600, null],
      middle: [200, 400, 600],
      far: [200, 400],
    },
  };
}

export function buildParserConfig(cfg: Config = config): ParserConfig {
  return {
    minMessageLength: cfg.minMessageLength,
    ignorePhrases: cfg.ignorePhrases ?? DEFAULT_IGNORE_PHRASES,
    rangeCeiling: cfg.rangeCeiling,
    defaultVolume: cfg.defaultVolume,
    symbolMode: cfg.symbolMode,
    tradingSymbol: cfg.tradingSymbol,
    symbolMinLength: 6,
  };
}

/** Multi-leg strategies open small legs, so management closes smaller slices */
export function buildManagementConfig(cfg: Config = config): ManagementConfig {
  const multi = isMultiLegStrategy(cfg.entryStrategy);
  return {
    bePartialVolume: multi ? cfg.bePartialVolumeMulti : cfg.bePartialVolume,
    partialVolume: multi ? cfg.partialsVolumeMulti : cfg.partialsVolume,
    beTolerance: 0.00001,
    tpHitCancelEnabled: cfg.tpHitCancelEnabled,
  };
}

export function buildExecutionConfig(cfg: Config = config): ExecutionConfig {
  return {
    minMarketDistance: cfg.minMarketDistance,
    commentPrefix: cfg.orderCommentPrefix,
  };
}
