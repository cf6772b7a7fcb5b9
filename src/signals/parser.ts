import type { ParserConfig } from '../config/strategies.js';
import type { Direction, ParseOutcome, Signal } from '../core/types.js';
import { createChildLogger } from '../monitoring/logger.js';

const log = createChildLogger('parser');

const SELL_MARKER = '🔴';
const BUY_MARKER = '🟢';

const NUMBER = String.raw`\d+(?:\.\d+)?`;
const NUMBER_RE = new RegExp(NUMBER, 'g');
const RANGE_RE = new RegExp(String.raw`(?:RANGE|:)\s*(${NUMBER})\s*[-–~]\s*(${NUMBER})`, 'i');
const SL_RE = new RegExp(String.raw`\bSL\s*:?\s*(${NUMBER})`, 'i');
// "TP1: 4050" and "TP1 4050" label a level; skip the label digit and take the price
const TP_RE = new RegExp(String.raw`\bTP\s*(?:[1-5](?:\s*:\s*|\s+)(?=\/?\s*\d))?:?\s*\/?\s*(${NUMBER})`, 'i');
const VOLUME_RE = /\b(?:lots?|volume)s?\s*[:=]?\s*(\d+(?:\.\d+)?)/i;
const HAS_ALNUM_RE = /[\p{L}\p{N}]/u;

// Uppercase tokens that are part of the signal grammar, never an instrument
const RESERVED_TOKENS = new Set([
  'RANGE', 'BUY', 'SELL', 'LIMIT', 'STOP', 'ENTRY', 'NOW', 'LOT', 'LOTS', 'VOLUME', 'PIPS', 'SIGNAL', 'TARGET',
]);

export class SignalParser {
  private readonly ignorePhrases: string[];

  constructor(private readonly cfg: ParserConfig, private readonly now: () => Date = () => new Date()) {
    this.ignorePhrases = cfg.ignorePhrases.map((p) => p.toLowerCase());
  }

  parse(text: string): ParseOutcome {
    try {
      return this.parseUnsafe(text);
    } catch (err) {
      log.error({ err }, 'Unexpected parser failure');
      return { ok: false, reason: 'parser error' };
    }
  }

  private parseUnsafe(text: string): ParseOutcome {
    const trimmed = text.trim();
    if (trimmed.length < this.cfg.minMessageLength) return fail('too short');
    if (!HAS_ALNUM_RE.test(trimmed)) return fail('no alphanumeric content');

    const lower = trimmed.toLowerCase();
    const ignored = this.ignorePhrases.find((p) => lower.includes(p));
    if (ignored) return fail(`ignore phrase "${ignored}"`);

    const direction = detectDirection(trimmed);
    if (!direction) return fail('no direction');

    const numbers: string[] = trimmed.match(NUMBER_RE) ?? [];
    if (numbers.length < 4) return fail(`only ${numbers.length} numbers`);

    const rangeMatch = RANGE_RE.exec(trimmed);
    const bound1 = parseFloat(rangeMatch ? rangeMatch[1] : numbers[0]);
    const bound2 = parseFloat(rangeMatch ? rangeMatch[2] : numbers[1]);
    const rangeStart = Math.max(bound1, bound2);
    const rangeEnd = Math.min(bound1, bound2);

    const slMatch = SL_RE.exec(trimmed);
    if (!slMatch) return fail('no stop loss');
    const tpMatch = TP_RE.exec(trimmed);
    if (!tpMatch) return fail('no take profit');

    const volumeMatch = VOLUME_RE.exec(trimmed);
    const volume = volumeMatch ? parseFloat(volumeMatch[1]) : this.cfg.defaultVolume;
    if (!(volume > 0)) return fail('non-positive volume');

    if (rangeStart > this.cfg.rangeCeiling) {
      return fail(`range ${rangeStart} above ceiling ${this.cfg.rangeCeiling}`);
    }

    const symbol = this.resolveSymbol(trimmed);
    if (!symbol) return fail('no symbol');

    const signal: Signal = {
      symbol,
      direction,
      rangeStart,
      rangeEnd,
      stopLoss: parseFloat(slMatch[1]),
      takeProfit: parseFloat(tpMatch[1]),
      volume,
      rawText: text,
      timestamp: this.now().toISOString(),
    };
    log.debug({ signal }, 'Signal parsed');
    return { ok: true, signal };
  }

  private resolveSymbol(text: string): string | null {
    if (this.cfg.symbolMode === 'fixed') return this.cfg.tradingSymbol;

    const tokenRe = new RegExp(String.raw`\b[A-Z]{${this.cfg.symbolMinLength},}\b`, 'g');
    for (const token of text.match(tokenRe) ?? []) {
      if (!RESERVED_TOKENS.has(token)) return token;
    }
    return null;
  }
}

function detectDirection(text: string): Direction | null {
  if (text.includes(SELL_MARKER)) return 'sell';
  if (text.includes(BUY_MARKER)) return 'buy';
  if (/\bSELL\b/i.test(text)) return 'sell';
  if (/\bBUY\b/i.test(text)) return 'buy';
  return null;
}

function fail(reason: string): ParseOutcome {
  return { ok: false, reason };
}
