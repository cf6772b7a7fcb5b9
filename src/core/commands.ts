import type { CommandKind, DetectedCommands } from './types.js';

const NUMBER = String.raw`(\d+(?:\.\d+)?)`;

/** Builds a case-insensitive matcher for a phrase bounded by non-alphanumerics */
function phrase(text: string): RegExp {
  const body = text
    .trim()
    .split(/\s+/)
    .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

const BREAK_EVEN = [
  'break even',
  'breakeven',
  'move sl to entry',
  'sl to entry',
  'move stop to entry',
  'sl be',
  'sl to be',
  'slto be',
  'move to be',
].map(phrase);

// A bare "be" is an English word too, so only the shouted form counts
const BREAK_EVEN_SHORT = /(?<![A-Za-z0-9])BE(?![A-Za-z0-9])/;

const FULL_CLOSE = [
  'position closed',
  'positions closed',
  'close position',
  'close positions',
  'close all',
  'close remaining',
  'exit all',
  'exit position',
  'exit positions',
  'close trade',
  'close trades',
  'position close',
  'full close',
  'close full',
].map(phrase);

const PARTIAL = [
  'close half',
  'close 25%',
  'close 50%',
  'close 75%',
  'taking partials',
  'take partials',
  'partials here',
].map(phrase);

// "TP1: 3990" inside a signal is a target label, not a command
// "TP1: 4010" or "TP1 4010" is a target label in a signal; "TP1 30 pips" is still a partial
const PARTIAL_LEVEL = /(?<![a-z0-9])tp\s*([1-4])(?![0-9])(?!\s*[:=@/])(?!\s+\d+(?:\.\d+)?(?![\d.])(?!\s*pips?(?![a-z])))/i;
const PIPS = new RegExp(`${NUMBER}\\s*pips?(?![a-z])`, 'i');

const TP_HIT = [
  'tp hit',
  'tps hit',
  'target hit',
  'targets hit',
  'all targets hit',
  'cancel all orders',
  'cancel pending',
  'cancel orders',
  'delete pending',
].map(phrase);

const EXTEND_TP = [
  new RegExp(String.raw`\b(?:extend|move|change|update)\s+(?:tp|take\s+profit|target)\s*(?:to\s*)?:?\s*${NUMBER}`, 'i'),
  new RegExp(String.raw`\bnew\s+(?:tp|target)\s*:?\s*${NUMBER}`, 'i'),
  new RegExp(String.raw`\btp\s+to\s+${NUMBER}`, 'i'),
];

export function detectCommands(text: string): DetectedCommands {
  return {
    breakEven: BREAK_EVEN_SHORT.test(text) || BREAK_EVEN.some((re) => re.test(text)),
    partial: detectPartial(text),
    fullClose: FULL_CLOSE.some((re) => re.test(text)),
    tpHit: TP_HIT.some((re) => re.test(text)),
    extendTp: detectExtendTp(text),
  };
}

function detectPartial(text: string): DetectedCommands['partial'] {
  const level = PARTIAL_LEVEL.exec(text);
  const keyword = PARTIAL.some((re) => re.test(text));
  if (!level && !keyword) return null;

  const pips = PIPS.exec(text);
  return {
    level: level ? level[1] : null,
    pips: pips ? Number(pips[1]) : null,
  };
}

function detectExtendTp(text: string): DetectedCommands['extendTp'] {
  for (const re of EXTEND_TP) {
    const match = re.exec(text);
    if (match) {
      const price = Number(match[1]);
      if (Number.isFinite(price) && price > 0) return { price };
    }
  }
  return null;
}

/** Matched commands in dispatch order */
export function matchedKinds(detected: DetectedCommands): CommandKind[] {
  const kinds: CommandKind[] = [];
  if (detected.breakEven) kinds.push('break_even');
  if (detected.partial) kinds.push('partial');
  if (detected.fullClose) kinds.push('full_close');
  if (detected.tpHit) kinds.push('tp_hit');
  if (detected.extendTp) kinds.push('extend_tp');
  return kinds;
}
