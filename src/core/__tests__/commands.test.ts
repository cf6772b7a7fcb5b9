import { describe, expect, it } from 'vitest';
import { detectCommands, matchedKinds } from '../commands.js';

function kinds(text: string) {
  return matchedKinds(detectCommands(text));
}

describe('detectCommands', () => {
  it.each([
    'Move SL to entry',
    'BREAKEVEN now',
    'sl to be please',
    'BE',
    'Gold running, BE now',
  ])('detects break-even in %j', (text) => {
    expect(detectCommands(text).breakEven).toBe(true);
  });

  it('ignores a lowercase "be" in ordinary prose', () => {
    expect(detectCommands('Should be a good week').breakEven).toBe(false);
  });

  it('reads the TP level and pips of a partial', () => {
    expect(detectCommands('TP1 hit, taking partials +30 pips').partial).toEqual({ level: '1', pips: 30 });
  });

  it('treats a partial keyword without a level as a plain partial', () => {
    expect(detectCommands('Close half here').partial).toEqual({ level: null, pips: null });
  });

  it('does not mistake target labels in a signal for a partial', () => {
    expect(kinds('BUY XAUUSD 3990-3985\nSL: 3980\nTP1: 4010\nTP2: 4030')).toEqual([]);
  });

  it('reads a level label followed by a price as part of a signal', () => {
    expect(kinds('BUY 3990-3985 SL 3980 TP1 4010')).toEqual([]);
    expect(detectCommands('TP1 30 pips, taking partials').partial).toEqual({ level: '1', pips: 30 });
  });

  it('detects a full close', () => {
    expect(kinds('Close all positions now')).toEqual(['full_close']);
  });

  it('matches phrases on word boundaries only', () => {
    expect(detectCommands('we will disclose all results').fullClose).toBe(false);
  });

  it('detects a TP-hit cancel', () => {
    expect(kinds('All targets hit, cancel pending orders')).toEqual(['tp_hit']);
  });

  it.each([
    ['Move TP to 4050', 4050],
    ['new target: 4062.5', 4062.5],
    ['tp to 4100', 4100],
  ])('reads the new take-profit from %j', (text, price) => {
    expect(detectCommands(text).extendTp).toEqual({ price });
  });

  it('rejects a zero take-profit', () => {
    expect(detectCommands('New TP: 0').extendTp).toBeNull();
  });

  it('returns every matched command in dispatch order', () => {
    expect(kinds('Close half and move SL to entry')).toEqual(['break_even', 'partial']);
  });

  it('finds nothing in chatter', () => {
    expect(detectCommands('Good morning traders')).toEqual({
      breakEven: false,
      partial: null,
      fullClose: false,
      tpHit: false,
      extendTp: null,
    });
  });
});
