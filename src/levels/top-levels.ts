import type { OptionSide } from '../types/chain.js';
import type { DayLevels, DaySnapshot, RankedLevels, RankedRow, StrikeSnapshot } from '../types/levels.js';

export const TOP_LEVEL_COUNT = 5;

const BLANK_ROW: RankedRow = { strike: null, money: null, refPrice: null, bep: null };

function toRow(s: StrikeSnapshot, side: OptionSide): RankedRow {
  return side === 'call'
    ? { strike: s.strike, money: s.callMoney, refPrice: s.callAvgRef, bep: s.callBep }
    : { strike: s.strike, money: s.putMoney, refPrice: s.putAvgRef, bep: s.putBep };
}

/**
 * Top strikes of one side by cumulative money.
 * Ranking is stable over the snapshot's ascending-strike order, so equal
 * money keeps the lower strike first. The selected rows are then shown
 * strike-descending and padded to TOP_LEVEL_COUNT.
 */
export function rankSide(strikes: readonly StrikeSnapshot[], side: OptionSide): RankedLevels {
  const money = (s: StrikeSnapshot): number => (side === 'call' ? s.callMoney : s.putMoney);

  const selected = [...strikes]
    .sort((a, b) => money(b) - money(a))
    .slice(0, TOP_LEVEL_COUNT)
    .sort((a, b) => b.strike - a.strike);

  const rows = selected.map(s => toRow(s, side));
  while (rows.length < TOP_LEVEL_COUNT) rows.push({ ...BLANK_ROW });

  return {
    side,
    rows,
    totalMoney: selected.reduce((sum, s) => sum + money(s), 0),
  };
}

export function extractTopLevels(snapshot: DaySnapshot): DayLevels {
  return {
    dayIndex: snapshot.dayIndex,
    dayLabel: snapshot.dayLabel,
    calls: rankSide(snapshot.strikes, 'call'),
    puts: rankSide(snapshot.strikes, 'put'),
  };
}
