import type { OptionSide, PricingMode } from './chain.js';

export interface StrikeSnapshot {
  strike: number;
  callMoney: number;        // cumulative through this day
  putMoney: number;
  callAvgRef: number;       // mean of positive reference prices so far, 0 if none
  putAvgRef: number;
  callBep: number;          // strike + callAvgRef
  putBep: number;           // strike - putAvgRef
}

export interface DaySnapshot {
  dayIndex: number;
  dayLabel: string;
  strikes: StrikeSnapshot[];   // strike ascending, one per strike in the universe
}

/** One display row of a ranked table. Padding rows are all null. */
export interface RankedRow {
  strike: number | null;
  money: number | null;
  refPrice: number | null;
  bep: number | null;
}

export interface RankedLevels {
  side: OptionSide;
  rows: RankedRow[];        // always TOP_LEVEL_COUNT rows, strike descending, padding last
  totalMoney: number;       // sum over the selected (non-padding) rows
}

export interface DayLevels {
  dayIndex: number;
  dayLabel: string;
  calls: RankedLevels;
  puts: RankedLevels;
}

export type StrikeModes = ReadonlyMap<number, PricingMode>;
