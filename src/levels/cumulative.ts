import { referencePrice } from './pricing-mode.js';
import type { DaySheet } from '../types/chain.js';
import type { DaySnapshot, StrikeModes, StrikeSnapshot } from '../types/levels.js';

interface SideAccumulator {
  money: number;
  refSum: number;
  refCount: number;
}

export interface StrikeAccumulator {
  call: SideAccumulator;
  put: SideAccumulator;
}

export type AccumulatorState = ReadonlyMap<number, StrikeAccumulator>;

const EMPTY_SIDE: SideAccumulator = { money: 0, refSum: 0, refCount: 0 };

/** Sorted set of every strike seen on any day. */
export function strikeUniverse(days: readonly DaySheet[]): number[] {
  const strikes = new Set<number>();
  for (const day of days) for (const r of day.records) strikes.add(r.strike);
  return [...strikes].sort((a, b) => a - b);
}

export function initialState(universe: readonly number[]): AccumulatorState {
  return new Map(universe.map((strike): [number, StrikeAccumulator] => [strike, { call: EMPTY_SIDE, put: EMPTY_SIDE }]));
}

function addDay(side: SideAccumulator, money: number, ref: number): SideAccumulator {
  // Money always counts; only a positive reference price enters the average.
  return ref > 0
    ? { money: side.money + money, refSum: side.refSum + ref, refCount: side.refCount + 1 }
    : { money: side.money + money, refSum: side.refSum, refCount: side.refCount };
}

function average(side: SideAccumulator): number {
  return side.refCount > 0 ? side.refSum / side.refCount : 0;
}

/**
 * Fold one day into the accumulator. Returns a new state; strikes absent
 * from the day carry their previous accumulator unchanged.
 */
export function foldDay(state: AccumulatorState, day: DaySheet, modes: StrikeModes): AccumulatorState {
  const next = new Map(state);
  for (const r of day.records) {
    const prev = next.get(r.strike);
    if (!prev) {
      throw new Error(`Strike ${r.strike} on ${day.dayLabel} is outside the strike universe`);
    }
    const mode = modes.get(r.strike) ?? 'STANDARD';
    next.set(r.strike, {
      call: addDay(prev.call, r.callMoney, referencePrice(mode, r.callVwap, r.callLtp)),
      put:  addDay(prev.put,  r.putMoney,  referencePrice(mode, r.putVwap,  r.putLtp)),
    });
  }
  return next;
}

export function snapshotOf(strike: number, acc: StrikeAccumulator): StrikeSnapshot {
  const callAvgRef = average(acc.call);
  const putAvgRef = average(acc.put);
  return {
    strike,
    callMoney: acc.call.money,
    putMoney: acc.put.money,
    callAvgRef,
    putAvgRef,
    callBep: strike + callAvgRef,
    putBep: strike - putAvgRef,
  };
}

/**
 * Cumulative picture of every strike as of each day, in day order.
 * Each snapshot depends only on days up to and including its own.
 */
export function accumulateDays(
  days: readonly DaySheet[],
  universe: readonly number[],
  modes: StrikeModes,
): DaySnapshot[] {
  const ordered = [...days].sort((a, b) => a.dayIndex - b.dayIndex);
  const snapshots: DaySnapshot[] = [];

  let state = initialState(universe);
  for (const day of ordered) {
    state = foldDay(state, day, modes);
    const current = state;
    snapshots.push({
      dayIndex: day.dayIndex,
      dayLabel: day.dayLabel,
      strikes: universe.map(strike => snapshotOf(strike, current.get(strike) ?? { call: EMPTY_SIDE, put: EMPTY_SIDE })),
    });
  }

  return snapshots;
}
