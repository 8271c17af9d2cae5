import type { DailyRecord, DaySheet, PricingMode } from '../types/chain.js';
import type { StrikeModes } from '../types/levels.js';

/**
 * Pricing mode for one strike, decided once from its earliest record.
 * A non-positive call VWAP on the first day the strike appears forces LTP
 * for every day and for both sides of that strike; no records means STANDARD.
 */
export function resolvePricingMode(records: readonly DailyRecord[]): PricingMode {
  const first = records.reduce<DailyRecord | undefined>(
    (earliest, r) => (earliest === undefined || r.dayIndex < earliest.dayIndex ? r : earliest),
    undefined,
  );
  if (!first) return 'STANDARD';
  return first.callVwap <= 0 ? 'FORCE_LTP' : 'STANDARD';
}

/** Modes for every strike appearing in any day. */
export function resolvePricingModes(days: readonly DaySheet[]): StrikeModes {
  const byStrike = new Map<number, DailyRecord[]>();
  for (const day of days) {
    for (const record of day.records) {
      const group = byStrike.get(record.strike) ?? [];
      group.push(record);
      byStrike.set(record.strike, group);
    }
  }

  const modes = new Map<number, PricingMode>();
  for (const [strike, records] of byStrike) modes.set(strike, resolvePricingMode(records));
  return modes;
}

/** Reference price of one side for one day under the strike's mode. */
export function referencePrice(mode: PricingMode, vwap: number, ltp: number): number {
  if (mode === 'FORCE_LTP') return ltp;
  return vwap > 0 ? vwap : ltp;
}
