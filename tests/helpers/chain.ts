import type { DailyRecord, DaySheet } from '../../src/types/chain.js';

type RecordFields = Partial<Omit<DailyRecord, 'strike' | 'dayIndex' | 'dayLabel'>>;

export function record(strike: number, fields: RecordFields = {}): Omit<DailyRecord, 'dayIndex' | 'dayLabel'> {
  return {
    strike,
    callMoney: 0,
    callVwap: 0,
    callLtp: 0,
    putMoney: 0,
    putVwap: 0,
    putLtp: 0,
    ...fields,
  };
}

export function day(dayIndex: number, dayLabel: string, records: Array<Omit<DailyRecord, 'dayIndex' | 'dayLabel'>>): DaySheet {
  return {
    dayIndex,
    dayLabel,
    records: records.map(r => ({ ...r, dayIndex, dayLabel })),
  };
}
