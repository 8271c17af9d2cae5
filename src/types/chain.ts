export type OptionSide = 'call' | 'put';

export type PricingMode = 'STANDARD' | 'FORCE_LTP';

/** A single cell as read off a day sheet, before numeric coercion. */
export type RawCell = string | number | boolean | null;

export type CellGrid = RawCell[][];

export interface DailyRecord {
  readonly strike: number;
  readonly callMoney: number;     // Chg in OI Value
  readonly callVwap: number;
  readonly callLtp: number;
  readonly putMoney: number;      // Chg in OI Value.1
  readonly putVwap: number;
  readonly putLtp: number;
  readonly dayIndex: number;      // discovery order among parsed days, 0 = earliest
  readonly dayLabel: string;      // sheet name
}

export interface DaySheet {
  dayIndex: number;
  dayLabel: string;
  records: readonly DailyRecord[];
}

export type SheetFailureReason = 'HEADER_NOT_FOUND' | 'MISSING_COLUMN';

export type SheetParseResult =
  | { ok: true; sheet: DaySheet; missingOptional: string[] }
  | { ok: false; reason: SheetFailureReason; detail: string };
