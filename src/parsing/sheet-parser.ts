import type { CellGrid, DailyRecord, RawCell, SheetParseResult } from '../types/chain.js';

export const HEADER_SCAN_ROWS = 10;
const HEADER_MARKERS = ['strike', 'chg in oi value'];

export const COLUMNS = {
  strike:    'Strike',
  callMoney: 'Chg in OI Value',
  callVwap:  'VWAP',
  callLtp:   'LTP (Chg %)',
  putMoney:  'Chg in OI Value.1',
  putVwap:   'VWAP.1',
  putLtp:    'LTP (Chg %).1',
} as const;

type ColumnKey = keyof typeof COLUMNS;

const REQUIRED: ColumnKey[] = ['strike', 'callMoney'];
const OPTIONAL: ColumnKey[] = ['callVwap', 'callLtp', 'putMoney', 'putVwap', 'putLtp'];

function cellText(cell: RawCell): string {
  return cell === null ? '' : String(cell).trim();
}

/** Index of the first row in the scan window holding a header marker, or null. */
export function locateHeaderRow(grid: CellGrid): number | null {
  const limit = Math.min(grid.length, HEADER_SCAN_ROWS);
  for (let i = 0; i < limit; i++) {
    const row = grid[i] ?? [];
    if (row.some(cell => HEADER_MARKERS.includes(cellText(cell).toLowerCase()))) return i;
  }
  return null;
}

/**
 * Header names for a header row. Names are trimmed, blanks become
 * 'Unnamed: <col>', and repeats get '.1', '.2' ... so the put side of a
 * chain (which reuses the call headings) is addressable.
 */
export function headerNames(row: readonly RawCell[]): string[] {
  const seen = new Map<string, number>();
  return row.map((cell, col) => {
    const base = cellText(cell) || `Unnamed: ${col}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Numeric coercion; anything that isn't a finite decimal number is missing (null). */
export function toNumber(cell: RawCell | undefined): number | null {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (typeof cell === 'string') {
    const text = cell.trim();
    if (!DECIMAL.test(text)) return null;
    const n = Number(text);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Two-phase parse of one day sheet: find the header row, then validate
 * columns and build typed records. Missing optional columns read as 0.
 */
export function parseDaySheet(grid: CellGrid, dayIndex: number, dayLabel: string): SheetParseResult {
  const headerIdx = locateHeaderRow(grid);
  if (headerIdx === null) {
    return {
      ok: false,
      reason: 'HEADER_NOT_FOUND',
      detail: `no '${HEADER_MARKERS.join("' or '")}' cell in the first ${HEADER_SCAN_ROWS} rows`,
    };
  }

  const names = headerNames(grid[headerIdx] ?? []);
  const position = (key: ColumnKey): number => names.indexOf(COLUMNS[key]);

  const missingRequired = REQUIRED.filter(key => position(key) < 0);
  if (missingRequired.length > 0) {
    return {
      ok: false,
      reason: 'MISSING_COLUMN',
      detail: `missing ${missingRequired.map(key => `'${COLUMNS[key]}'`).join(', ')} (found: ${names.join(', ')})`,
    };
  }
  const missingOptional = OPTIONAL.filter(key => position(key) < 0).map(key => COLUMNS[key]);

  const read = (row: readonly RawCell[], key: ColumnKey): number => {
    const col = position(key);
    return col < 0 ? 0 : toNumber(row[col]) ?? 0;
  };

  const records: DailyRecord[] = [];
  const seen = new Set<number>();
  for (const row of grid.slice(headerIdx + 1)) {
    const strike = toNumber(row[position('strike')]);
    if (strike === null || seen.has(strike)) continue;
    seen.add(strike);
    records.push({
      strike,
      callMoney: read(row, 'callMoney'),
      callVwap:  read(row, 'callVwap'),
      callLtp:   read(row, 'callLtp'),
      putMoney:  read(row, 'putMoney'),
      putVwap:   read(row, 'putVwap'),
      putLtp:    read(row, 'putLtp'),
      dayIndex,
      dayLabel,
    });
  }

  return { ok: true, sheet: { dayIndex, dayLabel, records }, missingOptional };
}
