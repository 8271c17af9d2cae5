import { joinBlocks, layoutRow, spacer } from './layout.js';
import type { DayLevels, DaySnapshot, RankedLevels } from '../types/levels.js';
import type { BlockNode, ReportCell, ReportRow, ReportTable } from '../types/report.js';

export const TOTAL_SHEET = 'Total';
export const MAX_SHEET = 'Max';

const TOTAL_COLUMNS = ['CE BEP', 'CE Money', 'PE Money', 'PE BEP'];
const CALL_COLUMNS = ['CE Strike', 'Money', 'AVWAP', 'CE BEP'];
const PUT_COLUMNS = ['PE Strike', 'Money', 'AVWAP', 'PE BEP'];

const TOTAL_DAY_GAP = 1;
const MAX_DAY_GAP = 2;
const MAX_SIDE_GAP = 1;

/**
 * Cumulative history: one row per strike (ascending), one 4-column block
 * per day. Each block is the state through that day, not the day alone.
 */
export function buildTotalTable(snapshots: readonly DaySnapshot[], universe: readonly number[]): ReportTable {
  const blocks = snapshots.map((s): BlockNode => ({
    kind: 'block',
    label: s.dayLabel,
    spans: [{ kind: 'data', columns: TOTAL_COLUMNS, boxed: false }],
  }));
  const nodes = joinBlocks(blocks, TOTAL_DAY_GAP);

  const rows: ReportRow[] = universe.map(strike => ({
    index: strike,
    cells: layoutRow(nodes, snapshots.map(s => {
      const snap = s.strikes.find(x => x.strike === strike);
      return snap ? [snap.callBep, snap.callMoney, snap.putMoney, snap.putBep] : [];
    })),
  }));

  return { sheetName: TOTAL_SHEET, indexLabel: 'Strike', hideIndex: false, nodes, rows };
}

function sideCells(levels: RankedLevels, rowIdx: number): ReportCell[] {
  if (rowIdx === levels.rows.length) return [null, levels.totalMoney, null, null];
  const row = levels.rows[rowIdx];
  return row ? [row.strike, row.money, row.refPrice, row.bep] : [null, null, null, null];
}

/**
 * Per-day ranked summary: call table, spacer, put table per day; five
 * ranked rows then the totals row.
 */
export function buildMaxTable(days: readonly DayLevels[]): ReportTable {
  const blocks = days.map((d): BlockNode => ({
    kind: 'block',
    label: d.dayLabel,
    spans: [
      { kind: 'data', columns: CALL_COLUMNS, boxed: true },
      spacer(MAX_SIDE_GAP),
      { kind: 'data', columns: PUT_COLUMNS, boxed: true },
    ],
  }));
  const nodes = joinBlocks(blocks, MAX_DAY_GAP);

  const rowCount = (days[0]?.calls.rows.length ?? 0) + 1;
  const rows: ReportRow[] = [];
  for (let i = 0; i < rowCount; i++) {
    rows.push({
      index: null,
      cells: layoutRow(nodes, days.map(d => [...sideCells(d.calls, i), ...sideCells(d.puts, i)])),
    });
  }

  return { sheetName: MAX_SHEET, indexLabel: '', hideIndex: true, nodes, rows };
}
