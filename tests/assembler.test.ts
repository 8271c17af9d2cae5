import { describe, it, expect } from 'vitest';
import { buildMaxTable, buildTotalTable } from '../src/report/assembler.js';
import { flattenColumns, joinBlocks, layoutRow, nodeWidth } from '../src/report/layout.js';
import { accumulateDays, strikeUniverse } from '../src/levels/cumulative.js';
import { resolvePricingModes } from '../src/levels/pricing-mode.js';
import { extractTopLevels } from '../src/levels/top-levels.js';
import type { BlockNode, LayoutNode } from '../src/types/report.js';
import { day, record } from './helpers/chain.js';

const block = (label: string, columns: string[]): BlockNode => ({
  kind: 'block',
  label,
  spans: [{ kind: 'data', columns, boxed: false }],
});

describe('layout', () => {
  it('joins blocks with spacers between them only', () => {
    const nodes = joinBlocks([block('a', ['x']), block('b', ['y']), block('c', ['z'])], 2);
    expect(nodes.map(n => n.kind)).toEqual(['block', 'spacer', 'block', 'spacer', 'block']);
    expect(nodes.map(nodeWidth)).toEqual([1, 2, 1, 2, 1]);
  });

  it('flattens blocks, inner spacers and outer spacers in order', () => {
    const nodes: LayoutNode[] = [
      { kind: 'block', label: 'tue', spans: [
        { kind: 'data', columns: ['p', 'q'], boxed: true },
        { kind: 'spacer', width: 1 },
        { kind: 'data', columns: ['r'], boxed: true },
      ] },
      { kind: 'spacer', width: 1 },
      block('wed', ['s']),
    ];
    expect(flattenColumns(nodes)).toEqual([
      { kind: 'data', group: 'tue', label: 'p', boxed: true },
      { kind: 'data', group: 'tue', label: 'q', boxed: true },
      { kind: 'spacer', group: 'tue', label: '', boxed: false },
      { kind: 'data', group: 'tue', label: 'r', boxed: true },
      { kind: 'spacer', group: '', label: '', boxed: false },
      { kind: 'data', group: 'wed', label: 's', boxed: false },
    ]);
    expect(layoutRow(nodes, [[1, 2, 3], [4]])).toEqual([1, 2, null, 3, null, 4]);
  });
});

const DAYS = [
  day(0, 'tue6', [
    record(100, { callMoney: 50, callVwap: 0, callLtp: 10, putMoney: 5, putLtp: 2 }),
    record(200, { callMoney: 20, callVwap: 4, callLtp: 3, putMoney: 30, putVwap: 6 }),
  ]),
  day(1, 'wed6', [
    record(100, { callMoney: -20, callVwap: 12, callLtp: 11, putMoney: 1, putLtp: 4 }),
  ]),
];

function report() {
  const universe = strikeUniverse(DAYS);
  const snapshots = accumulateDays(DAYS, universe, resolvePricingModes(DAYS));
  return { universe, snapshots, levels: snapshots.map(extractTopLevels) };
}

describe('buildTotalTable', () => {
  it('lays out one cumulative block per day with a single spacer between', () => {
    const { universe, snapshots } = report();
    const table = buildTotalTable(snapshots, universe);

    expect(table.sheetName).toBe('Total');
    expect(table.indexLabel).toBe('Strike');
    expect(table.hideIndex).toBe(false);
    expect(flattenColumns(table.nodes).map(c => `${c.group}:${c.label}`)).toEqual([
      'tue6:CE BEP', 'tue6:CE Money', 'tue6:PE Money', 'tue6:PE BEP',
      ':',
      'wed6:CE BEP', 'wed6:CE Money', 'wed6:PE Money', 'wed6:PE BEP',
    ]);
    expect(table.rows).toEqual([
      { index: 100, cells: [110, 50, 5, 98, null, 110.5, 30, 6, 97] },
      { index: 200, cells: [204, 20, 30, 194, null, 204, 20, 30, 194] },
    ]);
  });
});

describe('buildMaxTable', () => {
  it('lays out call and put tables per day with 1 and 2 wide spacers', () => {
    const { levels } = report();
    const table = buildMaxTable(levels);
    const columns = flattenColumns(table.nodes);

    expect(table.sheetName).toBe('Max');
    expect(table.hideIndex).toBe(true);
    expect(columns).toHaveLength(9 + 2 + 9);
    expect(columns.map(c => c.label).slice(0, 9)).toEqual([
      'CE Strike', 'Money', 'AVWAP', 'CE BEP', '', 'PE Strike', 'Money', 'AVWAP', 'PE BEP',
    ]);
    expect(columns.slice(9, 11).map(c => c.kind)).toEqual(['spacer', 'spacer']);
    expect(table.rows).toHaveLength(6);
  });

  it('fills ranked rows strike-descending, padding, then the totals row', () => {
    const { levels } = report();
    const table = buildMaxTable(levels);
    const tue = table.rows.map(r => r.cells.slice(0, 9));

    expect(tue[0]).toEqual([200, 20, 4, 204, null, 200, 30, 6, 194]);
    expect(tue[1]).toEqual([100, 50, 10, 110, null, 100, 5, 2, 98]);
    expect(tue[2]).toEqual([null, null, null, null, null, null, null, null, null]);
    expect(tue[5]).toEqual([null, 70, null, null, null, null, 35, null, null]);

    const wedTotals = table.rows[5]?.cells.slice(11);
    expect(wedTotals).toEqual([null, 50, null, null, null, null, 36, null, null]);
  });

  it('never puts a value in a spacer column', () => {
    const { levels } = report();
    const table = buildMaxTable(levels);
    const columns = flattenColumns(table.nodes);
    for (const row of table.rows) {
      row.cells.forEach((cell, i) => {
        if (columns[i]?.kind === 'spacer') expect(cell).toBeNull();
      });
    }
  });
});
