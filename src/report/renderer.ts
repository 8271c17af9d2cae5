import type { Borders, Workbook, Worksheet } from 'exceljs';
import { flattenColumns, nodeWidth } from './layout.js';
import type { ReportCell, ReportTable } from '../types/report.js';

const HEADER_ROWS = 2;         // day labels, then metric labels
const FIRST_DATA_COL = 2;      // column A holds the index
const COLUMN_PADDING = 2;

const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

/** Drop any sheet with this name (any letter case) and append a fresh one. */
export function replaceSheet(workbook: Workbook, name: string): Worksheet {
  const lower = name.toLowerCase();
  for (const existing of [...workbook.worksheets]) {
    if (existing.name.toLowerCase() === lower) workbook.removeWorksheet(existing.id);
  }
  return workbook.addWorksheet(name);
}

function rendered(value: ReportCell | string): string {
  return value === null ? '' : String(value);
}

/**
 * Write a layout table into its sheet and style it. Pure layout: every
 * value is taken as-is from the table.
 */
export function renderReport(workbook: Workbook, table: ReportTable): Worksheet {
  const sheet = replaceSheet(workbook, table.sheetName);
  const columns = flattenColumns(table.nodes);
  const widths: number[] = new Array(columns.length + 1).fill(0);
  const track = (col: number, value: ReportCell | string): void => {
    widths[col - 1] = Math.max(widths[col - 1] ?? 0, rendered(value).length);
  };

  // Row 1: one merged label per day block
  let col = FIRST_DATA_COL;
  for (const node of table.nodes) {
    const width = nodeWidth(node);
    if (node.kind === 'block' && width > 0) {
      const cell = sheet.getCell(1, col);
      cell.value = node.label;
      cell.font = { bold: true };
      cell.alignment = { horizontal: 'center' };
      track(col, node.label);
      if (width > 1) sheet.mergeCells(1, col, 1, col + width - 1);
    }
    col += width;
  }

  // Row 2: index label and metric labels
  if (table.indexLabel) {
    sheet.getCell(HEADER_ROWS, 1).value = table.indexLabel;
    sheet.getCell(HEADER_ROWS, 1).font = { bold: true };
    track(1, table.indexLabel);
  }
  columns.forEach((column, i) => {
    if (column.kind !== 'data') return;
    const cell = sheet.getCell(HEADER_ROWS, FIRST_DATA_COL + i);
    cell.value = column.label;
    cell.font = { bold: true };
    track(FIRST_DATA_COL + i, column.label);
  });

  table.rows.forEach((row, r) => {
    const rowNum = HEADER_ROWS + 1 + r;
    if (row.index !== null) {
      sheet.getCell(rowNum, 1).value = row.index;
      track(1, row.index);
    }
    row.cells.forEach((value, i) => {
      if (value === null || columns[i]?.kind !== 'data') return;
      sheet.getCell(rowNum, FIRST_DATA_COL + i).value = value;
      track(FIRST_DATA_COL + i, value);
    });
  });

  // Grid around boxed spans (header row + data rows); spacers stay bare
  const lastRow = HEADER_ROWS + table.rows.length;
  columns.forEach((column, i) => {
    for (let r = 1; r <= lastRow; r++) {
      const cell = sheet.getCell(r, FIRST_DATA_COL + i);
      if (column.kind === 'spacer') cell.border = {};
      else if (column.boxed && r >= HEADER_ROWS) cell.border = THIN_BORDER;
    }
  });

  if (table.hideIndex) sheet.getColumn(1).hidden = true;

  widths.forEach((len, i) => {
    if (i === 0 && table.hideIndex) return;
    sheet.getColumn(i + 1).width = len + COLUMN_PADDING;
  });

  return sheet;
}
