import type { CellValue, Worksheet } from 'exceljs';
import type { CellGrid, RawCell } from '../types/chain.js';

/** Flatten an exceljs cell value to what the sheet parser reads. */
export function toRawCell(value: CellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if ('richText' in value) return value.richText.map(part => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) return toRawCell(value.result);   // formula: cached result
  return null;                                              // #N/A, #DIV/0! ...
}

/** Zero-based cell grid of a worksheet, padded to its column count. */
export function worksheetToGrid(sheet: Worksheet): CellGrid {
  const grid: CellGrid = [];
  const width = sheet.columnCount;
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: RawCell[] = [];
    for (let c = 1; c <= width; c++) cells.push(toRawCell(row.getCell(c).value));
    grid.push(cells);
  }
  return grid;
}
