import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { toRawCell, worksheetToGrid } from '../src/parsing/worksheet-grid.js';

describe('toRawCell', () => {
  it('passes primitives through and blanks empty cells', () => {
    expect(toRawCell(5)).toBe(5);
    expect(toRawCell('Strike')).toBe('Strike');
    expect(toRawCell(false)).toBe(false);
    expect(toRawCell(null)).toBeNull();
    expect(toRawCell(undefined)).toBeNull();
  });

  it('uses the cached result of formula cells', () => {
    expect(toRawCell({ formula: 'A1+A2', result: 30, date1904: false })).toBe(30);
    expect(toRawCell({ formula: 'A1+A2', date1904: false })).toBeNull();
  });

  it('joins rich text and reads hyperlink text', () => {
    expect(toRawCell({ richText: [{ text: 'Chg in ' }, { text: 'OI Value' }] })).toBe('Chg in OI Value');
    expect(toRawCell({ text: 'Strike', hyperlink: 'https://example.com' })).toBe('Strike');
  });

  it('blanks error cells and writes dates as ISO text', () => {
    expect(toRawCell({ error: '#N/A' })).toBeNull();
    expect(toRawCell(new Date(Date.UTC(2026, 1, 10)))).toBe('2026-02-10T00:00:00.000Z');
  });
});

describe('worksheetToGrid', () => {
  it('returns a zero-based grid padded to the sheet width', () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('tue');
    sheet.addRow(['Strike', 'Chg in OI Value', 'VWAP']);
    sheet.addRow([100, 40]);
    expect(worksheetToGrid(sheet)).toEqual([
      ['Strike', 'Chg in OI Value', 'VWAP'],
      [100, 40, null],
    ]);
  });
});
