import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { readFile } from 'fs/promises';
import { buffer as streamToBuffer } from 'stream/consumers';
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { selectDaySheets } from '../parsing/day-sheets.js';
import { parseDaySheet } from '../parsing/sheet-parser.js';
import { worksheetToGrid } from '../parsing/worksheet-grid.js';
import { resolvePricingModes } from '../levels/pricing-mode.js';
import { accumulateDays, strikeUniverse } from '../levels/cumulative.js';
import { extractTopLevels } from '../levels/top-levels.js';
import { buildMaxTable, buildTotalTable } from '../report/assembler.js';
import { renderReport } from '../report/renderer.js';
import type { DaySheet, SheetParseResult } from '../types/chain.js';
import type { DayLevels, DaySnapshot, StrikeModes } from '../types/levels.js';
import type { ReportTable } from '../types/report.js';

/** A workbook file path, its bytes, or a stream of its bytes. */
export type WorkbookSource = string | Uint8Array | ArrayBuffer | Readable;

export interface LevelsReport {
  universe: number[];
  modes: StrikeModes;
  snapshots: DaySnapshot[];
  levels: DayLevels[];
  totalTable: ReportTable;
  maxTable: ReportTable;
}

/**
 * The whole computation over parsed days: strike universe, pricing modes,
 * the cumulative fold, top levels and both report tables.
 */
export function computeLevels(days: readonly DaySheet[]): LevelsReport {
  if (days.length === 0) throw new Error('No day sheets with valid data');

  const universe = strikeUniverse(days);
  const modes = resolvePricingModes(days);
  const snapshots = accumulateDays(days, universe, modes);
  const levels = snapshots.map(extractTopLevels);

  return {
    universe,
    modes,
    snapshots,
    levels,
    totalTable: buildTotalTable(snapshots, universe),
    maxTable: buildMaxTable(levels),
  };
}

async function readSource(source: WorkbookSource): Promise<Uint8Array> {
  if (typeof source === 'string') return readFile(source);
  if (source instanceof Uint8Array) return source;
  if (source instanceof ArrayBuffer) return new Uint8Array(source);
  return streamToBuffer(source);
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export async function loadWorkbook(source: WorkbookSource): Promise<Workbook> {
  const bytes = await readSource(source);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(toArrayBuffer(bytes));
  return workbook;
}

/**
 * Parse every day sheet of a workbook in stored order. A sheet that fails
 * to parse is logged and skipped; day indexes count parsed sheets only.
 */
export function readDaySheets(workbook: Workbook, tag = '[Levels]'): DaySheet[] {
  const names = selectDaySheets(workbook.worksheets.map(ws => ws.name));
  console.log(`${tag} Found day sheets: ${names.length > 0 ? names.join(', ') : '(none)'}`);

  const days: DaySheet[] = [];
  for (const name of names) {
    const sheet = workbook.getWorksheet(name);
    if (!sheet) continue;

    let result: SheetParseResult;
    try {
      result = parseDaySheet(worksheetToGrid(sheet), days.length, name);
    } catch (err) {
      console.warn(`${tag} [Sheet] Skipping ${name}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    if (!result.ok) {
      console.warn(`${tag} [Sheet] Skipping ${name}: ${result.reason} (${result.detail})`);
      continue;
    }
    if (result.missingOptional.length > 0) {
      console.warn(`${tag} [Sheet] ${name}: no ${result.missingOptional.join(', ')} column(s), reading as 0`);
    }
    console.log(`${tag} [Sheet] ${name}: ${result.sheet.records.length} strike(s)`);
    days.push(result.sheet);
  }
  return days;
}

/**
 * Entry point: add or replace the Total and Max sheets of a workbook and
 * return the new workbook bytes. Returns null when the workbook can't be
 * opened, has no usable day sheet, or the report can't be written; a
 * partially written workbook is never returned.
 */
export async function processWorkbook(source: WorkbookSource, runId: string = uuidv4()): Promise<Buffer | null> {
  const tag = `[Levels] ${runId.slice(0, 8)}`;

  let workbook: Workbook;
  try {
    workbook = await loadWorkbook(source);
  } catch (err) {
    console.error(`${tag} Error opening workbook: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const days = readDaySheets(workbook, tag);
  if (days.length === 0) {
    console.error(`${tag} No valid data.`);
    return null;
  }

  try {
    const report = computeLevels(days);
    renderReport(workbook, report.totalTable);
    renderReport(workbook, report.maxTable);
    const out = Buffer.from(await workbook.xlsx.writeBuffer());
    console.log(`${tag} Wrote Total (${report.universe.length} strikes) and Max (${report.levels.length} day(s))`);
    return out;
  } catch (err) {
    console.error(`${tag} Error building report: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
