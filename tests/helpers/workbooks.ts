/**
 * Snapshot workbook builders for tests.
 * `snapshotWorkbook` builds an in-memory Workbook; `snapshotDocument` writes
 * real .xlsx bytes with SheetJS so the reader is exercised too.
 */

import * as XLSX from 'xlsx';
import type { CellValue, Sheet, Workbook } from '../../src/providers/IWorkbookReader.js';
import { workbookFromSheets } from '../../src/providers/IWorkbookReader.js';

export const MASTER_HEADERS = ['Project ID', 'Project Name', 'Champion', 'Strategy', 'Status'];
export const MONTHLY_HEADERS = ['Project ID', 'Proposals', 'Approvals'];

/** [projectId, name, champion, strategy, status] */
export type MasterLine = [string, string, string, string, string];
/** [projectId, proposals, approvals] */
export type MonthlyLine = [string, CellValue, CellValue];

export interface SnapshotLayout {
  master: MasterLine[];
  months?: Record<string, MonthlyLine[]>;
  /** Extra sheets as raw rows, header first. */
  extra?: Record<string, CellValue[][]>;
}

/** A sheet whose header sits on row 1 and data from row 2. */
export function sheet(name: string, headers: string[], rows: CellValue[][]): Sheet {
  return {
    name,
    headers,
    rows: rows.map((values, i) => ({
      index: i + 2,
      cells: Object.fromEntries(headers.map((header, col) => [header, values[col] ?? null])),
    })),
  };
}

export function snapshotWorkbook(layout: SnapshotLayout): Workbook {
  const sheets = [sheet('AX_Master', MASTER_HEADERS, layout.master)];
  for (const [month, lines] of Object.entries(layout.months ?? {})) {
    sheets.push(sheet(month, MONTHLY_HEADERS, lines));
  }
  for (const [name, [headers = [], ...rows]] of Object.entries(layout.extra ?? {})) {
    sheets.push(sheet(name, headers.map((h) => String(h ?? '')), rows));
  }
  return workbookFromSheets(sheets);
}

/** Write raw sheets (header row first) to .xlsx bytes. */
export function xlsxDocument(sheets: Record<string, CellValue[][]>): Uint8Array {
  const book = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return new Uint8Array(XLSX.write(book, { type: 'array', bookType: 'xlsx' }));
}

export function snapshotDocument(layout: SnapshotLayout): Uint8Array {
  const sheets: Record<string, CellValue[][]> = {
    AX_Master: [MASTER_HEADERS, ...layout.master],
  };
  for (const [month, lines] of Object.entries(layout.months ?? {})) {
    sheets[month] = [MONTHLY_HEADERS, ...lines];
  }
  for (const [name, rows] of Object.entries(layout.extra ?? {})) {
    sheets[name] = rows;
  }
  return xlsxDocument(sheets);
}
