/**
 * SheetJS-backed workbook reader.
 * Reads .xlsx (zip) and legacy .xls (compound file) documents. The first
 * non-empty row of every sheet is its header row.
 *
 * Date-formatted cells are decoded from their serial number into a UTC
 * midnight Date, so the calendar date does not depend on the host timezone.
 */

import * as XLSX from 'xlsx';
import { SnapshotError } from '../errors.js';
import type { CellValue, IWorkbookReader, Sheet, SheetRow, Workbook } from './IWorkbookReader.js';
import { workbookFromSheets } from './IWorkbookReader.js';

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const CFB_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0];

export class XlsxWorkbookReader implements IWorkbookReader {
  read(document: Uint8Array): Workbook {
    // SheetJS happily parses arbitrary text as CSV, so insist on a real container first.
    if (!startsWith(document, ZIP_SIGNATURE) && !startsWith(document, CFB_SIGNATURE)) {
      throw new SnapshotError('MalformedDocument', 'Document is not a spreadsheet workbook');
    }

    let book: XLSX.WorkBook;
    try {
      book = XLSX.read(document, { type: 'array', cellDates: false, cellNF: true });
    } catch (err) {
      throw new SnapshotError(
        'MalformedDocument',
        `Workbook could not be opened: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (book.SheetNames.length === 0) {
      throw new SnapshotError('MalformedDocument', 'Workbook contains no sheets');
    }

    const date1904 = book.Workbook?.WBProps?.date1904 ?? false;
    return workbookFromSheets(
      book.SheetNames.map((name) => toSheet(name, book.Sheets[name], date1904))
    );
  }
}

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return signature.every((byte, i) => bytes[i] === byte);
}

function toSheet(name: string, worksheet: XLSX.WorkSheet | undefined, date1904: boolean): Sheet {
  const ref = worksheet?.['!ref'];
  if (!worksheet || !ref) {
    return { name, headers: [], rows: [] };
  }

  const range = XLSX.utils.decode_range(ref);
  const firstRow = range.s.r + 1;
  const matrix: CellValue[][] = [];
  for (let r = range.s.r; r <= range.e.r; r++) {
    const values: CellValue[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r, c })];
      values.push(toCellValue(cell, date1904));
    }
    matrix.push(values);
  }

  const headerOffset = matrix.findIndex((cells) => !isBlank(cells));
  if (headerOffset < 0) {
    return { name, headers: [], rows: [] };
  }

  const columns = matrix[headerOffset].map((value) =>
    value === null ? '' : String(value instanceof Date ? value.toISOString() : value).trim()
  );

  const rows: SheetRow[] = [];
  for (let i = headerOffset + 1; i < matrix.length; i++) {
    const values = matrix[i];
    if (isBlank(values)) continue;

    const cells: Record<string, CellValue> = {};
    columns.forEach((header, col) => {
      if (header && !(header in cells)) {
        cells[header] = values[col] ?? null;
      }
    });
    rows.push({ index: firstRow + i, cells });
  }

  return {
    name,
    headers: columns.filter((header) => header.length > 0),
    rows,
  };
}

function toCellValue(cell: XLSX.CellObject | undefined, date1904: boolean): CellValue {
  if (!cell) return null;
  const { v } = cell;
  switch (cell.t) {
    case 's':
      return typeof v === 'string' ? v : null;
    case 'b':
      return typeof v === 'boolean' ? v : null;
    case 'n':
      if (typeof v !== 'number' || !Number.isFinite(v)) return null;
      return cell.z !== undefined && XLSX.SSF.is_date(cell.z) ? serialToDate(v, date1904) : v;
    case 'd':
      // SheetJS builds these at local time.
      return v instanceof Date && !Number.isNaN(v.getTime())
        ? new Date(Date.UTC(v.getFullYear(), v.getMonth(), v.getDate(), v.getHours(), v.getMinutes(), v.getSeconds()))
        : null;
    default:
      return null;
  }
}

function serialToDate(serial: number, date1904: boolean): Date | null {
  const code: { y: number; m: number; d: number; H: number; M: number; S: number } | null =
    XLSX.SSF.parse_date_code(serial, { date1904 });
  if (!code) return null;
  return new Date(Date.UTC(code.y, code.m - 1, code.d, code.H, code.M, code.S));
}

function isBlank(values: CellValue[]): boolean {
  return values.every((value) => value === null || (typeof value === 'string' && value.trim() === ''));
}
