/**
 * Workbook reader interface.
 * Exposes a spreadsheet document as named sheets of header-keyed rows.
 * No business validation happens at this layer.
 */

export type CellValue = string | number | boolean | Date | null;

export interface SheetRow {
  /** 1-based row number as shown in the spreadsheet. */
  index: number;
  /** Cell values keyed by the trimmed header of their column. */
  cells: Record<string, CellValue>;
}

export interface Sheet {
  name: string;
  /** Trimmed header labels in column order. Blank headers are dropped. */
  headers: string[];
  /** Data rows below the header row, blank rows excluded. */
  rows: SheetRow[];
}

export interface Workbook {
  /** Sheet names in workbook order. */
  readonly sheetNames: readonly string[];
  getSheet(name: string): Sheet | null;
}

export interface IWorkbookReader {
  /**
   * Open a binary spreadsheet document.
   * @throws SnapshotError `MalformedDocument` when it cannot be opened or has no sheets.
   */
  read(document: Uint8Array): Workbook;
}

/** Build a workbook from already-materialized sheets. */
export function workbookFromSheets(sheets: Sheet[]): Workbook {
  const byName = new Map(sheets.map((sheet) => [sheet.name, sheet]));
  return {
    sheetNames: sheets.map((sheet) => sheet.name),
    getSheet: (name) => byName.get(name) ?? null,
  };
}
