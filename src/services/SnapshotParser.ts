/**
 * Snapshot parser.
 *
 * Turns one workbook into typed master and monthly rows. Pure: no store
 * access, no side effects, safe to retry. The first problem found fails the
 * whole snapshot with the sheet, row and column that need correcting.
 */

import type { ZodError } from 'zod';
import { SnapshotError, type SnapshotErrorKind } from '../errors.js';
import type { CellValue, Sheet, SheetRow, Workbook } from '../providers/IWorkbookReader.js';
import type { MonthKey, SnapshotDate } from '../types/models.js';
import {
  MASTER_COLUMNS,
  MONTHLY_COLUMNS,
  resolveColumns,
  type ColumnSpec,
  type ResolvedColumns,
} from './snapshotColumns.js';
import {
  cellToDetail,
  cellToMonthText,
  cellToText,
  isMonthKey,
  isSnapshotDate,
  masterRowSchema,
  monthlyRowSchema,
  type MasterRowFields,
  type MonthlyRowFields,
} from './snapshotSchemas.js';

export interface MasterRow extends MasterRowFields {
  /** Spreadsheet row the values came from. */
  row: number;
}

export interface MonthlyRow extends MonthlyRowFields {
  row: number;
}

export interface ParsedSnapshot {
  snapshotDate: SnapshotDate;
  projects: MasterRow[];
  /** Monthly rows grouped by sheet, month keys ascending. */
  months: Map<MonthKey, MonthlyRow[]>;
  warnings: string[];
  acceptedRows: number;
  rejectedRows: number;
}

const FILENAME_PATTERN = /^(\d{4}-\d{2}-\d{2})\.xlsx$/i;

/**
 * Snapshot date encoded in a `YYYY-MM-DD.xlsx` file name.
 * Directory components are ignored.
 */
export function snapshotDateFromFilename(filename: string): SnapshotDate {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const match = FILENAME_PATTERN.exec(base.trim());
  if (!match || !isSnapshotDate(match[1])) {
    throw new SnapshotError(
      'InvalidFilename',
      `"${filename}" is not a snapshot file name; expected YYYY-MM-DD.xlsx`,
      { value: filename }
    );
  }
  return match[1];
}

/** Accept either a bare snapshot date or a snapshot file name. */
export function resolveSnapshotDate(filenameOrDate: string): {
  snapshotDate: SnapshotDate;
  sourceFilename: string | null;
} {
  const trimmed = filenameOrDate.trim();
  if (isSnapshotDate(trimmed)) {
    return { snapshotDate: trimmed, sourceFilename: null };
  }
  return { snapshotDate: snapshotDateFromFilename(trimmed), sourceFilename: filenameOrDate };
}

export class SnapshotParser {
  constructor(private readonly masterSheetName: string) {}

  parse(workbook: Workbook, snapshotDate: SnapshotDate): ParsedSnapshot {
    const master = workbook.getSheet(this.masterSheetName);
    if (!master) {
      throw new SnapshotError(
        'MissingMasterSheet',
        `Workbook has no "${this.masterSheetName}" sheet`,
        { sheet: this.masterSheetName, snapshotDate }
      );
    }

    const warnings: string[] = [];
    const projects = this.parseMaster(master);
    const knownIds = new Set(projects.map((p) => p.projectId));

    const monthNames: MonthKey[] = [];
    for (const name of workbook.sheetNames) {
      if (name === this.masterSheetName) continue;
      if (isMonthKey(name)) {
        monthNames.push(name);
      } else {
        warnings.push(`Sheet "${name}" ignored: name is not a month key (YYYY-MM)`);
      }
    }
    monthNames.sort();

    const months = new Map<MonthKey, MonthlyRow[]>();
    let rejectedRows = 0;
    for (const name of monthNames) {
      const sheet = workbook.getSheet(name);
      if (!sheet) continue;
      const parsed = this.parseMonthly(sheet, knownIds, warnings);
      months.set(name, parsed.rows);
      rejectedRows += parsed.rejected;
    }

    let monthlyRows = 0;
    for (const rows of months.values()) monthlyRows += rows.length;

    return {
      snapshotDate,
      projects,
      months,
      warnings,
      acceptedRows: projects.length + monthlyRows,
      rejectedRows,
    };
  }

  // ── Master sheet ──

  private parseMaster(sheet: Sheet): MasterRow[] {
    const columns = requireColumns(sheet, MASTER_COLUMNS);
    const { headerFor } = columns;
    const firstRowById = new Map<string, number>();
    const rows: MasterRow[] = [];

    for (const row of sheet.rows) {
      const input = {
        projectId: cellToText(cellAt(row, headerFor.projectId)),
        name: cellToText(cellAt(row, headerFor.name)),
        champion: cellToText(cellAt(row, headerFor.champion)),
        strategy: cellToText(cellAt(row, headerFor.strategy)),
        status: cellToText(cellAt(row, headerFor.status)),
        orgUnit: cellToText(cellAt(row, headerFor.orgUnit)),
        proposedMonth: cellToMonthText(cellAt(row, headerFor.proposedMonth)),
        approvedMonth: cellToMonthText(cellAt(row, headerFor.approvedMonth)),
      };

      const result = masterRowSchema.safeParse(input);
      if (!result.success) {
        throw rowError('InvalidMasterRow', sheet, row, result.error, MASTER_COLUMNS, columns);
      }

      const { projectId } = result.data;
      const firstRow = firstRowById.get(projectId);
      if (firstRow !== undefined) {
        throw new SnapshotError(
          'InvalidMasterRow',
          `${sheet.name} row ${row.index}: project "${projectId}" already listed on row ${firstRow}`,
          { sheet: sheet.name, row: row.index, column: headerFor.projectId, value: projectId }
        );
      }
      firstRowById.set(projectId, row.index);
      rows.push({ ...result.data, row: row.index });
    }

    return rows;
  }

  // ── Monthly sheets ──

  private parseMonthly(
    sheet: Sheet,
    knownIds: ReadonlySet<string>,
    warnings: string[]
  ): { rows: MonthlyRow[]; rejected: number } {
    const columns = requireColumns(sheet, MONTHLY_COLUMNS);
    const { headerFor } = columns;
    const firstRowById = new Map<string, number>();
    const rows: MonthlyRow[] = [];
    let rejected = 0;

    for (const row of sheet.rows) {
      const projectId = cellToText(cellAt(row, headerFor.projectId));
      if (projectId === null) {
        warnings.push(`Sheet "${sheet.name}" row ${row.index}: blank project id; row skipped`);
        rejected++;
        continue;
      }

      if (!knownIds.has(projectId)) {
        throw new SnapshotError(
          'OrphanMonthlyRow',
          `${sheet.name} row ${row.index}: project "${projectId}" is not listed in the master sheet`,
          { sheet: sheet.name, row: row.index, column: headerFor.projectId, value: projectId }
        );
      }

      const firstRow = firstRowById.get(projectId);
      if (firstRow !== undefined) {
        throw new SnapshotError(
          'DuplicateMonthlyRow',
          `${sheet.name} row ${row.index}: project "${projectId}" already listed on row ${firstRow}`,
          { sheet: sheet.name, row: row.index, column: headerFor.projectId, value: projectId }
        );
      }
      firstRowById.set(projectId, row.index);

      const result = monthlyRowSchema.safeParse({
        projectId,
        proposals: cellAt(row, headerFor.proposals),
        approvals: cellAt(row, headerFor.approvals),
        note: cellToText(cellAt(row, headerFor.note)),
      });
      if (!result.success) {
        throw rowError('InvalidEventCount', sheet, row, result.error, MONTHLY_COLUMNS, columns);
      }
      rows.push({ ...result.data, row: row.index });
    }

    return { rows, rejected };
  }
}

function cellAt(row: SheetRow, header: string | undefined): CellValue {
  if (header === undefined) return null;
  return row.cells[header] ?? null;
}

function requireColumns<F extends string>(
  sheet: Sheet,
  specs: readonly ColumnSpec<F>[]
): ResolvedColumns<F> {
  const columns = resolveColumns(sheet.headers, specs);
  const [missing] = columns.missing;
  if (missing) {
    throw new SnapshotError(
      'MissingRequiredColumn',
      `Sheet "${sheet.name}" is missing required column "${missing.label}"`,
      { sheet: sheet.name, column: missing.label }
    );
  }
  return columns;
}

/** Translate the first schema issue into a cell-addressed error. */
function rowError<F extends string>(
  kind: SnapshotErrorKind,
  sheet: Sheet,
  row: SheetRow,
  error: ZodError,
  specs: readonly ColumnSpec<F>[],
  columns: ResolvedColumns<F>
): SnapshotError {
  const issue = error.issues[0];
  const field = String(issue?.path[0] ?? '');
  const spec = specs.find((s) => s.field === field);
  const header = spec ? columns.headerFor[spec.field] : undefined;
  const column = header ?? spec?.label ?? field;

  return new SnapshotError(
    kind,
    `${sheet.name} row ${row.index}: ${column} ${issue?.message ?? 'is invalid'}`,
    {
      sheet: sheet.name,
      row: row.index,
      column,
      value: cellToDetail(header === undefined ? undefined : row.cells[header]),
    }
  );
}
