/**
 * Typed row schemas for snapshot sheets and direct edits.
 * Raw cells are converted to text or counts here; nothing untyped leaves
 * the parser boundary.
 */

import { z } from 'zod';
import type { CellValue } from '../providers/IWorkbookReader.js';

export const MONTH_KEY_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const SNAPSHOT_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isMonthKey(value: string): boolean {
  return MONTH_KEY_PATTERN.test(value);
}

/** True for a real calendar date written as `YYYY-MM-DD`. */
export function isSnapshotDate(value: string): boolean {
  const match = SNAPSHOT_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

// ── Cell conversion ──

function isoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/** Trimmed text of a cell, or null when the cell is empty. */
export function cellToText(value: CellValue): string | null {
  if (value === null) return null;
  if (value instanceof Date) return isoDate(value);
  const text = String(value).trim();
  return text.length > 0 ? text : null;
}

/** Month-ish cells: a date cell becomes its `YYYY-MM`. */
export function cellToMonthText(value: CellValue): string | null {
  if (value instanceof Date) return isoDate(value).slice(0, 7);
  return cellToText(value);
}

/** Scalar form of a cell for error details. */
export function cellToDetail(value: CellValue | undefined): string | number | boolean | null {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * Empty cells count as zero and yes/no cells as one/zero.
 * Anything that is not plainly a number becomes NaN and fails validation.
 */
function coerceCount(value: unknown): unknown {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '') return 0;
    return /^[+-]?\d+(\.\d+)?$/.test(text) ? Number(text) : Number.NaN;
  }
  return Number.NaN;
}

// ── Schemas ──

const requiredText = z.string({ invalid_type_error: 'is required' }).trim().min(1, 'is required');
const personName = requiredText.transform((value) => value.replace(/\s+/g, ' '));
const optionalText = z.string().trim().min(1).nullable();

/** Largest value of a Postgres `integer` column. */
export const MAX_EVENT_COUNT = 2_147_483_647;

export const eventCountSchema = z.preprocess(
  coerceCount,
  z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .min(0, 'must not be negative')
    .max(MAX_EVENT_COUNT, 'is too large')
);

export const monthKeySchema = z.string().regex(MONTH_KEY_PATTERN, 'must be a month key (YYYY-MM)');

export const snapshotDateSchema = z
  .string()
  .refine(isSnapshotDate, 'must be a calendar date (YYYY-MM-DD)');

export const masterRowSchema = z.object({
  projectId: requiredText,
  name: requiredText,
  champion: personName,
  strategy: requiredText,
  status: requiredText,
  orgUnit: optionalText,
  proposedMonth: optionalText,
  approvedMonth: optionalText,
});

export const monthlyRowSchema = z.object({
  projectId: requiredText,
  proposals: eventCountSchema,
  approvals: eventCountSchema,
  note: optionalText,
});

/** Fields an editor may change on an existing project. */
export const projectUpdateSchema = z
  .object({
    name: requiredText.optional(),
    champion: personName.optional(),
    strategy: requiredText.optional(),
    status: requiredText.optional(),
    orgUnit: optionalText.optional(),
    proposedMonth: optionalText.optional(),
    approvedMonth: optionalText.optional(),
  })
  .strict();

export const eventKindSchema = z.enum(['proposal', 'approval']);

export type MasterRowFields = z.infer<typeof masterRowSchema>;
export type MonthlyRowFields = z.infer<typeof monthlyRowSchema>;
export type ProjectUpdateFields = z.infer<typeof projectUpdateSchema>;
