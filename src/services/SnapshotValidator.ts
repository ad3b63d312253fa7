/**
 * Snapshot validator and deduplicator.
 * Value checks shared by ingestion and direct edits. Everything here runs
 * before the first mutation is staged.
 */

import { SnapshotError, type SnapshotErrorDetail } from '../errors.js';
import type { EventKind, MonthKey, SnapshotDate } from '../types/models.js';
import {
  eventCountSchema,
  eventKindSchema,
  monthKeySchema,
  snapshotDateSchema,
} from './snapshotSchemas.js';

/** Fail if the date is already in the ingested set. */
export function ensureNewSnapshot(date: SnapshotDate, ingested: ReadonlySet<SnapshotDate>): void {
  if (ingested.has(date)) {
    throw new SnapshotError('DuplicateSnapshot', `Snapshot ${date} has already been ingested`, {
      snapshotDate: date,
    });
  }
}

/** A non-negative whole number. Never clamped. */
export function parseEventCount(value: unknown, detail: SnapshotErrorDetail = {}): number {
  // Direct edits pass numbers; an empty value is not a count here.
  if (value === null || value === undefined || value === '') {
    throw new SnapshotError('InvalidEventCount', 'Count is required', { ...detail, value: null });
  }
  const result = eventCountSchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotError(
      'InvalidEventCount',
      `Count ${result.error.issues[0]?.message ?? 'is invalid'}`,
      { ...detail, value: scalar(value) }
    );
  }
  return result.data;
}

export function parseMonthKey(value: string): MonthKey {
  const result = monthKeySchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotError('InvalidField', `Month key ${result.error.issues[0]?.message ?? 'is invalid'}`, {
      column: 'monthKey',
      value,
    });
  }
  return result.data;
}

export function parseSnapshotDate(value: string, column = 'date'): SnapshotDate {
  const result = snapshotDateSchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotError('InvalidWindow', `${value} ${result.error.issues[0]?.message ?? 'is invalid'}`, {
      column,
      value,
    });
  }
  return result.data;
}

export function parseEventKind(value: string): EventKind {
  const result = eventKindSchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotError('InvalidField', `Event kind must be "proposal" or "approval"`, {
      column: 'kind',
      value,
    });
  }
  return result.data;
}

function scalar(value: unknown): string | number | boolean | null {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return value === null || value === undefined ? null : String(value);
}
