/**
 * Staged audit recorder.
 * Collects entries in memory so they commit in the same change set as the
 * mutations they describe. Nothing is written until the store commits.
 */

import { randomUUID } from 'node:crypto';
import type { IAuditRecorder } from './IAuditRecorder.js';
import type {
  AuditEntityType,
  AuditEntry,
  AuditState,
  ChangeKind,
  MonthlyEvent,
  Project,
  Snapshot,
  Strategy,
} from '../types/models.js';

export class AuditTrail implements IAuditRecorder {
  private readonly staged: AuditEntry[] = [];

  constructor(private readonly generateId: () => string = randomUUID) {}

  record(
    entityType: AuditEntityType,
    entityId: string,
    changeKind: ChangeKind,
    before: AuditState | null,
    after: AuditState | null,
    actor: string,
    timestamp: string
  ): void {
    this.staged.push({
      id: this.generateId(),
      entityType,
      entityId,
      changeKind,
      before: before ? { ...before } : null,
      after: after ? { ...after } : null,
      changedFields: changedFields(before, after),
      actor,
      timestamp,
    });
  }

  get entries(): readonly AuditEntry[] {
    return this.staged;
  }
}

/** Keys whose values differ between two states, sorted. */
export function changedFields(before: AuditState | null, after: AuditState | null): string[] {
  const keys = new Set([...Object.keys(before ?? {}), ...Object.keys(after ?? {})]);
  return [...keys]
    .filter((key) => (before?.[key] ?? null) !== (after?.[key] ?? null))
    .sort();
}

// ── Entity → audit state ──

export function projectState(p: Project): AuditState {
  return {
    id: p.id,
    name: p.name,
    champion: p.champion,
    strategyId: p.strategyId,
    status: p.status,
    orgUnit: p.orgUnit,
    proposedMonth: p.proposedMonth,
    approvedMonth: p.approvedMonth,
    createdSnapshotDate: p.createdSnapshotDate,
    updatedSnapshotDate: p.updatedSnapshotDate,
    version: p.version,
  };
}

export function strategyState(s: Strategy): AuditState {
  return {
    id: s.id,
    name: s.name,
    description: s.description,
    deprecated: s.deprecated,
    version: s.version,
  };
}

export function eventState(e: MonthlyEvent): AuditState {
  return {
    projectId: e.projectId,
    monthKey: e.monthKey,
    kind: e.kind,
    count: e.count,
    sourceSnapshotDate: e.sourceSnapshotDate,
    note: e.note,
    version: e.version,
  };
}

export function snapshotState(s: Snapshot): AuditState {
  return {
    date: s.date,
    ingestedAt: s.ingestedAt,
    sourceFilename: s.sourceFilename,
    acceptedRows: s.acceptedRows,
    rejectedRows: s.rejectedRows,
  };
}
