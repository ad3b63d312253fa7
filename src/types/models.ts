/**
 * Domain models: canonical portfolio entities as the engine understands them.
 * Decoupled from both spreadsheet row shapes and database row shapes.
 */

/** Calendar date of a snapshot, `YYYY-MM-DD`. */
export type SnapshotDate = string;

/** Year-month bucket for monthly counts, `YYYY-MM`. */
export type MonthKey = string;

export type EventKind = 'proposal' | 'approval';

export const EVENT_KINDS: readonly EventKind[] = ['proposal', 'approval'];

// ── Canonical Entities ──

export interface Project {
  /** Stable project code. Never changes once created. */
  id: string;
  name: string;
  champion: string;
  strategyId: string;
  status: string;
  orgUnit: string | null;
  proposedMonth: string | null;
  approvedMonth: string | null;
  createdSnapshotDate: SnapshotDate;
  updatedSnapshotDate: SnapshotDate;
  version: number;
}

export interface Strategy {
  /** Normalized name: trimmed, lower-cased, inner whitespace collapsed. */
  id: string;
  /** Display name as first seen. */
  name: string;
  description: string | null;
  deprecated: boolean;
  version: number;
}

export interface MonthlyEvent {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
  sourceSnapshotDate: SnapshotDate;
  note: string | null;
  version: number;
}

/**
 * Append-only history of every value a monthly event has held.
 * `sequence` is assigned by the store at commit time.
 */
export interface EventRevision {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
  sourceSnapshotDate: SnapshotDate;
  sequence: number;
}

export interface Snapshot {
  date: SnapshotDate;
  /** ISO-8601 timestamp of the ingestion. */
  ingestedAt: string;
  sourceFilename: string | null;
  acceptedRows: number;
  rejectedRows: number;
}

// ── Audit ──

export type AuditEntityType = 'project' | 'strategy' | 'monthly_event' | 'snapshot';
export type ChangeKind = 'create' | 'update' | 'delete';

/** Flat, JSON-safe entity state captured before and after a mutation. */
export type AuditState = Record<string, string | number | boolean | null>;

export interface AuditEntry {
  id: string;
  entityType: AuditEntityType;
  entityId: string;
  changeKind: ChangeKind;
  before: AuditState | null;
  after: AuditState | null;
  changedFields: string[];
  actor: string;
  timestamp: string;
}

// ── Read Model ──

/** A consistent read of every canonical table. */
export interface PortfolioState {
  projects: Project[];
  strategies: Strategy[];
  events: MonthlyEvent[];
  revisions: EventRevision[];
  snapshots: Snapshot[];
}

export function eventKey(projectId: string, monthKey: MonthKey, kind: EventKind): string {
  return `${monthKey}|${projectId}|${kind}`;
}
