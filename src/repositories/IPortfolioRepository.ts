/**
 * Canonical store interface.
 * Reads return one consistent view; writes go through a single atomic
 * commit of a staged change set.
 */

import type {
  AuditEntityType,
  AuditEntry,
  EventRevision,
  MonthlyEvent,
  PortfolioState,
  Project,
  Snapshot,
  Strategy,
} from '../types/models.js';

export type WriteOp = 'insert' | 'update' | 'delete';

/**
 * One staged write. `baseVersion` is the version the change was computed
 * from (null for inserts); outside ingestion the store refuses the commit if
 * it moved.
 */
export interface StagedWrite<T> {
  op: WriteOp;
  baseVersion: number | null;
  value: T;
}

export interface PortfolioChangeSet {
  snapshot: Snapshot | null;
  strategies: StagedWrite<Strategy>[];
  projects: StagedWrite<Project>[];
  events: StagedWrite<MonthlyEvent>[];
  revisions: Omit<EventRevision, 'sequence'>[];
  audit: AuditEntry[];
}

export interface AuditQuery {
  entityType?: AuditEntityType;
  entityId?: string;
  limit?: number;
}

export interface IPortfolioRepository {
  /** Every canonical table, read as of one point in time. */
  loadState(): Promise<PortfolioState>;

  /**
   * Apply a change set atomically: all of it or none of it.
   *
   * A change set that records a snapshot is an ingestion. Its entity writes
   * merge by snapshot date instead of checking base versions: a strategy that
   * already exists is kept, and a project or monthly event is overwritten only
   * when the stored row comes from the same or an older snapshot. Every other
   * change set is version-checked.
   *
   * @throws SnapshotError `DuplicateSnapshot` if the snapshot date is taken at commit time.
   * @throws SnapshotError `ConcurrentModification` if a version-checked base version is stale.
   */
  commit(changes: PortfolioChangeSet): Promise<void>;

  /** Newest first. */
  listAuditEntries(query?: AuditQuery): Promise<AuditEntry[]>;
}

export function isEmptyChangeSet(changes: PortfolioChangeSet): boolean {
  return (
    changes.snapshot === null &&
    changes.strategies.length === 0 &&
    changes.projects.length === 0 &&
    changes.events.length === 0 &&
    changes.revisions.length === 0 &&
    changes.audit.length === 0
  );
}
