/**
 * In-memory mock for IPortfolioRepository.
 * Commits are all-or-nothing: every write is checked before any is applied,
 * with the same duplicate-date, version and merge rules as the database
 * function.
 */

import { SnapshotError } from '../../src/errors.js';
import type {
  AuditQuery,
  IPortfolioRepository,
  PortfolioChangeSet,
  StagedWrite,
} from '../../src/repositories/IPortfolioRepository.js';
import {
  eventKey,
  type AuditEntry,
  type EventRevision,
  type MonthlyEvent,
  type PortfolioState,
  type Project,
  type Snapshot,
  type Strategy,
} from '../../src/types/models.js';

export class MockPortfolioRepository implements IPortfolioRepository {
  readonly projects = new Map<string, Project>();
  readonly strategies = new Map<string, Strategy>();
  readonly events = new Map<string, MonthlyEvent>();
  readonly revisions: EventRevision[] = [];
  readonly snapshots = new Map<string, Snapshot>();
  readonly audit: AuditEntry[] = [];

  /** Number of successful commits. */
  commits = 0;

  private nextSequence = 1;
  private failure: Error | null = null;
  private beforeCommit: (() => void) | null = null;

  /** A repository already holding `state`. */
  static withState(state: PortfolioState): MockPortfolioRepository {
    const repo = new MockPortfolioRepository();
    for (const p of state.projects) repo.projects.set(p.id, { ...p });
    for (const s of state.strategies) repo.strategies.set(s.id, { ...s });
    for (const e of state.events) repo.events.set(eventKey(e.projectId, e.monthKey, e.kind), { ...e });
    for (const s of state.snapshots) repo.snapshots.set(s.date, { ...s });
    for (const r of state.revisions) repo.revisions.push({ ...r });
    repo.nextSequence = Math.max(0, ...state.revisions.map((r) => r.sequence)) + 1;
    return repo;
  }

  /** Make the next commit throw `error` without applying anything. */
  failNextCommit(error: Error): void {
    this.failure = error;
  }

  /** Run `hook` once, after a change set is prepared but before it is checked. */
  onNextCommit(hook: () => void): void {
    this.beforeCommit = hook;
  }

  async loadState(): Promise<PortfolioState> {
    return {
      projects: [...this.projects.values()].map((p) => ({ ...p })),
      strategies: [...this.strategies.values()].map((s) => ({ ...s })),
      events: [...this.events.values()].map((e) => ({ ...e })),
      revisions: this.revisions.map((r) => ({ ...r })),
      snapshots: [...this.snapshots.values()].map((s) => ({ ...s })),
    };
  }

  async commit(changes: PortfolioChangeSet): Promise<void> {
    const hook = this.beforeCommit;
    this.beforeCommit = null;
    hook?.();

    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }

    if (changes.snapshot && this.snapshots.has(changes.snapshot.date)) {
      throw new SnapshotError('DuplicateSnapshot', `Snapshot ${changes.snapshot.date} has already been ingested`, {
        snapshotDate: changes.snapshot.date,
      });
    }
    if (changes.snapshot) {
      this.snapshots.set(changes.snapshot.date, { ...changes.snapshot });
      mergeStrategies(this.strategies, changes.strategies);
      mergeByDate(this.projects, changes.projects, (p) => p.id, (p) => p.updatedSnapshotDate, (stored, next) => ({
        ...next,
        createdSnapshotDate:
          stored.createdSnapshotDate < next.createdSnapshotDate ? stored.createdSnapshotDate : next.createdSnapshotDate,
      }));
      mergeByDate(
        this.events,
        changes.events,
        (e) => eventKey(e.projectId, e.monthKey, e.kind),
        (e) => e.sourceSnapshotDate,
        (_stored, next) => next
      );
    } else {
      checkWrites('strategy', this.strategies, changes.strategies, (s) => s.id);
      checkWrites('project', this.projects, changes.projects, (p) => p.id);
      checkWrites('monthly_event', this.events, changes.events, (e) => eventKey(e.projectId, e.monthKey, e.kind));

      applyWrites(this.strategies, changes.strategies, (s) => s.id);
      applyWrites(this.projects, changes.projects, (p) => p.id);
      applyWrites(this.events, changes.events, (e) => eventKey(e.projectId, e.monthKey, e.kind));
    }
    for (const revision of changes.revisions) {
      this.revisions.push({ ...revision, sequence: this.nextSequence++ });
    }
    this.audit.push(...changes.audit.map((entry) => ({ ...entry })));
    this.commits++;
  }

  async listAuditEntries(query: AuditQuery = {}): Promise<AuditEntry[]> {
    return this.audit
      .filter((e) => query.entityType === undefined || e.entityType === query.entityType)
      .filter((e) => query.entityId === undefined || e.entityId === query.entityId)
      .reverse()
      .slice(0, query.limit ?? 100);
  }

  /** Row counts per table. */
  counts(): Record<'projects' | 'strategies' | 'events' | 'revisions' | 'snapshots' | 'audit', number> {
    return {
      projects: this.projects.size,
      strategies: this.strategies.size,
      events: this.events.size,
      revisions: this.revisions.length,
      snapshots: this.snapshots.size,
      audit: this.audit.length,
    };
  }
}

function checkWrites<T extends { version: number }>(
  entity: string,
  table: Map<string, T>,
  writes: StagedWrite<T>[],
  keyOf: (value: T) => string
): void {
  for (const write of writes) {
    const key = keyOf(write.value);
    const stored = table.get(key);
    const stale = write.op === 'insert' ? stored !== undefined : stored?.version !== write.baseVersion;
    if (stale) {
      throw new SnapshotError('ConcurrentModification', `${entity} ${key} changed concurrently`, {
        entityType: entity,
        entityId: key,
      });
    }
  }
}

function applyWrites<T>(table: Map<string, T>, writes: StagedWrite<T>[], keyOf: (value: T) => string): void {
  for (const write of writes) {
    if (write.op === 'delete') table.delete(keyOf(write.value));
    else table.set(keyOf(write.value), { ...write.value });
  }
}

/** Ingestion: strategies that already exist are kept as they are. */
function mergeStrategies(table: Map<string, Strategy>, writes: StagedWrite<Strategy>[]): void {
  for (const write of writes) {
    if (write.op === 'insert' && !table.has(write.value.id)) table.set(write.value.id, { ...write.value });
  }
}

/** Ingestion: a stored row from a newer snapshot wins; otherwise the write lands on top of it. */
function mergeByDate<T extends { version: number }>(
  table: Map<string, T>,
  writes: StagedWrite<T>[],
  keyOf: (value: T) => string,
  dateOf: (value: T) => string,
  combine: (stored: T, next: T) => T
): void {
  for (const write of writes) {
    const key = keyOf(write.value);
    const stored = table.get(key);
    if (!stored) {
      table.set(key, { ...write.value });
    } else if (dateOf(stored) <= dateOf(write.value)) {
      table.set(key, { ...combine(stored, write.value), version: stored.version + 1 });
    }
  }
}
