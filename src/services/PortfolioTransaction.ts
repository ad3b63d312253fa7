/**
 * Portfolio transaction.
 * A working copy of the canonical store that stages every mutation, with its
 * audit entry, into one change set. Nothing touches the store until the
 * caller commits `changes()`; discarding the transaction discards everything.
 */

import { AuditTrail, eventState, projectState, snapshotState, strategyState } from '../audit/AuditTrail.js';
import { SnapshotError } from '../errors.js';
import {
  isEmptyChangeSet,
  type IPortfolioRepository,
  type PortfolioChangeSet,
  type StagedWrite,
} from '../repositories/IPortfolioRepository.js';
import {
  eventKey,
  type AuditEntityType,
  type AuditState,
  type ChangeKind,
  type EventKind,
  type EventRevision,
  type MonthKey,
  type MonthlyEvent,
  type PortfolioState,
  type Project,
  type Snapshot,
  type SnapshotDate,
  type Strategy,
} from '../types/models.js';

export interface TransactionContext {
  actor: string;
  /** ISO-8601 timestamp stamped on every audit entry. */
  timestamp: string;
  /** Snapshot being ingested; null for direct edits. */
  snapshotDate: SnapshotDate | null;
}

export type ProjectPatch = Partial<
  Pick<Project, 'name' | 'champion' | 'strategyId' | 'status' | 'orgUnit' | 'proposedMonth' | 'approvedMonth'>
>;

export type NewProject = Pick<
  Project,
  'id' | 'name' | 'champion' | 'strategyId' | 'status' | 'orgUnit' | 'proposedMonth' | 'approvedMonth'
>;

export interface EventUpsert {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
  sourceSnapshotDate: SnapshotDate;
  note: string | null;
}

/** `superseded`: an older snapshot's value, kept as history only. */
export type UpsertOutcome = 'created' | 'updated' | 'unchanged' | 'superseded' | 'skipped';

export type StrategyPatch = Partial<Pick<Strategy, 'description' | 'deprecated'>>;

const PROJECT_FIELDS = [
  'name',
  'champion',
  'strategyId',
  'status',
  'orgUnit',
  'proposedMonth',
  'approvedMonth',
] as const;

/** Canonical strategy key: trimmed, inner whitespace collapsed, lower-cased. */
export function normalizeStrategyName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export class PortfolioTransaction {
  readonly audit = new AuditTrail();

  private readonly projects: Map<string, Project>;
  private readonly strategies: Map<string, Strategy>;
  private readonly events: Map<string, MonthlyEvent>;
  private readonly snapshotDates: Set<string>;

  private readonly projectWrites = new Map<string, StagedWrite<Project>>();
  private readonly strategyWrites = new Map<string, StagedWrite<Strategy>>();
  private readonly eventWrites = new Map<string, StagedWrite<MonthlyEvent>>();
  private readonly revisions: Omit<EventRevision, 'sequence'>[] = [];
  private snapshot: Snapshot | null = null;

  constructor(
    state: PortfolioState,
    private readonly ctx: TransactionContext
  ) {
    this.projects = new Map(state.projects.map((p) => [p.id, { ...p }]));
    this.strategies = new Map(state.strategies.map((s) => [s.id, { ...s }]));
    this.events = new Map(
      state.events.map((e) => [eventKey(e.projectId, e.monthKey, e.kind), { ...e }])
    );
    this.snapshotDates = new Set(state.snapshots.map((s) => s.date));
  }

  // ── Reads (see staged writes) ──

  getProject(id: string): Project | null {
    const project = this.projects.get(id);
    return project ? { ...project } : null;
  }

  getStrategy(id: string): Strategy | null {
    const strategy = this.strategies.get(id);
    return strategy ? { ...strategy } : null;
  }

  getEvent(projectId: string, monthKey: MonthKey, kind: EventKind): MonthlyEvent | null {
    const event = this.events.get(eventKey(projectId, monthKey, kind));
    return event ? { ...event } : null;
  }

  /** True when the snapshot being ingested is older than the one that last wrote `project`. */
  predates(project: Project): boolean {
    return this.ctx.snapshotDate !== null && this.ctx.snapshotDate < project.updatedSnapshotDate;
  }

  hasSnapshot(date: SnapshotDate): boolean {
    return this.snapshotDates.has(date);
  }

  latestSnapshotDate(): SnapshotDate | null {
    let latest: SnapshotDate | null = null;
    for (const date of this.snapshotDates) {
      if (latest === null || date > latest) latest = date;
    }
    return latest;
  }

  // ── Strategies ──

  /** Return the strategy bound to this name, creating it on first reference. */
  resolveStrategy(name: string): Strategy {
    const id = normalizeStrategyName(name);
    if (!id) {
      throw new SnapshotError('InvalidField', 'Strategy name must not be empty', { column: 'strategy' });
    }

    const existing = this.strategies.get(id);
    if (existing) return { ...existing };

    const created: Strategy = {
      id,
      name: name.trim().replace(/\s+/g, ' '),
      description: null,
      deprecated: false,
      version: 1,
    };
    this.strategies.set(id, created);
    this.stage(this.strategyWrites, id, { op: 'insert', baseVersion: null, value: created });
    this.record('strategy', id, 'create', null, strategyState(created));
    return { ...created };
  }

  updateStrategy(id: string, patch: StrategyPatch): Strategy | null {
    const current = this.requireStrategy(id);
    const next: Strategy = { ...current, ...patch };
    if (next.description === current.description && next.deprecated === current.deprecated) {
      return null;
    }
    next.version = current.version + 1;

    this.strategies.set(id, next);
    this.stage(this.strategyWrites, id, { op: 'update', baseVersion: current.version, value: next });
    this.record('strategy', id, 'update', strategyState(current), strategyState(next));
    return { ...next };
  }

  deleteStrategy(id: string): void {
    const current = this.requireStrategy(id);
    const referencedBy = [...this.projects.values()].filter((p) => p.strategyId === id);
    if (referencedBy.length > 0) {
      throw new SnapshotError(
        'StrategyInUse',
        `Strategy "${current.name}" is referenced by ${referencedBy.length} project(s); deprecate it instead`,
        { entityType: 'strategy', entityId: id }
      );
    }

    this.strategies.delete(id);
    this.stage(this.strategyWrites, id, { op: 'delete', baseVersion: current.version, value: current });
    this.record('strategy', id, 'delete', strategyState(current), null);
  }

  // ── Projects ──

  createProject(input: NewProject): Project {
    if (this.projects.has(input.id)) {
      throw new SnapshotError('InvalidField', `Project "${input.id}" already exists`, {
        entityType: 'project',
        entityId: input.id,
      });
    }
    const snapshotDate = this.requireSnapshotDate();
    this.requireStrategy(input.strategyId);

    const created: Project = {
      ...input,
      createdSnapshotDate: snapshotDate,
      updatedSnapshotDate: snapshotDate,
      version: 1,
    };
    this.projects.set(created.id, created);
    this.stage(this.projectWrites, created.id, { op: 'insert', baseVersion: null, value: created });
    this.record('project', created.id, 'create', null, projectState(created));
    return { ...created };
  }

  /**
   * Apply only the fields that differ. Returns null when nothing changed,
   * in which case nothing is staged and nothing is audited.
   */
  updateProject(id: string, patch: ProjectPatch): Project | null {
    const current = this.projects.get(id);
    if (!current) {
      throw new SnapshotError('UnknownEntity', `Project "${id}" does not exist`, {
        entityType: 'project',
        entityId: id,
      });
    }
    if (patch.strategyId !== undefined) this.requireStrategy(patch.strategyId);

    const next: Project = { ...current };
    let changed = false;
    for (const field of PROJECT_FIELDS) {
      const value = patch[field];
      if (value !== undefined && value !== current[field]) {
        Object.assign(next, { [field]: value });
        changed = true;
      }
    }
    if (!changed) return null;

    next.updatedSnapshotDate = this.ctx.snapshotDate ?? current.updatedSnapshotDate;
    next.version = current.version + 1;

    this.projects.set(id, next);
    this.stage(this.projectWrites, id, { op: 'update', baseVersion: current.version, value: next });
    this.record('project', id, 'update', projectState(current), projectState(next));
    return { ...next };
  }

  // ── Monthly events ──

  /**
   * Latest-snapshot-wins upsert keyed by (project, month, kind).
   * A zero count for a key that does not exist yet creates nothing unless
   * `createZero` is set, as it is for explicit edits. A value from an older
   * snapshot than the stored one only joins the revision history.
   */
  upsertEvent(
    input: EventUpsert,
    createZero = false
  ): { outcome: UpsertOutcome; event: MonthlyEvent | null } {
    if (!this.projects.has(input.projectId)) {
      throw new SnapshotError('UnknownEntity', `Project "${input.projectId}" does not exist`, {
        entityType: 'project',
        entityId: input.projectId,
      });
    }

    const key = eventKey(input.projectId, input.monthKey, input.kind);
    const current = this.events.get(key);

    if (!current) {
      if (input.count === 0 && !createZero) return { outcome: 'skipped', event: null };

      const created: MonthlyEvent = { ...input, version: 1 };
      this.events.set(key, created);
      this.stage(this.eventWrites, key, { op: 'insert', baseVersion: null, value: created });
      this.appendRevision(created);
      this.record('monthly_event', key, 'create', null, eventState(created));
      return { outcome: 'created', event: { ...created } };
    }

    if (input.sourceSnapshotDate < current.sourceSnapshotDate) {
      this.appendRevision({ ...input, version: current.version });
      return { outcome: 'superseded', event: { ...current } };
    }

    if (current.count === input.count && current.note === input.note) {
      return { outcome: 'unchanged', event: { ...current } };
    }

    const next: MonthlyEvent = { ...input, version: current.version + 1 };
    this.events.set(key, next);
    this.stage(this.eventWrites, key, { op: 'update', baseVersion: current.version, value: next });
    if (next.count !== current.count) this.appendRevision(next);
    this.record('monthly_event', key, 'update', eventState(current), eventState(next));
    return { outcome: 'updated', event: { ...next } };
  }

  // ── Snapshot ledger ──

  recordSnapshot(snapshot: Snapshot): void {
    if (this.snapshotDates.has(snapshot.date) || this.snapshot) {
      throw new SnapshotError('DuplicateSnapshot', `Snapshot ${snapshot.date} has already been ingested`, {
        snapshotDate: snapshot.date,
      });
    }
    this.snapshot = { ...snapshot };
    this.snapshotDates.add(snapshot.date);
    this.record('snapshot', snapshot.date, 'create', null, snapshotState(snapshot));
  }

  // ── Output ──

  changes(): PortfolioChangeSet {
    return {
      snapshot: this.snapshot ? { ...this.snapshot } : null,
      strategies: [...this.strategyWrites.values()],
      projects: [...this.projectWrites.values()],
      events: [...this.eventWrites.values()],
      revisions: [...this.revisions],
      audit: [...this.audit.entries],
    };
  }

  // ── Private ──

  private record(
    entityType: AuditEntityType,
    entityId: string,
    changeKind: ChangeKind,
    before: AuditState | null,
    after: AuditState | null
  ): void {
    this.audit.record(entityType, entityId, changeKind, before, after, this.ctx.actor, this.ctx.timestamp);
  }

  private appendRevision(event: MonthlyEvent): void {
    this.revisions.push({
      projectId: event.projectId,
      monthKey: event.monthKey,
      kind: event.kind,
      count: event.count,
      sourceSnapshotDate: event.sourceSnapshotDate,
    });
  }

  private requireStrategy(id: string): Strategy {
    const strategy = this.strategies.get(id);
    if (!strategy) {
      throw new SnapshotError('UnknownEntity', `Strategy "${id}" does not exist`, {
        entityType: 'strategy',
        entityId: id,
      });
    }
    return strategy;
  }

  private requireSnapshotDate(): SnapshotDate {
    if (!this.ctx.snapshotDate) {
      throw new SnapshotError('InvalidField', 'Projects can only be created by snapshot ingestion');
    }
    return this.ctx.snapshotDate;
  }

  /** Fold repeated writes to one entity into a single staged write. */
  private stage<T>(writes: Map<string, StagedWrite<T>>, key: string, write: StagedWrite<T>): void {
    const previous = writes.get(key);
    if (!previous) {
      writes.set(key, write);
      return;
    }
    if (previous.op === 'insert' && write.op === 'delete') {
      writes.delete(key);
      return;
    }
    writes.set(key, {
      op: previous.op === 'insert' ? 'insert' : write.op,
      baseVersion: previous.baseVersion,
      value: write.value,
    });
  }
}

/**
 * Load a consistent state, run `work` against a transaction over it and
 * commit whatever it staged. Nothing is committed if `work` throws.
 */
export async function runTransaction<T>(
  repo: IPortfolioRepository,
  ctx: TransactionContext,
  work: (tx: PortfolioTransaction) => T
): Promise<{ result: T; changes: PortfolioChangeSet }> {
  const tx = new PortfolioTransaction(await repo.loadState(), ctx);
  const result = work(tx);
  const changes = tx.changes();
  if (!isEmptyChangeSet(changes)) {
    await repo.commit(changes);
  }
  return { result, changes };
}
