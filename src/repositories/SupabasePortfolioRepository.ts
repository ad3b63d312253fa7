/**
 * Supabase implementation of IPortfolioRepository.
 *
 * Reads go through `load_portfolio_state()`, a single statement and so one
 * consistent snapshot of every table. Writes go through
 * `apply_portfolio_changes(change_set)`, which applies a whole change set in
 * one database transaction and checks snapshot uniqueness, versions and
 * snapshot-date precedence there.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { SnapshotError } from '../errors.js';
import type {
  AuditEntryRow,
  ChangeSetRow,
  EventRevisionRow,
  MonthlyEventRow,
  ProjectRow,
  SnapshotRow,
  StagedRowWrite,
  StrategyRow,
} from '../types/database.js';
import {
  EVENT_KINDS,
  type AuditEntityType,
  type AuditEntry,
  type ChangeKind,
  type EventKind,
  type EventRevision,
  type MonthlyEvent,
  type PortfolioState,
  type Project,
  type Snapshot,
  type Strategy,
} from '../types/models.js';
import type {
  AuditQuery,
  IPortfolioRepository,
  PortfolioChangeSet,
  StagedWrite,
} from './IPortfolioRepository.js';
import { auditEntryRowSchema, portfolioStateRowSchema } from './rowSchemas.js';

/** SQLSTATEs raised by apply_portfolio_changes. */
const DUPLICATE_SNAPSHOT = 'PS409';
const STALE_VERSION = 'PV409';

export class SupabasePortfolioRepository implements IPortfolioRepository {
  constructor(private readonly db: SupabaseClient) {}

  async loadState(): Promise<PortfolioState> {
    const { data, error } = await this.db.rpc('load_portfolio_state');

    if (error) throw new Error(`Failed to load portfolio state: ${error.message}`);

    const parsed = portfolioStateRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Failed to load portfolio state: unexpected payload (${parsed.error.message})`);
    }
    const row = parsed.data;
    return {
      projects: (row.projects ?? []).map(toProject),
      strategies: (row.strategies ?? []).map(toStrategy),
      events: (row.monthly_events ?? []).map(toMonthlyEvent),
      revisions: (row.event_revisions ?? []).map(toEventRevision),
      snapshots: (row.snapshots ?? []).map(toSnapshot),
    };
  }

  async commit(changes: PortfolioChangeSet): Promise<void> {
    const { error } = await this.db.rpc('apply_portfolio_changes', {
      change_set: toChangeSetRow(changes),
    });

    if (error) throw commitError(error, changes);
  }

  async listAuditEntries(query: AuditQuery = {}): Promise<AuditEntry[]> {
    let request = this.db.from('audit_entries').select('*');
    if (query.entityType) request = request.eq('entity_type', query.entityType);
    if (query.entityId) request = request.eq('entity_id', query.entityId);

    const { data, error } = await request
      .order('position', { ascending: false })
      .limit(query.limit ?? 100);

    if (error) throw new Error(`Failed to list audit entries: ${error.message}`);

    const parsed = auditEntryRowSchema.array().safeParse(data ?? []);
    if (!parsed.success) {
      throw new Error(`Failed to list audit entries: unexpected payload (${parsed.error.message})`);
    }
    return parsed.data.map(toAuditEntry);
  }
}

function commitError(error: PostgrestError, changes: PortfolioChangeSet): Error {
  if (error.code === DUPLICATE_SNAPSHOT) {
    const date = changes.snapshot?.date;
    return new SnapshotError('DuplicateSnapshot', `Snapshot ${date ?? ''} has already been ingested`.trim(), {
      ...(date && { snapshotDate: date }),
    });
  }
  if (error.code === STALE_VERSION) {
    return new SnapshotError(
      'ConcurrentModification',
      `Portfolio changed while this change was being prepared: ${error.message}`
    );
  }
  return new Error(`Failed to commit portfolio changes: ${error.message}`);
}

// ── Row ↔ model mapping ──

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    champion: row.champion,
    strategyId: row.strategy_id,
    status: row.status,
    orgUnit: row.org_unit,
    proposedMonth: row.proposed_month,
    approvedMonth: row.approved_month,
    createdSnapshotDate: row.created_snapshot_date,
    updatedSnapshotDate: row.updated_snapshot_date,
    version: row.version,
  };
}

function toStrategy(row: StrategyRow): Strategy {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    deprecated: row.deprecated,
    version: row.version,
  };
}

function toMonthlyEvent(row: MonthlyEventRow): MonthlyEvent {
  return {
    projectId: row.project_id,
    monthKey: row.month_key,
    kind: toEventKind(row.kind),
    count: row.count,
    sourceSnapshotDate: row.source_snapshot_date,
    note: row.note,
    version: row.version,
  };
}

function toEventRevision(row: EventRevisionRow): EventRevision {
  return {
    projectId: row.project_id,
    monthKey: row.month_key,
    kind: toEventKind(row.kind),
    count: row.count,
    sourceSnapshotDate: row.source_snapshot_date,
    sequence: row.sequence,
  };
}

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    date: row.snapshot_date,
    ingestedAt: row.ingested_at,
    sourceFilename: row.source_filename,
    acceptedRows: row.accepted_rows,
    rejectedRows: row.rejected_rows,
  };
}

function toAuditEntry(row: AuditEntryRow): AuditEntry {
  return {
    id: row.id,
    entityType: toAuditEntityType(row.entity_type),
    entityId: row.entity_id,
    changeKind: toChangeKind(row.change_kind),
    before: row.before_state,
    after: row.after_state,
    changedFields: row.changed_fields,
    actor: row.actor,
    timestamp: row.acted_at,
  };
}

function toEventKind(value: string): EventKind {
  const kind = EVENT_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown event kind in store: ${value}`);
  return kind;
}

const AUDIT_ENTITY_TYPES: readonly AuditEntityType[] = ['project', 'strategy', 'monthly_event', 'snapshot'];
const CHANGE_KINDS: readonly ChangeKind[] = ['create', 'update', 'delete'];

function toAuditEntityType(value: string): AuditEntityType {
  const type = AUDIT_ENTITY_TYPES.find((t) => t === value);
  if (!type) throw new Error(`Unknown audit entity type in store: ${value}`);
  return type;
}

function toChangeKind(value: string): ChangeKind {
  const kind = CHANGE_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown audit change kind in store: ${value}`);
  return kind;
}

function toChangeSetRow(changes: PortfolioChangeSet): ChangeSetRow {
  return {
    snapshot: changes.snapshot && {
      snapshot_date: changes.snapshot.date,
      ingested_at: changes.snapshot.ingestedAt,
      source_filename: changes.snapshot.sourceFilename,
      accepted_rows: changes.snapshot.acceptedRows,
      rejected_rows: changes.snapshot.rejectedRows,
    },
    strategies: changes.strategies.map((w) =>
      toRowWrite(w, (s): StrategyRow => ({
        id: s.id,
        name: s.name,
        description: s.description,
        deprecated: s.deprecated,
        version: s.version,
      }))
    ),
    projects: changes.projects.map((w) =>
      toRowWrite(w, (p): ProjectRow => ({
        id: p.id,
        name: p.name,
        champion: p.champion,
        strategy_id: p.strategyId,
        status: p.status,
        org_unit: p.orgUnit,
        proposed_month: p.proposedMonth,
        approved_month: p.approvedMonth,
        created_snapshot_date: p.createdSnapshotDate,
        updated_snapshot_date: p.updatedSnapshotDate,
        version: p.version,
      }))
    ),
    monthly_events: changes.events.map((w) =>
      toRowWrite(w, (e): MonthlyEventRow => ({
        project_id: e.projectId,
        month_key: e.monthKey,
        kind: e.kind,
        count: e.count,
        source_snapshot_date: e.sourceSnapshotDate,
        note: e.note,
        version: e.version,
      }))
    ),
    event_revisions: changes.revisions.map((r) => ({
      project_id: r.projectId,
      month_key: r.monthKey,
      kind: r.kind,
      count: r.count,
      source_snapshot_date: r.sourceSnapshotDate,
    })),
    audit_entries: changes.audit.map((a) => ({
      id: a.id,
      entity_type: a.entityType,
      entity_id: a.entityId,
      change_kind: a.changeKind,
      before_state: a.before,
      after_state: a.after,
      changed_fields: a.changedFields,
      actor: a.actor,
      acted_at: a.timestamp,
    })),
  };
}

function toRowWrite<T, R>(write: StagedWrite<T>, toRow: (value: T) => R): StagedRowWrite<R> {
  return { op: write.op, base_version: write.baseVersion, row: toRow(write.value) };
}
