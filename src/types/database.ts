/**
 * Database row types. Mirror the Supabase table schemas.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface ProjectRow {
  id: string;
  name: string;
  champion: string;
  strategy_id: string;
  status: string;
  org_unit: string | null;
  proposed_month: string | null;
  approved_month: string | null;
  created_snapshot_date: string;
  updated_snapshot_date: string;
  version: number;
}

export interface StrategyRow {
  id: string;
  name: string;
  description: string | null;
  deprecated: boolean;
  version: number;
}

export interface MonthlyEventRow {
  project_id: string;
  month_key: string;
  kind: string;
  count: number;
  source_snapshot_date: string;
  note: string | null;
  version: number;
}

export interface EventRevisionRow {
  project_id: string;
  month_key: string;
  kind: string;
  count: number;
  source_snapshot_date: string;
  sequence: number;
}

export interface SnapshotRow {
  snapshot_date: string;
  ingested_at: string;
  source_filename: string | null;
  accepted_rows: number;
  rejected_rows: number;
}

export interface AuditEntryRow {
  /** Commit order, assigned by the database. */
  position: number;
  id: string;
  entity_type: string;
  entity_id: string;
  change_kind: string;
  before_state: Record<string, string | number | boolean | null> | null;
  after_state: Record<string, string | number | boolean | null> | null;
  changed_fields: string[];
  actor: string;
  acted_at: string;
}

/** Payload returned by the `load_portfolio_state` function. */
export interface PortfolioStateRow {
  projects: ProjectRow[] | null;
  strategies: StrategyRow[] | null;
  monthly_events: MonthlyEventRow[] | null;
  event_revisions: EventRevisionRow[] | null;
  snapshots: SnapshotRow[] | null;
}

export type WriteOp = 'insert' | 'update' | 'delete';

export interface StagedRowWrite<TRow> {
  op: WriteOp;
  base_version: number | null;
  row: TRow;
}

/** Payload accepted by the `apply_portfolio_changes` function. */
export interface ChangeSetRow {
  snapshot: SnapshotRow | null;
  strategies: StagedRowWrite<StrategyRow>[];
  projects: StagedRowWrite<ProjectRow>[];
  monthly_events: StagedRowWrite<MonthlyEventRow>[];
  event_revisions: Omit<EventRevisionRow, 'sequence'>[];
  audit_entries: Omit<AuditEntryRow, 'position'>[];
}
