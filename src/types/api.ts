/**
 * API types: shapes the engine hands to its callers.
 * Decoupled from domain models so the facade can evolve independently.
 */

import type { SnapshotErrorDetail, SnapshotErrorKind } from '../errors.js';
import type { EventKind, MonthKey, SnapshotDate } from './models.js';

// ── Results ──

export interface EngineFailure {
  kind: SnapshotErrorKind;
  message: string;
  detail: SnapshotErrorDetail;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: EngineFailure };

// ── Requests ──

/** Editable project fields. A strategy is given by name. */
export interface UpdateProjectRequest {
  name?: string;
  champion?: string;
  strategy?: string;
  status?: string;
  orgUnit?: string | null;
  proposedMonth?: string | null;
  approvedMonth?: string | null;
}

export interface UpdateMonthlyEventRequest {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
}

export type MetricsWindow =
  | { kind: 'latest' }
  | { kind: 'month'; month: MonthKey; asOf?: SnapshotDate }
  | { kind: 'range'; from: MonthKey; to: MonthKey; asOf?: SnapshotDate }
  | { kind: 'snapshot'; date: SnapshotDate };

// ── Responses ──

export interface IngestReport {
  snapshotDate: SnapshotDate;
  sourceFilename: string | null;
  acceptedRows: number;
  rejectedRows: number;
  createdProjects: number;
  updatedProjects: number;
  createdStrategies: number;
  /** Monthly events inserted or overwritten. */
  upsertedEvents: number;
  unchangedEvents: number;
  auditEntries: number;
  warnings: string[];
}

export interface KpiTotals {
  activeProjects: number;
  totalProjects: number;
  totalProposals: number;
  totalApprovals: number;
  /** Champions with activity in the window over champions with projects. */
  championParticipationRate: number;
  /** Approvals over proposals. */
  approvalConversionRate: number;
}

export interface ChampionRanking {
  rank: number;
  champion: string;
  proposals: number;
  approvals: number;
  activeProjects: number;
}

export interface StrategyShare {
  strategyId: string;
  name: string;
  deprecated: boolean;
  projects: number;
  activeProjects: number;
  proposals: number;
  approvals: number;
  /** Share of all active projects, 0–1. */
  activeShare: number;
}

export interface StrategyBias {
  strategyId: string;
  name: string;
  activeShare: number;
}

export interface StrategyDistribution {
  strategies: StrategyShare[];
  bias: StrategyBias | null;
}

export interface HeatmapCell {
  proposals: number;
  approvals: number;
  /** proposals + approvals */
  value: number;
  /** value / grid maximum; 0 when the grid is empty. */
  intensity: number;
}

export interface Heatmap {
  champions: string[];
  months: MonthKey[];
  /** One row per champion, one column per month. */
  cells: HeatmapCell[][];
  max: number;
}

export interface TrendPoint {
  monthKey: MonthKey;
  proposals: number;
  approvals: number;
}

export interface StatusCount {
  status: string;
  projects: number;
}

export interface DashboardMetrics {
  window: MetricsWindow;
  /** Snapshot date counts were reconstructed at; null for current state. */
  asOf: SnapshotDate | null;
  months: MonthKey[];
  kpis: KpiTotals;
  rankings: ChampionRanking[];
  distribution: StrategyDistribution;
  heatmap: Heatmap;
  trend: TrendPoint[];
  statusDistribution: StatusCount[];
}
