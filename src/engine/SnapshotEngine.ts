/**
 * Snapshot engine facade.
 *
 * The single entry point a shell (HTTP routes, admin screens, a CLI) calls.
 * Every operation returns a Result: expected failures come back as
 * `{ ok: false, error }`, faults are logged and re-thrown.
 */

import type { EngineConfig } from '../config.js';
import type { AuditQuery } from '../repositories/IPortfolioRepository.js';
import type { AuditService } from '../services/AuditService.js';
import type { IngestionService } from '../services/IngestionService.js';
import type { MetricsService } from '../services/MetricsService.js';
import type { ProjectService } from '../services/ProjectService.js';
import type { StrategyService } from '../services/StrategyService.js';
import type {
  DashboardMetrics,
  IngestReport,
  MetricsWindow,
  Result,
  UpdateMonthlyEventRequest,
  UpdateProjectRequest,
} from '../types/api.js';
import type { AuditEntry, MonthlyEvent, MonthKey, Project, Snapshot, SnapshotDate, Strategy } from '../types/models.js';
import type { OperationRunner } from './operation-logging.js';
import { toResult } from './result.js';

export interface SnapshotEngineDeps {
  ingestion: IngestionService;
  projects: ProjectService;
  strategies: StrategyService;
  metrics: MetricsService;
  audit: AuditService;
  runOperation: OperationRunner;
  config: Pick<EngineConfig, 'defaultActor'>;
}

export class SnapshotEngine {
  constructor(private readonly deps: SnapshotEngineDeps) {}

  ingest(document: Uint8Array, filenameOrDate: string, actor?: string): Promise<Result<IngestReport>> {
    const who = this.actor(actor);
    return this.deps.runOperation(
      { operation: 'ingest', actor: who, fields: { source: filenameOrDate, bytes: document.byteLength } },
      () => toResult(() => this.deps.ingestion.ingest(document, filenameOrDate, who))
    );
  }

  updateProject(id: string, fields: UpdateProjectRequest, actor?: string): Promise<Result<Project>> {
    const who = this.actor(actor);
    return this.deps.runOperation({ operation: 'updateProject', actor: who, fields: { projectId: id } }, () =>
      toResult(() => this.deps.projects.updateProject(id, fields, who))
    );
  }

  updateMonthlyEvent(
    projectId: string,
    monthKey: MonthKey,
    kind: UpdateMonthlyEventRequest['kind'],
    count: number,
    actor?: string
  ): Promise<Result<MonthlyEvent>> {
    const who = this.actor(actor);
    return this.deps.runOperation(
      { operation: 'updateMonthlyEvent', actor: who, fields: { projectId, monthKey, kind } },
      () => toResult(() => this.deps.projects.updateMonthlyEvent({ projectId, monthKey, kind, count }, who))
    );
  }

  describeStrategy(id: string, description: string | null, actor?: string): Promise<Result<Strategy>> {
    const who = this.actor(actor);
    return this.deps.runOperation({ operation: 'describeStrategy', actor: who, fields: { strategyId: id } }, () =>
      toResult(() => this.deps.strategies.describeStrategy(id, description, who))
    );
  }

  deprecateStrategy(id: string, actor?: string): Promise<Result<Strategy>> {
    const who = this.actor(actor);
    return this.deps.runOperation({ operation: 'deprecateStrategy', actor: who, fields: { strategyId: id } }, () =>
      toResult(() => this.deps.strategies.deprecateStrategy(id, who))
    );
  }

  deleteStrategy(id: string, actor?: string): Promise<Result<void>> {
    const who = this.actor(actor);
    return this.deps.runOperation({ operation: 'deleteStrategy', actor: who, fields: { strategyId: id } }, () =>
      toResult(() => this.deps.strategies.deleteStrategy(id, who))
    );
  }

  computeMetrics(window: MetricsWindow): Promise<Result<DashboardMetrics>> {
    return this.deps.runOperation({ operation: 'computeMetrics', fields: { window: window.kind } }, () =>
      toResult(() => this.deps.metrics.computeMetrics(window))
    );
  }

  // ── Read helpers ──

  getProject(id: string): Promise<Result<Project>> {
    return this.deps.runOperation({ operation: 'getProject', fields: { projectId: id } }, () =>
      toResult(() => this.deps.projects.getProject(id))
    );
  }

  listStrategies(): Promise<Result<Strategy[]>> {
    return this.deps.runOperation({ operation: 'listStrategies' }, () =>
      toResult(() => this.deps.strategies.listStrategies())
    );
  }

  listSnapshots(): Promise<Result<Snapshot[]>> {
    return this.deps.runOperation({ operation: 'listSnapshots' }, () =>
      toResult(() => this.deps.metrics.listSnapshots())
    );
  }

  listMonths(asOf?: SnapshotDate): Promise<Result<MonthKey[]>> {
    return this.deps.runOperation({ operation: 'listMonths', fields: { asOf } }, () =>
      toResult(() => this.deps.metrics.listMonths(asOf))
    );
  }

  listAuditEntries(query: AuditQuery = {}): Promise<Result<AuditEntry[]>> {
    return this.deps.runOperation({ operation: 'listAuditEntries', fields: { ...query } }, () =>
      toResult(() => this.deps.audit.listAuditEntries(query))
    );
  }

  private actor(actor: string | undefined): string {
    const trimmed = actor?.trim();
    return trimmed ? trimmed : this.deps.config.defaultActor;
  }
}
