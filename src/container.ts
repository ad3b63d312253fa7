/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production the repository is the Supabase implementation; tests pass
 * the in-memory mock.
 */

import { DEFAULT_CONFIG, type EngineConfig } from './config.js';
import { SnapshotEngine } from './engine/SnapshotEngine.js';
import { createOperationLogger } from './engine/operation-logging.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IWorkbookReader } from './providers/IWorkbookReader.js';
import { XlsxWorkbookReader } from './providers/XlsxWorkbookReader.js';
import type { IPortfolioRepository } from './repositories/IPortfolioRepository.js';
import { AuditService } from './services/AuditService.js';
import { IngestionService } from './services/IngestionService.js';
import { MetricsService } from './services/MetricsService.js';
import { ProjectService } from './services/ProjectService.js';
import { StrategyService } from './services/StrategyService.js';

export interface Container {
  engine: SnapshotEngine;
  ingestionService: IngestionService;
  projectService: ProjectService;
  strategyService: StrategyService;
  metricsService: MetricsService;
  auditService: AuditService;
  logProvider: ILogProvider;
  config: EngineConfig;
}

export function createContainer(deps: {
  repository: IPortfolioRepository;
  logProvider: ILogProvider;
  workbookReader?: IWorkbookReader;
  config?: EngineConfig;
  clock?: () => Date;
}): Container {
  const config = deps.config ?? DEFAULT_CONFIG;
  const clock = deps.clock ?? (() => new Date());

  const ingestionService = new IngestionService(
    deps.repository,
    deps.workbookReader ?? new XlsxWorkbookReader(),
    config,
    clock
  );
  const projectService = new ProjectService(deps.repository, clock);
  const strategyService = new StrategyService(deps.repository, clock);
  const metricsService = new MetricsService(deps.repository, config);
  const auditService = new AuditService(deps.repository);

  const engine = new SnapshotEngine({
    ingestion: ingestionService,
    projects: projectService,
    strategies: strategyService,
    metrics: metricsService,
    audit: auditService,
    runOperation: createOperationLogger(deps.logProvider),
    config,
  });

  return {
    engine,
    ingestionService,
    projectService,
    strategyService,
    metricsService,
    auditService,
    logProvider: deps.logProvider,
    config,
  };
}
