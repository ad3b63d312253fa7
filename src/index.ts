export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
export { DEFAULT_CONFIG, loadConfig, type EngineConfig, type RankingMetric } from './config.js';
export { AppError, SnapshotError, isSnapshotError, type SnapshotErrorDetail, type SnapshotErrorKind } from './errors.js';
export { SnapshotEngine } from './engine/SnapshotEngine.js';
export { computeDashboard } from './metrics/index.js';
export { SupabasePortfolioRepository } from './repositories/SupabasePortfolioRepository.js';
export type { IPortfolioRepository, PortfolioChangeSet, AuditQuery } from './repositories/IPortfolioRepository.js';
export type { IAuditRecorder } from './audit/IAuditRecorder.js';
export { snapshotDateFromFilename } from './services/SnapshotParser.js';
export * from './providers/index.js';
export type * from './types/api.js';
export type * from './types/models.js';
