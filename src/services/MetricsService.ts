/**
 * Metrics service.
 * Reads one consistent state and hands it to the pure metrics functions.
 * Takes no locks and writes nothing.
 */

import { computeDashboard, type MetricsConfig } from '../metrics/index.js';
import { compareText } from '../metrics/view.js';
import type { IPortfolioRepository } from '../repositories/IPortfolioRepository.js';
import type { DashboardMetrics, MetricsWindow } from '../types/api.js';
import type { MonthKey, Snapshot, SnapshotDate } from '../types/models.js';
import { parseSnapshotDate } from './SnapshotValidator.js';

export class MetricsService {
  constructor(
    private readonly repo: IPortfolioRepository,
    private readonly config: MetricsConfig
  ) {}

  async computeMetrics(window: MetricsWindow): Promise<DashboardMetrics> {
    const state = await this.repo.loadState();
    return computeDashboard(state, window, this.config);
  }

  /** Ingested snapshots, oldest first. */
  async listSnapshots(): Promise<Snapshot[]> {
    const { snapshots } = await this.repo.loadState();
    return [...snapshots].sort((a, b) => compareText(a.date, b.date));
  }

  /** Month keys with recorded counts, optionally as of a snapshot date. */
  async listMonths(asOf?: SnapshotDate): Promise<MonthKey[]> {
    const cutoff = asOf === undefined ? null : parseSnapshotDate(asOf, 'asOf');
    const state = await this.repo.loadState();
    const months =
      cutoff === null
        ? state.events.map((e) => e.monthKey)
        : state.revisions.filter((r) => r.sourceSnapshotDate <= cutoff).map((r) => r.monthKey);
    return [...new Set(months)].sort(compareText);
  }
}
