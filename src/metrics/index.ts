/**
 * Dashboard metrics.
 * Pure functions of one consistent state and a window: same inputs, same
 * output, no writes.
 */

import type { EngineConfig } from '../config.js';
import type { DashboardMetrics, MetricsWindow } from '../types/api.js';
import type { PortfolioState } from '../types/models.js';
import { computeDistribution } from './distribution.js';
import { computeHeatmap } from './heatmap.js';
import { computeKpis } from './kpis.js';
import { computeRankings } from './rankings.js';
import { computeStatusDistribution, computeTrend } from './trend.js';
import { buildView } from './view.js';

export type MetricsConfig = Pick<
  EngineConfig,
  'activeStatuses' | 'rankingPrimaryMetric' | 'rankingLimit' | 'strategyBiasThreshold'
>;

export function computeDashboard(
  state: PortfolioState,
  window: MetricsWindow,
  config: MetricsConfig
): DashboardMetrics {
  const view = buildView(state, window);

  return {
    window,
    asOf: view.asOf,
    months: [...view.months],
    kpis: computeKpis(view, config.activeStatuses),
    rankings: computeRankings(view, {
      primary: config.rankingPrimaryMetric,
      limit: config.rankingLimit,
      activeStatuses: config.activeStatuses,
    }),
    distribution: computeDistribution(view, {
      activeStatuses: config.activeStatuses,
      biasThreshold: config.strategyBiasThreshold,
    }),
    heatmap: computeHeatmap(view),
    trend: computeTrend(view),
    statusDistribution: computeStatusDistribution(view),
  };
}

export { buildView, enumerateMonths, validateWindow, type PortfolioView, type EventCount } from './view.js';
export { computeKpis } from './kpis.js';
export { computeRankings, type RankingOptions } from './rankings.js';
export { computeDistribution, type DistributionOptions } from './distribution.js';
export { computeHeatmap } from './heatmap.js';
export { computeTrend, computeStatusDistribution } from './trend.js';
