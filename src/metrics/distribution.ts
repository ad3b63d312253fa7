/**
 * Strategy distribution.
 * Not windowed by month: counts cover every month at the view's as-of date.
 * Every known strategy is listed, including empty ones.
 */

import type { StrategyBias, StrategyDistribution, StrategyShare } from '../types/api.js';
import { activeMatcher, compareText, roundRate, tallyByProject, type PortfolioView } from './view.js';

export interface DistributionOptions {
  activeStatuses: readonly string[];
  /** Minimum share of active projects that flags a strategy. */
  biasThreshold: number;
}

export function computeDistribution(view: PortfolioView, options: DistributionOptions): StrategyDistribution {
  const isActive = activeMatcher(options.activeStatuses);
  const byProject = tallyByProject(view.allEvents);

  const rows = new Map<string, StrategyShare>(
    view.strategies.map((s) => [
      s.id,
      {
        strategyId: s.id,
        name: s.name,
        deprecated: s.deprecated,
        projects: 0,
        activeProjects: 0,
        proposals: 0,
        approvals: 0,
        activeShare: 0,
      },
    ])
  );

  let totalActive = 0;
  for (const project of view.projects) {
    const row = rows.get(project.strategyId);
    if (!row) continue;
    row.projects++;
    if (isActive(project.status)) {
      row.activeProjects++;
      totalActive++;
    }
    const tally = byProject.get(project.id);
    if (tally) {
      row.proposals += tally.proposals;
      row.approvals += tally.approvals;
    }
  }

  const strategies = [...rows.values()]
    .map((row) => ({ ...row, activeShare: totalActive === 0 ? 0 : roundRate(row.activeProjects / totalActive) }))
    .sort((a, b) => compareText(a.name, b.name) || compareText(a.strategyId, b.strategyId));

  return { strategies, bias: findBias(strategies, totalActive, options.biasThreshold) };
}

/** The strategy holding the largest share of active projects, if at or above the threshold. */
function findBias(strategies: StrategyShare[], totalActive: number, threshold: number): StrategyBias | null {
  if (totalActive === 0) return null;

  let top: StrategyShare | null = null;
  for (const row of strategies) {
    if (top === null || row.activeProjects > top.activeProjects) top = row;
  }
  if (top === null || top.activeProjects / totalActive < threshold) return null;

  return { strategyId: top.strategyId, name: top.name, activeShare: top.activeShare };
}
