import type { StatusCount, TrendPoint } from '../types/api.js';
import { addCount, compareText, emptyTally, type PortfolioView, type Tally } from './view.js';

/** Proposals and approvals per month of the window. */
export function computeTrend(view: PortfolioView): TrendPoint[] {
  const byMonth = new Map<string, Tally>(view.months.map((month) => [month, emptyTally()]));
  for (const event of view.windowEvents) {
    const tally = byMonth.get(event.monthKey);
    if (tally) addCount(tally, event);
  }
  return view.months.map((monthKey) => {
    const tally = byMonth.get(monthKey) ?? emptyTally();
    return { monthKey, proposals: tally.proposals, approvals: tally.approvals };
  });
}

/** Project count per status, most common first. */
export function computeStatusDistribution(view: PortfolioView): StatusCount[] {
  const counts = new Map<string, number>();
  for (const project of view.projects) {
    counts.set(project.status, (counts.get(project.status) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([status, projects]) => ({ status, projects }))
    .sort((a, b) => b.projects - a.projects || compareText(a.status, b.status));
}
