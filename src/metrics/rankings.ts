/**
 * Champion rankings.
 * Primary metric desc, the other metric desc, then champion name asc:
 * a total order, so equal inputs always rank identically.
 */

import type { RankingMetric } from '../config.js';
import type { ChampionRanking } from '../types/api.js';
import { activeMatcher, compareText, emptyTally, tallyByProject, type PortfolioView, type Tally } from './view.js';

export interface RankingOptions {
  primary: RankingMetric;
  /** Top-N cut; null keeps every champion. */
  limit: number | null;
  activeStatuses: readonly string[];
}

export function computeRankings(view: PortfolioView, options: RankingOptions): ChampionRanking[] {
  const isActive = activeMatcher(options.activeStatuses);
  const byProject = tallyByProject(view.windowEvents);
  const byChampion = new Map<string, Tally & { activeProjects: number }>();

  for (const project of view.projects) {
    let entry = byChampion.get(project.champion);
    if (!entry) {
      entry = { ...emptyTally(), activeProjects: 0 };
      byChampion.set(project.champion, entry);
    }
    const tally = byProject.get(project.id);
    if (tally) {
      entry.proposals += tally.proposals;
      entry.approvals += tally.approvals;
    }
    if (isActive(project.status)) entry.activeProjects++;
  }

  const secondary: RankingMetric = options.primary === 'proposals' ? 'approvals' : 'proposals';
  const ranked = [...byChampion.entries()]
    .map(([champion, entry]) => ({ champion, ...entry }))
    .sort(
      (a, b) =>
        b[options.primary] - a[options.primary] ||
        b[secondary] - a[secondary] ||
        compareText(a.champion, b.champion)
    );

  const limited = options.limit === null ? ranked : ranked.slice(0, options.limit);
  return limited.map((entry, i) => ({
    rank: i + 1,
    champion: entry.champion,
    proposals: entry.proposals,
    approvals: entry.approvals,
    activeProjects: entry.activeProjects,
  }));
}
