/**
 * Headline KPI totals for a window.
 */

import type { KpiTotals } from '../types/api.js';
import { activeMatcher, roundRate, tallyByProject, type PortfolioView } from './view.js';

export function computeKpis(view: PortfolioView, activeStatuses: readonly string[]): KpiTotals {
  const isActive = activeMatcher(activeStatuses);
  const byProject = tallyByProject(view.windowEvents);

  let totalProposals = 0;
  let totalApprovals = 0;
  for (const tally of byProject.values()) {
    totalProposals += tally.proposals;
    totalApprovals += tally.approvals;
  }

  const champions = new Set<string>();
  const participating = new Set<string>();
  for (const project of view.projects) {
    champions.add(project.champion);
    const tally = byProject.get(project.id);
    if (tally && tally.proposals + tally.approvals > 0) participating.add(project.champion);
  }

  return {
    activeProjects: view.projects.filter((p) => isActive(p.status)).length,
    totalProjects: view.projects.length,
    totalProposals,
    totalApprovals,
    championParticipationRate: champions.size === 0 ? 0 : roundRate(participating.size / champions.size),
    approvalConversionRate: totalProposals === 0 ? 0 : roundRate(totalApprovals / totalProposals),
  };
}
