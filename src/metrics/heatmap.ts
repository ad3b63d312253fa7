/**
 * Champion × month activity heatmap.
 * Cell value is proposals + approvals; intensity is the value over the
 * grid maximum. No colour mapping happens here.
 */

import type { Heatmap, HeatmapCell } from '../types/api.js';
import { addCount, compareText, emptyTally, type PortfolioView, type Tally } from './view.js';

export function computeHeatmap(view: PortfolioView): Heatmap {
  const championOf = new Map(view.projects.map((p) => [p.id, p.champion]));
  const champions = [...new Set(championOf.values())].sort(compareText);
  const months = view.months;
  const column = new Map(months.map((month, i) => [month, i]));

  const grid: Tally[][] = champions.map(() => months.map(emptyTally));
  const row = new Map(champions.map((champion, i) => [champion, i]));

  for (const event of view.windowEvents) {
    const champion = championOf.get(event.projectId);
    const r = champion === undefined ? undefined : row.get(champion);
    const c = column.get(event.monthKey);
    if (r === undefined || c === undefined) continue;
    addCount(grid[r][c], event);
  }

  let max = 0;
  for (const cells of grid) {
    for (const cell of cells) max = Math.max(max, cell.proposals + cell.approvals);
  }

  const cells: HeatmapCell[][] = grid.map((cellsInRow) =>
    cellsInRow.map(({ proposals, approvals }) => {
      const value = proposals + approvals;
      return { proposals, approvals, value, intensity: max === 0 ? 0 : value / max };
    })
  );

  return { champions, months: [...months], cells, max };
}
