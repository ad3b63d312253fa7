/**
 * Engine configuration.
 * Defaults cover the standard snapshot layout; every knob can be overridden
 * from the environment by the production container.
 */

import { z } from 'zod';

export type RankingMetric = 'proposals' | 'approvals';

export interface EngineConfig {
  /** Name of the sheet listing every project in a snapshot. */
  masterSheetName: string;
  /** Statuses that count a project as active. Compared case-insensitively. */
  activeStatuses: string[];
  rankingPrimaryMetric: RankingMetric;
  /** Maximum number of ranking entries returned. `null` returns all. */
  rankingLimit: number | null;
  /** Share of active projects at which a single strategy is flagged. */
  strategyBiasThreshold: number;
  /** Actor recorded on audit entries when the caller names none. */
  defaultActor: string;
}

export const DEFAULT_CONFIG: EngineConfig = {
  masterSheetName: 'AX_Master',
  activeStatuses: ['active', 'in progress', '승인(진행중)'],
  rankingPrimaryMetric: 'proposals',
  rankingLimit: null,
  strategyBiasThreshold: 0.5,
  defaultActor: 'system',
};

const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.string()).min(1));

const envSchema = z.object({
  MASTER_SHEET_NAME: z.string().trim().min(1).optional(),
  ACTIVE_STATUSES: csv.optional(),
  RANKING_PRIMARY_METRIC: z.enum(['proposals', 'approvals']).optional(),
  RANKING_LIMIT: z.coerce.number().int().positive().optional(),
  STRATEGY_BIAS_THRESHOLD: z.coerce.number().gt(0).max(1).optional(),
  DEFAULT_ACTOR: z.string().trim().min(1).optional(),
});

/**
 * Build a config from environment variables, falling back to defaults.
 * Throws on malformed values rather than silently ignoring them.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid engine configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    masterSheetName: vars.MASTER_SHEET_NAME ?? DEFAULT_CONFIG.masterSheetName,
    activeStatuses: vars.ACTIVE_STATUSES ?? DEFAULT_CONFIG.activeStatuses,
    rankingPrimaryMetric: vars.RANKING_PRIMARY_METRIC ?? DEFAULT_CONFIG.rankingPrimaryMetric,
    rankingLimit: vars.RANKING_LIMIT ?? DEFAULT_CONFIG.rankingLimit,
    strategyBiasThreshold: vars.STRATEGY_BIAS_THRESHOLD ?? DEFAULT_CONFIG.strategyBiasThreshold,
    defaultActor: vars.DEFAULT_ACTOR ?? DEFAULT_CONFIG.defaultActor,
  };
}
