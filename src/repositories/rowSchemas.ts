/**
 * Runtime shapes of rows coming back from Postgres.
 * The client is untyped, so every payload is checked before it is mapped.
 */

import { z } from 'zod';
import type {
  AuditEntryRow,
  EventRevisionRow,
  MonthlyEventRow,
  PortfolioStateRow,
  ProjectRow,
  SnapshotRow,
  StrategyRow,
} from '../types/database.js';

const auditValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const projectRowSchema: z.ZodType<ProjectRow> = z.object({
  id: z.string(),
  name: z.string(),
  champion: z.string(),
  strategy_id: z.string(),
  status: z.string(),
  org_unit: z.string().nullable(),
  proposed_month: z.string().nullable(),
  approved_month: z.string().nullable(),
  created_snapshot_date: z.string(),
  updated_snapshot_date: z.string(),
  version: z.number().int(),
});

export const strategyRowSchema: z.ZodType<StrategyRow> = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  deprecated: z.boolean(),
  version: z.number().int(),
});

export const monthlyEventRowSchema: z.ZodType<MonthlyEventRow> = z.object({
  project_id: z.string(),
  month_key: z.string(),
  kind: z.string(),
  count: z.number().int(),
  source_snapshot_date: z.string(),
  note: z.string().nullable(),
  version: z.number().int(),
});

export const eventRevisionRowSchema: z.ZodType<EventRevisionRow> = z.object({
  project_id: z.string(),
  month_key: z.string(),
  kind: z.string(),
  count: z.number().int(),
  source_snapshot_date: z.string(),
  // bigserial comes back as a number or, past 2^53, a string
  sequence: z.coerce.number(),
});

export const snapshotRowSchema: z.ZodType<SnapshotRow> = z.object({
  snapshot_date: z.string(),
  ingested_at: z.string(),
  source_filename: z.string().nullable(),
  accepted_rows: z.number().int(),
  rejected_rows: z.number().int(),
});

export const auditEntryRowSchema: z.ZodType<AuditEntryRow> = z.object({
  position: z.coerce.number(),
  id: z.string(),
  entity_type: z.string(),
  entity_id: z.string(),
  change_kind: z.string(),
  before_state: z.record(auditValue).nullable(),
  after_state: z.record(auditValue).nullable(),
  changed_fields: z.array(z.string()),
  actor: z.string(),
  acted_at: z.string(),
});

export const portfolioStateRowSchema: z.ZodType<PortfolioStateRow> = z.object({
  projects: z.array(projectRowSchema).nullable(),
  strategies: z.array(strategyRowSchema).nullable(),
  monthly_events: z.array(monthlyEventRowSchema).nullable(),
  event_revisions: z.array(eventRevisionRowSchema).nullable(),
  snapshots: z.array(snapshotRowSchema).nullable(),
});
