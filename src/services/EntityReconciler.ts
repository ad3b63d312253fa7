/**
 * Entity reconciler.
 *
 * Maps validated snapshot rows and direct edits onto canonical entities
 * inside a PortfolioTransaction. Every mutation goes through the
 * transaction, which stages exactly one audit entry for it.
 */

import { SnapshotError } from '../errors.js';
import type { EventKind, MonthKey, MonthlyEvent, Project } from '../types/models.js';
import {
  normalizeStrategyName,
  type PortfolioTransaction,
  type ProjectPatch,
  type UpsertOutcome,
} from './PortfolioTransaction.js';
import type { MasterRow, ParsedSnapshot } from './SnapshotParser.js';
import type { ProjectUpdateFields } from './snapshotSchemas.js';

export interface ReconcileSummary {
  createdProjects: number;
  updatedProjects: number;
  createdStrategies: number;
  createdEvents: number;
  updatedEvents: number;
  unchangedEvents: number;
  /** Master rows skipped because a newer snapshot already wrote the project. */
  staleProjects: number;
  /** Counts recorded as history only because a newer snapshot already set them. */
  supersededEvents: number;
}

export interface MonthlyEventEdit {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
}

export class EntityReconciler {
  /** Apply a parsed snapshot to the transaction's working set. */
  reconcile(parsed: ParsedSnapshot, tx: PortfolioTransaction): ReconcileSummary {
    const summary: ReconcileSummary = {
      createdProjects: 0,
      updatedProjects: 0,
      createdStrategies: 0,
      createdEvents: 0,
      updatedEvents: 0,
      unchangedEvents: 0,
      staleProjects: 0,
      supersededEvents: 0,
    };

    for (const row of parsed.projects) {
      const existing = tx.getProject(row.projectId);
      if (existing !== null && tx.predates(existing)) {
        summary.staleProjects++;
        continue;
      }
      if (tx.getStrategy(normalizeStrategyName(row.strategy)) === null) {
        summary.createdStrategies++;
      }
      const strategy = tx.resolveStrategy(row.strategy);
      const fields = projectFields(row, strategy.id);

      if (existing === null) {
        tx.createProject({ id: row.projectId, ...fields });
        summary.createdProjects++;
      } else if (tx.updateProject(row.projectId, fields) !== null) {
        summary.updatedProjects++;
      }
    }

    for (const [monthKey, rows] of parsed.months) {
      for (const row of rows) {
        const counts: [EventKind, number][] = [
          ['proposal', row.proposals],
          ['approval', row.approvals],
        ];
        for (const [kind, count] of counts) {
          const { outcome } = tx.upsertEvent({
            projectId: row.projectId,
            monthKey,
            kind,
            count,
            sourceSnapshotDate: parsed.snapshotDate,
            note: row.note,
          });
          tally(summary, outcome);
        }
      }
    }

    return summary;
  }

  /**
   * Direct project edit. A strategy given by name is resolved, and created
   * on first reference, the same way ingestion does it.
   * Returns the current project when nothing differs.
   */
  updateProject(tx: PortfolioTransaction, id: string, fields: ProjectUpdateFields): Project {
    const current = tx.getProject(id);
    if (!current) {
      throw new SnapshotError('UnknownEntity', `Project "${id}" does not exist`, {
        entityType: 'project',
        entityId: id,
      });
    }

    const { strategy, ...rest } = fields;
    const patch: ProjectPatch = { ...rest };
    if (strategy !== undefined) {
      patch.strategyId = tx.resolveStrategy(strategy).id;
    }
    return tx.updateProject(id, patch) ?? current;
  }

  /**
   * Direct count edit. Keeps the event's note and source snapshot; a new
   * event is attributed to the latest ingested snapshot.
   */
  updateMonthlyEvent(tx: PortfolioTransaction, edit: MonthlyEventEdit): MonthlyEvent {
    if (tx.getProject(edit.projectId) === null) {
      throw new SnapshotError('UnknownEntity', `Project "${edit.projectId}" does not exist`, {
        entityType: 'project',
        entityId: edit.projectId,
      });
    }

    const current = tx.getEvent(edit.projectId, edit.monthKey, edit.kind);
    const sourceSnapshotDate = current?.sourceSnapshotDate ?? tx.latestSnapshotDate();
    if (sourceSnapshotDate === null) {
      throw new SnapshotError('InvalidField', 'No snapshot has been ingested yet', {
        entityType: 'monthly_event',
      });
    }

    const { event } = tx.upsertEvent(
      {
        projectId: edit.projectId,
        monthKey: edit.monthKey,
        kind: edit.kind,
        count: edit.count,
        sourceSnapshotDate,
        note: current?.note ?? null,
      },
      true
    );
    if (!event) {
      throw new Error(`Event ${edit.projectId}/${edit.monthKey}/${edit.kind} was not staged`);
    }
    return event;
  }
}

function projectFields(row: MasterRow, strategyId: string): Required<ProjectPatch> {
  return {
    name: row.name,
    champion: row.champion,
    strategyId,
    status: row.status,
    orgUnit: row.orgUnit,
    proposedMonth: row.proposedMonth,
    approvedMonth: row.approvedMonth,
  };
}

function tally(summary: ReconcileSummary, outcome: UpsertOutcome): void {
  switch (outcome) {
    case 'created':
      summary.createdEvents++;
      break;
    case 'updated':
      summary.updatedEvents++;
      break;
    case 'unchanged':
      summary.unchangedEvents++;
      break;
    case 'superseded':
      summary.supersededEvents++;
      break;
    case 'skipped':
      break;
  }
}
