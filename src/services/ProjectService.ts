/**
 * Project service.
 * Direct edits to projects and monthly counts. Each call is its own
 * transaction with the same audit contract as ingestion.
 */

import { SnapshotError } from '../errors.js';
import type { IPortfolioRepository } from '../repositories/IPortfolioRepository.js';
import type { UpdateMonthlyEventRequest } from '../types/api.js';
import type { MonthlyEvent, Project } from '../types/models.js';
import { EntityReconciler } from './EntityReconciler.js';
import { runTransaction, type TransactionContext } from './PortfolioTransaction.js';
import { parseEventCount, parseEventKind, parseMonthKey } from './SnapshotValidator.js';
import { projectUpdateSchema } from './snapshotSchemas.js';

export class ProjectService {
  private readonly reconciler = new EntityReconciler();

  constructor(
    private readonly repo: IPortfolioRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async getProject(id: string): Promise<Project> {
    const state = await this.repo.loadState();
    const project = state.projects.find((p) => p.id === id);
    if (!project) {
      throw new SnapshotError('UnknownEntity', `Project "${id}" does not exist`, {
        entityType: 'project',
        entityId: id,
      });
    }
    return project;
  }

  /** Validate `fields` and apply only the ones that differ. */
  async updateProject(id: string, fields: unknown, actor: string): Promise<Project> {
    const parsed = projectUpdateSchema.safeParse(fields);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const column = issue?.path.join('.') ?? '';
      throw new SnapshotError(
        'InvalidField',
        `Invalid project update${column ? ` (${column})` : ''}: ${issue?.message ?? 'invalid value'}`,
        { entityType: 'project', entityId: id, ...(column ? { column } : {}) }
      );
    }

    const { result } = await runTransaction(this.repo, this.context(actor), (tx) =>
      this.reconciler.updateProject(tx, id, parsed.data)
    );
    return result;
  }

  async updateMonthlyEvent(request: UpdateMonthlyEventRequest, actor: string): Promise<MonthlyEvent> {
    const monthKey = parseMonthKey(request.monthKey);
    const kind = parseEventKind(request.kind);
    const count = parseEventCount(request.count, {
      entityType: 'monthly_event',
      entityId: request.projectId,
      column: 'count',
    });

    const { result } = await runTransaction(this.repo, this.context(actor), (tx) =>
      this.reconciler.updateMonthlyEvent(tx, { projectId: request.projectId, monthKey, kind, count })
    );
    return result;
  }

  private context(actor: string): TransactionContext {
    return { actor, timestamp: this.clock().toISOString(), snapshotDate: null };
  }
}
