/**
 * Strategy service.
 * Strategies are created by ingestion; editors can describe, deprecate or
 * delete them. A strategy that projects still reference cannot be deleted.
 */

import { SnapshotError } from '../errors.js';
import type { IPortfolioRepository } from '../repositories/IPortfolioRepository.js';
import type { Strategy } from '../types/models.js';
import {
  normalizeStrategyName,
  runTransaction,
  type PortfolioTransaction,
  type StrategyPatch,
  type TransactionContext,
} from './PortfolioTransaction.js';

export class StrategyService {
  constructor(
    private readonly repo: IPortfolioRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** Every strategy, ordered by normalized name. */
  async listStrategies(): Promise<Strategy[]> {
    const { strategies } = await this.repo.loadState();
    return [...strategies].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async describeStrategy(idOrName: string, description: string | null, actor: string): Promise<Strategy> {
    const text = description?.trim() || null;
    return this.patch(idOrName, { description: text }, actor);
  }

  async deprecateStrategy(idOrName: string, actor: string): Promise<Strategy> {
    return this.patch(idOrName, { deprecated: true }, actor);
  }

  async deleteStrategy(idOrName: string, actor: string): Promise<void> {
    const id = normalizeStrategyName(idOrName);
    await runTransaction(this.repo, this.context(actor), (tx) => {
      requireStrategy(tx, id);
      tx.deleteStrategy(id);
    });
  }

  private async patch(idOrName: string, patch: StrategyPatch, actor: string): Promise<Strategy> {
    const id = normalizeStrategyName(idOrName);
    const { result } = await runTransaction(this.repo, this.context(actor), (tx) => {
      const current = requireStrategy(tx, id);
      return tx.updateStrategy(id, patch) ?? current;
    });
    return result;
  }

  private context(actor: string): TransactionContext {
    return { actor, timestamp: this.clock().toISOString(), snapshotDate: null };
  }
}

function requireStrategy(tx: PortfolioTransaction, id: string): Strategy {
  const strategy = tx.getStrategy(id);
  if (!strategy) {
    throw new SnapshotError('UnknownEntity', `Strategy "${id}" does not exist`, {
      entityType: 'strategy',
      entityId: id,
    });
  }
  return strategy;
}
