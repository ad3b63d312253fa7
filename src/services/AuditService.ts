/**
 * Audit service.
 * Read access to the audit trail written alongside every committed change.
 */

import { SnapshotError } from '../errors.js';
import type { AuditQuery, IPortfolioRepository } from '../repositories/IPortfolioRepository.js';
import type { AuditEntry } from '../types/models.js';

const MAX_LIMIT = 500;

export class AuditService {
  constructor(private readonly repo: IPortfolioRepository) {}

  async listAuditEntries(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const limit = query.limit ?? 100;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
      throw new SnapshotError('InvalidField', `limit must be a whole number from 1 to ${MAX_LIMIT}`, {
        column: 'limit',
        value: limit,
      });
    }
    return this.repo.listAuditEntries({ ...query, limit });
  }
}
