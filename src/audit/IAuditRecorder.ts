/**
 * Audit collaborator contract.
 * Invoked synchronously, exactly once per mutation, inside the transaction
 * that performs the mutation. How entries are persisted is up to the
 * implementation.
 */

import type { AuditEntityType, AuditState, ChangeKind } from '../types/models.js';

export interface IAuditRecorder {
  record(
    entityType: AuditEntityType,
    entityId: string,
    changeKind: ChangeKind,
    before: AuditState | null,
    after: AuditState | null,
    actor: string,
    timestamp: string
  ): void;
}
