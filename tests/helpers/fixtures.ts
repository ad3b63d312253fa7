import type { EventRevision, MonthlyEvent, PortfolioState, Project, Snapshot, Strategy } from '../../src/types/models.js';
import type { TransactionContext } from '../../src/services/PortfolioTransaction.js';

export function makeProject(overrides: Partial<Project> & Pick<Project, 'id'>): Project {
  return {
    name: `Project ${overrides.id}`,
    champion: 'Kim',
    strategyId: 'growth',
    status: 'Active',
    orgUnit: null,
    proposedMonth: null,
    approvedMonth: null,
    createdSnapshotDate: '2026-02-01',
    updatedSnapshotDate: '2026-02-01',
    version: 1,
    ...overrides,
  };
}

export function makeStrategy(name: string, overrides: Partial<Strategy> = {}): Strategy {
  return {
    id: name.toLowerCase(),
    name,
    description: null,
    deprecated: false,
    version: 1,
    ...overrides,
  };
}

export function makeEvent(
  overrides: Partial<MonthlyEvent> & Pick<MonthlyEvent, 'projectId' | 'monthKey' | 'kind' | 'count'>
): MonthlyEvent {
  return {
    sourceSnapshotDate: '2026-02-01',
    note: null,
    version: 1,
    ...overrides,
  };
}

export function makeSnapshot(date: string): Snapshot {
  return {
    date,
    ingestedAt: `${date}T09:00:00.000Z`,
    sourceFilename: `${date}.xlsx`,
    acceptedRows: 1,
    rejectedRows: 0,
  };
}

export function makeState(parts: Partial<PortfolioState> = {}): PortfolioState {
  return {
    projects: [],
    strategies: [],
    events: [],
    revisions: [],
    snapshots: [],
    ...parts,
  };
}

export const INGEST_CONTEXT: TransactionContext = {
  actor: 'alice',
  timestamp: '2026-03-01T09:00:00.000Z',
  snapshotDate: '2026-03-01',
};

export const EDIT_CONTEXT: TransactionContext = {
  actor: 'bob',
  timestamp: '2026-03-05T10:00:00.000Z',
  snapshotDate: null,
};

/** A clock that always reads `iso`. */
export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

/**
 * Four projects under three champions over three months, ingested in two
 * snapshots. P2's February proposals went from 1 to 2 in the second one.
 */
export function samplePortfolioState(): PortfolioState {
  const revision = (
    projectId: string,
    monthKey: string,
    kind: 'proposal' | 'approval',
    count: number,
    sourceSnapshotDate: string,
    sequence: number
  ): EventRevision => ({ projectId, monthKey, kind, count, sourceSnapshotDate, sequence });

  return makeState({
    strategies: [makeStrategy('Growth'), makeStrategy('Efficiency'), makeStrategy('Legacy', { deprecated: true })],
    projects: [
      makeProject({ id: 'P1', champion: 'C1', strategyId: 'growth', status: 'Active' }),
      makeProject({ id: 'P2', champion: 'C2', strategyId: 'growth', status: 'Active' }),
      makeProject({ id: 'P3', champion: 'C2', strategyId: 'efficiency', status: 'Proposed' }),
      makeProject({
        id: 'P4',
        champion: 'C3',
        strategyId: 'growth',
        status: 'in progress',
        createdSnapshotDate: '2026-03-01',
        updatedSnapshotDate: '2026-03-01',
      }),
    ],
    events: [
      makeEvent({ projectId: 'P1', monthKey: '2026-01', kind: 'proposal', count: 3 }),
      makeEvent({ projectId: 'P1', monthKey: '2026-01', kind: 'approval', count: 1 }),
      makeEvent({ projectId: 'P2', monthKey: '2026-01', kind: 'proposal', count: 2 }),
      makeEvent({ projectId: 'P2', monthKey: '2026-02', kind: 'proposal', count: 2, sourceSnapshotDate: '2026-03-01', version: 2 }),
      makeEvent({ projectId: 'P2', monthKey: '2026-02', kind: 'approval', count: 3, sourceSnapshotDate: '2026-03-01' }),
      makeEvent({ projectId: 'P3', monthKey: '2026-02', kind: 'proposal', count: 1 }),
      makeEvent({ projectId: 'P4', monthKey: '2026-03', kind: 'proposal', count: 4, sourceSnapshotDate: '2026-03-01' }),
    ],
    revisions: [
      revision('P1', '2026-01', 'proposal', 3, '2026-02-01', 1),
      revision('P1', '2026-01', 'approval', 1, '2026-02-01', 2),
      revision('P2', '2026-01', 'proposal', 2, '2026-02-01', 3),
      revision('P2', '2026-02', 'proposal', 1, '2026-02-01', 4),
      revision('P3', '2026-02', 'proposal', 1, '2026-02-01', 5),
      revision('P2', '2026-02', 'proposal', 2, '2026-03-01', 6),
      revision('P2', '2026-02', 'approval', 3, '2026-03-01', 7),
      revision('P4', '2026-03', 'proposal', 4, '2026-03-01', 8),
    ],
    snapshots: [makeSnapshot('2026-02-01'), makeSnapshot('2026-03-01')],
  });
}
