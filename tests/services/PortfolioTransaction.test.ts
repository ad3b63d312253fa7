import { describe, it, expect, beforeEach } from 'vitest';
import {
  PortfolioTransaction,
  normalizeStrategyName,
  runTransaction,
} from '../../src/services/PortfolioTransaction.js';
import { MockPortfolioRepository } from '../mocks/MockPortfolioRepository.js';
import { snapshotErrorFrom, rejectedSnapshotError } from '../helpers/errors.js';
import {
  EDIT_CONTEXT,
  INGEST_CONTEXT,
  makeEvent,
  makeProject,
  makeSnapshot,
  makeState,
  makeStrategy,
} from '../helpers/fixtures.js';

function seededState() {
  return makeState({
    strategies: [makeStrategy('Growth'), makeStrategy('Legacy')],
    projects: [makeProject({ id: 'P1' })],
    events: [makeEvent({ projectId: 'P1', monthKey: '2026-01', kind: 'proposal', count: 3 })],
    snapshots: [makeSnapshot('2026-02-01')],
  });
}

describe('normalizeStrategyName', () => {
  it('should trim, collapse inner whitespace and lower-case', () => {
    expect(normalizeStrategyName('  Cost   Reduction ')).toBe('cost reduction');
  });
});

describe('PortfolioTransaction', () => {
  let tx: PortfolioTransaction;

  beforeEach(() => {
    tx = new PortfolioTransaction(seededState(), INGEST_CONTEXT);
  });

  // --- resolveStrategy() ---

  it('should bind differently written names to one existing strategy', () => {
    expect(tx.resolveStrategy(' GROWTH ').id).toBe('growth');
    expect(tx.resolveStrategy('growth').id).toBe('growth');
    expect(tx.changes().strategies).toEqual([]);
    expect(tx.changes().audit).toEqual([]);
  });

  it('should create a strategy on first reference and audit it', () => {
    const created = tx.resolveStrategy('  New   Ideas ');

    expect(created).toEqual({ id: 'new ideas', name: 'New Ideas', description: null, deprecated: false, version: 1 });
    expect(tx.changes().strategies).toEqual([{ op: 'insert', baseVersion: null, value: created }]);
    expect(tx.changes().audit).toEqual([
      {
        id: expect.any(String),
        entityType: 'strategy',
        entityId: 'new ideas',
        changeKind: 'create',
        before: null,
        after: { id: 'new ideas', name: 'New Ideas', description: null, deprecated: false, version: 1 },
        changedFields: ['deprecated', 'id', 'name', 'version'],
        actor: 'alice',
        timestamp: '2026-03-01T09:00:00.000Z',
      },
    ]);
  });

  it('should reject a blank strategy name', () => {
    expect(snapshotErrorFrom(() => tx.resolveStrategy('   ')).kind).toBe('InvalidField');
  });

  // --- createProject() ---

  it('should create a project stamped with the snapshot date', () => {
    const project = tx.createProject({
      id: 'P2',
      name: 'Beta',
      champion: 'Lee',
      strategyId: 'growth',
      status: 'Proposed',
      orgUnit: 'Sales',
      proposedMonth: '2026-02',
      approvedMonth: null,
    });

    expect(project).toMatchObject({
      createdSnapshotDate: '2026-03-01',
      updatedSnapshotDate: '2026-03-01',
      version: 1,
    });
    expect(tx.getProject('P2')).toEqual(project);
    expect(tx.changes().audit[0]).toMatchObject({ entityType: 'project', entityId: 'P2', changeKind: 'create' });
  });

  it('should refuse to create a project outside an ingestion', () => {
    const edit = new PortfolioTransaction(seededState(), EDIT_CONTEXT);
    const err = snapshotErrorFrom(() =>
      edit.createProject({
        id: 'P2',
        name: 'Beta',
        champion: 'Lee',
        strategyId: 'growth',
        status: 'Proposed',
        orgUnit: null,
        proposedMonth: null,
        approvedMonth: null,
      })
    );
    expect(err.kind).toBe('InvalidField');
  });

  it('should refuse a project that references an unknown strategy', () => {
    const err = snapshotErrorFrom(() =>
      tx.createProject({
        id: 'P2',
        name: 'Beta',
        champion: 'Lee',
        strategyId: 'moonshots',
        status: 'Proposed',
        orgUnit: null,
        proposedMonth: null,
        approvedMonth: null,
      })
    );
    expect(err.kind).toBe('UnknownEntity');
    expect(err.detail).toEqual({ entityType: 'strategy', entityId: 'moonshots' });
  });

  // --- updateProject() ---

  it('should return null and stage nothing when no field changes', () => {
    expect(tx.updateProject('P1', { name: 'Project P1', status: 'Active' })).toBeNull();
    expect(tx.changes().projects).toEqual([]);
    expect(tx.changes().audit).toEqual([]);
  });

  it('should apply changed fields and audit the difference', () => {
    const updated = tx.updateProject('P1', { status: 'Done' });

    expect(updated).toMatchObject({ status: 'Done', version: 2, updatedSnapshotDate: '2026-03-01' });
    const [write] = tx.changes().projects;
    expect(write).toMatchObject({ op: 'update', baseVersion: 1 });
    expect(tx.changes().audit[0]?.changedFields).toEqual(['status', 'updatedSnapshotDate', 'version']);
  });

  it('should keep the last snapshot date on direct edits', () => {
    const edit = new PortfolioTransaction(seededState(), EDIT_CONTEXT);
    const updated = edit.updateProject('P1', { champion: 'Park' });

    expect(updated?.updatedSnapshotDate).toBe('2026-02-01');
    expect(edit.changes().audit[0]).toMatchObject({ actor: 'bob', changedFields: ['champion', 'version'] });
  });

  it('should fold repeated updates into one write against the original version', () => {
    tx.updateProject('P1', { status: 'Paused' });
    tx.updateProject('P1', { status: 'Active', champion: 'Park' });

    const { projects, audit } = tx.changes();
    expect(projects).toHaveLength(1);
    expect(projects[0]).toMatchObject({ op: 'update', baseVersion: 1, value: { version: 3, champion: 'Park' } });
    expect(audit).toHaveLength(2);
  });

  it('should tell when the snapshot being ingested predates a project', () => {
    const backfill = new PortfolioTransaction(seededState(), { ...INGEST_CONTEXT, snapshotDate: '2026-01-15' });
    const project = backfill.getProject('P1');

    expect(project && backfill.predates(project)).toBe(true);
    expect(project && tx.predates(project)).toBe(false);
    expect(project && new PortfolioTransaction(seededState(), EDIT_CONTEXT).predates(project)).toBe(false);
  });

  it('should reject an update to an unknown project', () => {
    expect(snapshotErrorFrom(() => tx.updateProject('P9', { status: 'Done' })).kind).toBe('UnknownEntity');
  });

  // --- upsertEvent() ---

  it('should skip a zero count for a key that does not exist', () => {
    const result = tx.upsertEvent({
      projectId: 'P1',
      monthKey: '2026-02',
      kind: 'approval',
      count: 0,
      sourceSnapshotDate: '2026-03-01',
      note: null,
    });

    expect(result).toEqual({ outcome: 'skipped', event: null });
    expect(tx.changes().events).toEqual([]);
  });

  it('should create a zero count when asked to', () => {
    const { outcome, event } = tx.upsertEvent(
      { projectId: 'P1', monthKey: '2026-02', kind: 'approval', count: 0, sourceSnapshotDate: '2026-03-01', note: null },
      true
    );

    expect(outcome).toBe('created');
    expect(event?.count).toBe(0);
    expect(tx.changes().revisions).toEqual([
      { projectId: 'P1', monthKey: '2026-02', kind: 'approval', count: 0, sourceSnapshotDate: '2026-03-01' },
    ]);
  });

  it('should leave an identical event unchanged', () => {
    const result = tx.upsertEvent({
      projectId: 'P1',
      monthKey: '2026-01',
      kind: 'proposal',
      count: 3,
      sourceSnapshotDate: '2026-03-01',
      note: null,
    });

    expect(result.outcome).toBe('unchanged');
    expect(result.event?.sourceSnapshotDate).toBe('2026-02-01');
    expect(tx.changes().events).toEqual([]);
  });

  it('should overwrite a changed count and append a revision', () => {
    const result = tx.upsertEvent({
      projectId: 'P1',
      monthKey: '2026-01',
      kind: 'proposal',
      count: 5,
      sourceSnapshotDate: '2026-03-01',
      note: null,
    });

    expect(result.outcome).toBe('updated');
    expect(tx.getEvent('P1', '2026-01', 'proposal')).toEqual({
      projectId: 'P1',
      monthKey: '2026-01',
      kind: 'proposal',
      count: 5,
      sourceSnapshotDate: '2026-03-01',
      note: null,
      version: 2,
    });
    const changes = tx.changes();
    expect(changes.events[0]).toMatchObject({ op: 'update', baseVersion: 1 });
    expect(changes.revisions).toHaveLength(1);
    expect(changes.audit[0]).toMatchObject({
      entityType: 'monthly_event',
      entityId: '2026-01|P1|proposal',
      changeKind: 'update',
      changedFields: ['count', 'sourceSnapshotDate', 'version'],
    });
  });

  it('should update a note without appending a revision', () => {
    tx.upsertEvent({
      projectId: 'P1',
      monthKey: '2026-01',
      kind: 'proposal',
      count: 3,
      sourceSnapshotDate: '2026-02-01',
      note: 'carried over',
    });

    expect(tx.changes().events).toHaveLength(1);
    expect(tx.changes().revisions).toEqual([]);
  });

  it('should keep a newer stored count and only record an older snapshot value as history', () => {
    const result = tx.upsertEvent({
      projectId: 'P1',
      monthKey: '2026-01',
      kind: 'proposal',
      count: 9,
      sourceSnapshotDate: '2026-01-15',
      note: null,
    });

    expect(result.outcome).toBe('superseded');
    expect(result.event).toMatchObject({ count: 3, sourceSnapshotDate: '2026-02-01', version: 1 });
    expect(tx.getEvent('P1', '2026-01', 'proposal')?.count).toBe(3);
    expect(tx.changes().events).toEqual([]);
    expect(tx.changes().audit).toEqual([]);
    expect(tx.changes().revisions).toEqual([
      { projectId: 'P1', monthKey: '2026-01', kind: 'proposal', count: 9, sourceSnapshotDate: '2026-01-15' },
    ]);
  });

  it('should reject an event for an unknown project', () => {
    const err = snapshotErrorFrom(() =>
      tx.upsertEvent({ projectId: 'P9', monthKey: '2026-01', kind: 'proposal', count: 1, sourceSnapshotDate: '2026-03-01', note: null })
    );
    expect(err.kind).toBe('UnknownEntity');
  });

  // --- strategies ---

  it('should refuse to delete a strategy that projects reference', () => {
    const err = snapshotErrorFrom(() => tx.deleteStrategy('growth'));
    expect(err.kind).toBe('StrategyInUse');
    expect(err.message).toBe('Strategy "Growth" is referenced by 1 project(s); deprecate it instead');
  });

  it('should stage the deletion of an unreferenced strategy', () => {
    tx.deleteStrategy('legacy');

    expect(tx.getStrategy('legacy')).toBeNull();
    expect(tx.changes().strategies).toEqual([
      { op: 'delete', baseVersion: 1, value: makeStrategy('Legacy') },
    ]);
  });

  it('should cancel a create followed by a delete but keep both audit entries', () => {
    tx.resolveStrategy('Temporary');
    tx.deleteStrategy('temporary');

    expect(tx.changes().strategies).toEqual([]);
    expect(tx.changes().audit.map((e) => e.changeKind)).toEqual(['create', 'delete']);
  });

  it('should return null from updateStrategy when nothing changes', () => {
    expect(tx.updateStrategy('growth', { deprecated: false })).toBeNull();
    expect(tx.updateStrategy('growth', { deprecated: true })?.version).toBe(2);
  });

  // --- recordSnapshot() ---

  it('should refuse a snapshot date that already exists', () => {
    const err = snapshotErrorFrom(() => tx.recordSnapshot(makeSnapshot('2026-02-01')));
    expect(err.kind).toBe('DuplicateSnapshot');
  });

  it('should report the latest snapshot date including one being recorded', () => {
    expect(tx.latestSnapshotDate()).toBe('2026-02-01');
    tx.recordSnapshot(makeSnapshot('2026-03-01'));
    expect(tx.latestSnapshotDate()).toBe('2026-03-01');
    expect(tx.changes().snapshot?.date).toBe('2026-03-01');
  });
});

describe('runTransaction', () => {
  let repo: MockPortfolioRepository;

  beforeEach(() => {
    repo = new MockPortfolioRepository();
    repo.strategies.set('growth', makeStrategy('Growth'));
    repo.projects.set('P1', makeProject({ id: 'P1' }));
  });

  it('should not commit an empty change set', async () => {
    const { result } = await runTransaction(repo, EDIT_CONTEXT, (tx) => tx.getProject('P1')?.name);

    expect(result).toBe('Project P1');
    expect(repo.commits).toBe(0);
  });

  it('should commit staged writes with their audit entries', async () => {
    await runTransaction(repo, EDIT_CONTEXT, (tx) => tx.updateProject('P1', { status: 'Done' }));

    expect(repo.commits).toBe(1);
    expect(repo.projects.get('P1')?.status).toBe('Done');
    expect(repo.audit).toHaveLength(1);
  });

  it('should commit nothing when the work throws', async () => {
    const err = await rejectedSnapshotError(
      runTransaction(repo, EDIT_CONTEXT, (tx) => {
        tx.updateProject('P1', { status: 'Done' });
        return tx.updateProject('P9', { status: 'Done' });
      })
    );

    expect(err.kind).toBe('UnknownEntity');
    expect(repo.commits).toBe(0);
    expect(repo.projects.get('P1')?.status).toBe('Active');
  });
});
