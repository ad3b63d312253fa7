/**
 * Ingestion service.
 *
 * One snapshot file, one transaction: resolve the date, refuse duplicates,
 * read and parse the workbook, reconcile every row, record the snapshot and
 * commit the lot. Any failure before the commit leaves the store untouched.
 * The store re-checks date uniqueness at commit and merges entity writes by
 * snapshot date, so ingestions of different dates do not block each other.
 */

import type { EngineConfig } from '../config.js';
import type { IWorkbookReader } from '../providers/IWorkbookReader.js';
import type { IPortfolioRepository } from '../repositories/IPortfolioRepository.js';
import type { IngestReport } from '../types/api.js';
import { EntityReconciler } from './EntityReconciler.js';
import { PortfolioTransaction } from './PortfolioTransaction.js';
import { SnapshotParser, resolveSnapshotDate } from './SnapshotParser.js';
import { ensureNewSnapshot } from './SnapshotValidator.js';

export class IngestionService {
  private readonly parser: SnapshotParser;
  private readonly reconciler = new EntityReconciler();

  constructor(
    private readonly repo: IPortfolioRepository,
    private readonly workbookReader: IWorkbookReader,
    config: Pick<EngineConfig, 'masterSheetName'>,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.parser = new SnapshotParser(config.masterSheetName);
  }

  async ingest(document: Uint8Array, filenameOrDate: string, actor: string): Promise<IngestReport> {
    const { snapshotDate, sourceFilename } = resolveSnapshotDate(filenameOrDate);

    const state = await this.repo.loadState();
    ensureNewSnapshot(snapshotDate, new Set(state.snapshots.map((s) => s.date)));

    const workbook = this.workbookReader.read(document);
    const parsed = this.parser.parse(workbook, snapshotDate);

    const ingestedAt = this.clock().toISOString();
    const tx = new PortfolioTransaction(state, { actor, timestamp: ingestedAt, snapshotDate });
    const summary = this.reconciler.reconcile(parsed, tx);
    tx.recordSnapshot({
      date: snapshotDate,
      ingestedAt,
      sourceFilename,
      acceptedRows: parsed.acceptedRows,
      rejectedRows: parsed.rejectedRows,
    });

    const changes = tx.changes();
    await this.repo.commit(changes);

    const warnings = [...parsed.warnings];
    if (summary.staleProjects > 0 || summary.supersededEvents > 0) {
      warnings.push(
        `Snapshot ${snapshotDate} predates stored data: ${summary.staleProjects} project rows and ` +
          `${summary.supersededEvents} monthly counts kept their newer values`
      );
    }

    return {
      snapshotDate,
      sourceFilename,
      acceptedRows: parsed.acceptedRows,
      rejectedRows: parsed.rejectedRows,
      createdProjects: summary.createdProjects,
      updatedProjects: summary.updatedProjects,
      createdStrategies: summary.createdStrategies,
      upsertedEvents: summary.createdEvents + summary.updatedEvents,
      unchangedEvents: summary.unchangedEvents,
      auditEntries: changes.audit.length,
      warnings,
    };
  }
}
