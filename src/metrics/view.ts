/**
 * Portfolio view.
 *
 * Resolves a metrics window against one consistent state: which projects
 * are in scope, which month keys the window covers, and the event counts
 * that applied at the window's as-of date. Every aggregate reads a view,
 * never the raw state.
 */

import { SnapshotError } from '../errors.js';
import { isMonthKey, isSnapshotDate } from '../services/snapshotSchemas.js';
import type { MetricsWindow } from '../types/api.js';
import {
  eventKey,
  type EventKind,
  type EventRevision,
  type MonthKey,
  type PortfolioState,
  type Project,
  type SnapshotDate,
  type Strategy,
} from '../types/models.js';

export interface EventCount {
  projectId: string;
  monthKey: MonthKey;
  kind: EventKind;
  count: number;
}

export interface PortfolioView {
  asOf: SnapshotDate | null;
  /** Projects that existed at `asOf` (all projects for current state). */
  projects: Project[];
  strategies: Strategy[];
  /** Month keys the window covers, ascending. */
  months: MonthKey[];
  /** Counts inside the window's months. */
  windowEvents: EventCount[];
  /** Counts across every month, at `asOf`. */
  allEvents: EventCount[];
}

/** Plain code-unit ordering, independent of locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Status membership test, case- and whitespace-insensitive. */
export function activeMatcher(activeStatuses: readonly string[]): (status: string) => boolean {
  const active = new Set(activeStatuses.map(normalizeStatus));
  return (status) => active.has(normalizeStatus(status));
}

function normalizeStatus(status: string): string {
  return status.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function roundRate(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Reject windows that cannot be resolved. A snapshot window must name an
 * ingested snapshot.
 */
export function validateWindow(window: MetricsWindow, state: PortfolioState): void {
  switch (window.kind) {
    case 'latest':
      return;
    case 'month':
      requireMonth(window.month, 'month');
      if (window.asOf !== undefined) requireDate(window.asOf, 'asOf');
      return;
    case 'range':
      requireMonth(window.from, 'from');
      requireMonth(window.to, 'to');
      if (window.from > window.to) {
        throw new SnapshotError('InvalidWindow', `Range start ${window.from} is after its end ${window.to}`, {
          column: 'from',
          value: window.from,
        });
      }
      if (window.asOf !== undefined) requireDate(window.asOf, 'asOf');
      return;
    case 'snapshot': {
      const { date } = window;
      requireDate(date, 'date');
      if (!state.snapshots.some((s) => s.date === date)) {
        throw new SnapshotError('InvalidWindow', `No snapshot was ingested on ${date}`, {
          column: 'date',
          value: date,
          snapshotDate: date,
        });
      }
      return;
    }
  }
}

export function buildView(state: PortfolioState, window: MetricsWindow): PortfolioView {
  validateWindow(window, state);

  const asOf = asOfDate(window);
  const projects =
    asOf === null ? [...state.projects] : state.projects.filter((p) => p.createdSnapshotDate <= asOf);
  const inScope = new Set(projects.map((p) => p.id));

  const counts = asOf === null ? currentCounts(state) : countsAsOf(state.revisions, asOf);
  const allEvents = counts
    .filter((e) => inScope.has(e.projectId))
    .sort((a, b) =>
      compareText(eventKey(a.projectId, a.monthKey, a.kind), eventKey(b.projectId, b.monthKey, b.kind))
    );

  const covers = monthFilter(window);
  const windowEvents = allEvents.filter((e) => covers(e.monthKey));

  return {
    asOf,
    projects: projects.sort((a, b) => compareText(a.id, b.id)),
    strategies: [...state.strategies].sort((a, b) => compareText(a.id, b.id)),
    months: windowMonths(window, allEvents),
    windowEvents,
    allEvents,
  };
}

function asOfDate(window: MetricsWindow): SnapshotDate | null {
  switch (window.kind) {
    case 'latest':
      return null;
    case 'snapshot':
      return window.date;
    case 'month':
    case 'range':
      return window.asOf ?? null;
  }
}

function currentCounts(state: PortfolioState): EventCount[] {
  return state.events.map(({ projectId, monthKey, kind, count }) => ({ projectId, monthKey, kind, count }));
}

/**
 * Latest revision per key whose source snapshot is on or before `asOf`.
 * Revisions from the same snapshot are ordered by commit sequence.
 */
function countsAsOf(revisions: readonly EventRevision[], asOf: SnapshotDate): EventCount[] {
  const latest = new Map<string, EventRevision>();
  for (const revision of revisions) {
    if (revision.sourceSnapshotDate > asOf) continue;
    const key = eventKey(revision.projectId, revision.monthKey, revision.kind);
    const seen = latest.get(key);
    if (!seen || isLater(revision, seen)) latest.set(key, revision);
  }
  return [...latest.values()].map(({ projectId, monthKey, kind, count }) => ({
    projectId,
    monthKey,
    kind,
    count,
  }));
}

function isLater(a: EventRevision, b: EventRevision): boolean {
  if (a.sourceSnapshotDate !== b.sourceSnapshotDate) return a.sourceSnapshotDate > b.sourceSnapshotDate;
  return a.sequence > b.sequence;
}

function monthFilter(window: MetricsWindow): (month: MonthKey) => boolean {
  switch (window.kind) {
    case 'month': {
      const only = window.month;
      return (month) => month === only;
    }
    case 'range': {
      const { from, to } = window;
      return (month) => month >= from && month <= to;
    }
    case 'latest':
    case 'snapshot':
      return () => true;
  }
}

function windowMonths(window: MetricsWindow, events: readonly EventCount[]): MonthKey[] {
  switch (window.kind) {
    case 'month':
      return [window.month];
    case 'range':
      return enumerateMonths(window.from, window.to);
    case 'latest':
    case 'snapshot':
      return [...new Set(events.map((e) => e.monthKey))].sort(compareText);
  }
}

/** Every month key from `from` to `to`, inclusive. */
export function enumerateMonths(from: MonthKey, to: MonthKey): MonthKey[] {
  const months: MonthKey[] = [];
  let year = Number(from.slice(0, 4));
  let month = Number(from.slice(5, 7));
  for (;;) {
    const key = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
    if (key > to) break;
    months.push(key);
    month++;
    if (month > 12) {
      month = 1;
      year++;
    }
  }
  return months;
}

function requireMonth(value: string, column: string): void {
  if (!isMonthKey(value)) {
    throw new SnapshotError('InvalidWindow', `${column} must be a month key (YYYY-MM)`, { column, value });
  }
}

function requireDate(value: string, column: string): void {
  if (!isSnapshotDate(value)) {
    throw new SnapshotError('InvalidWindow', `${column} must be a calendar date (YYYY-MM-DD)`, {
      column,
      value,
    });
  }
}

export interface Tally {
  proposals: number;
  approvals: number;
}

export function emptyTally(): Tally {
  return { proposals: 0, approvals: 0 };
}

export function addCount(tally: Tally, event: EventCount): void {
  if (event.kind === 'proposal') tally.proposals += event.count;
  else tally.approvals += event.count;
}

/** Proposal and approval sums per project. */
export function tallyByProject(events: readonly EventCount[]): Map<string, Tally> {
  const byProject = new Map<string, Tally>();
  for (const event of events) {
    let tally = byProject.get(event.projectId);
    if (!tally) {
      tally = emptyTally();
      byProject.set(event.projectId, tally);
    }
    addCount(tally, event);
  }
  return byProject;
}
