/**
 * Application error hierarchy.
 * Every expected failure is an AppError carrying a stable code, an HTTP-ish
 * status for whichever shell surfaces it, and structured details.
 * Anything that is not an AppError is a fault and is never converted.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type SnapshotErrorKind =
  | 'MalformedDocument'
  | 'InvalidFilename'
  | 'MissingMasterSheet'
  | 'MissingRequiredColumn'
  | 'InvalidMasterRow'
  | 'OrphanMonthlyRow'
  | 'DuplicateMonthlyRow'
  | 'InvalidEventCount'
  | 'DuplicateSnapshot'
  | 'UnknownEntity'
  | 'InvalidField'
  | 'StrategyInUse'
  | 'ConcurrentModification'
  | 'InvalidWindow';

const STATUS_BY_KIND: Record<SnapshotErrorKind, number> = {
  MalformedDocument: 422,
  InvalidFilename: 400,
  MissingMasterSheet: 422,
  MissingRequiredColumn: 422,
  InvalidMasterRow: 422,
  OrphanMonthlyRow: 422,
  DuplicateMonthlyRow: 422,
  InvalidEventCount: 422,
  DuplicateSnapshot: 409,
  UnknownEntity: 404,
  InvalidField: 400,
  StrategyInUse: 409,
  ConcurrentModification: 409,
  InvalidWindow: 400,
};

/** Row-level context pointing at the cell that needs correcting. */
export interface SnapshotErrorDetail {
  sheet?: string;
  /** 1-based spreadsheet row number. */
  row?: number;
  column?: string;
  value?: string | number | boolean | null;
  entityType?: string;
  entityId?: string;
  snapshotDate?: string;
}

export class SnapshotError extends AppError {
  constructor(
    readonly kind: SnapshotErrorKind,
    message: string,
    readonly detail: SnapshotErrorDetail = {}
  ) {
    super(kind, message, STATUS_BY_KIND[kind], { ...detail });
  }
}

export function isSnapshotError(err: unknown, kind?: SnapshotErrorKind): err is SnapshotError {
  return err instanceof SnapshotError && (kind === undefined || err.kind === kind);
}
