/**
 * Header aliases for the master and monthly sheets.
 * Matching ignores case and surrounding/inner whitespace runs.
 */

export interface ColumnSpec<F extends string> {
  field: F;
  /** Label used in error messages. */
  label: string;
  required: boolean;
  aliases: string[];
}

export type MasterField =
  | 'projectId'
  | 'name'
  | 'champion'
  | 'strategy'
  | 'status'
  | 'orgUnit'
  | 'proposedMonth'
  | 'approvedMonth';

export type MonthlyField = 'projectId' | 'proposals' | 'approvals' | 'note';

const PROJECT_ID_ALIASES = ['project id', 'project_id', 'project code', 'id', '과제id'];

export const MASTER_COLUMNS: ColumnSpec<MasterField>[] = [
  { field: 'projectId', label: 'Project ID', required: true, aliases: PROJECT_ID_ALIASES },
  { field: 'name', label: 'Project Name', required: true, aliases: ['project name', 'name', '과제명'] },
  { field: 'champion', label: 'Champion', required: true, aliases: ['champion', 'owner', '챔피언'] },
  { field: 'strategy', label: 'Strategy', required: true, aliases: ['strategy', 'strategy category', '전략분류'] },
  { field: 'status', label: 'Status', required: true, aliases: ['status', 'stage', '심의상태'] },
  { field: 'orgUnit', label: 'Org Unit', required: false, aliases: ['org unit', 'department', '수행 부서'] },
  { field: 'proposedMonth', label: 'Proposed Month', required: false, aliases: ['proposed month', '제안월'] },
  { field: 'approvedMonth', label: 'Approved Month', required: false, aliases: ['approved month', '승인월'] },
];

export const MONTHLY_COLUMNS: ColumnSpec<MonthlyField>[] = [
  { field: 'projectId', label: 'Project ID', required: true, aliases: PROJECT_ID_ALIASES },
  {
    field: 'proposals',
    label: 'Proposals',
    required: true,
    aliases: ['proposals', 'proposal count', 'new proposals', '신규제안', '신규제안여부'],
  },
  {
    field: 'approvals',
    label: 'Approvals',
    required: true,
    aliases: ['approvals', 'approval count', '승인', '승인여부'],
  },
  { field: 'note', label: 'Note', required: false, aliases: ['note', 'notes', '비고'] },
];

export function normalizeHeader(header: string): string {
  return header.trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface ResolvedColumns<F extends string> {
  /** Actual header for each recognised field. */
  headerFor: Partial<Record<F, string>>;
  missing: ColumnSpec<F>[];
}

/** Map sheet headers onto fields. The first header matching a field wins. */
export function resolveColumns<F extends string>(
  headers: readonly string[],
  specs: readonly ColumnSpec<F>[]
): ResolvedColumns<F> {
  const headerFor: Partial<Record<F, string>> = {};
  for (const spec of specs) {
    const match = headers.find((header) => spec.aliases.includes(normalizeHeader(header)));
    if (match !== undefined) headerFor[spec.field] = match;
  }
  return {
    headerFor,
    missing: specs.filter((spec) => spec.required && headerFor[spec.field] === undefined),
  };
}
