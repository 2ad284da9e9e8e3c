import type { CellValue, Row } from '@mastersync/shared';

export const MERGE_COLUMN = '_merge' as const;
export const LEFT_SUFFIX = '_left' as const;
export const RIGHT_SUFFIX = '_right' as const;
export const FLAG_COLUMN = 'flag' as const;
export const DISABLE_FLAG_COLUMN = 'disable_flag' as const;

export const PROVENANCES = ['left_only', 'right_only', 'both'] as const;
export type Provenance = (typeof PROVENANCES)[number];

export const CHANGE_FLAGS = ['ADD', 'UPDATE'] as const;
export type ChangeFlag = (typeof CHANGE_FLAGS)[number];

/** Column configuration of one entity type (organization, user, location, …). */
export interface SheetConfig {
  readonly name: string;
  readonly columnNames: readonly string[];
  readonly keyColumns: readonly string[];
  readonly dropColumns: readonly string[];
  /** `columnNames` minus keys and drops, in column order. */
  readonly compareColumns: readonly string[];
}

/**
 * How right-only rows are soft-disabled. Standard entities set
 * `disable_flag = 1`; user-like entities move to the retirement department.
 */
export type EntityProfile =
  | { kind: 'standard' }
  | {
      kind: 'user';
      departmentColumn: string;
      retirementSentinel: string;
      blankColumns: readonly string[];
    };

export type JoinedRow = Row & { [MERGE_COLUMN]: Provenance };

export interface JoinedTable {
  keyColumns: readonly string[];
  columns: string[];
  rows: JoinedRow[];
}

export type ChangeRow = Row & { [FLAG_COLUMN]: ChangeFlag };

export interface ChangeSet {
  columns: string[];
  rows: ChangeRow[];
}

/** Spreadsheet contents before the configured column names are applied. */
export interface RawSheet {
  headers: string[];
  rows: CellValue[][];
}
