/**
 * Turns a joined table into ADD / UPDATE change rows.
 *
 * Removal downstream is never emitted as a delete: a right-only row becomes
 * an UPDATE that flips the entity's disable indicator.
 */

import { ValidationError, cellsEqual } from '@mastersync/shared';
import type { CellValue } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import { DISABLE_FLAG_COLUMN, FLAG_COLUMN, LEFT_SUFFIX, MERGE_COLUMN, RIGHT_SUFFIX } from '../types';
import type { ChangeFlag, ChangeRow, ChangeSet, EntityProfile, JoinedRow, JoinedTable } from '../types';

export interface ClassifyChangesInput {
  joined: JoinedTable;
  compareColumns: readonly string[];
  keyColumns: readonly string[];
  entity: EntityProfile;
}

type Side = typeof LEFT_SUFFIX | typeof RIGHT_SUFFIX;

function assertComparable(joined: JoinedTable, compareColumns: readonly string[]): void {
  const missing: string[] = [];
  for (const col of compareColumns) {
    for (const suffix of [LEFT_SUFFIX, RIGHT_SUFFIX]) {
      if (!joined.columns.includes(`${col}${suffix}`)) missing.push(`${col}${suffix}`);
    }
  }
  if (missing.length > 0) {
    throw new ValidationError(
      'Compare columns missing from joined table',
      missing.map((field) => ({ field, message: 'Column not found' })),
    );
  }
}

/** True when any compare column differs; two missing values count as equal. */
export function hasDifferences(row: JoinedRow, compareColumns: readonly string[]): boolean {
  return compareColumns.some((col) => !cellsEqual(row[`${col}${LEFT_SUFFIX}`], row[`${col}${RIGHT_SUFFIX}`]));
}

function isDisabledFlag(value: CellValue): boolean {
  return value === 1 || value === '1';
}

/** Right-only rows already in the disabled state produce no change. */
export function isAlreadyDisabled(row: JoinedRow, entity: EntityProfile): boolean {
  if (entity.kind === 'user') {
    return row[`${entity.departmentColumn}${RIGHT_SUFFIX}`] === entity.retirementSentinel;
  }
  return isDisabledFlag(row[`${DISABLE_FLAG_COLUMN}${RIGHT_SUFFIX}`]);
}

function extractSide(
  row: JoinedRow,
  side: Side,
  flag: ChangeFlag,
  keyColumns: readonly string[],
  compareColumns: readonly string[],
): ChangeRow {
  const out: ChangeRow = { [FLAG_COLUMN]: flag };
  for (const key of keyColumns) out[key] = row[key] ?? null;
  for (const col of compareColumns) out[col] = row[`${col}${side}`] ?? null;
  return out;
}

function disableRow(row: ChangeRow, entity: EntityProfile): ChangeRow {
  if (entity.kind === 'user') {
    const retired: ChangeRow = { ...row };
    for (const col of entity.blankColumns) retired[col] = null;
    retired[entity.departmentColumn] = entity.retirementSentinel;
    return retired;
  }
  return { ...row, [DISABLE_FLAG_COLUMN]: 1 };
}

function outputColumns(
  keyColumns: readonly string[],
  compareColumns: readonly string[],
  entity: EntityProfile,
): string[] {
  const columns = [...keyColumns, FLAG_COLUMN, ...compareColumns];
  const extras =
    entity.kind === 'user'
      ? [...entity.blankColumns, entity.departmentColumn]
      : [DISABLE_FLAG_COLUMN];
  for (const col of extras) {
    if (!columns.includes(col)) columns.push(col);
  }
  return columns;
}

/**
 * ADD rows first, then modified UPDATE rows, then soft-disable UPDATE rows,
 * each group in joined-table order.
 *
 * @throws ValidationError when a compare column lacks its `_left` or `_right` side
 */
export function classifyChanges(input: ClassifyChangesInput): ChangeSet {
  const { joined, compareColumns, keyColumns, entity } = input;
  assertComparable(joined, compareColumns);

  const adds: ChangeRow[] = [];
  const updates: ChangeRow[] = [];
  const disables: ChangeRow[] = [];

  for (const row of joined.rows) {
    switch (row[MERGE_COLUMN]) {
      case 'left_only':
        adds.push(extractSide(row, LEFT_SUFFIX, 'ADD', keyColumns, compareColumns));
        break;
      case 'both':
        if (hasDifferences(row, compareColumns)) {
          updates.push(extractSide(row, LEFT_SUFFIX, 'UPDATE', keyColumns, compareColumns));
        }
        break;
      case 'right_only':
        if (!isAlreadyDisabled(row, entity)) {
          disables.push(disableRow(extractSide(row, RIGHT_SUFFIX, 'UPDATE', keyColumns, compareColumns), entity));
        }
        break;
    }
  }

  const columns = outputColumns(keyColumns, compareColumns, entity);
  const rows = [...adds, ...updates, ...disables].map((row) => {
    const ordered: ChangeRow = { [FLAG_COLUMN]: row[FLAG_COLUMN] };
    for (const col of columns) {
      if (col !== FLAG_COLUMN) ordered[col] = row[col] ?? null;
    }
    return ordered;
  });

  logger.info('Changes classified', {
    entity: entity.kind,
    rowCount: rows.length,
    addCount: adds.length,
    updateCount: updates.length,
    disableCount: disables.length,
  });
  return { columns, rows };
}
