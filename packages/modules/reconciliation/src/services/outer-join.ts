/**
 * Full outer join of the local (desired) and downloaded (current) tables.
 *
 * Non-key columns present on both sides get `_left` / `_right` suffixes and
 * every row is tagged with its provenance in `_merge`. A non-key column
 * that exists on only one side keeps its bare name and fails validation.
 */

import { ValidationError, SuffixValidationError, compositeKey } from '@mastersync/shared';
import type { Row, Table } from '@mastersync/shared';
import { LEFT_SUFFIX, MERGE_COLUMN, RIGHT_SUFFIX } from '../types';
import type { JoinedRow, JoinedTable, Provenance } from '../types';

function indexByKey(table: Table, keyColumns: readonly string[], side: string): Map<string, Row> {
  const index = new Map<string, Row>();
  const duplicates: string[] = [];
  for (const row of table.rows) {
    const key = compositeKey(row, [...keyColumns]);
    if (index.has(key)) duplicates.push(key);
    else index.set(key, row);
  }
  if (duplicates.length > 0) {
    throw new ValidationError(
      `Duplicate keys in ${side} table`,
      duplicates.map((key) => ({ field: keyColumns.join(','), message: `Duplicate key ${key}` })),
    );
  }
  return index;
}

function assertKeyColumns(table: Table, keyColumns: readonly string[], side: string): void {
  const missing = keyColumns.filter((k) => !table.columns.includes(k));
  if (missing.length > 0) {
    throw new ValidationError(
      `Key columns missing from ${side} table`,
      missing.map((field) => ({ field, message: 'Key column not found' })),
    );
  }
}

/** Columns that violate the `_left` / `_right` suffix rule. */
export function findUnsuffixedColumns(columns: readonly string[], keyColumns: readonly string[]): string[] {
  return columns.filter(
    (col) =>
      !keyColumns.includes(col) &&
      col !== MERGE_COLUMN &&
      !col.endsWith(LEFT_SUFFIX) &&
      !col.endsWith(RIGHT_SUFFIX),
  );
}

/**
 * @throws ValidationError for empty/missing key columns or duplicate keys
 * @throws SuffixValidationError when a non-key column lacks a side suffix
 */
export function outerJoin(local: Table, downloaded: Table, keyColumns: readonly string[]): JoinedTable {
  if (keyColumns.length === 0) {
    throw new ValidationError('At least one key column is required');
  }
  assertKeyColumns(local, keyColumns, 'local');
  assertKeyColumns(downloaded, keyColumns, 'downloaded');

  const leftValues = local.columns.filter((c) => !keyColumns.includes(c));
  const rightValues = downloaded.columns.filter((c) => !keyColumns.includes(c));
  const shared = new Set(leftValues.filter((c) => rightValues.includes(c)));

  const leftName = (c: string) => (shared.has(c) ? `${c}${LEFT_SUFFIX}` : c);
  const rightName = (c: string) => (shared.has(c) ? `${c}${RIGHT_SUFFIX}` : c);

  const columns = [...keyColumns, ...leftValues.map(leftName), ...rightValues.map(rightName), MERGE_COLUMN];
  const unsuffixed = findUnsuffixedColumns(columns, keyColumns);
  if (unsuffixed.length > 0) {
    throw new SuffixValidationError(unsuffixed);
  }

  const rightIndex = indexByKey(downloaded, keyColumns, 'downloaded');
  indexByKey(local, keyColumns, 'local');

  const build = (keySource: Row, left: Row | undefined, right: Row | undefined, provenance: Provenance): JoinedRow => {
    const row: JoinedRow = { [MERGE_COLUMN]: provenance };
    for (const k of keyColumns) row[k] = keySource[k] ?? null;
    for (const c of leftValues) row[leftName(c)] = left ? (left[c] ?? null) : null;
    for (const c of rightValues) row[rightName(c)] = right ? (right[c] ?? null) : null;
    return row;
  };

  const rows: JoinedRow[] = [];
  const matched = new Set<string>();
  for (const left of local.rows) {
    const key = compositeKey(left, [...keyColumns]);
    const right = rightIndex.get(key);
    if (right) {
      matched.add(key);
      rows.push(build(left, left, right, 'both'));
    } else {
      rows.push(build(left, left, undefined, 'left_only'));
    }
  }
  for (const right of downloaded.rows) {
    if (matched.has(compositeKey(right, [...keyColumns]))) continue;
    rows.push(build(right, undefined, right, 'right_only'));
  }

  return { keyColumns: [...keyColumns], columns, rows };
}
