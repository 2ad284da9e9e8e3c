import { ValidationError, isMissing } from '@mastersync/shared';
import type { Row, Table } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import { FLAG_COLUMN } from '../types';
import type { RawSheet, SheetConfig } from '../types';

// ── Downloaded Sheets ────────────────────────────────────────────────

/**
 * Replace the downloaded header positionally with the configured column
 * names, then drop the configured columns.
 *
 * @throws ValidationError when the header width differs from the config
 */
export function prepareDownloadedTable(sheet: RawSheet, config: SheetConfig): Table {
  if (sheet.headers.length !== config.columnNames.length) {
    throw new ValidationError(
      `Sheet ${config.name} has ${sheet.headers.length} columns, configuration expects ${config.columnNames.length}`,
    );
  }

  const dropped = new Set(config.dropColumns);
  const columns = config.columnNames.filter((c) => !dropped.has(c));
  const rows = sheet.rows.map((cells) => {
    const row: Row = {};
    config.columnNames.forEach((name, i) => {
      if (!dropped.has(name)) row[name] = cells[i] ?? null;
    });
    return row;
  });

  return { columns, rows };
}

// ── Change Set Columns ───────────────────────────────────────────────

/**
 * `targetColumn` becomes `""` on ADD rows and a copy of `sourceColumn` on
 * UPDATE rows. Returns new rows.
 */
export function copyColumnForUpdates(rows: readonly Row[], targetColumn: string, sourceColumn: string): Row[] {
  return rows.map((row) => ({
    ...row,
    [targetColumn]: row[FLAG_COLUMN] === 'UPDATE' ? (row[sourceColumn] ?? null) : '',
  }));
}

// ── Rank Name Melt ───────────────────────────────────────────────────

export interface RankGroupName {
  column: number;
  group_name: string;
}

/**
 * Unpivot `{baseName}_{start..end}` columns into distinct
 * `{ column, group_name }` pairs, skipping missing cells. Pairs come out
 * column by column, rows in input order within each column.
 */
export function meltRankNames(
  rows: readonly Row[],
  baseName: string,
  startRank = 3,
  endRank = 10,
): RankGroupName[] {
  const seen = new Set<string>();
  const result: RankGroupName[] = [];
  for (let rank = startRank; rank <= endRank; rank++) {
    const column = `${baseName}_${rank}`;
    for (const row of rows) {
      const value = row[column];
      if (isMissing(value)) continue;
      const groupName = String(value);
      const key = `${rank}\u0000${groupName}`;
      if (seen.has(key)) continue;
      seen.add(key);
      result.push({ column: rank, group_name: groupName });
    }
  }

  const ranksByName = new Map<string, number[]>();
  for (const entry of result) {
    const ranks = ranksByName.get(entry.group_name);
    if (ranks) ranks.push(entry.column);
    else ranksByName.set(entry.group_name, [entry.column]);
  }
  for (const [groupName, ranks] of ranksByName) {
    if (ranks.length > 1) {
      logger.warn('Group name appears under more than one rank', { groupName, ranks });
    }
  }

  return result;
}
