import { afterEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import { copyColumnForUpdates, meltRankNames, prepareDownloadedTable } from '../services/column-helpers';
import { defineSheetConfig } from '../validation';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('prepareDownloadedTable', () => {
  const config = defineSheetConfig({
    name: 'item',
    columnNames: ['code', 'name', 'updated_at'],
    keyColumns: ['code'],
    dropColumns: ['updated_at'],
  });

  it('renames headers by position and drops configured columns', () => {
    const prepared = prepareDownloadedTable(
      {
        headers: ['Code', 'Display Name', 'Last Updated'],
        rows: [
          ['K1', 'Alpha', '2024-01-01'],
          ['K2'],
        ],
      },
      config,
    );

    expect(prepared).toEqual({
      columns: ['code', 'name'],
      rows: [
        { code: 'K1', name: 'Alpha' },
        { code: 'K2', name: null },
      ],
    });
  });

  it('rejects a header of the wrong width', () => {
    expect(() => prepareDownloadedTable({ headers: ['Code', 'Name'], rows: [] }, config)).toThrow(ValidationError);
  });
});

describe('copyColumnForUpdates', () => {
  it('copies the source on UPDATE rows and blanks ADD rows', () => {
    const rows = [
      { flag: 'ADD', code: 'A' },
      { flag: 'UPDATE', code: 'B' },
    ];

    expect(copyColumnForUpdates(rows, 'code_after', 'code')).toEqual([
      { flag: 'ADD', code: 'A', code_after: '' },
      { flag: 'UPDATE', code: 'B', code_after: 'B' },
    ]);
    expect(rows[0]).toEqual({ flag: 'ADD', code: 'A' });
  });
});

describe('meltRankNames', () => {
  it('unpivots distinct names per rank and warns on names shared across ranks', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const rows = [
      { rank_3: 'East', rank_4: 'Team A' },
      { rank_3: 'East', rank_4: null },
      { rank_3: 'West', rank_4: 'East' },
    ];

    expect(meltRankNames(rows, 'rank', 3, 4)).toEqual([
      { column: 3, group_name: 'East' },
      { column: 3, group_name: 'West' },
      { column: 4, group_name: 'Team A' },
      { column: 4, group_name: 'East' },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Group name appears under more than one rank', {
      groupName: 'East',
      ranks: [3, 4],
    });
  });
});
