import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '@mastersync/shared';
import { readWorkbookSheet } from '../services/sheet-reader';
import { prepareDownloadedTable } from '../services/column-helpers';
import { processMasterUpdate } from '../commands/process-master-update';
import { defineSheetConfig } from '../validation';
import { table } from './fixtures';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'sheet-reader-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeWorkbook(name: string, rows: unknown[][]): string {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'download');
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  const filePath = join(dir, name);
  writeFileSync(filePath, data);
  return filePath;
}

describe('readWorkbookSheet', () => {
  it('reads numeric cells as text and blanks as null', () => {
    const filePath = writeWorkbook('org.xlsx', [
      ['Code', 'Name', 'Disabled'],
      [100, 'Sales', null],
    ]);

    expect(readWorkbookSheet(filePath)).toEqual({
      headers: ['Code', 'Name', 'Disabled'],
      rows: [['100', 'Sales', null]],
    });
  });

  it('reconciles a downloaded numeric code against the same local code', () => {
    const filePath = writeWorkbook('org.xlsx', [
      ['Code', 'Name', 'Disabled'],
      [100, 'Sales', null],
    ]);
    const sheetConfig = defineSheetConfig({
      name: 'organization',
      columnNames: ['code', 'name', 'disable_flag'],
      keyColumns: ['code'],
    });

    const changes = processMasterUpdate({
      local: table(['code', 'name', 'disable_flag'], [{ code: '100', name: 'Sales', disable_flag: null }]),
      downloaded: prepareDownloadedTable(readWorkbookSheet(filePath), sheetConfig),
      sheetConfig,
    });

    expect(changes.rows).toEqual([]);
  });

  it('fails for a sheet the workbook lacks', () => {
    const filePath = writeWorkbook('org.xlsx', [['Code']]);
    expect(() => readWorkbookSheet(filePath, 'missing')).toThrow(NotFoundError);
  });
});
