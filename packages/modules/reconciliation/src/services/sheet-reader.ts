import { readFileSync } from 'node:fs';
import * as XLSX from 'xlsx';
import { NotFoundError } from '@mastersync/shared';
import type { CellValue } from '@mastersync/shared';
import type { RawSheet } from '../types';

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Read one worksheet (the first when `sheetName` is omitted) as a header
 * row plus data rows. Every cell is read as text, so a numeric code cell
 * `100` matches the local code `'100'`; blank cells become null.
 *
 * @throws NotFoundError when the workbook has no such sheet
 */
export function readWorkbookSheet(filePath: string, sheetName?: string): RawSheet {
  const workbook = XLSX.read(readFileSync(filePath), { type: 'buffer' });
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) {
    throw new NotFoundError('Worksheet', sheetName ?? filePath);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true });
  const [header = [], ...body] = matrix;
  return {
    headers: header.map((cell) => (cell === null || cell === undefined ? '' : String(cell))),
    rows: body.map((cells) => cells.map(toCell)),
  };
}
