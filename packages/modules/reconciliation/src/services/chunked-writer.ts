/**
 * Change-set export: one xlsx workbook with every row, plus numbered
 * delimited-text chunks when the set exceeds the upload chunk size.
 *
 *   out/org.csv → out/org_original.csv (xlsx), out/org_01.csv, out/org_02.csv, …
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import * as XLSX from 'xlsx';
import { ValidationError } from '@mastersync/shared';
import type { Row } from '@mastersync/shared';
import { getRunConfig, logger } from '@mastersync/core';

export interface WriteChangeSetOptions {
  filePath: string;
  chunkSize?: number;
  /** Column order of every artifact; defaults to the keys of the first row. */
  columns?: readonly string[];
}

export interface WrittenChangeSet {
  originalPath: string;
  chunkPaths: string[];
}

const TAB_EXTENSIONS = new Set(['txt', 'tsv']);

export function splitIntoChunks<T>(rows: readonly T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < rows.length; start += chunkSize) {
    chunks.push(rows.slice(start, start + chunkSize));
  }
  return chunks;
}

function toSheet(rows: readonly Row[], columns: readonly string[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet([...rows], { header: [...columns] });
}

function toDelimited(rows: readonly Row[], columns: readonly string[], separator: string): string {
  return XLSX.utils.sheet_to_csv(toSheet(rows, columns), { FS: separator, RS: '\n' }) + '\n';
}

/**
 * @throws ValidationError when the path has no extension or the chunk size
 *   is not a positive integer
 */
export function writeChangeSet(rows: readonly Row[], options: WriteChangeSetOptions): WrittenChangeSet {
  const chunkSize = options.chunkSize ?? getRunConfig().changeSet.chunkSize;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const extension = extname(options.filePath).slice(1);
  if (!extension) {
    throw new ValidationError(`Output path ${options.filePath} has no file extension`);
  }
  const dir = dirname(options.filePath);
  const base = basename(options.filePath, `.${extension}`);
  const columns = options.columns ?? Object.keys(rows[0] ?? {});

  mkdirSync(dir, { recursive: true });

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, toSheet(rows, columns), 'changes');
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  const originalPath = join(dir, `${base}_original.${extension}`);
  writeFileSync(originalPath, data);
  logger.info('Wrote original change set', { path: originalPath, rowCount: rows.length });

  const chunkPaths: string[] = [];
  if (rows.length > chunkSize) {
    const separator = TAB_EXTENSIONS.has(extension.toLowerCase()) ? '\t' : ',';
    splitIntoChunks(rows, chunkSize).forEach((chunk, i) => {
      const chunkPath = join(dir, `${base}_${String(i + 1).padStart(2, '0')}.${extension}`);
      writeFileSync(chunkPath, toDelimited(chunk, columns, separator), 'utf8');
      logger.info('Wrote change set chunk', { path: chunkPath, rowCount: chunk.length });
      chunkPaths.push(chunkPath);
    });
  }

  return { originalPath, chunkPaths };
}
