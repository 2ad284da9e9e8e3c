import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '@mastersync/shared';
import { splitIntoChunks, writeChangeSet } from '../services/chunked-writer';
import { readWorkbookSheet } from '../services/sheet-reader';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'changeset-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const rows = ['K1', 'K2', 'K3', 'K4', 'K5'].map((code) => ({ code, flag: 'ADD' }));

function lines(path: string): string[] {
  return readFileSync(path, 'utf8').trim().split('\n');
}

describe('splitIntoChunks', () => {
  it('keeps order and puts the remainder last', () => {
    expect(splitIntoChunks([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('writeChangeSet', () => {
  it('writes the original workbook and numbered chunks', () => {
    const filePath = join(dir, 'out', 'org.csv');

    const written = writeChangeSet(rows, { filePath, chunkSize: 2 });

    expect(written.originalPath).toBe(join(dir, 'out', 'org_original.csv'));
    expect(written.chunkPaths).toEqual([
      join(dir, 'out', 'org_01.csv'),
      join(dir, 'out', 'org_02.csv'),
      join(dir, 'out', 'org_03.csv'),
    ]);
    expect(lines(join(dir, 'out', 'org_01.csv'))).toEqual(['code,flag', 'K1,ADD', 'K2,ADD']);
    expect(lines(join(dir, 'out', 'org_03.csv'))).toEqual(['code,flag', 'K5,ADD']);
  });

  it('round-trips the original workbook', () => {
    const { originalPath } = writeChangeSet(rows, { filePath: join(dir, 'org.csv'), chunkSize: 2 });

    const sheet = readWorkbookSheet(originalPath);

    expect(sheet.headers).toEqual(['code', 'flag']);
    expect(sheet.rows.map((r) => r[0])).toEqual(['K1', 'K2', 'K3', 'K4', 'K5']);
  });

  it('writes tab-delimited chunks for .tsv paths', () => {
    const written = writeChangeSet(rows, { filePath: join(dir, 'org.tsv'), chunkSize: 4 });

    expect(written.chunkPaths).toHaveLength(2);
    expect(lines(join(dir, 'org_02.tsv'))).toEqual(['code\tflag', 'K5\tADD']);
  });

  it('follows the given column order', () => {
    writeChangeSet(rows, { filePath: join(dir, 'org.csv'), chunkSize: 1, columns: ['flag', 'code'] });

    expect(lines(join(dir, 'org_01.csv'))).toEqual(['flag,code', 'ADD,K1']);
  });

  it('writes no chunks when the set fits in one', () => {
    const written = writeChangeSet(rows, { filePath: join(dir, 'org.csv'), chunkSize: 5 });

    expect(written.chunkPaths).toEqual([]);
    expect(existsSync(written.originalPath)).toBe(true);
    expect(existsSync(join(dir, 'org_01.csv'))).toBe(false);
  });

  it('rejects paths without an extension and non-positive chunk sizes', () => {
    expect(() => writeChangeSet(rows, { filePath: join(dir, 'org'), chunkSize: 2 })).toThrow(ValidationError);
    expect(() => writeChangeSet(rows, { filePath: join(dir, 'org.csv'), chunkSize: 0 })).toThrow(ValidationError);
  });
});
