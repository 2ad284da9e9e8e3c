import type { CellValue, Row } from '../types/table';

export function isMissing(value: CellValue): value is null | undefined {
  if (value === null || value === undefined) return true;
  return typeof value === 'number' && Number.isNaN(value);
}

/**
 * Equality where two missing values are equal and a missing value never
 * equals a present one.
 * cellsEqual(null, NaN) → true, cellsEqual(null, '') → false
 */
export function cellsEqual(a: CellValue, b: CellValue): boolean {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing || bMissing) return aMissing && bMissing;
  return a === b;
}

/** Stable composite key for joins and grouping. Missing cells all map to the same token. */
export function compositeKey(row: Row, columns: string[]): string {
  return JSON.stringify(columns.map((c) => (isMissing(row[c]) ? null : row[c])));
}
