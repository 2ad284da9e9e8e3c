/**
 * Tabular primitives shared by the hierarchy and reconciliation modules.
 *
 * A row is a plain record keyed by column name. `null`, `undefined` and
 * `NaN` are all "missing" and compare equal to each other.
 */

export type CellValue = string | number | boolean | null | undefined;

export type Row = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}
