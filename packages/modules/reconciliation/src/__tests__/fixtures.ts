import type { Row, Table } from '@mastersync/shared';
import { defineSheetConfig } from '../validation';

export function table(columns: string[], rows: Row[]): Table {
  return { columns, rows };
}

/** code key; a, b and disable_flag compared. */
export function itemConfig() {
  return defineSheetConfig({
    name: 'item',
    columnNames: ['code', 'a', 'b', 'disable_flag'],
    keyColumns: ['code'],
  });
}

export const ITEM_COLUMNS = ['code', 'a', 'b', 'disable_flag'];
