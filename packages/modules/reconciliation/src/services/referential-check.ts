/**
 * Location references: every `location_code` used by organization rows must
 * exist in the canonical location table.
 */

import { ReferentialIntegrityError, ValidationError, compositeKey, isMissing } from '@mastersync/shared';
import type { Row, Table } from '@mastersync/shared';
import { logger } from '@mastersync/core';

export const LOCATION_CODE_COLUMN = 'location_code';

function assertColumn(table: Table, column: string, side: string): void {
  if (!table.columns.includes(column)) {
    throw new ValidationError(`${side} table has no ${column} column`, [
      { field: column, message: 'Column not found' },
    ]);
  }
}

/**
 * @throws ValidationError when either table lacks `column`
 * @throws ReferentialIntegrityError listing the unresolved values
 */
export function validateReferences(rows: Table, reference: Table, column: string): void {
  assertColumn(rows, column, 'Source');
  assertColumn(reference, column, 'Reference');

  const known = new Set(reference.rows.map((row) => compositeKey(row, [column])));
  const missing = new Set<string>();
  for (const row of rows.rows) {
    if (!known.has(compositeKey(row, [column]))) {
      const value = row[column];
      missing.add(isMissing(value) ? '' : String(value));
    }
  }

  if (missing.size > 0) {
    throw new ReferentialIntegrityError(column, [...missing]);
  }
}

export function validateLocationCodes(organizations: Table, locations: Table): void {
  validateReferences(organizations, locations, LOCATION_CODE_COLUMN);
}

/**
 * Referential check followed by an inner join on `location_code`; each
 * organization row gains the location columns. Rows matching several
 * locations appear once per match.
 *
 * @throws ValidationError when the tables share a non-key column
 */
export function mergeLocations(organizations: Table, locations: Table): Table {
  validateLocationCodes(organizations, locations);

  const added = locations.columns.filter((c) => c !== LOCATION_CODE_COLUMN);
  const overlap = added.filter((c) => organizations.columns.includes(c));
  if (overlap.length > 0) {
    throw new ValidationError(
      'Organization and location tables share columns',
      overlap.map((field) => ({ field, message: 'Column exists in both tables' })),
    );
  }

  const byCode = new Map<string, Row[]>();
  for (const location of locations.rows) {
    const key = compositeKey(location, [LOCATION_CODE_COLUMN]);
    const matches = byCode.get(key);
    if (matches) matches.push(location);
    else byCode.set(key, [location]);
  }

  const rows = organizations.rows.flatMap((org) =>
    (byCode.get(compositeKey(org, [LOCATION_CODE_COLUMN])) ?? []).map((location) => {
      const merged: Row = { ...org };
      for (const col of added) merged[col] = location[col] ?? null;
      return merged;
    }),
  );

  logger.info('Locations merged', { rowCount: rows.length });
  return { columns: [...organizations.columns, ...added], rows };
}
