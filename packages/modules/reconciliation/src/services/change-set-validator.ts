import { InvalidDisableFlagError, InvalidFlagError, isMissing } from '@mastersync/shared';
import type { CellValue, Row } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import { CHANGE_FLAGS, DISABLE_FLAG_COLUMN, FLAG_COLUMN } from '../types';

function distinct(values: CellValue[]): CellValue[] {
  return [...new Set(values)];
}

function isChangeFlag(value: CellValue): boolean {
  return CHANGE_FLAGS.some((flag) => flag === value);
}

/**
 * Post-conditions of a change set: `disable_flag` is null or exactly 1, and
 * `flag` is ADD or UPDATE.
 *
 * @throws InvalidDisableFlagError
 * @throws InvalidFlagError
 */
export function validateChangeSet(rows: readonly Row[]): void {
  const badDisable = rows
    .map((row) => row[DISABLE_FLAG_COLUMN])
    .filter((value) => !isMissing(value) && value !== 1);
  if (badDisable.length > 0) {
    throw new InvalidDisableFlagError(distinct(badDisable));
  }

  const badFlags = rows.map((row) => row[FLAG_COLUMN]).filter((value) => !isChangeFlag(value));
  if (badFlags.length > 0) {
    throw new InvalidFlagError(distinct(badFlags));
  }

  logger.info('Change set validated', { rowCount: rows.length });
}
