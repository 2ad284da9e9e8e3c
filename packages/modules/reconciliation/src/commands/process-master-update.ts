import type { Table } from '@mastersync/shared';
import { errorFields, logger } from '@mastersync/core';
import { outerJoin } from '../services/outer-join';
import { classifyChanges } from '../services/change-classifier';
import { validateChangeSet } from '../services/change-set-validator';
import { STANDARD_ENTITY } from '../validation';
import type { ChangeSet, EntityProfile, SheetConfig } from '../types';

export interface ProcessMasterUpdateInput {
  /** Desired state, maintained locally. */
  local: Table;
  /** Current state, downloaded from the target system. */
  downloaded: Table;
  sheetConfig: SheetConfig;
  entity?: EntityProfile;
}

/** Join, classify and validate one entity's master data. */
export function processMasterUpdate(input: ProcessMasterUpdateInput): ChangeSet {
  const { local, downloaded, sheetConfig } = input;
  const entity = input.entity ?? STANDARD_ENTITY;
  const startTime = Date.now();

  try {
    const joined = outerJoin(local, downloaded, sheetConfig.keyColumns);
    logger.info('Performed outer join on key columns', { entity: sheetConfig.name, rowCount: joined.rows.length });

    const changes = classifyChanges({
      joined,
      compareColumns: sheetConfig.compareColumns,
      keyColumns: sheetConfig.keyColumns,
      entity,
    });

    validateChangeSet(changes.rows);
    logger.info('Master update prepared', {
      entity: sheetConfig.name,
      rowCount: changes.rows.length,
      durationMs: Date.now() - startTime,
    });
    return changes;
  } catch (err) {
    logger.error('Master update failed', { entity: sheetConfig.name, error: errorFields(err) });
    throw err;
  }
}
