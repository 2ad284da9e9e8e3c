export const MODULE_KEY = 'reconciliation' as const;
export const MODULE_NAME = 'Change-Set Reconciliation';
export const MODULE_VERSION = '0.1.0';

// ── Commands ─────────────────────────────────────────────────────────
export { processMasterUpdate } from './commands/process-master-update';
export type { ProcessMasterUpdateInput } from './commands/process-master-update';

// ── Services (for testing / direct use) ──────────────────────────────
export { outerJoin, findUnsuffixedColumns } from './services/outer-join';
export { classifyChanges, hasDifferences, isAlreadyDisabled } from './services/change-classifier';
export type { ClassifyChangesInput } from './services/change-classifier';
export { validateChangeSet } from './services/change-set-validator';
export {
  validateReferences,
  validateLocationCodes,
  mergeLocations,
  LOCATION_CODE_COLUMN,
} from './services/referential-check';
export { prepareDownloadedTable, copyColumnForUpdates, meltRankNames } from './services/column-helpers';
export type { RankGroupName } from './services/column-helpers';
export { writeChangeSet, splitIntoChunks } from './services/chunked-writer';
export type { WriteChangeSetOptions, WrittenChangeSet } from './services/chunked-writer';
export { readWorkbookSheet } from './services/sheet-reader';

// ── Validation Schemas ───────────────────────────────────────────────
export { sheetConfigInputSchema, defineSheetConfig, STANDARD_ENTITY, userEntityProfile } from './validation';
export type { SheetConfigInput } from './validation';

// ── Types ────────────────────────────────────────────────────────────
export {
  MERGE_COLUMN,
  LEFT_SUFFIX,
  RIGHT_SUFFIX,
  FLAG_COLUMN,
  DISABLE_FLAG_COLUMN,
  PROVENANCES,
  CHANGE_FLAGS,
} from './types';
export type {
  Provenance,
  ChangeFlag,
  SheetConfig,
  EntityProfile,
  JoinedRow,
  JoinedTable,
  ChangeRow,
  ChangeSet,
  RawSheet,
} from './types';
