export const MODULE_KEY = 'hierarchy' as const;
export const MODULE_NAME = 'Organization Hierarchy';
export const MODULE_VERSION = '0.1.0';

// ── Commands ─────────────────────────────────────────────────────────
export { createOrganization, createOrganizationFromRows } from './commands/create-organization';
export type { CreateOrganizationResult } from './commands/create-organization';

// ── Services (for testing / direct use) ──────────────────────────────
export { HierarchyGraph, buildHierarchyGraph } from './services/hierarchy-graph';
export { assignRankColumns, fillMissingRanks, maxRank } from './services/rank-columns';
export {
  findDuplicateGroups,
  assignIdentifiers,
  validateIdentifiers,
  applyIdentifiers,
  longestCommonPrefix,
} from './services/duplicate-names';
export { prepareOverrideTable } from './services/abbreviation-overrides';
export {
  toOrganizationRows,
  organizationColumns,
  rankCodeColumn,
  rankNameColumn,
} from './services/organization-rows';

// ── Validation Schemas ───────────────────────────────────────────────
export { orgInputRowSchema, overrideInputRowSchema, parseOrgRecords, parseOverrideRows } from './validation';
export type { OrgInputRow, OverrideInputRow } from './validation';

// ── Types ────────────────────────────────────────────────────────────
export type {
  OrgRecord,
  OrgNode,
  RankSlot,
  RankedOrganization,
  DuplicateGroup,
  IdentifiedOrganization,
  OverrideInput,
  AbbreviationOverride,
  OverrideTable,
} from './types';
