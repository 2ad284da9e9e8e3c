import { logger } from '@mastersync/core';
import { buildHierarchyGraph } from '../services/hierarchy-graph';
import type { HierarchyGraph } from '../services/hierarchy-graph';
import { assignRankColumns } from '../services/rank-columns';
import {
  applyIdentifiers,
  assignIdentifiers,
  findDuplicateGroups,
  validateIdentifiers,
} from '../services/duplicate-names';
import { prepareOverrideTable } from '../services/abbreviation-overrides';
import { parseOrgRecords, parseOverrideRows } from '../validation';
import type { IdentifiedOrganization, OrgRecord, OverrideInput, RankedOrganization } from '../types';

export interface CreateOrganizationResult {
  graph: HierarchyGraph;
  organizations: RankedOrganization[];
  duplicates: IdentifiedOrganization[];
  warnings: string[];
}

/**
 * Build the org master table: hierarchy → rank columns → duplicate name
 * disambiguation. Each stage consumes the full output of the previous one.
 */
export function createOrganization(
  records: readonly OrgRecord[],
  overrides: readonly OverrideInput[],
): CreateOrganizationResult {
  logger.info('Loaded organization records', { entity: 'organization', rowCount: records.length });

  const graph = buildHierarchyGraph(records);
  const ranked = assignRankColumns(records, graph);
  const groups = findDuplicateGroups(ranked);

  if (groups.length === 0) {
    logger.info('No duplicate organization names', { entity: 'organization' });
    return { graph, organizations: ranked, duplicates: [], warnings: [] };
  }

  logger.info('Duplicate organization names found', {
    entity: 'organization',
    groupCount: groups.length,
    rowCount: groups.reduce((sum, g) => sum + g.members.length, 0),
  });

  const overrideTable = prepareOverrideTable(graph, overrides);
  const duplicates = assignIdentifiers(groups, graph, overrideTable);
  const warnings = validateIdentifiers(duplicates);
  const organizations = applyIdentifiers(ranked, duplicates);

  return { graph, organizations, duplicates, warnings };
}

/** Same as {@link createOrganization}, from raw tabular rows. */
export function createOrganizationFromRows(
  orgRows: unknown[],
  overrideRows: unknown[],
): CreateOrganizationResult {
  return createOrganization(parseOrgRecords(orgRows), parseOverrideRows(overrideRows));
}
