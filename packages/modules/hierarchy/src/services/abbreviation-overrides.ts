import { MappingOrgNotFoundError, MissingOrCorruptRankError, ValidationError } from '@mastersync/shared';
import type { HierarchyGraph } from './hierarchy-graph';
import type { AbbreviationOverride, OverrideInput, OverrideTable } from '../types';

/**
 * Key the abbreviation rows by org code. Blank abbreviations become "".
 * The rank always comes from the org in the hierarchy; a rank column in the
 * input is ignored.
 *
 * @throws MappingOrgNotFoundError when a row names an org the graph lacks
 */
export function prepareOverrideTable(graph: HierarchyGraph, rows: readonly OverrideInput[]): OverrideTable {
  const table = new Map<string, AbbreviationOverride>();

  for (const row of rows) {
    const node = graph.node(row.orgCode);
    if (!node) throw new MappingOrgNotFoundError(row.orgCode);
    if (table.has(row.orgCode)) {
      throw new ValidationError('Duplicate abbreviation rows', [
        { field: 'org_code', message: `Org code ${row.orgCode} has more than one abbreviation` },
      ]);
    }

    const rank = node.rank;
    if (rank === null) throw new MissingOrCorruptRankError(row.orgCode, rank);

    table.set(row.orgCode, {
      orgCode: row.orgCode,
      abbreviation: row.abbreviation?.trim() ?? '',
      rank,
    });
  }

  return table;
}
