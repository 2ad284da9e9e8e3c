import type { Row } from '@mastersync/shared';
import type { RankedOrganization } from '../types';

export function rankCodeColumn(rank: number): string {
  return `rank${rank}_code`;
}

export function rankNameColumn(rank: number): string {
  return `rank${rank}_name`;
}

/** Column order of {@link toOrganizationRows}: base columns, every rank code, then every rank name. */
export function organizationColumns(levels: number): string[] {
  const ranks = Array.from({ length: levels }, (_, i) => i + 1);
  return [
    'org_code',
    'org_name',
    'parent_code',
    'rank',
    ...ranks.map(rankCodeColumn),
    ...ranks.map(rankNameColumn),
  ];
}

/**
 * Flatten ranked orgs into plain rows so they can be reconciled like any
 * other master table.
 */
export function toOrganizationRows(organizations: readonly RankedOrganization[]): Row[] {
  return organizations.map((org) => {
    const row: Row = {
      org_code: org.code,
      org_name: org.name,
      parent_code: org.parentCode,
      rank: org.rank,
    };
    org.ranks.forEach((slot, i) => {
      row[rankCodeColumn(i + 1)] = slot.code;
    });
    org.ranks.forEach((slot, i) => {
      row[rankNameColumn(i + 1)] = slot.name;
    });
    return row;
  });
}
