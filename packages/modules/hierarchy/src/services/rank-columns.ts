import { MissingOrCorruptRankError } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import type { HierarchyGraph } from './hierarchy-graph';
import type { OrgRecord, RankSlot, RankedOrganization } from '../types';

interface RankEntry {
  rank: number;
  code: string;
  name: string | null;
}

/** Highest rank in the dataset; 0 when no record carries one. */
export function maxRank(records: readonly OrgRecord[]): number {
  let max = 0;
  for (const record of records) {
    if (record.rank !== null && record.rank > max) max = record.rank;
  }
  return max;
}

/**
 * Populate `rank{1..R}` slots for every record from its root-to-self path.
 * The first node on the path to claim a rank slot keeps it.
 *
 * @throws MissingOrCorruptRankError when any node on a path has no rank or
 *   one outside `[1, R]`
 */
export function assignRankColumns(
  records: readonly OrgRecord[],
  graph: HierarchyGraph,
): RankedOrganization[] {
  const levels = maxRank(records);
  const memo = new Map<string, RankEntry>();

  const resolve = (code: string): RankEntry => {
    const cached = memo.get(code);
    if (cached) return cached;

    const node = graph.node(code);
    const rank = node?.rank ?? null;
    if (rank === null || !Number.isInteger(rank) || rank < 1 || rank > levels) {
      throw new MissingOrCorruptRankError(code, rank);
    }
    const entry: RankEntry = { rank, code, name: node?.name ?? null };
    memo.set(code, entry);
    return entry;
  };

  const ranked = records.map((record) => {
    const ranks: RankSlot[] = Array.from({ length: levels }, () => ({ code: null, name: null }));
    const path = [...graph.ancestorsTopological(record.code), record.code];

    for (const code of path) {
      const entry = resolve(code);
      const slot = ranks[entry.rank - 1];
      if (slot && slot.code === null) {
        slot.code = entry.code;
        slot.name = entry.name;
      }
    }

    return { ...record, ranks };
  });

  logger.debug('Rank columns assigned', { rowCount: ranked.length, rankLevels: levels });
  return ranked;
}

/**
 * Fill empty rank names with `otherLabel`, deepest rank first. The deepest
 * slot is always filled; a shallower one is filled when the slot below it
 * holds a name. Codes are left as they are.
 */
export function fillMissingRanks(
  organizations: readonly RankedOrganization[],
  otherLabel: string,
): RankedOrganization[] {
  return organizations.map((org) => {
    const ranks = org.ranks.map((slot) => ({ ...slot }));
    for (let i = ranks.length - 1; i >= 0; i--) {
      const slot = ranks[i];
      if (!slot || slot.name !== null) continue;
      const below = ranks[i + 1];
      if (below === undefined || below.name !== null) slot.name = otherLabel;
    }
    return { ...org, ranks };
  });
}
