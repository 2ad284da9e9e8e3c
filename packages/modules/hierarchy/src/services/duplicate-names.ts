/**
 * Duplicate org name disambiguation.
 *
 * Orgs whose normalized names collide are split apart by the normalized
 * names of their ancestors: the group is partitioned on the first ancestor
 * segment where the paths diverge, repeatedly, until each org stands alone.
 * A lone org gets its own display name as identifier unless an ancestor has
 * an abbreviation override ranked at or below the divergence point.
 */

import { normalizeName } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import type { HierarchyGraph } from './hierarchy-graph';
import type {
  DuplicateGroup,
  IdentifiedOrganization,
  OverrideTable,
  RankedOrganization,
} from '../types';

// ── Detection ────────────────────────────────────────────────────────

/** Groups of two or more orgs sharing a normalized name, in first-seen order. */
export function findDuplicateGroups(organizations: readonly RankedOrganization[]): DuplicateGroup[] {
  const byName = new Map<string, RankedOrganization[]>();
  for (const org of organizations) {
    const key = normalizeName(org.name);
    const members = byName.get(key);
    if (members) members.push(org);
    else byName.set(key, [org]);
  }

  const groups: DuplicateGroup[] = [];
  for (const [normalizedName, members] of byName) {
    if (members.length >= 2) groups.push({ normalizedName, members });
  }
  return groups;
}

// ── Path Helpers ─────────────────────────────────────────────────────

function ancestorNamePath(graph: HierarchyGraph, code: string): string[] {
  return graph.ancestorsTopological(code).map((c) => normalizeName(graph.node(c)?.name));
}

export function longestCommonPrefix(paths: readonly string[][]): string[] {
  const [first, ...rest] = paths;
  if (!first) return [];
  let length = first.length;
  for (const path of rest) {
    let i = 0;
    while (i < length && i < path.length && path[i] === first[i]) i++;
    length = i;
    if (length === 0) break;
  }
  return first.slice(0, length);
}

/** Rank of the first ancestor (root first) whose normalized name is `segment`; 0 when none. */
function divergenceRank(graph: HierarchyGraph, ancestors: readonly string[], segment: string): number {
  for (const code of ancestors) {
    const node = graph.node(code);
    if (normalizeName(node?.name) === segment) return node?.rank ?? 0;
  }
  return 0;
}

function displayName(graph: HierarchyGraph, code: string): string {
  return graph.node(code)?.name ?? '';
}

// ── Identifier Assignment ────────────────────────────────────────────

function resolveSingleton(
  graph: HierarchyGraph,
  code: string,
  segment: string,
  overrides: OverrideTable,
): string {
  const ancestors = graph.ancestorsTopological(code);
  const rank = divergenceRank(graph, ancestors, segment);
  const onPath = new Set(ancestors);

  // First qualifying entry in table order wins, not the nearest ancestor.
  for (const [orgCode, override] of overrides) {
    if (onPath.has(orgCode) && override.rank >= rank) {
      return override.abbreviation;
    }
  }
  return displayName(graph, code);
}

function identifyGroup(
  group: DuplicateGroup,
  graph: HierarchyGraph,
  overrides: OverrideTable,
): Map<string, string> {
  const paths = new Map<string, string[]>();
  for (const member of group.members) {
    paths.set(member.code, ancestorNamePath(graph, member.code));
  }

  const identifiers = new Map<string, string>();
  const worklist: string[][] = [group.members.map((m) => m.code)];

  while (worklist.length > 0) {
    const codes = worklist.shift();
    if (!codes) break;

    const prefix = longestCommonPrefix(codes.map((c) => paths.get(c) ?? []));
    if (prefix.length === 0) {
      for (const code of codes) identifiers.set(code, displayName(graph, code));
      continue;
    }

    const subsets = new Map<string, string[]>();
    for (const code of codes) {
      const segment = paths.get(code)?.[prefix.length] ?? '';
      const subset = subsets.get(segment);
      if (subset) subset.push(code);
      else subsets.set(segment, [code]);
    }

    if (subsets.size === 1) {
      // Identical ancestor paths: no segment left to split on.
      logger.warn('Duplicate org names share an identical ancestor path', {
        normalizedName: group.normalizedName,
        orgCodes: codes,
      });
      for (const code of codes) identifiers.set(code, displayName(graph, code));
      continue;
    }

    for (const [segment, subset] of subsets) {
      const [only] = subset;
      if (subset.length === 1 && only !== undefined) {
        identifiers.set(only, resolveSingleton(graph, only, segment, overrides));
      } else {
        worklist.push(subset);
      }
    }
  }

  for (const member of group.members) {
    if (!identifiers.get(member.code)) {
      identifiers.set(member.code, displayName(graph, member.code));
    }
  }
  return identifiers;
}

/** Assign a disambiguating identifier to every member of every duplicate group. */
export function assignIdentifiers(
  groups: readonly DuplicateGroup[],
  graph: HierarchyGraph,
  overrides: OverrideTable,
): IdentifiedOrganization[] {
  const result: IdentifiedOrganization[] = [];
  for (const group of groups) {
    const identifiers = identifyGroup(group, graph, overrides);
    for (const organization of group.members) {
      result.push({
        organization,
        normalizedName: group.normalizedName,
        identifier: identifiers.get(organization.code) ?? '',
      });
    }
  }
  return result;
}

/** One warning per duplicate org that still has no identifier. */
export function validateIdentifiers(identified: readonly IdentifiedOrganization[]): string[] {
  const warnings: string[] = [];
  for (const entry of identified) {
    if (entry.identifier) continue;
    const { code, name } = entry.organization;
    const warning = `No identifier found for organization '${name ?? ''}' (code: ${code})`;
    logger.warn(warning, { orgCode: code });
    warnings.push(warning);
  }

  if (warnings.length === 0) {
    logger.info('Every duplicate organization has an identifier', { rowCount: identified.length });
  }
  return warnings;
}

/**
 * Rewrite the own-rank name slot of each identified org to
 * `"{name} ({identifier})"`. Returns new objects; the input is untouched.
 */
export function applyIdentifiers(
  organizations: readonly RankedOrganization[],
  identified: readonly IdentifiedOrganization[],
): RankedOrganization[] {
  const byCode = new Map<string, string>();
  for (const entry of identified) byCode.set(entry.organization.code, entry.identifier);

  return organizations.map((org) => {
    const identifier = byCode.get(org.code);
    const ownRank = org.rank;
    if (identifier === undefined || ownRank === null) return org;
    const name = org.name ?? '';
    const label = identifier ? `${name} (${identifier})` : name;
    const ranks = org.ranks.map((slot, i) => (i === ownRank - 1 ? { ...slot, name: label } : slot));
    return { ...org, ranks };
  });
}
