/**
 * Organization hierarchy as an explicit adjacency structure.
 *
 * Nodes are keyed by org code; edges run parent → child. The graph is
 * validated acyclic (Kahn's algorithm) before anything can traverse it,
 * and is read-only once built.
 */

import { CyclicHierarchyError, ValidationError } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import type { OrgNode, OrgRecord } from '../types';

export class HierarchyGraph {
  private readonly nodes = new Map<string, OrgNode>();
  private readonly parents = new Map<string, string[]>();
  private readonly children = new Map<string, string[]>();
  private edgeCount = 0;

  private constructor() {}

  get size(): number {
    return this.nodes.size;
  }

  get edges(): number {
    return this.edgeCount;
  }

  has(code: string): boolean {
    return this.nodes.has(code);
  }

  node(code: string): OrgNode | undefined {
    return this.nodes.get(code);
  }

  codes(): string[] {
    return [...this.nodes.keys()];
  }

  parentsOf(code: string): readonly string[] {
    return this.parents.get(code) ?? [];
  }

  childrenOf(code: string): readonly string[] {
    return this.children.get(code) ?? [];
  }

  private addNode(node: OrgNode): void {
    this.nodes.set(node.code, node);
    this.parents.set(node.code, []);
    this.children.set(node.code, []);
  }

  private addEdge(parentCode: string, childCode: string): void {
    this.children.get(parentCode)?.push(childCode);
    this.parents.get(childCode)?.push(parentCode);
    this.edgeCount++;
  }

  /**
   * Build and validate the hierarchy. A parent code that no record defines
   * becomes an implicit node with no name and no rank.
   *
   * @throws ValidationError when two records share a code
   * @throws CyclicHierarchyError when the parent relation has a cycle
   */
  static fromRecords(records: readonly OrgRecord[]): HierarchyGraph {
    const graph = new HierarchyGraph();

    const duplicates: string[] = [];
    for (const record of records) {
      if (graph.has(record.code)) {
        duplicates.push(record.code);
        continue;
      }
      graph.addNode({ code: record.code, name: record.name, rank: record.rank, implicit: false });
    }
    if (duplicates.length > 0) {
      throw new ValidationError(
        'Duplicate organization codes',
        duplicates.map((code) => ({ field: 'org_code', message: `Duplicate org code ${code}` })),
      );
    }

    for (const record of records) {
      if (record.parentCode === null) continue;
      if (!graph.has(record.parentCode)) {
        logger.warn('Parent org code not found; adding placeholder node', {
          orgCode: record.code,
          parentCode: record.parentCode,
        });
        graph.addNode({ code: record.parentCode, name: null, rank: null, implicit: true });
      }
      graph.addEdge(record.parentCode, record.code);
    }

    const { blocked } = graph.sortSubgraph();
    if (blocked.length > 0) {
      throw new CyclicHierarchyError(blocked);
    }

    logger.info('Hierarchy graph built', { nodeCount: graph.size, edgeCount: graph.edges });
    return graph;
  }

  /** Orgs with no parent, in insertion order. */
  rootCodes(): string[] {
    return this.codes().filter((code) => this.parentsOf(code).length === 0);
  }

  /**
   * Ancestors of `code`, root first, excluding `code` itself.
   * Unknown codes log an error and yield no ancestors.
   */
  ancestorsTopological(code: string): string[] {
    if (!this.nodes.has(code)) {
      logger.error('Org code not found in hierarchy', { orgCode: code });
      return [];
    }

    const ancestors = new Set<string>();
    const stack = [...this.parentsOf(code)];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || ancestors.has(current)) continue;
      ancestors.add(current);
      stack.push(...this.parentsOf(current));
    }

    return this.sortSubgraph(ancestors).sorted;
  }

  /** Every org below `code`, breadth-first. */
  descendants(code: string): string[] {
    const result: string[] = [];
    const seen = new Set<string>([code]);
    const queue = [...this.childrenOf(code)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      result.push(current);
      queue.push(...this.childrenOf(current));
    }
    return result;
  }

  /**
   * Kahn's algorithm over the subgraph induced by `subset` (the whole graph
   * when omitted). Ties break by insertion order. Returns the sorted codes
   * and whatever could not be sorted because it sits on or below a cycle.
   */
  sortSubgraph(subset?: ReadonlySet<string>): { sorted: string[]; blocked: string[] } {
    const members = subset ? this.codes().filter((c) => subset.has(c)) : this.codes();
    const inside = new Set(members);
    const inDegree = new Map<string, number>();
    for (const code of members) {
      inDegree.set(code, this.parentsOf(code).filter((p) => inside.has(p)).length);
    }

    const ready = members.filter((c) => inDegree.get(c) === 0);
    const sorted: string[] = [];
    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) break;
      sorted.push(current);
      for (const child of this.childrenOf(current)) {
        if (!inside.has(child)) continue;
        const remaining = (inDegree.get(child) ?? 0) - 1;
        inDegree.set(child, remaining);
        if (remaining === 0) ready.push(child);
      }
    }

    const placed = new Set(sorted);
    return { sorted, blocked: members.filter((c) => !placed.has(c)) };
  }
}

// ── Builder ──────────────────────────────────────────────────────────

/** See {@link HierarchyGraph.fromRecords}. */
export function buildHierarchyGraph(records: readonly OrgRecord[]): HierarchyGraph {
  return HierarchyGraph.fromRecords(records);
}
