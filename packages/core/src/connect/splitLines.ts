/**
 * Line splitter / child builder
 *
 * Turns each line's split list into child lines. A line whose list collapses
 * to its two endpoints is left alone and maps to itself; any other line is
 * replaced by one child per consecutive pair of distinct nodes, and its
 * member is re-created on every child.
 */

import { GraphContractError } from '../graph/errors.js';
import type { IdAllocator } from '../graph/idAllocator.js';
import type { Lineage, LineId, Member, MutableMemberGraph } from '../graph/types.js';
import type { SplitLists, SplitPoint } from './collectIntersections.js';

export interface SplitStats {
  mothersSplit: number;
  childrenCreated: number;
}

/**
 * Sort by parameter, then drop entries that repeat the previous node id
 *
 * The sort is stable, so split points sharing a parameter keep discovery order.
 */
export function sortAndCollapse(points: readonly SplitPoint[]): SplitPoint[] {
  const sorted = [...points].sort((p, q) => p.t - q.t);
  const out: SplitPoint[] = [];
  for (const p of sorted) {
    if (out.length === 0 || out[out.length - 1].nodeId !== p.nodeId) {
      out.push(p);
    }
  }
  return out;
}

/**
 * Remove and return the member sitting on `lineId`
 */
function takeMember(members: MutableMemberGraph['members'], lineId: LineId): Member | null {
  for (const [key, member] of members) {
    if (member.lineId === lineId) {
      members.delete(key);
      return member;
    }
  }
  return null;
}

/**
 * Split every line with interior split points
 *
 * Mutates `graph.lines` and `graph.members`; returns fresh lineage maps with
 * an entry for every line in `splits`.
 *
 * @throws GraphContractError when a member is already stored under a new
 *   child's id
 */
export function buildChildren(
  graph: Pick<MutableMemberGraph, 'lines' | 'members'>,
  splits: SplitLists,
  ids: IdAllocator
): { lineage: Lineage; stats: SplitStats } {
  const motherToChildren: Lineage['motherToChildren'] = new Map();
  const childToMother: Lineage['childToMother'] = new Map();
  const stats: SplitStats = { mothersSplit: 0, childrenCreated: 0 };
  const mothersToRemove: LineId[] = [];

  for (const [lineId, points] of splits) {
    const children: LineId[] = [];
    motherToChildren.set(lineId, children);
    const chain = sortAndCollapse(points);

    if (chain.length <= 2) {
      children.push(lineId);
      childToMother.set(lineId, lineId);
      continue;
    }

    mothersToRemove.push(lineId);
    stats.mothersSplit++;
    const motherMember = takeMember(graph.members, lineId);

    for (let k = 0; k < chain.length - 1; k++) {
      const ni = chain[k].nodeId;
      const nj = chain[k + 1].nodeId;
      if (ni === nj) continue;

      const childId = ids.allocateLineId();
      if (graph.members.has(childId)) {
        throw new GraphContractError(
          'member',
          childId,
          `Member stored under line ${childId} has no line and collides with a new child`
        );
      }
      graph.lines.set(childId, { id: childId, ni, nj });
      children.push(childId);
      childToMother.set(childId, lineId);
      stats.childrenCreated++;

      if (motherMember) {
        graph.members.set(childId, {
          lineId: childId,
          crossSectionId: motherMember.crossSectionId,
          materialName: motherMember.materialName,
        });
      }
    }
  }

  for (const lineId of mothersToRemove) {
    graph.lines.delete(lineId);
  }

  return { lineage: { motherToChildren, childToMother }, stats };
}
