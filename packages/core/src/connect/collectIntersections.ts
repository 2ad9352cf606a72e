/**
 * Intersection collector
 *
 * Every unordered pair of lines at the same elevation is intersected in plan.
 * Each hit resolves to a node (existing within tolerance, or new) and is
 * appended to both lines' split lists. The scan is a plain O(n²) loop over
 * the line table.
 */

import type { NumericContext } from '../num/tolerance.js';
import { sameElevation } from '../num/tolerance.js';
import { vec3 } from '../num/vec3.js';
import { intersectSegmentsXY } from '../geom/intersect2d.js';
import type { IdAllocator } from '../graph/idAllocator.js';
import { findOrCreateNode } from '../graph/nodes.js';
import type { LineGeometry } from '../graph/tables.js';
import { lineGeometry } from '../graph/tables.js';
import type { Line, LineId, NodeId, NodeTable } from '../graph/types.js';

/**
 * A node a line passes through, at parameter t along ni→nj
 */
export interface SplitPoint {
  t: number;
  nodeId: NodeId;
}

export type SplitLists = Map<LineId, SplitPoint[]>;

export interface CollectStats {
  /** Pairs that passed the elevation check */
  pairsTested: number;
  /** Pairs whose plan projections intersect */
  hits: number;
  /** Synthetic nodes added to the node table */
  nodesCreated: number;
}

/**
 * Split lists seeded with each line's own endpoints at t = 0 and t = 1
 */
export function initSplitLists(lines: ReadonlyMap<LineId, Line>): SplitLists {
  const splits: SplitLists = new Map();
  for (const [id, line] of lines) {
    splits.set(id, [
      { t: 0, nodeId: line.ni },
      { t: 1, nodeId: line.nj },
    ]);
  }
  return splits;
}

/**
 * Collect plan intersections between all same-elevation line pairs
 *
 * Extends `nodes` with synthetic nodes and `splits` with the split points
 * found. Line geometry is read before any node is added.
 */
export function collectIntersections(
  nodes: NodeTable,
  lines: ReadonlyMap<LineId, Line>,
  splits: SplitLists,
  ctx: NumericContext,
  ids: IdAllocator
): CollectStats {
  const stats: CollectStats = { pairsTested: 0, hits: 0, nodesCreated: 0 };

  const entries: Array<{ id: LineId; geom: LineGeometry }> = [];
  for (const [id, line] of lines) {
    entries.push({ id, geom: lineGeometry(nodes, line) });
  }

  for (let i = 0; i < entries.length; i++) {
    const li = entries[i];
    for (let j = i + 1; j < entries.length; j++) {
      const lj = entries[j];
      if (!sameElevation(li.geom.z, lj.geom.z, ctx)) {
        continue;
      }
      stats.pairsTested++;

      const hit = intersectSegmentsXY(li.geom.a, li.geom.b, lj.geom.a, lj.geom.b, ctx.tol.length);
      if (!hit) {
        continue;
      }
      stats.hits++;

      const z = (li.geom.z + lj.geom.z) * 0.5;
      const before = nodes.size;
      const nodeId = findOrCreateNode(nodes, vec3(hit.point[0], hit.point[1], z), ctx.tol.length, ids);
      if (nodes.size > before) {
        stats.nodesCreated++;
      }

      splitListOf(splits, li.id).push({ t: hit.t, nodeId });
      splitListOf(splits, lj.id).push({ t: hit.u, nodeId });
    }
  }

  return stats;
}

function splitListOf(splits: SplitLists, id: LineId): SplitPoint[] {
  let list = splits.get(id);
  if (!list) {
    list = [];
    splits.set(id, list);
  }
  return list;
}
