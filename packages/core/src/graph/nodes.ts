/**
 * Node deduplication
 *
 * Synthetic intersection points are snapped onto an existing node when one
 * lies within tolerance on every axis. Original nodes are never merged here;
 * `mergeDuplicateNodes` is the separate pre-pass for exact duplicates in the
 * source model.
 */

import type { Vec3 } from '../num/vec3.js';
import { eq3 } from '../num/tolerance.js';
import { IdAllocator, maxId } from './idAllocator.js';
import { cloneGraph, nodePosition } from './tables.js';
import type { Line, MemberGraph, MutableMemberGraph, Node, NodeId, NodeTable } from './types.js';

/**
 * First node (in table order) within `tol` of `point` on x, y and z
 */
export function findExistingNode(
  nodes: ReadonlyMap<NodeId, Node>,
  point: Vec3,
  tol: number
): NodeId | null {
  for (const [id, node] of nodes) {
    if (eq3(nodePosition(node), point, tol)) {
      return id;
    }
  }
  return null;
}

/**
 * Locate or create a node at `point`
 *
 * New ids come from `ids` when given, otherwise max(existing) + 1 (1 for an
 * empty table). The node table is extended in place.
 */
export function findOrCreateNode(
  nodes: NodeTable,
  point: Vec3,
  tol: number,
  ids?: IdAllocator
): NodeId {
  const existing = findExistingNode(nodes, point, tol);
  if (existing !== null) {
    return existing;
  }
  const id = ids ? ids.allocateNodeId() : maxId(nodes.keys()) + 1;
  nodes.set(id, { id, x: point[0], y: point[1], z: point[2] });
  return id;
}

export interface MergeNodesResult {
  graph: MutableMemberGraph;
  /** Removed node id → node id kept in its place */
  replacements: Map<NodeId, NodeId>;
}

/**
 * Collapse nodes with identical coordinates onto the smallest id
 *
 * Line references to a removed node are rewritten to the kept one. The input
 * graph is not modified.
 */
export function mergeDuplicateNodes(graph: MemberGraph): MergeNodesResult {
  const out = cloneGraph(graph);

  const byPosition = new Map<string, NodeId[]>();
  for (const [id, node] of out.nodes) {
    const key = `${node.x},${node.y},${node.z}`;
    const bucket = byPosition.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      byPosition.set(key, [id]);
    }
  }

  const replacements = new Map<NodeId, NodeId>();
  for (const ids of byPosition.values()) {
    if (ids.length < 2) continue;
    const kept = Math.min(...ids);
    for (const id of ids) {
      if (id !== kept) {
        replacements.set(id, kept);
      }
    }
  }

  const remap = (line: Line): Line => ({
    id: line.id,
    ni: replacements.get(line.ni) ?? line.ni,
    nj: replacements.get(line.nj) ?? line.nj,
  });
  for (const [key, line] of out.lines) {
    out.lines.set(key, remap(line));
  }
  for (const id of replacements.keys()) {
    out.nodes.delete(id);
  }

  return { graph: out, replacements };
}
