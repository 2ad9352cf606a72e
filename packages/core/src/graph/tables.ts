/**
 * Table helpers: cloning and checked lookups
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import { meanZ, toPlan, vec3 } from '../num/vec3.js';
import { GraphContractError } from './errors.js';
import type {
  Line,
  LineId,
  MemberGraph,
  MutableMemberGraph,
  Node,
  NodeId,
} from './types.js';

/**
 * Deep copy of the three tables, preserving insertion order
 */
export function cloneGraph(graph: MemberGraph): MutableMemberGraph {
  const nodes = new Map<NodeId, Node>();
  for (const [key, n] of graph.nodes) {
    nodes.set(key, { id: n.id, x: n.x, y: n.y, z: n.z });
  }
  const lines = new Map<LineId, Line>();
  for (const [key, l] of graph.lines) {
    lines.set(key, { id: l.id, ni: l.ni, nj: l.nj });
  }
  const members: MutableMemberGraph['members'] = new Map();
  for (const [key, m] of graph.members) {
    members.set(key, {
      lineId: m.lineId,
      crossSectionId: m.crossSectionId,
      materialName: m.materialName,
    });
  }
  return { nodes, lines, members };
}

/**
 * Look up a node a line depends on
 *
 * @throws GraphContractError when the node is missing
 */
export function getNode(nodes: ReadonlyMap<NodeId, Node>, id: NodeId, lineId?: LineId): Node {
  const node = nodes.get(id);
  if (node === undefined) {
    const message =
      lineId === undefined ? `Missing node ${id}` : `Line ${lineId} references missing node ${id}`;
    throw new GraphContractError('node', id, message);
  }
  return node;
}

export function nodePosition(node: Node): Vec3 {
  return vec3(node.x, node.y, node.z);
}

/**
 * Plan endpoints and average elevation of a line
 */
export interface LineGeometry {
  a: Vec2;
  b: Vec2;
  z: number;
}

export function lineGeometry(nodes: ReadonlyMap<NodeId, Node>, line: Line): LineGeometry {
  const start = nodePosition(getNode(nodes, line.ni, line.id));
  const end = nodePosition(getNode(nodes, line.nj, line.id));
  return { a: toPlan(start), b: toPlan(end), z: meanZ(start, end) };
}
