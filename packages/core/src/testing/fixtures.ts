/**
 * Compact graph builders for tests
 */

import type {
  CrossSectionId,
  LineId,
  MaterialName,
  MemberGraph,
  NodeId,
} from '../graph/types.js';

export type NodeRow = [id: NodeId, x: number, y: number, z: number];
export type LineRow = [id: LineId, ni: NodeId, nj: NodeId];
export type MemberRow = [lineId: LineId, crossSectionId: CrossSectionId, materialName: MaterialName];

export function makeGraph(nodes: NodeRow[], lines: LineRow[], members: MemberRow[] = []): MemberGraph {
  return {
    nodes: new Map(nodes.map(([id, x, y, z]) => [id, { id, x, y, z }])),
    lines: new Map(lines.map(([id, ni, nj]) => [id, { id, ni, nj }])),
    members: new Map(
      members.map(([lineId, crossSectionId, materialName]) => [
        lineId,
        { lineId, crossSectionId, materialName },
      ])
    ),
  };
}

/**
 * Two diagonals of the 10×10 square crossing at (5, 5, 0)
 */
export function crossingDiagonals(z2 = 0): MemberGraph {
  return makeGraph(
    [
      [1, 0, 0, 0],
      [2, 10, 10, 0],
      [3, 0, 10, z2],
      [4, 10, 0, z2],
    ],
    [
      [1, 1, 2],
      [2, 3, 4],
    ],
    [
      [1, 7, 'Steel'],
      [2, 3, 'Concrete'],
    ]
  );
}
