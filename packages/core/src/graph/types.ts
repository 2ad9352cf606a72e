/**
 * Structural member graph types
 *
 * A member graph is three keyed tables exported from the authoring tool:
 * nodes (points in 3D), lines (connectors between two nodes) and members
 * (section/material attributes attached to a line). Lines hold node ids, not
 * node values; the node table is shared read-only by every line.
 */

export type NodeId = number;
export type LineId = number;
export type CrossSectionId = number;

export const MATERIAL_NAMES = ['Steel', 'Concrete'] as const;

export type MaterialName = (typeof MATERIAL_NAMES)[number];

/**
 * A point in model space. z is the elevation.
 */
export interface Node {
  id: NodeId;
  x: number;
  y: number;
  z: number;
}

/**
 * A straight connector between two nodes
 */
export interface Line {
  id: LineId;
  /** Start node */
  ni: NodeId;
  /** End node */
  nj: NodeId;
}

/**
 * Analysis attributes of the line a member sits on
 */
export interface Member {
  lineId: LineId;
  crossSectionId: CrossSectionId;
  materialName: MaterialName;
}

export type NodeTable = Map<NodeId, Node>;
export type LineTable = Map<LineId, Line>;
/** Members keyed by the id of the line they sit on */
export type MemberTable = Map<LineId, Member>;

/**
 * Caller-supplied graph. Never mutated by this package.
 */
export interface MemberGraph {
  nodes: ReadonlyMap<NodeId, Node>;
  lines: ReadonlyMap<LineId, Line>;
  members: ReadonlyMap<LineId, Member>;
}

/**
 * Owned working copy of a graph
 */
export interface MutableMemberGraph {
  nodes: NodeTable;
  lines: LineTable;
  members: MemberTable;
}

/**
 * Original line id → ids of the lines that make it up after repair
 */
export type MotherToChildren = Map<LineId, LineId[]>;

/**
 * Line id → id of the original line that owns it
 */
export type ChildToMother = Map<LineId, LineId>;

/**
 * Bidirectional index between original lines and their fragments
 */
export interface Lineage {
  motherToChildren: MotherToChildren;
  childToMother: ChildToMother;
}
