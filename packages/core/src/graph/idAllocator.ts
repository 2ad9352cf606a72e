/**
 * ID Allocator
 *
 * Synthetic node and line ids are handed out from explicit counters owned by
 * a single repair pass, seeded one past the largest id already in the graph.
 * Allocation is strictly ascending in discovery order, which keeps the output
 * reproducible.
 */

import type { LineId, MemberGraph, NodeId } from './types.js';

/**
 * Largest id in a key set, or 0 for an empty one
 */
export function maxId(ids: Iterable<number>): number {
  let max = 0;
  let seen = false;
  for (const id of ids) {
    if (!seen || id > max) {
      max = id;
      seen = true;
    }
  }
  return seen ? max : 0;
}

export class IdAllocator {
  private _nextNodeId: number;
  private _nextLineId: number;

  constructor(start: { node: NodeId; line: LineId }) {
    this._nextNodeId = start.node;
    this._nextLineId = start.line;
  }

  /**
   * Allocator for a graph: max(existing) + 1, or 1 for an empty table
   */
  static forGraph(graph: Pick<MemberGraph, 'nodes' | 'lines'>): IdAllocator {
    return new IdAllocator({
      node: maxId(graph.nodes.keys()) + 1,
      line: maxId(graph.lines.keys()) + 1,
    });
  }

  allocateNodeId(): NodeId {
    return this._nextNodeId++;
  }

  allocateLineId(): LineId {
    return this._nextLineId++;
  }

  /**
   * Next ids that would be handed out (for debugging/testing)
   */
  getState(): { node: NodeId; line: LineId } {
    return { node: this._nextNodeId, line: this._nextLineId };
  }
}
