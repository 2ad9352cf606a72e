/**
 * Connect lines at intersections
 *
 * Entry point of the repair pass: copy the graph, collect plan intersections
 * per elevation, split mothers into children, adopt pre-existing
 * sub-segments, then make sure every original line has a lineage entry.
 */

import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext, DEFAULT_LENGTH_TOLERANCE } from '../num/tolerance.js';
import { IdAllocator } from '../graph/idAllocator.js';
import { cloneGraph } from '../graph/tables.js';
import type { Lineage, MemberGraph, MutableMemberGraph } from '../graph/types.js';
import { collectIntersections, initSplitLists } from './collectIntersections.js';
import { buildChildren } from './splitLines.js';
import { augmentWithExistingSegments } from './augment.js';
import { finalizeMappings } from './finalize.js';

export interface ConnectOptions {
  /** Length tolerance for coordinates, collinearity and parameters. Default: 1e-6 */
  tol?: number;
  /** Elevation tolerance. Default: max(tol, 10 * tol) */
  elevationTol?: number;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Repaired tables plus lineage. All tables are owned by the caller.
 */
export interface ConnectResult extends MutableMemberGraph, Lineage {}

export function contextFromOptions(options: ConnectOptions): NumericContext {
  return createNumericContext({
    length: options.tol ?? DEFAULT_LENGTH_TOLERANCE,
    elevation: options.elevationTol,
  });
}

/**
 * Split lines that cross or touch in plan at the same elevation so they
 * share nodes
 *
 * The input graph is never modified.
 *
 * @throws GraphContractError when a line references a missing node, or a
 *   member is stored under an id a new child line takes
 */
export function connectLinesAtIntersections(
  graph: MemberGraph,
  options: ConnectOptions = {}
): ConnectResult {
  const ctx = contextFromOptions(options);
  const work = cloneGraph(graph);
  const ids = IdAllocator.forGraph(work);

  const splits = initSplitLists(work.lines);
  const collected = collectIntersections(work.nodes, work.lines, splits, ctx, ids);
  if (options.verbose) {
    console.log(
      `[connect] ${collected.hits} intersections in ${collected.pairsTested} same-elevation pairs, ` +
        `${collected.nodesCreated} nodes created`
    );
  }

  const { lineage, stats } = buildChildren(work, splits, ids);
  if (options.verbose) {
    console.log(`[connect] split ${stats.mothersSplit} lines into ${stats.childrenCreated} children`);
  }

  const adopted = augmentWithExistingSegments(graph.lines, work.nodes, work.lines, lineage, ctx);
  if (options.verbose && adopted > 0) {
    console.log(`[connect] attached ${adopted} existing sub-segments to their mothers`);
  }

  finalizeMappings(graph.lines, work.lines, lineage);

  return {
    nodes: work.nodes,
    lines: work.lines,
    members: work.members,
    motherToChildren: lineage.motherToChildren,
    childToMother: lineage.childToMother,
  };
}
