/**
 * Mapping finalizer
 */

import type { Line, LineId, Lineage } from '../graph/types.js';

/**
 * Give every original line a lineage entry
 *
 * A missing entry becomes an empty list; an empty entry for a line that is
 * still in the table and not owned by another mother maps to itself.
 */
export function finalizeMappings(
  originalLines: ReadonlyMap<LineId, Line>,
  lines: ReadonlyMap<LineId, Line>,
  lineage: Lineage
): void {
  const { motherToChildren, childToMother } = lineage;
  for (const lineId of originalLines.keys()) {
    let children = motherToChildren.get(lineId);
    if (!children) {
      children = [];
      motherToChildren.set(lineId, children);
    }
    if (children.length === 0 && lines.has(lineId) && !childToMother.has(lineId)) {
      children.push(lineId);
      childToMother.set(lineId, lineId);
    }
  }
}
