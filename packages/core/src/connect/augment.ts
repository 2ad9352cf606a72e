/**
 * Pre-existing-segment augmenter
 *
 * Attaches lines that already lie along a mother's span (a shorter duplicate
 * drawn over a longer member, say) to that mother's lineage. Such overlaps are
 * collinear, so the collector never reports them as intersections. Only the
 * lineage maps change.
 */

import type { NumericContext } from '../num/tolerance.js';
import { sameElevation } from '../num/tolerance.js';
import { lengthSq2, sub2 } from '../num/vec2.js';
import { collinearXY, pointOnSegmentXY } from '../num/predicates.js';
import type { LineGeometry } from '../graph/tables.js';
import { lineGeometry } from '../graph/tables.js';
import type { Line, LineId, Lineage, Node, NodeId } from '../graph/types.js';

/**
 * A line can be adopted only while it is an untouched original that owns
 * nothing but itself.
 */
function isUnclaimed(lineage: Lineage, lineId: LineId): boolean {
  const children = lineage.motherToChildren.get(lineId);
  return (
    lineage.childToMother.get(lineId) === lineId &&
    children !== undefined &&
    children.length === 1 &&
    children[0] === lineId
  );
}

function liesWithin(mother: LineGeometry, cand: LineGeometry, ctx: NumericContext): boolean {
  const tol = ctx.tol.length;
  if (!sameElevation(mother.z, cand.z, ctx)) {
    return false;
  }
  if (!collinearXY(mother.a, mother.b, cand.a, tol) || !collinearXY(mother.a, mother.b, cand.b, tol)) {
    return false;
  }
  return pointOnSegmentXY(mother.a, mother.b, cand.a, tol) && pointOnSegmentXY(mother.a, mother.b, cand.b, tol);
}

/**
 * Attach sub-segments to the mothers whose span contains them
 *
 * Mothers are scanned in lineage order and measured on their original
 * geometry, so a mother that was split still adopts segments. The first
 * mother to claim a line keeps it; a claimed line's own entry is emptied and
 * it adopts nothing itself. Zero-length mothers adopt nothing.
 *
 * @returns number of lines adopted
 */
export function augmentWithExistingSegments(
  originalLines: ReadonlyMap<LineId, Line>,
  nodes: ReadonlyMap<NodeId, Node>,
  lines: ReadonlyMap<LineId, Line>,
  lineage: Lineage,
  ctx: NumericContext
): number {
  const { motherToChildren, childToMother } = lineage;
  const minLengthSq = ctx.tol.length * ctx.tol.length;

  const candidates: Array<{ id: LineId; geom: LineGeometry }> = [];
  for (const [id, line] of lines) {
    candidates.push({ id, geom: lineGeometry(nodes, line) });
  }

  let adopted = 0;
  for (const [motherId, children] of motherToChildren) {
    const owner = childToMother.get(motherId);
    if (owner !== undefined && owner !== motherId) {
      continue;
    }
    const original = originalLines.get(motherId);
    if (!original) {
      continue;
    }
    const span = lineGeometry(nodes, original);
    if (lengthSq2(sub2(span.b, span.a)) <= minLengthSq) {
      continue;
    }

    for (const cand of candidates) {
      if (cand.id === motherId || !isUnclaimed(lineage, cand.id)) {
        continue;
      }
      if (!liesWithin(span, cand.geom, ctx)) {
        continue;
      }
      children.push(cand.id);
      childToMother.set(cand.id, motherId);
      motherToChildren.set(cand.id, []);
      adopted++;
    }
  }

  return adopted;
}
