/**
 * Lineage queries and consistency checks
 */

import type { Line, LineId, Lineage } from '../graph/types.js';

/**
 * Original line a line belongs to, or null when it has no lineage
 */
export function resolveMother(lineage: Lineage, lineId: LineId): LineId | null {
  return lineage.childToMother.get(lineId) ?? null;
}

/**
 * Lines that make up an original line; empty for an unknown id
 */
export function childrenOf(lineage: Lineage, motherId: LineId): readonly LineId[] {
  return lineage.motherToChildren.get(motherId) ?? [];
}

/**
 * Check coverage and partition of a lineage against the line tables
 *
 * @returns one message per violation; empty when consistent
 */
export function verifyLineage(
  lineage: Lineage,
  originalLines: ReadonlyMap<LineId, Line>,
  lines: ReadonlyMap<LineId, Line>
): string[] {
  const problems: string[] = [];
  const { motherToChildren, childToMother } = lineage;

  for (const lineId of originalLines.keys()) {
    if (!motherToChildren.has(lineId)) {
      problems.push(`original line ${lineId} has no lineage entry`);
    }
  }

  const owners = new Map<LineId, LineId[]>();
  for (const [motherId, children] of motherToChildren) {
    for (const child of children) {
      const list = owners.get(child);
      if (list) {
        list.push(motherId);
      } else {
        owners.set(child, [motherId]);
      }
    }
  }

  for (const lineId of lines.keys()) {
    const mothers = owners.get(lineId) ?? [];
    if (mothers.length !== 1) {
      problems.push(`line ${lineId} is listed under ${mothers.length} mothers`);
      continue;
    }
    if (childToMother.get(lineId) !== mothers[0]) {
      problems.push(`line ${lineId} resolves to ${childToMother.get(lineId)} but is listed under ${mothers[0]}`);
    }
  }

  for (const [child, motherId] of childToMother) {
    if (!childrenOf(lineage, motherId).includes(child)) {
      problems.push(`line ${child} points at mother ${motherId} which does not list it`);
    }
  }

  return problems;
}
