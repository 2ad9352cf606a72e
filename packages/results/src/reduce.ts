/**
 * Child → mother reduction
 *
 * The analysis runs on the repaired graph, so its results are keyed by child
 * line. These helpers fold them back onto the original (mother) lines using
 * the lineage produced by the connect pass.
 */

import type { CrossSectionId, LineId, Lineage, Member } from '@framestitch/core';
import { sectionSizeFromName } from './sectionName.js';
import type { CrossSection, GoverningSection } from './types.js';

/**
 * Fold each mother's child values with `pick`
 *
 * Children without a value are skipped; mothers with no valued child are
 * left out of the result.
 */
export function reduceToMothers<T>(
  lineage: Pick<Lineage, 'motherToChildren'>,
  childValues: ReadonlyMap<LineId, T>,
  pick: (best: T, next: T) => T
): Map<LineId, T> {
  const out = new Map<LineId, T>();
  for (const [motherId, children] of lineage.motherToChildren) {
    let best: T | undefined;
    for (const childId of children) {
      const value = childValues.get(childId);
      if (value === undefined) continue;
      best = best === undefined ? value : pick(best, value);
    }
    if (best !== undefined) {
      out.set(motherId, best);
    }
  }
  return out;
}

/**
 * Largest analysed section among each mother's children
 *
 * Ties keep the child listed first.
 */
export function governingSections(
  lineage: Pick<Lineage, 'motherToChildren'>,
  childMembers: ReadonlyMap<LineId, Member>,
  crossSections: ReadonlyMap<CrossSectionId, CrossSection>
): Map<LineId, GoverningSection> {
  const candidates = new Map<LineId, GoverningSection>();
  for (const [motherId, children] of lineage.motherToChildren) {
    for (const childId of children) {
      const member = childMembers.get(childId);
      const crossSection = member ? crossSections.get(member.crossSectionId) : undefined;
      if (!crossSection) continue;
      candidates.set(childId, {
        motherId,
        childId,
        crossSection,
        size: sectionSizeFromName(crossSection.name),
      });
    }
  }
  return reduceToMothers(lineage, candidates, (best, next) => (next.size > best.size ? next : best));
}

/**
 * Mothers none of whose children appear in the analysed members
 */
export function mothersWithoutResults(
  lineage: Pick<Lineage, 'motherToChildren'>,
  childMembers: ReadonlyMap<LineId, Member>
): LineId[] {
  const missing: LineId[] = [];
  for (const [motherId, children] of lineage.motherToChildren) {
    if (!children.some((childId) => childMembers.has(childId))) {
      missing.push(motherId);
    }
  }
  return missing;
}
