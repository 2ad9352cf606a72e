/**
 * Write governing sections back onto mother members
 */

import type { LineId, Member } from '@framestitch/core';
import type { GoverningSection, ResultsOptions } from './types.js';

export interface WriteBackResult {
  /** Copy of the mother member table with governing sections applied */
  members: Map<LineId, Member>;
  /** Mothers whose member received a governing section */
  updated: number;
  /** Mother members with no governing section */
  missing: LineId[];
}

/**
 * Set each mother member's cross section to its governing one
 *
 * Governing entries for mothers without a member are ignored. The input
 * table is not modified.
 */
export function applyGoverningSections(
  motherMembers: ReadonlyMap<LineId, Member>,
  governing: ReadonlyMap<LineId, GoverningSection>,
  options: ResultsOptions = {}
): WriteBackResult {
  const members = new Map<LineId, Member>();
  const missing: LineId[] = [];
  let updated = 0;

  for (const [lineId, member] of motherMembers) {
    const section = governing.get(lineId);
    if (!section) {
      members.set(lineId, { ...member });
      missing.push(lineId);
      continue;
    }
    members.set(lineId, { ...member, crossSectionId: section.crossSection.id });
    updated++;
    if (options.verbose) {
      console.log(
        `[results] mother ${lineId}: section ${member.crossSectionId} -> ${section.crossSection.id} ` +
          `(${section.crossSection.name}, from child ${section.childId})`
      );
    }
  }

  if (options.verbose) {
    console.log(`[results] updated ${updated} mothers from their governing child`);
    if (missing.length > 0) {
      console.log(`[results] ${missing.length} mothers without analysed children: ${missing.join(', ')}`);
    }
  }

  return { members, updated, missing };
}
