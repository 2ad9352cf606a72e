/**
 * Analysis result types
 */

import type { CrossSectionId, LineId } from '@framestitch/core';

/**
 * A cross section from the analysis catalogue
 */
export interface CrossSection {
  id: CrossSectionId;
  /** Catalogue name, e.g. `HEA 200` or `RHS 100x50x6` */
  name: string;
}

/**
 * Governing section chosen for a mother line from its children
 */
export interface GoverningSection {
  motherId: LineId;
  /** Child whose section won */
  childId: LineId;
  crossSection: CrossSection;
  /** Rank of the section, from its name */
  size: number;
}

export interface ResultsOptions {
  /** Enable verbose logging */
  verbose?: boolean;
}
