/**
 * @framestitch/results - analysis results back on the original model
 *
 * The analysis sees the repaired graph; the model the user edits has the
 * original (mother) lines. This package reduces per-child results onto
 * mothers through the lineage maps and writes the governing section back.
 */

export type { CrossSection, GoverningSection, ResultsOptions } from './types.js';
export { sectionSizeFromName } from './sectionName.js';
export { reduceToMothers, governingSections, mothersWithoutResults } from './reduce.js';
export { applyGoverningSections, type WriteBackResult } from './writeBack.js';
