/**
 * @framestitch/core - structural member graph repair
 *
 * Makes members that cross or touch in plan at the same elevation share
 * nodes, splitting them into children and keeping lineage maps that relate
 * every fragment back to the original (mother) line.
 *
 * ## Entry points
 * - connectLinesAtIntersections: the repair pass; throws on contract violations
 * - repairMemberGraph: validate + repair, returning a RepairResult
 * - parseMemberGraph: records → keyed tables, validated with zod
 *
 * ## Building blocks
 * - num / geom: plan-view vector math, predicates, segment intersection
 * - graph: data model, node deduplication, validation
 * - connect: collector, splitter, augmenter, finalizer, lineage checks
 */

// =============================================================================
// Repair
// =============================================================================
export {
  connectLinesAtIntersections,
  contextFromOptions,
  type ConnectOptions,
  type ConnectResult,
} from './connect/connectLines.js';
export { repairMemberGraph, type RepairOptions } from './repair/repairMemberGraph.js';
export {
  success,
  failure,
  createRepairError,
  mapResult,
  unwrapResult,
  type RepairResult,
  type RepairError,
  type RepairErrorCategory,
  type RepairOperationType,
} from './repair/types.js';

// =============================================================================
// Pipeline stages
// =============================================================================
export {
  collectIntersections,
  initSplitLists,
  type SplitPoint,
  type SplitLists,
  type CollectStats,
} from './connect/collectIntersections.js';
export { buildChildren, sortAndCollapse, type SplitStats } from './connect/splitLines.js';
export { augmentWithExistingSegments } from './connect/augment.js';
export { finalizeMappings } from './connect/finalize.js';
export { resolveMother, childrenOf, verifyLineage } from './connect/lineage.js';

// =============================================================================
// Graph model
// =============================================================================
export type {
  NodeId,
  LineId,
  CrossSectionId,
  MaterialName,
  Node,
  Line,
  Member,
  NodeTable,
  LineTable,
  MemberTable,
  MemberGraph,
  MutableMemberGraph,
  MotherToChildren,
  ChildToMother,
  Lineage,
} from './graph/types.js';
export { MATERIAL_NAMES } from './graph/types.js';
export { GraphContractError, isGraphContractError, type GraphEntityKind } from './graph/errors.js';
export { IdAllocator, maxId } from './graph/idAllocator.js';
export { cloneGraph, getNode, lineGeometry, type LineGeometry } from './graph/tables.js';
export {
  findExistingNode,
  findOrCreateNode,
  mergeDuplicateNodes,
  type MergeNodesResult,
} from './graph/nodes.js';
export {
  validateMemberGraph,
  formatValidationReport,
  type ValidationReport,
  type ValidationIssue,
  type ValidationIssueKind,
  type ValidationSeverity,
  type ValidationOptions,
} from './graph/validate.js';
export {
  parseMemberGraph,
  memberGraphFromRecords,
  memberGraphRecordsSchema,
  type MemberGraphRecords,
  type MemberGraphRecordsInput,
} from './graph/schema.js';

// =============================================================================
// Numeric helpers
// =============================================================================
export { vec2, cross2, type Vec2 } from './num/vec2.js';
export { vec3, type Vec3 } from './num/vec3.js';
export {
  createNumericContext,
  defaultElevationTolerance,
  DEFAULT_LENGTH_TOLERANCE,
  type NumericContext,
  type Tolerances,
} from './num/tolerance.js';
export { collinearXY, paramOnSegmentXY, pointOnSegmentXY } from './num/predicates.js';
export { intersectSegmentsXY, type SegmentHit } from './geom/intersect2d.js';
