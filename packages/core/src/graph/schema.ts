/**
 * Member graph record schemas
 *
 * Zod schemas for the plain records an upstream parser hands over (arrays of
 * nodes, lines and members), and the conversion into keyed tables.
 */

import { z } from 'zod';
import type { RepairResult } from '../repair/types.js';
import { createRepairError, failure, success } from '../repair/types.js';
import type { Line, LineId, Member, MemberGraph, Node, NodeId } from './types.js';
import { MATERIAL_NAMES } from './types.js';

// ============================================================================
// Record Schemas
// ============================================================================

const idField = z.number().int();

export const nodeRecordSchema = z.object({
  id: idField,
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const lineRecordSchema = z.object({
  id: idField,
  ni: idField,
  nj: idField,
});

export const memberRecordSchema = z.object({
  lineId: idField,
  crossSectionId: idField,
  materialName: z.enum(MATERIAL_NAMES),
});

/**
 * Positions of ids already seen earlier in the list
 */
function duplicateIndices(ids: number[]): number[] {
  const seen = new Set<number>();
  const dupes: number[] = [];
  ids.forEach((id, index) => {
    if (seen.has(id)) {
      dupes.push(index);
    }
    seen.add(id);
  });
  return dupes;
}

export const memberGraphRecordsSchema = z
  .object({
    nodes: z.array(nodeRecordSchema),
    lines: z.array(lineRecordSchema),
    members: z.array(memberRecordSchema).default([]),
  })
  .superRefine((records, ctx) => {
    const tables = [
      { path: 'nodes', label: 'node id', ids: records.nodes.map((n) => n.id) },
      { path: 'lines', label: 'line id', ids: records.lines.map((l) => l.id) },
      { path: 'members', label: 'member for line', ids: records.members.map((m) => m.lineId) },
    ];
    for (const { path, label, ids } of tables) {
      for (const index of duplicateIndices(ids)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate ${label} ${ids[index]}`,
          path: [path, index],
        });
      }
    }
  });

// ============================================================================
// Types
// ============================================================================

export type MemberGraphRecordsInput = z.input<typeof memberGraphRecordsSchema>;
export type MemberGraphRecords = z.output<typeof memberGraphRecordsSchema>;

// ============================================================================
// Conversion
// ============================================================================

/**
 * Keyed tables from validated records, keeping record order
 */
export function memberGraphFromRecords(records: MemberGraphRecords): MemberGraph {
  return {
    nodes: new Map<NodeId, Node>(records.nodes.map((n) => [n.id, { ...n }])),
    lines: new Map<LineId, Line>(records.lines.map((l) => [l.id, { ...l }])),
    members: new Map<LineId, Member>(records.members.map((m) => [m.lineId, { ...m }])),
  };
}

/**
 * Validate raw records and build a member graph
 *
 * Only shape, finiteness and id uniqueness are checked here; references
 * between tables are checked by `validateMemberGraph`.
 */
export function parseMemberGraph(raw: unknown): RepairResult<MemberGraph> {
  const parsed = memberGraphRecordsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`
    );
    return failure(
      createRepairError('invalidInput', `Member graph records are malformed`, 'parse', { issues })
    );
  }
  return success(memberGraphFromRecords(parsed.data));
}
