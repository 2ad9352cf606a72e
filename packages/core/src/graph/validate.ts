/**
 * Member graph validation
 *
 * Detects the input problems the connect pipeline treats as contract
 * violations (dangling references, mismatched keys) and reports geometry the
 * connect pass only skips (zero-length lines, non-finite coordinates) as
 * warnings.
 */

import type { GraphEntityKind } from './errors.js';
import type { MemberGraph } from './types.js';

/**
 * Types of validation issues
 */
export type ValidationIssueKind =
  | 'keyMismatch'
  | 'nonFiniteCoordinate'
  | 'danglingNode'
  | 'danglingLine'
  | 'degenerateLine'
  | 'duplicateNodePosition';

/**
 * Severity levels for validation issues
 */
export type ValidationSeverity = 'error' | 'warning' | 'info';

export interface ValidationEntityRef {
  type: GraphEntityKind;
  id: number;
}

/**
 * A single validation issue
 */
export interface ValidationIssue {
  kind: ValidationIssueKind;
  severity: ValidationSeverity;
  message: string;
  /** The entity where the issue was found */
  subject: ValidationEntityRef;
  /** Related entities involved in the issue */
  related?: ValidationEntityRef[];
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  /** Whether the graph is usable (no errors) */
  isValid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

export interface ValidationOptions {
  /** Report zero-length lines (warning). Default: true */
  checkDegenerate?: boolean;
  /** Report distinct nodes sharing identical coordinates (info). Default: false */
  checkDuplicateNodes?: boolean;
}

const DEFAULT_OPTIONS: Required<ValidationOptions> = {
  checkDegenerate: true,
  checkDuplicateNodes: false,
};

function createReport(): ValidationReport {
  return {
    isValid: true,
    issues: [],
    errorCount: 0,
    warningCount: 0,
    infoCount: 0,
  };
}

function addIssue(
  report: ValidationReport,
  kind: ValidationIssueKind,
  severity: ValidationSeverity,
  message: string,
  subject: ValidationEntityRef,
  related?: ValidationEntityRef[]
): void {
  report.issues.push({ kind, severity, message, subject, related });

  if (severity === 'error') {
    report.errorCount++;
    report.isValid = false;
  } else if (severity === 'warning') {
    report.warningCount++;
  } else {
    report.infoCount++;
  }
}

/**
 * Validate a member graph before repair
 */
export function validateMemberGraph(
  graph: MemberGraph,
  options: ValidationOptions = {}
): ValidationReport {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const report = createReport();

  for (const [key, node] of graph.nodes) {
    if (key !== node.id) {
      addIssue(report, 'keyMismatch', 'error', `Node stored under key ${key} has id ${node.id}`, {
        type: 'node',
        id: key,
      });
    }
    if (!Number.isFinite(node.x) || !Number.isFinite(node.y) || !Number.isFinite(node.z)) {
      addIssue(report, 'nonFiniteCoordinate', 'warning', `Node ${node.id} has a non-finite coordinate`, {
        type: 'node',
        id: node.id,
      });
    }
  }

  for (const [key, line] of graph.lines) {
    if (key !== line.id) {
      addIssue(report, 'keyMismatch', 'error', `Line stored under key ${key} has id ${line.id}`, {
        type: 'line',
        id: key,
      });
    }
    for (const nodeId of [line.ni, line.nj]) {
      if (!graph.nodes.has(nodeId)) {
        addIssue(
          report,
          'danglingNode',
          'error',
          `Line ${line.id} references missing node ${nodeId}`,
          { type: 'line', id: line.id },
          [{ type: 'node', id: nodeId }]
        );
      }
    }
    const ni = graph.nodes.get(line.ni);
    const nj = graph.nodes.get(line.nj);
    if (opts.checkDegenerate && ni && nj && ni.x === nj.x && ni.y === nj.y && ni.z === nj.z) {
      addIssue(report, 'degenerateLine', 'warning', `Line ${line.id} has zero length`, {
        type: 'line',
        id: line.id,
      });
    }
  }

  for (const [key, member] of graph.members) {
    if (key !== member.lineId) {
      addIssue(
        report,
        'keyMismatch',
        'error',
        `Member stored under line ${key} points at line ${member.lineId}`,
        { type: 'member', id: key }
      );
    }
    if (!graph.lines.has(member.lineId)) {
      addIssue(
        report,
        'danglingLine',
        'error',
        `Member references missing line ${member.lineId}`,
        { type: 'member', id: key },
        [{ type: 'line', id: member.lineId }]
      );
    }
  }

  if (opts.checkDuplicateNodes) {
    const firstAt = new Map<string, number>();
    for (const node of graph.nodes.values()) {
      const pos = `${node.x},${node.y},${node.z}`;
      const first = firstAt.get(pos);
      if (first === undefined) {
        firstAt.set(pos, node.id);
      } else {
        addIssue(
          report,
          'duplicateNodePosition',
          'info',
          `Node ${node.id} coincides with node ${first}`,
          { type: 'node', id: node.id },
          [{ type: 'node', id: first }]
        );
      }
    }
  }

  return report;
}

/**
 * One line per issue, for logs and error messages
 */
export function formatValidationReport(report: ValidationReport): string {
  if (report.issues.length === 0) {
    return 'no issues';
  }
  return report.issues.map((issue) => `${issue.severity}: ${issue.message}`).join('\n');
}
