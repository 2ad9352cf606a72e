/**
 * Checked repair entry point
 *
 * Validates the graph, then connects it. Input the connect pass would reject
 * comes back as a failed RepairResult instead of a GraphContractError; on
 * failure no partial output is returned.
 */

import type { ConnectOptions, ConnectResult } from '../connect/connectLines.js';
import { connectLinesAtIntersections } from '../connect/connectLines.js';
import type { MemberGraph } from '../graph/types.js';
import type { ValidationOptions } from '../graph/validate.js';
import { formatValidationReport, validateMemberGraph } from '../graph/validate.js';
import type { RepairResult } from './types.js';
import { createRepairError, failure, success } from './types.js';

export interface RepairOptions extends ConnectOptions {
  validation?: ValidationOptions;
}

export function repairMemberGraph(
  graph: MemberGraph,
  options: RepairOptions = {}
): RepairResult<ConnectResult> {
  const { validation, ...connectOptions } = options;

  for (const [name, value] of [
    ['tol', options.tol],
    ['elevationTol', options.elevationTol],
  ] as const) {
    if (value !== undefined && !(Number.isFinite(value) && value >= 0)) {
      return failure(
        createRepairError('invalidOptions', `${name} must be a finite, non-negative number`, 'validate', {
          details: { [name]: value },
        })
      );
    }
  }

  const report = validateMemberGraph(graph, validation);
  if (!report.isValid) {
    if (options.verbose) {
      console.log(`[connect] input rejected:\n${formatValidationReport(report)}`);
    }
    return failure(
      createRepairError(
        'invalidInput',
        `Member graph failed validation with ${report.errorCount} error(s)`,
        'validate',
        { validationReport: report }
      )
    );
  }
  const warnings = report.issues
    .filter((issue) => issue.severity === 'warning')
    .map((issue) => issue.message);

  return success(connectLinesAtIntersections(graph, connectOptions), warnings);
}
