/**
 * Contract violations
 *
 * Raised when the graph handed to the pipeline breaks a precondition the
 * upstream parser is expected to guarantee, e.g. a line pointing at a node
 * that does not exist. These abort the whole computation.
 */

export type GraphEntityKind = 'node' | 'line' | 'member';

export class GraphContractError extends Error {
  readonly entity: GraphEntityKind;
  readonly entityId: number;

  constructor(entity: GraphEntityKind, entityId: number, message: string) {
    super(message);
    this.name = 'GraphContractError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export function isGraphContractError(err: unknown): err is GraphContractError {
  return err instanceof GraphContractError;
}
