/**
 * Endpoint definition errors
 */

/**
 * An entity.json file that does not describe a usable endpoint
 */
export class EndpointDefinitionError extends Error {
  readonly code: string = 'INVALID_DEFINITION';
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = 'EndpointDefinitionError';
    this.source = source;
  }
}

export type CompositeDefinitionReason =
  | 'duplicate-step'
  | 'unknown-dependency'
  | 'multiple-predecessors'
  | 'dependency-cycle'
  | 'missing-array-property';

/**
 * A composite whose step graph cannot be executed
 */
export class CompositeDefinitionError extends EndpointDefinitionError {
  override readonly code: string = 'INVALID_COMPOSITE';
  readonly reason: CompositeDefinitionReason;
  readonly stepName?: string;

  constructor(message: string, reason: CompositeDefinitionReason, stepName?: string) {
    super(message);
    this.name = 'CompositeDefinitionError';
    this.reason = reason;
    this.stepName = stepName;
  }
}

/**
 * Type guard for CompositeDefinitionError
 */
export function isCompositeDefinitionError(error: unknown): error is CompositeDefinitionError {
  return error instanceof CompositeDefinitionError;
}
