/**
 * Composite step errors
 *
 * Every step error is terminal for the composite request; none is retried.
 */

export type CompositeErrorKind =
  | 'StepNotFound'
  | 'TemplateReferenceUnresolved'
  | 'MalformedInputDocument'
  | 'BackendCallFailed';

/**
 * Base class for failures attributed to one step
 */
export class CompositeStepError extends Error {
  readonly kind: CompositeErrorKind;
  readonly stepName: string;
  /** Element of an array step being processed */
  elementIndex?: number;

  constructor(kind: CompositeErrorKind, stepName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompositeStepError';
    this.kind = kind;
    this.stepName = stepName;
  }
}

/**
 * A step's target endpoint has no directory entry
 */
export class StepNotFoundError extends CompositeStepError {
  readonly endpointName: string;

  constructor(stepName: string, endpointName: string) {
    super('StepNotFound', stepName, `Endpoint "${endpointName}" for step "${stepName}" was not found`);
    this.name = 'StepNotFoundError';
    this.endpointName = endpointName;
  }
}

/**
 * A `$prev` or `$context` expression that does not resolve
 */
export class TemplateReferenceUnresolvedError extends CompositeStepError {
  readonly expression: string;
  readonly field: string;

  constructor(stepName: string, field: string, expression: string, reason: string) {
    super(
      'TemplateReferenceUnresolved',
      stepName,
      `Cannot resolve "${expression}" for field "${field}" in step "${stepName}": ${reason}`
    );
    this.name = 'TemplateReferenceUnresolvedError';
    this.expression = expression;
    this.field = field;
  }
}

/**
 * Request body, sourceProperty or arrayProperty not usable for a step
 */
export class MalformedInputDocumentError extends CompositeStepError {
  constructor(stepName: string, message: string) {
    super('MalformedInputDocument', stepName, message);
    this.name = 'MalformedInputDocumentError';
  }
}

/**
 * Details of a failed backend call
 */
export interface BackendFailure {
  /** Absent for transport failures */
  status?: number;
  detail: string;
  responseBody?: string;
  structuredError?: unknown;
}

/**
 * Backend answered with a non-success status, or no response at all
 */
export class BackendCallFailedError extends CompositeStepError {
  readonly failure: BackendFailure;

  constructor(stepName: string, message: string, failure: BackendFailure, options?: { cause?: unknown }) {
    super('BackendCallFailed', stepName, message, options);
    this.name = 'BackendCallFailedError';
    this.failure = failure;
  }
}

/**
 * The caller went away; no result is produced
 */
export class CompositeCancelledError extends Error {
  readonly code = 'COMPOSITE_CANCELLED';
  readonly completedSteps: readonly string[];

  constructor(compositeName: string, completedSteps: readonly string[], options?: { cause?: unknown }) {
    super(`Composite "${compositeName}" was cancelled`, options);
    this.name = 'CompositeCancelledError';
    this.completedSteps = completedSteps;
  }
}

/**
 * Type guard for CompositeStepError
 */
export function isCompositeStepError(error: unknown): error is CompositeStepError {
  return error instanceof CompositeStepError;
}

/**
 * Type guard for CompositeCancelledError
 */
export function isCompositeCancelledError(error: unknown): error is CompositeCancelledError {
  return error instanceof CompositeCancelledError;
}
