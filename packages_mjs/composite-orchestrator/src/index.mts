/**
 * @apigw/composite-orchestrator
 *
 * Executes composite endpoint workflows: ordered backend steps whose fields are
 * filled from template expressions, with fail-fast partial results.
 */

export type {
  OrchestratorConfig,
  ExecutionMetadata,
  CompositeResult,
  CompositeSuccess,
  CompositeFailure,
} from './types.mjs';

export {
  CompositeStepError,
  StepNotFoundError,
  TemplateReferenceUnresolvedError,
  MalformedInputDocumentError,
  BackendCallFailedError,
  CompositeCancelledError,
  isCompositeStepError,
  isCompositeCancelledError,
  type CompositeErrorKind,
  type BackendFailure,
} from './errors.mjs';

export { ExecutionContext, type ExecutionContextInit, type SharedValueScope } from './context.mjs';

export {
  TemplateResolver,
  parseExpression,
  type TemplateExpression,
  type TemplateResolverOptions,
} from './template-resolver.mjs';

export { parsePath, resolvePath, isPlainObject, type PathSegment, type PathLookup } from './path.mjs';

export { extractErrorDetail, parseBody, DEFAULT_MAX_DETAIL_LENGTH, type ExtractedErrorDetail } from './error-detail.mjs';

export { CompositeOrchestrator, createCompositeOrchestrator } from './orchestrator.mjs';
