/**
 * @apigw/endpoint-directory
 *
 * Loads endpoint definitions from `entity.json` files and validates composite
 * step graphs.
 */

export {
  HTTP_METHODS,
  type HttpMethod,
  type EndpointType,
  type CompositeStep,
  type CompositeDefinition,
  type EndpointDefinition,
  type EndpointLookup,
} from './types.mjs';

export {
  EndpointDefinitionError,
  CompositeDefinitionError,
  isCompositeDefinitionError,
  type CompositeDefinitionReason,
} from './errors.mjs';

export {
  EntitySchema,
  CompositeConfigSchema,
  CompositeStepSchema,
  formatIssues,
  type EntityInput,
  type CompositeConfigInput,
  type CompositeStepInput,
} from './schema.mjs';

export { buildCompositeDefinition, planExecution } from './composite.mjs';

export {
  EndpointDirectory,
  ENTITY_FILE_NAME,
  parseEndpointDefinition,
  isEnvironmentAllowed,
  type EndpointDirectoryOptions,
  type LoadSummary,
} from './directory.mjs';
