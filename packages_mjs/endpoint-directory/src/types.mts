/**
 * Type definitions for @apigw/endpoint-directory
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type EndpointType = 'standard' | 'composite';

/**
 * One step of a composite workflow
 */
export interface CompositeStep {
  /** Unique within the definition */
  name: string;
  /** Endpoint name resolved through the directory at execution time */
  targetEndpoint: string;
  method: HttpMethod;
  /** Single predecessor; chains and trees only */
  dependsOn?: string;
  isArray: boolean;
  /** Path of the array inside the step input when `isArray` */
  arrayProperty?: string;
  /** Path of the step input inside the request body */
  sourceProperty?: string;
  /** Field name to template expression */
  templateTransformations: Readonly<Record<string, string>>;
}

/**
 * Composite workflow, steps in document order
 */
export interface CompositeDefinition {
  name: string;
  description: string;
  steps: readonly CompositeStep[];
}

/**
 * Immutable endpoint definition
 */
export interface EndpointDefinition {
  name: string;
  type: EndpointType;
  /** Backend base URL; empty for composites */
  baseUrl: string;
  allowedMethods: ReadonlySet<HttpMethod>;
  isPrivate: boolean;
  allowedEnvironments: ReadonlySet<string> | 'all';
  /** Endpoint-specific cache duration, between backend max-age and the global default */
  cacheDurationSeconds?: number;
  compositeConfig?: CompositeDefinition;
  /** File the definition was loaded from */
  source?: string;
}

/**
 * Read side of the directory consumed by the engines
 */
export interface EndpointLookup {
  /** Case-insensitive lookup; undefined when not found */
  lookup(name: string): EndpointDefinition | undefined;
  list(): EndpointDefinition[];
}
