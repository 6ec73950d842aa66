/**
 * Composite Orchestrator
 *
 * Runs a composite's steps one at a time in planned order, resolving template
 * fields against the execution context and stopping at the first failure.
 * Completed steps are not compensated when a later step fails.
 */
import type { BackendInvoker, BackendResponse } from '@apigw/fetch-client';
import { isTransportError } from '@apigw/fetch-client';
import {
  planExecution,
  type CompositeDefinition,
  type CompositeStep,
  type EndpointDefinition,
  type EndpointLookup,
} from '@apigw/endpoint-directory';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';
import { createEndpointRewriter } from '@apigw/url-rewriter';
import { ExecutionContext } from './context.mjs';
import {
  BackendCallFailedError,
  CompositeCancelledError,
  CompositeStepError,
  MalformedInputDocumentError,
  StepNotFoundError,
} from './errors.mjs';
import { DEFAULT_MAX_DETAIL_LENGTH, extractErrorDetail, parseBody, truncate } from './error-detail.mjs';
import { isPlainObject, resolvePath } from './path.mjs';
import { TemplateResolver } from './template-resolver.mjs';
import type { CompositeFailure, CompositeResult, ExecutionMetadata, OrchestratorConfig } from './types.mjs';

interface StepRun {
  environment: string;
  metadata: ExecutionMetadata;
  context: ExecutionContext;
}

/**
 * @example
 * const orchestrator = new CompositeOrchestrator({ directory, invoker, logger });
 * const result = await orchestrator.execute(definition, body, 'prod', {
 *   headers: { DatabaseName: 'prod' },
 *   publicBaseUrl: 'https://gw.example.com',
 * });
 */
export class CompositeOrchestrator {
  private readonly directory: EndpointLookup;
  private readonly invoker: BackendInvoker;
  private readonly logger: Logger;
  private readonly resolver: TemplateResolver;
  private readonly config: OrchestratorConfig;

  constructor(config: OrchestratorConfig) {
    this.config = config;
    this.directory = config.directory;
    this.invoker = config.invoker;
    this.logger = componentLogger('composite-orchestrator', config.logger);
    this.resolver = new TemplateResolver({ generateId: config.generateId });
  }

  /**
   * Execute a composite definition
   *
   * Step failures come back as a failed result; cancellation rejects with
   * CompositeCancelledError.
   */
  async execute(
    definition: CompositeDefinition,
    requestBody: unknown,
    environment: string,
    metadata: ExecutionMetadata = {}
  ): Promise<CompositeResult> {
    const context = new ExecutionContext({
      root: requestBody,
      variables: { environment, ...metadata.variables },
      sharedValueScope: this.config.sharedValueScope,
    });
    const plan = planExecution(definition);
    const run: StepRun = { environment, metadata, context };
    const startedAt = Date.now();

    this.logger.debug(
      { composite: definition.name, environment, steps: plan.map((step) => step.name) },
      'Composite started'
    );

    for (const step of plan) {
      this.throwIfCancelled(definition, context, metadata.signal);

      try {
        await this.runStep(step, run);
      } catch (error) {
        if (error instanceof CompositeStepError) {
          const failure = this.toFailure(error, context);
          this.logger.warn(
            {
              composite: definition.name,
              failedStep: failure.failedStep,
              errorKind: failure.errorKind,
              httpStatusCode: failure.httpStatusCode,
            },
            `Composite step failed: ${failure.errorMessage}`
          );
          return { ...failure, stepResults: this.rewriteResults(failure.stepResults, environment, metadata) };
        }
        if (isTransportError(error) && error.aborted) {
          throw new CompositeCancelledError(definition.name, context.completedSteps(), { cause: error });
        }
        throw error;
      }
    }

    this.logger.debug(
      { composite: definition.name, durationMs: Date.now() - startedAt },
      'Composite completed'
    );

    return { success: true, stepResults: this.rewriteResults(context.stepResults(), environment, metadata) };
  }

  private async runStep(step: CompositeStep, run: StepRun): Promise<void> {
    const { context } = run;
    const endpoint = this.resolveEndpoint(step);
    const input = this.resolveInput(step, context);

    this.logger.debug({ step: step.name, endpoint: endpoint.name, isArray: step.isArray }, 'Step started');

    if (!step.isArray) {
      const document = this.applyTemplates(step, input, context);
      const result = await this.callBackend(step, endpoint, document, run);
      context.recordResult(step.name, result, document);
      this.logger.debug({ step: step.name }, 'Step completed');
      return;
    }

    const elements = this.resolveArray(step, input);
    const results: unknown[] = [];
    const documents: unknown[] = [];

    for (const [index, element] of elements.entries()) {
      try {
        const document = this.applyTemplates(step, element, context);
        results.push(await this.callBackend(step, endpoint, document, run));
        documents.push(document);
      } catch (error) {
        if (error instanceof CompositeStepError) {
          error.elementIndex = index;
          if (index > 0) {
            context.recordResult(step.name, results, documents);
          }
        }
        throw error;
      }
    }

    context.recordResult(step.name, results, documents);
    this.logger.debug({ step: step.name, elements: results.length }, 'Step completed');
  }

  private resolveEndpoint(step: CompositeStep): EndpointDefinition {
    const endpoint = this.directory.lookup(step.targetEndpoint);
    if (!endpoint || endpoint.type !== 'standard' || !endpoint.baseUrl) {
      throw new StepNotFoundError(step.name, step.targetEndpoint);
    }
    return endpoint;
  }

  /**
   * sourceProperty reads from the request root, then from prior results newest first
   */
  private resolveInput(step: CompositeStep, context: ExecutionContext): unknown {
    if (!step.sourceProperty) {
      return context.root;
    }

    for (const candidate of [context.root, ...context.resultsNewestFirst()]) {
      const lookup = resolvePath(candidate, step.sourceProperty);
      if (lookup.found) {
        return lookup.value;
      }
    }

    throw new MalformedInputDocumentError(
      step.name,
      `sourceProperty "${step.sourceProperty}" was not found for step "${step.name}"`
    );
  }

  private resolveArray(step: CompositeStep, input: unknown): unknown[] {
    const lookup = step.arrayProperty ? resolvePath(input, step.arrayProperty) : { found: true as const, value: input };
    if (!lookup.found) {
      throw new MalformedInputDocumentError(
        step.name,
        `arrayProperty "${step.arrayProperty ?? ''}" was not found for step "${step.name}": ${lookup.reason}`
      );
    }
    if (!Array.isArray(lookup.value)) {
      throw new MalformedInputDocumentError(
        step.name,
        `Input for array step "${step.name}" is not an array`
      );
    }
    const elements: unknown[] = lookup.value;
    return elements;
  }

  private applyTemplates(step: CompositeStep, element: unknown, context: ExecutionContext): unknown {
    const fields = Object.entries(step.templateTransformations);
    if (fields.length === 0) {
      return structuredClone(element);
    }
    const base = element ?? {};
    if (!isPlainObject(base)) {
      throw new MalformedInputDocumentError(
        step.name,
        `Input for step "${step.name}" must be an object to apply template fields`
      );
    }

    const document: Record<string, unknown> = structuredClone(base);
    for (const [field, expression] of fields) {
      document[field] = this.resolver.resolve(expression, context, step.name, field);
    }
    return document;
  }

  private async callBackend(
    step: CompositeStep,
    endpoint: EndpointDefinition,
    document: unknown,
    run: StepRun
  ): Promise<unknown> {
    const { metadata } = run;
    const hasBody = step.method !== 'GET' && step.method !== 'HEAD';
    let response: BackendResponse;

    try {
      response = await this.invoker.invoke({
        url: endpoint.baseUrl,
        method: step.method,
        headers: {
          ...metadata.headers,
          accept: 'application/json',
          ...(hasBody ? { 'content-type': 'application/json' } : {}),
        },
        body: hasBody ? JSON.stringify(document ?? null) : undefined,
        timeoutMs: metadata.timeoutMs,
        signal: metadata.signal,
      });
    } catch (error) {
      if (isTransportError(error) && !error.aborted) {
        throw new BackendCallFailedError(
          step.name,
          `Step "${step.name}" could not reach endpoint "${endpoint.name}"`,
          { detail: error.message },
          { cause: error }
        );
      }
      throw error;
    }

    if (!response.ok) {
      const maxLength = this.config.maxErrorDetailLength ?? DEFAULT_MAX_DETAIL_LENGTH;
      const extracted = extractErrorDetail(response.body, maxLength);
      throw new BackendCallFailedError(
        step.name,
        `Step "${step.name}" failed with status ${response.status}`,
        {
          status: response.status,
          detail: extracted.detail,
          responseBody: truncate(response.body, maxLength),
          structuredError: extracted.structured,
        }
      );
    }

    return parseBody(response.body);
  }

  private toFailure(error: CompositeStepError, context: ExecutionContext): CompositeFailure {
    const failure: CompositeFailure = {
      success: false,
      stepResults: context.stepResults(),
      failedStep: error.stepName,
      errorKind: error.kind,
      errorMessage: error.message,
      errorDetail: error.message,
      failedElementIndex: error.elementIndex,
    };

    if (error instanceof BackendCallFailedError) {
      const { status, detail, responseBody, structuredError } = error.failure;
      failure.errorDetail = detail;
      failure.httpStatusCode = status;
      failure.responseBody = responseBody;
      failure.structuredError = structuredError;
    }

    return failure;
  }

  private throwIfCancelled(
    definition: CompositeDefinition,
    context: ExecutionContext,
    signal: AbortSignal | undefined
  ): void {
    if (signal?.aborted) {
      this.logger.info(
        { composite: definition.name, completedSteps: context.completedSteps() },
        'Composite cancelled by caller'
      );
      throw new CompositeCancelledError(definition.name, context.completedSteps(), { cause: signal.reason });
    }
  }

  /**
   * Replace backend URLs in results with gateway URLs
   */
  private rewriteResults(
    stepResults: Record<string, unknown>,
    environment: string,
    metadata: ExecutionMetadata
  ): Record<string, unknown> {
    const rewriter = createEndpointRewriter(
      this.directory
        .list()
        .filter((endpoint) => endpoint.type === 'standard' && endpoint.baseUrl)
        .map((endpoint) => ({ name: endpoint.name, url: endpoint.baseUrl })),
      { publicBaseUrl: metadata.publicBaseUrl ?? '', environment }
    );

    const rewritten: Record<string, unknown> = {};
    for (const [name, result] of Object.entries(stepResults)) {
      if (typeof result === 'string') {
        rewritten[name] = rewriter.rewrite(result);
      } else {
        const serialized = JSON.stringify(result);
        rewritten[name] = serialized === undefined ? result : parseBody(rewriter.rewrite(serialized));
      }
    }
    return rewritten;
  }
}

/**
 * Create a composite orchestrator
 */
export function createCompositeOrchestrator(config: OrchestratorConfig): CompositeOrchestrator {
  return new CompositeOrchestrator(config);
}
