/**
 * Template expression language for composite step fields
 *
 * - `$guid`: one generated identifier shared by every use in the request
 * - `$prev.<step>[.<path>]`: value from a completed step's result
 * - `$context.<name>[.<path>]`: caller-supplied variable
 * - anything else: literal
 */
import { v4 as uuidv4 } from 'uuid';
import type { ExecutionContext } from './context.mjs';
import { TemplateReferenceUnresolvedError } from './errors.mjs';
import { resolvePath } from './path.mjs';

export type TemplateExpression =
  | { kind: 'guid' }
  | { kind: 'prev'; step: string; path: string }
  | { kind: 'context'; path: string }
  | { kind: 'literal'; value: string };

const GUID = '$guid';
const PREV_PREFIX = '$prev.';
const CONTEXT_PREFIX = '$context.';

/**
 * Classify an expression
 */
export function parseExpression(expression: string): TemplateExpression {
  const trimmed = expression.trim();

  if (trimmed.toLowerCase() === GUID) {
    return { kind: 'guid' };
  }

  if (trimmed.toLowerCase().startsWith(PREV_PREFIX)) {
    const reference = /^([^.[\]]*)(.*)$/.exec(trimmed.slice(PREV_PREFIX.length));
    return {
      kind: 'prev',
      step: reference?.[1] ?? '',
      path: (reference?.[2] ?? '').replace(/^\./, ''),
    };
  }

  if (trimmed.toLowerCase().startsWith(CONTEXT_PREFIX)) {
    return { kind: 'context', path: trimmed.slice(CONTEXT_PREFIX.length) };
  }

  return { kind: 'literal', value: expression };
}

export interface TemplateResolverOptions {
  /** Identifier generator for `$guid`. Default: uuid v4 */
  generateId?: () => string;
}

/**
 * Resolves template expressions against an execution context
 */
export class TemplateResolver {
  private readonly generateId: () => string;

  constructor(options: TemplateResolverOptions = {}) {
    this.generateId = options.generateId ?? (() => uuidv4());
  }

  /**
   * @throws TemplateReferenceUnresolvedError
   */
  resolve(expression: string, context: ExecutionContext, stepName: string, field: string): unknown {
    const parsed = parseExpression(expression);

    switch (parsed.kind) {
      case 'guid':
        return context.sharedValue(GUID, stepName, this.generateId);

      case 'prev': {
        if (!parsed.step) {
          throw new TemplateReferenceUnresolvedError(stepName, field, expression, 'no step name given');
        }
        if (context.resultKey(parsed.step) === undefined) {
          throw new TemplateReferenceUnresolvedError(
            stepName,
            field,
            expression,
            `step "${parsed.step}" has not completed`
          );
        }

        const fromResult = resolvePath(context.result(parsed.step), parsed.path);
        if (fromResult.found) {
          return fromResult.value;
        }
        // Values generated for the step are readable even when the backend does not echo them
        const fromSubmitted = resolvePath(context.submittedDocument(parsed.step), parsed.path);
        if (fromSubmitted.found) {
          return fromSubmitted.value;
        }
        throw new TemplateReferenceUnresolvedError(stepName, field, expression, fromResult.reason);
      }

      case 'context': {
        const lookup = context.variable(parsed.path);
        if (!lookup.found || parsed.path.length === 0) {
          throw new TemplateReferenceUnresolvedError(
            stepName,
            field,
            expression,
            lookup.found ? 'no variable name given' : lookup.reason
          );
        }
        return lookup.value;
      }

      case 'literal':
        return parsed.value;
    }
  }
}
