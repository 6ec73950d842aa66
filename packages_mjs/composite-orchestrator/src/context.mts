/**
 * Per-request execution context for one composite run
 */
import { resolvePath, type PathLookup } from './path.mjs';

export type SharedValueScope = 'request' | 'step';

export interface ExecutionContextInit {
  /** Parsed request body */
  root: unknown;
  variables?: Record<string, unknown>;
  sharedValueScope?: SharedValueScope;
}

/**
 * Holds the request root, generated shared values and step results
 *
 * Owned by a single in-flight request; never shared.
 */
export class ExecutionContext {
  readonly root: unknown;
  readonly sharedValueScope: SharedValueScope;
  private readonly variables: Record<string, unknown>;
  private readonly sharedValues = new Map<string, unknown>();
  private readonly results = new Map<string, unknown>();
  private readonly submitted = new Map<string, unknown>();

  constructor(init: ExecutionContextInit) {
    this.root = init.root;
    this.variables = { ...init.variables };
    this.sharedValueScope = init.sharedValueScope ?? 'request';
  }

  /**
   * Memoized value for a generator expression
   *
   * Keyed by the expression text, or by step and expression under `step` scope.
   */
  sharedValue(expression: string, stepName: string, generate: () => unknown): unknown {
    const key = this.sharedValueScope === 'step' ? `${stepName}:${expression}` : expression;
    if (!this.sharedValues.has(key)) {
      this.sharedValues.set(key, generate());
    }
    return this.sharedValues.get(key);
  }

  variable(path: string): PathLookup {
    return resolvePath(this.variables, path);
  }

  /**
   * Store a completed step's response and the document(s) sent for it
   */
  recordResult(stepName: string, result: unknown, submitted: unknown): void {
    this.results.set(stepName, result);
    this.submitted.set(stepName, submitted);
  }

  hasResult(stepName: string): boolean {
    return this.results.has(stepName);
  }

  /**
   * Resolve the step name exactly, then case-insensitively
   */
  resultKey(stepName: string): string | undefined {
    if (this.results.has(stepName)) {
      return stepName;
    }
    const lowerName = stepName.toLowerCase();
    return [...this.results.keys()].find((name) => name.toLowerCase() === lowerName);
  }

  result(stepName: string): unknown {
    const key = this.resultKey(stepName);
    return key === undefined ? undefined : this.results.get(key);
  }

  submittedDocument(stepName: string): unknown {
    const key = this.resultKey(stepName);
    return key === undefined ? undefined : this.submitted.get(key);
  }

  /**
   * Completed step names, in execution order
   */
  completedSteps(): string[] {
    return [...this.results.keys()];
  }

  /**
   * Results newest first, for sourceProperty lookups
   */
  resultsNewestFirst(): unknown[] {
    return [...this.results.values()].reverse();
  }

  stepResults(): Record<string, unknown> {
    return Object.fromEntries(this.results);
  }
}
