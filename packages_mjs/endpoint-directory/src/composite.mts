/**
 * Composite definition validation and execution planning
 *
 * `dependsOn` is single-valued: a step has at most one predecessor, so a valid
 * definition is a forest of chains. Anything richer is rejected, not under-executed.
 */
import { CompositeDefinitionError } from './errors.mjs';
import type { CompositeConfigInput, CompositeStepInput } from './schema.mjs';
import type { CompositeDefinition, CompositeStep } from './types.mjs';

function normalizeDependsOn(step: CompositeStepInput): string | undefined {
  const { dependsOn } = step;
  if (dependsOn === undefined) {
    return undefined;
  }
  if (typeof dependsOn === 'string') {
    return dependsOn.trim() || undefined;
  }

  const predecessors = dependsOn.map((name) => name.trim()).filter((name) => name.length > 0);
  if (predecessors.length > 1) {
    throw new CompositeDefinitionError(
      `Step "${step.name}" depends on ${predecessors.length} steps (${predecessors.join(', ')}); only one predecessor is supported`,
      'multiple-predecessors',
      step.name
    );
  }
  return predecessors[0];
}

/**
 * Validate a parsed compositeConfig and build the immutable definition
 *
 * @throws CompositeDefinitionError
 */
export function buildCompositeDefinition(config: CompositeConfigInput, fallbackName: string): CompositeDefinition {
  const steps: CompositeStep[] = [];
  const seen = new Set<string>();

  for (const input of config.steps) {
    if (seen.has(input.name)) {
      throw new CompositeDefinitionError(`Duplicate step name "${input.name}"`, 'duplicate-step', input.name);
    }
    seen.add(input.name);

    if (input.isArray && !input.arrayProperty && !input.sourceProperty) {
      throw new CompositeDefinitionError(
        `Array step "${input.name}" needs arrayProperty or sourceProperty`,
        'missing-array-property',
        input.name
      );
    }

    steps.push({
      name: input.name,
      targetEndpoint: input.endpoint,
      method: input.method,
      dependsOn: normalizeDependsOn(input),
      isArray: input.isArray,
      arrayProperty: input.arrayProperty,
      sourceProperty: input.sourceProperty,
      templateTransformations: Object.freeze({ ...input.templateTransformations }),
    });
  }

  const byName = new Map(steps.map((step) => [step.name, step]));

  for (const step of steps) {
    if (step.dependsOn !== undefined && !byName.has(step.dependsOn)) {
      throw new CompositeDefinitionError(
        `Step "${step.name}" depends on unknown step "${step.dependsOn}"`,
        'unknown-dependency',
        step.name
      );
    }
  }

  for (const step of steps) {
    const visited = new Set<string>([step.name]);
    let current = step.dependsOn;
    while (current !== undefined) {
      if (visited.has(current)) {
        throw new CompositeDefinitionError(
          `Step "${step.name}" is part of a dependency cycle`,
          'dependency-cycle',
          step.name
        );
      }
      visited.add(current);
      current = byName.get(current)?.dependsOn;
    }
  }

  return Object.freeze({
    name: config.name ?? fallbackName,
    description: config.description,
    steps: Object.freeze(steps),
  });
}

/**
 * Order steps for sequential execution
 *
 * Repeatedly takes the first step in document order whose predecessor has already
 * been placed, so independent steps keep their declared order.
 */
export function planExecution(definition: CompositeDefinition): CompositeStep[] {
  const planned: CompositeStep[] = [];
  const placed = new Set<string>();
  const pending = [...definition.steps];

  while (pending.length > 0) {
    const index = pending.findIndex((step) => step.dependsOn === undefined || placed.has(step.dependsOn));
    if (index < 0) {
      throw new CompositeDefinitionError(
        `Composite "${definition.name}" has steps that can never become eligible`,
        'dependency-cycle',
        pending[0]?.name
      );
    }
    const [step] = pending.splice(index, 1);
    if (step) {
      planned.push(step);
      placed.add(step.name);
    }
  }

  return planned;
}
