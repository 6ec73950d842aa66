/**
 * Tests for composite.mts
 */
import { describe, it, expect } from 'vitest';
import { buildCompositeDefinition, planExecution } from '../src/composite.mjs';
import { CompositeConfigSchema } from '../src/schema.mjs';
import { CompositeDefinitionError } from '../src/errors.mjs';

function build(steps: unknown[]) {
  return buildCompositeDefinition(CompositeConfigSchema.parse({ steps }), 'Workflow');
}

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof CompositeDefinitionError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

describe('buildCompositeDefinition', () => {
  // Happy Path: defaults applied
  it('should build steps with defaults', () => {
    const definition = build([{ name: 'A', endpoint: 'Lines' }]);

    expect(definition.name).toBe('Workflow');
    expect(definition.description).toBe('');
    expect(definition.steps).toEqual([
      {
        name: 'A',
        targetEndpoint: 'Lines',
        method: 'POST',
        dependsOn: undefined,
        isArray: false,
        arrayProperty: undefined,
        sourceProperty: undefined,
        templateTransformations: {},
      },
    ]);
  });

  // Decision: single-element dependsOn array is one predecessor
  it('should accept a one-element dependsOn array', () => {
    const definition = build([
      { name: 'A', endpoint: 'Lines' },
      { name: 'B', endpoint: 'Header', dependsOn: ['A'], method: 'put' },
    ]);
    expect(definition.steps[1]?.dependsOn).toBe('A');
    expect(definition.steps[1]?.method).toBe('PUT');
  });

  // Error Paths: rejected graphs
  it('should reject multiple predecessors', () => {
    expect(
      reasonOf(() =>
        build([
          { name: 'A', endpoint: 'Lines' },
          { name: 'B', endpoint: 'Lines' },
          { name: 'C', endpoint: 'Header', dependsOn: ['A', 'B'] },
        ])
      )
    ).toBe('multiple-predecessors');
  });

  it('should reject duplicate step names', () => {
    expect(
      reasonOf(() =>
        build([
          { name: 'A', endpoint: 'Lines' },
          { name: 'A', endpoint: 'Header' },
        ])
      )
    ).toBe('duplicate-step');
  });

  it('should reject unknown dependencies', () => {
    expect(reasonOf(() => build([{ name: 'A', endpoint: 'Lines', dependsOn: 'Missing' }]))).toBe('unknown-dependency');
  });

  it('should reject cycles', () => {
    expect(
      reasonOf(() =>
        build([
          { name: 'A', endpoint: 'Lines', dependsOn: 'B' },
          { name: 'B', endpoint: 'Header', dependsOn: 'A' },
        ])
      )
    ).toBe('dependency-cycle');
    expect(reasonOf(() => build([{ name: 'A', endpoint: 'Lines', dependsOn: 'A' }]))).toBe('dependency-cycle');
  });

  it('should reject array steps with no array location', () => {
    expect(reasonOf(() => build([{ name: 'A', endpoint: 'Lines', isArray: true }]))).toBe('missing-array-property');
  });
});

describe('planExecution', () => {
  // Path: document order kept for independent steps
  it('should keep document order when there are no dependencies', () => {
    const definition = build([
      { name: 'A', endpoint: 'Lines' },
      { name: 'B', endpoint: 'Lines' },
      { name: 'C', endpoint: 'Lines' },
    ]);
    expect(planExecution(definition).map((step) => step.name)).toEqual(['A', 'B', 'C']);
  });

  // Path: a step declared before its predecessor moves after it
  it('should place each step after its predecessor', () => {
    const definition = build([
      { name: 'Header', endpoint: 'Header', dependsOn: 'Lines' },
      { name: 'Audit', endpoint: 'Audit' },
      { name: 'Lines', endpoint: 'Lines' },
      { name: 'Notify', endpoint: 'Notify', dependsOn: 'Header' },
    ]);
    expect(planExecution(definition).map((step) => step.name)).toEqual(['Audit', 'Lines', 'Header', 'Notify']);
  });
});
