import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FunctionRegistry, createBasicFunctions, defineSynchronousFunction } from '../src/index';

const double = defineSynchronousFunction({
  name: 'double',
  description: 'Doubles a number.',
  argumentSchema: z.object({ value: z.number() }),
  returnType: 'number',
  run: ({ value }) => value * 2
});

describe('FunctionRegistry', () => {
  it('looks functions up by name', () => {
    const registry = new FunctionRegistry([double]);
    expect(registry.has('double')).toBe(true);
    expect(registry.get('double')).toBe(double);
    expect(registry.get('triple')).toBeUndefined();
  });

  it('replaces a function registered under the same name', () => {
    const replacement = { ...double, description: 'Doubles, again.' };
    const registry = new FunctionRegistry([double]).register(replacement);
    expect(registry.list()).toEqual([replacement]);
  });

  it('describes functions with JSON Schema parameters', () => {
    const [description] = new FunctionRegistry([double]).describe();
    expect(description).toEqual({
      name: 'double',
      description: 'Doubles a number.',
      returnType: 'number',
      parameters: {
        type: 'object',
        properties: { value: { type: 'number' } },
        required: ['value'],
        additionalProperties: false
      }
    });
  });

  it('describes every built-in', () => {
    const names = new FunctionRegistry(createBasicFunctions()).describe().map((entry) => entry.name);
    expect(names).toContain('formatDate');
    expect(names).toHaveLength(14);
  });
});
