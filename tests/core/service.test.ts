import { describe, expect, it } from 'vitest';
import { compileDescriptor, compileDescriptorText, parseJson, translateExpression } from '../../src/core/service.js';

const chart = { name: 'c', initial: 's', states: [{ id: 's' }] };

describe('compileDescriptorText', () => {
  it('reports malformed JSON at its position', () => {
    const { model, errors } = compileDescriptorText('{bad', () => undefined);
    expect(model).toBeUndefined();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ line: 1, column: 2, code: 'IN-JSON', severity: 'error' });
    expect(errors[0]?.message).toMatch(/^Invalid JSON in model descriptor: /);
  });

  it('reports chart files it cannot read', () => {
    const { errors } = compileDescriptorText(JSON.stringify({ name: 'm', charts: ['a.json'] }), () => undefined);
    expect(errors).toEqual([{ line: 1, column: 1, severity: 'error', code: 'MO-CONFIG', message: "Chart file 'a.json' not found" }]);
  });

  it('compiles the charts it reads', () => {
    const read = (reference: string) => (reference === 'a.json' ? JSON.stringify(chart) : undefined);
    const { model, errors } = compileDescriptorText(JSON.stringify({ name: 'm', charts: ['a.json'] }), read);
    expect(errors).toEqual([]);
    expect(model?.name).toBe('m');
    expect(model?.automata.map((a) => a.name)).toEqual(['c']);
  });
});

describe('compileDescriptor', () => {
  it('reports missing and invalid charts', () => {
    expect(compileDescriptor({ name: 'm', charts: ['a.json'] }).errors).toEqual([
      { line: 1, column: 1, severity: 'error', code: 'MO-CONFIG', message: "Chart 'a.json' was not provided" },
    ]);
    const { errors } = compileDescriptor({ name: 'm', charts: ['a.json'] }, { 'a.json': { name: 'c' } });
    expect(errors.map((e) => e.message)).toEqual([
      'a.json: Invalid chart at initial: Required',
      'a.json: Invalid chart at states: Required',
    ]);
  });

  it('turns compile errors into diagnostics with their chart location', () => {
    const dup = { name: 'dup', initial: 's', states: [{ id: 's', transitions: [{ event: 'go', target: 's' }, { event: 'go', target: 's' }] }] };
    expect(compileDescriptor({ name: 'm', charts: [dup] })).toEqual({
      model: undefined,
      errors: [
        {
          line: 1,
          column: 1,
          severity: 'error',
          code: 'MO-MODEL',
          message: "dup/s: Event 'go' in state 's' already has an unconditional transition",
        },
      ],
    });
  });
});

describe('parseJson', () => {
  it('parses valid text', () => {
    expect(parseJson('{"a": [1]}', 'x')).toEqual({ value: { a: [1] }, errors: [] });
  });
});

describe('translateExpression', () => {
  it('returns the JANI JSON of an expression', () => {
    expect(translateExpression('x + 1')).toEqual({ expression: { op: '+', left: 'x', right: 1 }, errors: [] });
    expect(translateExpression('Math.round(x)').expression).toEqual({ op: 'round', exp: 'x' });
  });

  it('expands macros on request', () => {
    expect(translateExpression('Math.round(x)', { expand: true }).expression).toEqual({
      op: 'floor',
      exp: { op: '+', left: 'x', right: 0.5 },
    });
    expect(
      translateExpression('Geometry.distance(r1, obstacles)', { expand: true, constants: { 'boundaries.count': 4 } }).expression
    ).toBe(true);
  });

  it('reports syntax errors as diagnostics', () => {
    const { expression, errors } = translateExpression('(a + b');
    expect(expression).toBeUndefined();
    expect(errors[0]).toMatchObject({ code: 'EX-MISSING-RPAREN', line: 1, column: 7 });
  });
});
