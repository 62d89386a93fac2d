import { describe, it, expect } from 'vitest';
import { classifyValue, toBlockInstances, toDisplayString } from './value';

describe('classifyValue', () => {
  it('should classify null and undefined as null', () => {
    expect(classifyValue(null)).toEqual({ kind: 'null' });
    expect(classifyValue(undefined)).toEqual({ kind: 'null' });
  });

  it('should classify primitives as scalars', () => {
    expect(classifyValue('s')).toEqual({ kind: 'scalar', value: 's' });
    expect(classifyValue(0)).toEqual({ kind: 'scalar', value: 0 });
    expect(classifyValue(false)).toEqual({ kind: 'scalar', value: false });
    expect(classifyValue(5n)).toEqual({ kind: 'scalar', value: 5n });
    expect(classifyValue(Symbol('tag'))).toEqual({ kind: 'scalar', value: 'Symbol(tag)' });
  });

  it('should classify collections', () => {
    expect(classifyValue([1]).kind).toBe('sequence');
    expect(classifyValue(new Set([1])).kind).toBe('set');
    expect(classifyValue(new Map()).kind).toBe('mapping');
    expect(classifyValue({}).kind).toBe('mapping');
    expect(classifyValue(Object.create(null)).kind).toBe('mapping');
  });

  it('should classify class instances and functions as objects', () => {
    expect(classifyValue(new Date(0)).kind).toBe('object');
    expect(classifyValue(() => 1).kind).toBe('object');
  });
});

describe('toBlockInstances', () => {
  it('should wrap single values and spread collections', () => {
    const mapping = { a: 1 };

    expect(toBlockInstances(classifyValue(null))).toEqual([]);
    expect(toBlockInstances(classifyValue('x'))).toEqual(['x']);
    expect(toBlockInstances(classifyValue(mapping))[0]).toBe(mapping);
    expect(toBlockInstances(classifyValue([1, 2]))).toEqual([1, 2]);
    expect(toBlockInstances(classifyValue(new Set(['b', 'a'])))).toEqual(['b', 'a']);
  });
});

describe('toDisplayString', () => {
  it('should write scalars in their natural form', () => {
    expect(toDisplayString('text')).toBe('text');
    expect(toDisplayString(1.5)).toBe('1.5');
    expect(toDisplayString(true)).toBe('true');
    expect(toDisplayString(10n)).toBe('10');
    expect(toDisplayString(null)).toBe('');
  });

  it('should write collections as JSON', () => {
    expect(toDisplayString([1, 'a', null])).toBe('[1,"a",null]');
    expect(toDisplayString(new Map<string, unknown>([['k', new Set([2n])]]))).toBe('{"k":["2"]}');
  });
});
