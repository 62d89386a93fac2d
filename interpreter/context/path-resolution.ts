import { classifyValue, type ValueNode } from '../../core/types/value';
import type { PathFailureReason } from '../../core/errors';
import { SELF_REFERENCE } from '../token/Token';

export type PathStep =
  | { ok: true; value: unknown }
  | { ok: false; reason: PathFailureReason };

export interface SplitPath {
  /** Name searched on the context stack */
  root: string;
  /** Components walked from the root value */
  components: string[];
}

/**
 * `a.b.c` -> root `a`, components `[b, c]`.
 * `.b.c`  -> root `.`, components `[b, c]`.
 */
export function splitPath(name: string): SplitPath {
  if (name.startsWith(SELF_REFERENCE)) {
    return {
      root: SELF_REFERENCE,
      components: name.length > 1 ? name.slice(1).split('.') : []
    };
  }

  const [root, ...components] = name.split('.');
  return { root, components };
}

const INDEX_PATTERN = /^\[([+-]?\d+)\]$/;

type Strategy = (node: ValueNode, component: string) => PathStep | undefined;

/**
 * `[n]` on a sequence. Negative indices count from the end.
 */
const indexStrategy: Strategy = (node, component) => {
  if (!component.startsWith('[') || !component.endsWith(']')) {
    return undefined;
  }

  const match = INDEX_PATTERN.exec(component);
  if (!match || node.kind !== 'sequence') {
    return { ok: false, reason: 'not-indexable' };
  }

  const index = Number.parseInt(match[1], 10);
  const position = index < 0 ? node.items.length + index : index;
  if (position < 0 || position >= node.items.length) {
    return { ok: false, reason: 'out-of-range' };
  }
  return { ok: true, value: node.items[position] };
};

/**
 * Key of a plain object or Map.
 */
const keyStrategy: Strategy = (node, component) => {
  if (node.kind !== 'mapping') {
    return undefined;
  }
  if (!node.entries.has(component)) {
    return { ok: false, reason: 'missing' };
  }
  return { ok: true, value: node.entries.get(component) };
};

/**
 * Member of a non-mapping object, getters included. Methods are not values.
 */
const memberStrategy: Strategy = (node, component) => {
  if (node.kind !== 'object') {
    return undefined;
  }
  if (!(component in node.value)) {
    return { ok: false, reason: 'missing' };
  }

  const value: unknown = Reflect.get(node.value, component);
  if (typeof value === 'function') {
    return { ok: false, reason: 'missing' };
  }
  return { ok: true, value };
};

const STRATEGIES: readonly Strategy[] = [indexStrategy, keyStrategy, memberStrategy];

/**
 * Resolve one path component against a value. Strategies are tried in
 * order; the first that applies decides.
 */
export function resolvePathComponent(value: unknown, component: string): PathStep {
  const node = classifyValue(value);
  if (node.kind === 'null') {
    return { ok: false, reason: 'null-value' };
  }

  for (const strategy of STRATEGIES) {
    const step = strategy(node, component);
    if (step) {
      return step;
    }
  }
  return { ok: false, reason: 'missing' };
}
