/**
 * Value model used by the renderer.
 *
 * Context data is caller-owned and arbitrary. The renderer never branches on
 * raw values directly; it classifies them into a {@link ValueNode} first.
 */

export type Scalar = string | number | boolean | bigint;

/** Root context handed to `Template.render` */
export type TemplateContext = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

/** Read-only view over the two mapping shapes the engine accepts */
export interface MappingView {
  has(key: string): boolean;
  get(key: string): unknown;
}

export type ValueNode =
  | { kind: 'null' }
  | { kind: 'scalar'; value: Scalar }
  | { kind: 'mapping'; value: object; entries: MappingView }
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'set'; items: ReadonlySet<unknown> }
  | { kind: 'object'; value: object };

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function recordView(record: object): MappingView {
  return {
    has: key => Object.prototype.hasOwnProperty.call(record, key),
    get: key => Reflect.get(record, key)
  };
}

function mapView(map: ReadonlyMap<unknown, unknown>): MappingView {
  return {
    has: key => map.has(key),
    get: key => map.get(key)
  };
}

/**
 * Classify a raw context value.
 */
export function classifyValue(value: unknown): ValueNode {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return { kind: 'scalar', value };
    case 'symbol':
      return { kind: 'scalar', value: value.toString() };
    case 'function':
      return { kind: 'object', value };
    case 'object':
      break;
  }

  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (value instanceof Map) {
    return { kind: 'mapping', value, entries: mapView(value) };
  }
  if (value instanceof Set) {
    return { kind: 'set', items: value };
  }
  if (isPlainObject(value)) {
    return { kind: 'mapping', value, entries: recordView(value) };
  }
  return { kind: 'object', value };
}

/**
 * Expand a block value into the ordered list of instances it iterates over.
 *
 * mapping -> [mapping], set -> items in insertion order,
 * scalar/object -> [value], sequence -> as-is. `null` has no instances;
 * callers decide what a null block means.
 */
export function toBlockInstances(node: ValueNode): readonly unknown[] {
  switch (node.kind) {
    case 'null':
      return [];
    case 'scalar':
      return [node.value];
    case 'mapping':
    case 'object':
      return [node.value];
    case 'set':
      return Array.from(node.items);
    case 'sequence':
      return node.items;
  }
}

function toJsonReady(value: unknown): unknown {
  const node = classifyValue(value);
  switch (node.kind) {
    case 'null':
      return null;
    case 'scalar':
      return typeof node.value === 'bigint' ? node.value.toString() : node.value;
    case 'sequence':
      return node.items.map(toJsonReady);
    case 'set':
      return Array.from(node.items, toJsonReady);
    case 'mapping': {
      const entries = node.value instanceof Map
        ? Array.from(node.value.entries(), ([key, item]) => [String(key), toJsonReady(item)])
        : Object.entries(node.value).map(([key, item]) => [key, toJsonReady(item)]);
      return Object.fromEntries(entries);
    }
    case 'object':
      return String(node.value);
  }
}

/**
 * Convert a non-null value to the text written to the output.
 */
export function toDisplayString(value: unknown): string {
  const node = classifyValue(value);
  switch (node.kind) {
    case 'null':
      return '';
    case 'scalar':
      return typeof node.value === 'string' ? node.value : String(node.value);
    case 'object':
      return String(node.value);
    default:
      return JSON.stringify(toJsonReady(value));
  }
}
