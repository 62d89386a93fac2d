import { classifyValue, type MappingView } from '../../core/types/value';
import { SELF_REFERENCE } from '../token/Token';

export type LookupResult = { found: true; value: unknown } | { found: false };

export const NOT_FOUND: LookupResult = { found: false };

export type InstanceMarker = 'First' | 'Separator' | 'Last';

/**
 * Value bound to `<block>#First`, `<block>#Separator` and `<block>#Last`.
 * Only its presence matters; as a block it expands exactly once.
 */
export const MARKER_VALUE: Readonly<Record<string, never>> = Object.freeze({});

export function markerName(blockName: string, marker: InstanceMarker): string {
  return `${blockName}#${marker}`;
}

/**
 * One scope on the context stack.
 *
 * The frame of a block instance layers the self-reference and the instance
 * markers over the instance's own mapping, without touching that mapping.
 */
export class ContextFrame {
  private constructor(
    private readonly bindings: MappingView | undefined,
    private readonly self: LookupResult,
    private readonly markers: ReadonlySet<string>
  ) {}

  static root(context: unknown): ContextFrame {
    const node = classifyValue(context);
    return new ContextFrame(node.kind === 'mapping' ? node.entries : undefined, NOT_FOUND, new Set());
  }

  /**
   * Frame for instance `index` of `count` of the block `blockName`.
   */
  static forInstance(blockName: string, instance: unknown, index: number, count: number): ContextFrame {
    const node = classifyValue(instance);
    const markers = new Set<string>();

    if (index === 0) {
      markers.add(markerName(blockName, 'First'));
    }
    if (index + 1 < count) {
      markers.add(markerName(blockName, 'Separator'));
    }
    if (index + 1 === count) {
      markers.add(markerName(blockName, 'Last'));
    }

    return new ContextFrame(
      node.kind === 'mapping' ? node.entries : undefined,
      { found: true, value: instance },
      markers
    );
  }

  lookup(name: string): LookupResult {
    if (name === SELF_REFERENCE) {
      return this.self;
    }
    if (this.markers.has(name)) {
      return { found: true, value: MARKER_VALUE };
    }
    if (this.bindings?.has(name)) {
      return { found: true, value: this.bindings.get(name) };
    }
    return NOT_FOUND;
  }
}
