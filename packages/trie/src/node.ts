/**
 * Value slot of a node. `absent` marks a node that is only a branching
 * point; it is distinct from any stored value, `undefined` and `null`
 * included.
 */
export type Slot<V> =
  | { readonly kind: "present"; readonly value: V }
  | { readonly kind: "absent" };

export const ABSENT: Slot<never> = Object.freeze({ kind: "absent" });

export const present = <V>(value: V): Slot<V> => ({ kind: "present", value });

export interface Edge<K, V> {
  /** Non-empty run of symbols consumed when following this edge. */
  readonly label: K;
  readonly child: TrieNode<K, V>;
}

/**
 * Storage unit of the trie: a value slot plus outgoing edges keyed by the
 * leading symbol of their label. No two labels of one node share a leading
 * symbol, so dispatch is a single map lookup.
 */
export class TrieNode<K, V> {
  slot: Slot<V>;
  readonly edges = new Map<number, Edge<K, V>>();

  constructor(slot: Slot<V> = ABSENT) {
    this.slot = slot;
  }

  get isTerminal(): boolean {
    return this.slot.kind === "present";
  }

  get degree(): number {
    return this.edges.size;
  }

  /** The edge whose label begins with `symbol`, if any. */
  findEdge = (symbol: number): Edge<K, V> | undefined => {
    return this.edges.get(symbol);
  };

  /**
   * Attach or replace the edge starting with `symbol`. Replacing keeps the
   * edge's position in enumeration order.
   */
  setEdge = (symbol: number, edge: Edge<K, V>): void => {
    this.edges.set(symbol, edge);
  };
}
