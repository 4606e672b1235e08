import type { TrieNode } from "./node";
import type { TrieContext } from "./trie.domain";

export interface Visit<K, V> {
  node: TrieNode<K, V>;
  /** Offset into the walked sequence at which `node` was reached. */
  offset: number;
}

/**
 * Follow edges from `node` while their labels match `seq[start..end)`.
 * Yields the starting node at `start`, then every node reached, in order
 * of increasing offset. A label that would run past `end` does not match.
 */
export function* walk<K, V>(
  { space, monitor }: TrieContext<K>,
  node: TrieNode<K, V>,
  seq: K,
  start: number,
  end: number,
): Generator<Visit<K, V>, void, unknown> {
  let current = node;
  let offset = start;
  yield { node: current, offset };

  while (offset < end) {
    const edge = current.findEdge(space.symbolAt(seq, offset));
    if (edge === undefined) return;
    if (!space.matchesAt(seq, offset, end, edge.label)) return;

    offset += space.length(edge.label);
    current = edge.child;
    monitor.increment("nodesVisited");
    yield { node: current, offset };
  }
}

export interface Lookup<K, V> {
  /** The node spelling exactly `key`, if the tree has one. */
  node: TrieNode<K, V> | undefined;
  /** Symbols of `key` consumed before the walk stopped. */
  matched: number;
}

/** Walk the whole of `key`. */
export const lookup = <K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  key: K,
): Lookup<K, V> => {
  const length = ctx.space.length(key);
  let last: Visit<K, V> = { node: root, offset: 0 };
  for (const visit of walk(ctx, root, key, 0, length)) last = visit;

  return {
    node: last.offset === length ? last.node : undefined,
    matched: last.offset,
  };
};
