import type { TrieNode } from "./node";
import type { TrieContext } from "./trie.domain";

interface Frame<K, V> {
  node: TrieNode<K, V>;
  path: K;
}

/**
 * Depth-first `[key, value]` pairs of every stored key under `node`, whose
 * path from the root is `seed`. Values precede their descendants; siblings
 * follow edge insertion order. Runs on an explicit stack.
 */
export function* entries<K, V>(
  { space }: TrieContext<K>,
  node: TrieNode<K, V>,
  seed: K,
): Generator<[K, V], void, unknown> {
  const stack: Frame<K, V>[] = [{ node, path: seed }];

  let frame: Frame<K, V> | undefined;
  while ((frame = stack.pop()) !== undefined) {
    const { node: current, path } = frame;
    if (current.slot.kind === "present") yield [path, current.slot.value];

    // reversed so the first edge is popped first
    const edges = Array.from(current.edges.values());
    for (let i = edges.length - 1; i >= 0; i--) {
      const { label, child } = edges[i];
      stack.push({ node: child, path: space.concat([path, label]) });
    }
  }
}

/** Values under `node`, in the order of `entries`, without building keys. */
export function* values<K, V>(
  node: TrieNode<K, V>,
): Generator<V, void, unknown> {
  for (const terminal of terminals(node)) {
    if (terminal.slot.kind === "present") yield terminal.slot.value;
  }
}

/** Number of stored keys under `node`. */
export const count = <K, V>(node: TrieNode<K, V>): number => {
  let n = 0;
  for (const _ of terminals(node)) n++;
  return n;
};

function* terminals<K, V>(
  node: TrieNode<K, V>,
): Generator<TrieNode<K, V>, void, unknown> {
  const stack: TrieNode<K, V>[] = [node];

  let current: TrieNode<K, V> | undefined;
  while ((current = stack.pop()) !== undefined) {
    if (current.isTerminal) yield current;
    const edges = Array.from(current.edges.values());
    for (let i = edges.length - 1; i >= 0; i--) stack.push(edges[i].child);
  }
}

export interface Descent<K, V> {
  /** Node whose subtree holds exactly the keys starting with the prefix. */
  node: TrieNode<K, V>;
  /** Full path to `node`; the prefix, possibly extended by a label tail. */
  path: K;
}

/**
 * Follow `prefix` down the tree. The last edge may run past the prefix as
 * long as it agrees with it where they overlap. Undefined when no path
 * spells the prefix.
 */
export const descend = <K, V>(
  { space }: TrieContext<K>,
  root: TrieNode<K, V>,
  prefix: K,
): Descent<K, V> | undefined => {
  const length = space.length(prefix);
  let node = root;
  let offset = 0;

  while (offset < length) {
    const edge = node.findEdge(space.symbolAt(prefix, offset));
    if (edge === undefined) return undefined;

    const labelLength = space.length(edge.label);
    const overlap = Math.min(labelLength, length - offset);
    if (space.commonPrefixLength(edge.label, prefix, offset, length) < overlap) {
      return undefined;
    }

    if (overlap < labelLength) {
      return {
        node: edge.child,
        path: space.concat([prefix, space.slice(edge.label, overlap)]),
      };
    }

    node = edge.child;
    offset += labelLength;
  }

  return { node, path: prefix };
};
