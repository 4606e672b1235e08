import { KeyNotFoundError } from "./errors";
import { lookup } from "./matcher";
import { ABSENT, TrieNode, present, type Edge } from "./node";
import type { TrieContext } from "./trie.domain";

/**
 * Store `value` under `key`, splitting edges so that labels stay maximally
 * merged. Returns the node now holding the value.
 */
export const insert = <K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  key: K,
  value: V,
): TrieNode<K, V> => {
  const { space, monitor } = ctx;
  const keyLength = space.length(key);
  let node = root;
  let offset = 0;

  while (offset < keyLength) {
    const symbol = space.symbolAt(key, offset);
    const edge = node.findEdge(symbol);

    if (edge === undefined) {
      // nothing shares the leading symbol: hang the rest of the key as a leaf
      const leaf = new TrieNode<K, V>(present(value));
      node.setEdge(symbol, { label: space.slice(key, offset), child: leaf });
      monitor.increment("leavesCreated");
      monitor.increment("inserts");
      return leaf;
    }

    const shared = space.commonPrefixLength(edge.label, key, offset, keyLength);
    if (shared < space.length(edge.label)) {
      node = split(ctx, node, symbol, edge, shared);
    } else {
      node = edge.child;
    }
    offset += shared;
  }

  monitor.increment(node.isTerminal ? "overwrites" : "inserts");
  node.slot = present(value);
  return node;
};

/**
 * Replace `edge` (leaving `parent` under `symbol`) by `label[:at]` into a
 * new branch node that holds `label[at:]` into the old child. `at` lies
 * strictly inside the label. Returns the new branch node.
 */
const split = <K, V>(
  { space, monitor }: TrieContext<K>,
  parent: TrieNode<K, V>,
  symbol: number,
  edge: Edge<K, V>,
  at: number,
): TrieNode<K, V> => {
  const branch = new TrieNode<K, V>();
  branch.setEdge(space.symbolAt(edge.label, at), {
    label: space.slice(edge.label, at),
    child: edge.child,
  });
  parent.setEdge(symbol, { label: space.slice(edge.label, 0, at), child: branch });
  monitor.increment("splits");
  return branch;
};

/**
 * Unset the value stored under `key`. Nodes and edges are left in place,
 * so a removed leaf stays in the tree as a dead branch.
 */
export const remove = <K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  key: K,
): TrieNode<K, V> => {
  const { node, matched } = lookup(ctx, root, key);
  ctx.monitor.increment("lookups");

  if (node === undefined || !node.isTerminal) {
    ctx.monitor.increment("misses");
    throw new KeyNotFoundError(key, ctx.space.slice(key, 0, matched));
  }

  node.slot = ABSENT;
  ctx.monitor.increment("deletes");
  return node;
};
