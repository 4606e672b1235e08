import { describe, expect, test } from "vitest";
import { KeyNotFoundError, NoOpTrieMonitor, StringSymbols } from "..";
import { insert, remove } from "../mutator";
import { TrieNode } from "../node";
import type { TrieContext } from "../trie.domain";

const ctx: TrieContext<string> = {
  space: StringSymbols,
  monitor: new NoOpTrieMonitor(),
};

const labels = (node: TrieNode<string, number>) =>
  Array.from(node.edges.values(), (edge) => edge.label);

const edgeTo = (node: TrieNode<string, number>, label: string) => {
  const edge = node.findEdge(label.charCodeAt(0));
  if (edge === undefined || edge.label !== label) {
    throw new Error(`no edge ${label}`);
  }
  return edge.child;
};

/** Labels non-empty, keyed by their first symbol, branch-only nodes fork. */
const checkInvariants = (node: TrieNode<string, number>, isRoot = true) => {
  if (!isRoot && !node.isTerminal) expect(node.degree).toBeGreaterThan(1);
  for (const [symbol, edge] of node.edges) {
    expect(edge.label.length).toBeGreaterThan(0);
    expect(edge.label.charCodeAt(0)).toBe(symbol);
    checkInvariants(edge.child, false);
  }
};

describe("insert", () => {
  test("hangs a new key as a single leaf edge", () => {
    const root = new TrieNode<string, number>();
    const leaf = insert(ctx, root, "baar", 2);

    expect(labels(root)).toEqual(["baar"]);
    expect(leaf.slot).toEqual({ kind: "present", value: 2 });
  });

  test("descends whole labels and splits at divergence", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "baar", 2);
    insert(ctx, root, "baarhus", 3);
    insert(ctx, root, "bazar", 4);

    expect(labels(root)).toEqual(["ba"]);
    const branch = edgeTo(root, "ba");
    expect(branch.isTerminal).toBe(false);
    expect(labels(branch)).toEqual(["ar", "zar"]);
    expect(labels(edgeTo(branch, "ar"))).toEqual(["hus"]);
    checkInvariants(root);
  });

  test("splits when the key ends inside a label", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "foobar", 2);
    const node = insert(ctx, root, "foo", 1);

    expect(labels(root)).toEqual(["foo"]);
    expect(edgeTo(root, "foo")).toBe(node);
    expect(labels(node)).toEqual(["bar"]);
    expect(node.slot).toEqual({ kind: "present", value: 1 });
  });

  test("reuses an existing branch node for a key ending on it", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "bar", 1);
    insert(ctx, root, "baz", 2);
    const branch = edgeTo(root, "ba");

    const node = insert(ctx, root, "ba", 3);

    expect(node).toBe(branch);
    expect(labels(root)).toEqual(["ba"]);
    expect(labels(branch)).toEqual(["r", "z"]);
    expect(branch.slot).toEqual({ kind: "present", value: 3 });
  });

  test("stores the empty key on the root", () => {
    const root = new TrieNode<string, number>();
    expect(insert(ctx, root, "", 0)).toBe(root);
    expect(root.degree).toBe(0);
  });

  test("keeps the tree compressed under many inserts", () => {
    const root = new TrieNode<string, number>();
    const words = ["romane", "romanus", "romulus", "rubens", "ruber", "rubicon", "rubicundus"];
    words.forEach((word, i) => insert(ctx, root, word, i));

    expect(labels(root)).toEqual(["r"]);
    expect(labels(edgeTo(root, "r"))).toEqual(["om", "ub"]);
    checkInvariants(root);
  });
});

describe("remove", () => {
  test("unsets the value and leaves the node in place", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "abc", 1);
    const leaf = edgeTo(root, "abc");

    expect(remove(ctx, root, "abc")).toBe(leaf);
    expect(leaf.isTerminal).toBe(false);
    expect(labels(root)).toEqual(["abc"]);
  });

  test("keeps children of the removed node", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "ab", 1);
    insert(ctx, root, "abc", 2);

    const node = remove(ctx, root, "ab");
    expect(labels(node)).toEqual(["c"]);
  });

  test("fails on missing keys and branch points", () => {
    const root = new TrieNode<string, number>();
    insert(ctx, root, "bar", 1);
    insert(ctx, root, "baz", 2);

    expect(() => remove(ctx, root, "ba")).toThrow(KeyNotFoundError);
    expect(() => remove(ctx, root, "bars")).toThrow(
      "Key not found: 'bars' (matched 'bar')",
    );
    expect(() => remove(ctx, root, "")).toThrow(KeyNotFoundError);
  });
});
