import { walk } from "./matcher";
import type { TrieNode } from "./node";
import type { PrefixMatch, ScanWindow, TrieContext } from "./trie.domain";

export interface ResolvedWindow {
  start: number;
  end: number;
}

const clampOffset = (offset: number, length: number): number =>
  offset < 0 ? Math.max(0, length + offset) : Math.min(offset, length);

/**
 * Resolve a window against a text of `length` symbols. Negative offsets
 * count from the end; an end before the start yields an empty window.
 */
export const resolveWindow = (
  length: number,
  { start = 0, end = length }: ScanWindow = {},
): ResolvedWindow => {
  const from = clampOffset(start, length);
  return { start: from, end: Math.max(from, clampOffset(end, length)) };
};

/**
 * Every stored key that is a prefix of `text[start..end)`, shortest first.
 * A value on the root counts as an empty match at `start`.
 */
export function* allMatches<K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  text: K,
  { start, end }: ResolvedWindow,
): Generator<PrefixMatch<K, V>, void, unknown> {
  ctx.monitor.increment("scans");

  for (const { node, offset } of walk(ctx, root, text, start, end)) {
    if (node.slot.kind === "absent") continue;
    ctx.monitor.increment("matches");
    yield {
      key: ctx.space.slice(text, start, offset),
      value: node.slot.value,
      start,
      end: offset,
    };
  }
}

export interface LongestMatch<K, V> {
  match: PrefixMatch<K, V> | undefined;
  /** Offset the walk reached, matched or not. */
  reached: number;
}

/** The longest stored key that is a prefix of `text[start..end)`. */
export const longestMatch = <K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  text: K,
  { start, end }: ResolvedWindow,
): LongestMatch<K, V> => {
  ctx.monitor.increment("scans");

  let best: { offset: number; value: V } | undefined;
  let reached = start;
  for (const { node, offset } of walk(ctx, root, text, start, end)) {
    reached = offset;
    if (node.slot.kind === "present") best = { offset, value: node.slot.value };
  }

  if (best === undefined) return { match: undefined, reached };

  ctx.monitor.increment("matches");
  return {
    match: {
      key: ctx.space.slice(text, start, best.offset),
      value: best.value,
      start,
      end: best.offset,
    },
    reached,
  };
};

/**
 * Greedy left-to-right segmentation: report the longest non-empty key at
 * the current offset and resume after it, or step one symbol on a miss.
 */
export function* scanLongest<K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  text: K,
  { start, end }: ResolvedWindow,
): Generator<PrefixMatch<K, V>, void, unknown> {
  let offset = start;
  while (offset < end) {
    let best: PrefixMatch<K, V> | undefined;
    for (const match of allMatches(ctx, root, text, { start: offset, end })) {
      if (match.end > match.start) best = match;
    }

    if (best === undefined) {
      offset++;
    } else {
      yield best;
      offset = best.end;
    }
  }
}

/** Non-empty stored keys anywhere in the window, by start then length. */
export function* scanAll<K, V>(
  ctx: TrieContext<K>,
  root: TrieNode<K, V>,
  text: K,
  { start, end }: ResolvedWindow,
): Generator<PrefixMatch<K, V>, void, unknown> {
  for (let offset = start; offset < end; offset++) {
    for (const match of allMatches(ctx, root, text, { start: offset, end })) {
      if (match.end > match.start) yield match;
    }
  }
}
