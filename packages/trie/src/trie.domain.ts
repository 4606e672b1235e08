import type { ITrieMonitor, ITrieMonitorConfig } from "./monitor.domain";
import type { ISymbolSpace } from "./symbols.domain";

/**
 * Shared by the tree algorithms: how keys split into symbols, and where
 * operation counts go.
 */
export interface TrieContext<K> {
  readonly space: ISymbolSpace<K>;
  readonly monitor: ITrieMonitor;
}

/**
 * Half-open window `[start, end)` into a scanned text. A negative offset
 * counts from the end of the text; both are clamped to the text.
 */
export interface ScanWindow {
  start?: number;
  end?: number;
}

/** A window plus the value to return when nothing matches. */
export type ScanOptions<D> = ScanWindow & { default: D };

/** A stored key found at `text[start..end)`. */
export interface PrefixMatch<K, V> {
  key: K;
  value: V;
  start: number;
  end: number;
}

/** Returned in place of a match when a default was supplied. */
export interface DefaultMatch<D> {
  key: null;
  value: D;
  start: number;
  end: number;
}

export interface ITrieOptions<K, V> {
  /** Pairs loaded with `set`, in iteration order. */
  entries?: Iterable<readonly [K, V]>;
  /**
   * A monitor instance, a monitor mode, or false for none. Defaults to the
   * `TRIE_MONITOR` environment variable.
   */
  monitor?: ITrieMonitor | ITrieMonitorConfig | false;
}

/**
 * `value`, when present, is stored under the empty key. Any value counts,
 * `undefined` included.
 */
export type ITrieConfig<K, V> =
  | ITrieOptions<K, V>
  | (ITrieOptions<K, V> & { value: V });

/**
 * Dictionary access plus prefix scanning over keys of type `K`.
 */
export interface ITrie<K, V> extends Iterable<K> {
  // ===== DICTIONARY API =====

  set(key: K, value: V): this;

  /** Throws KeyNotFoundError when `key` is not stored. */
  get(key: K): V;

  /** Unsets the value of `key`; throws KeyNotFoundError when absent. */
  delete(key: K): void;

  contains(key: K): boolean;

  /** Number of stored keys, by full traversal. */
  count(): number;

  // ===== ENUMERATION API =====

  /**
   * All stored keys, or with `text` the stored keys that are prefixes of
   * the window, shortest first.
   */
  keys(): Generator<K, void, unknown>;
  keys(text: K, window?: ScanWindow): Generator<K, void, unknown>;
  values(): Generator<V, void, unknown>;
  values(text: K, window?: ScanWindow): Generator<V, void, unknown>;
  items(): Generator<[K, V], void, unknown>;
  items(text: K, window?: ScanWindow): Generator<[K, V], void, unknown>;

  keysWithPrefix(prefix: K): Generator<K, void, unknown>;
  valuesWithPrefix(prefix: K): Generator<V, void, unknown>;
  itemsWithPrefix(prefix: K): Generator<[K, V], void, unknown>;

  /** True when some path of the tree starts with `seq`. */
  isPrefix(seq: K): boolean;

  // ===== SCANNING API =====

  /** Every stored key that is a prefix of the window, shortest first. */
  allMatches(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown>;

  /** Greedy non-overlapping segmentation of the window. */
  scanLongest(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown>;

  /** Every non-empty stored key occurring anywhere in the window. */
  scanAll(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown>;
}
