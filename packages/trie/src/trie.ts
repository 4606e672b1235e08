import { inspect } from "node:util";
import { logger } from "@patricia-scan/shared";
import { variables } from "./environment";
import { KeyNotFoundError } from "./errors";
import { count, descend, entries, values } from "./enumerator";
import { lookup } from "./matcher";
import { NoOpTrieMonitor, TrieMonitor } from "./monitor";
import {
  isITrieMonitor,
  type IStats,
  type ITrieMonitor,
  type ITrieMonitorConfig,
} from "./monitor.domain";
import { insert, remove } from "./mutator";
import { TrieNode, present } from "./node";
import {
  allMatches,
  longestMatch,
  resolveWindow,
  scanAll,
  scanLongest,
  type ResolvedWindow,
} from "./scanner";
import { SequenceSymbols, StringSymbols } from "./symbols";
import type { ISymbolSpace } from "./symbols.domain";
import type {
  DefaultMatch,
  ITrie,
  ITrieConfig,
  ITrieOptions,
  PrefixMatch,
  ScanOptions,
  ScanWindow,
  TrieContext,
} from "./trie.domain";

const resolveMonitor = (
  option: ITrieMonitor | ITrieMonitorConfig | false | undefined,
): ITrieMonitor => {
  if (option === false) return new NoOpTrieMonitor();
  if (option !== undefined && isITrieMonitor(option)) return option;

  const mode = option?.mode ?? variables.TRIE_MONITOR;
  return mode === "disabled" ? new NoOpTrieMonitor() : new TrieMonitor({ mode });
};

const isDefaultMatch = <K, V, D>(
  found: PrefixMatch<K, V> | DefaultMatch<D>,
): found is DefaultMatch<D> => found.key === null;

/**
 * PATRICIA trie over keys of type `K`.
 *
 * Deletion only unsets values: nodes stay in place, so heavy delete
 * traffic leaves dead branches behind. Rebuild with
 * `new PatriciaTrie({ entries: old.items() })` to compact.
 *
 * Longest-match accessors (`longestMatch`, `item`, `key`, `value`) throw
 * `KeyNotFoundError` on a miss unless a `default` is supplied, in which
 * case the miss result is the pair `[null, default]`: `item` returns it,
 * `key` and `value` return its halves.
 */
export class Trie<K extends {}, V> implements ITrie<K, V> {
  protected readonly _root = new TrieNode<K, V>();
  protected readonly _ctx: TrieContext<K>;

  constructor(
    space: ISymbolSpace<K>,
    config: ITrieConfig<K, V> = {},
  ) {
    this._ctx = { space, monitor: resolveMonitor(config.monitor) };

    if ("value" in config) this._root.slot = present(config.value);
    if (config.entries !== undefined) this._load(config.entries);
  }

  private _load(source: Iterable<readonly [K, V]>): void {
    let loaded = 0;
    for (const [key, value] of source) {
      this.set(key, value);
      loaded++;
    }
    logger.trie.debug("Bulk-loaded trie", { entries: loaded });
  }

  get monitor(): ITrieMonitor {
    return this._ctx.monitor;
  }

  get stats(): IStats | null {
    return this._ctx.monitor.stats;
  }

  // ---- Dictionary API ----

  set(key: K, value: V): this {
    insert(this._ctx, this._root, key, value);
    return this;
  }

  get(key: K): V {
    const { space, monitor } = this._ctx;
    const { node, matched } = lookup(this._ctx, this._root, key);
    monitor.increment("lookups");

    if (node === undefined || node.slot.kind === "absent") {
      monitor.increment("misses");
      throw new KeyNotFoundError(key, space.slice(key, 0, matched));
    }
    return node.slot.value;
  }

  delete(key: K): void {
    const node = remove(this._ctx, this._root, key);
    if (node.degree === 0 && node !== this._root) {
      logger.trie.debug("Deleted key left a dead leaf", {
        keyLength: this._ctx.space.length(key),
      });
    }
  }

  contains(key: K): boolean {
    const { monitor } = this._ctx;
    const { node } = lookup(this._ctx, this._root, key);
    monitor.increment("lookups");

    const found = node !== undefined && node.isTerminal;
    if (!found) monitor.increment("misses");
    return found;
  }

  has(key: K): boolean {
    return this.contains(key);
  }

  count(): number {
    return count(this._root);
  }

  // ---- Enumeration API ----

  keys(): Generator<K, void, unknown>;
  keys(text: K, window?: ScanWindow): Generator<K, void, unknown>;
  *keys(text?: K, window?: ScanWindow): Generator<K, void, unknown> {
    for (const [key] of this._pairs(text, window)) yield key;
  }

  values(): Generator<V, void, unknown>;
  values(text: K, window?: ScanWindow): Generator<V, void, unknown>;
  *values(text?: K, window?: ScanWindow): Generator<V, void, unknown> {
    if (text === undefined) {
      yield* values(this._root);
      return;
    }
    for (const match of this.allMatches(text, window)) yield match.value;
  }

  items(): Generator<[K, V], void, unknown>;
  items(text: K, window?: ScanWindow): Generator<[K, V], void, unknown>;
  items(text?: K, window?: ScanWindow): Generator<[K, V], void, unknown> {
    return this._pairs(text, window);
  }

  private *_pairs(
    text: K | undefined,
    window: ScanWindow | undefined,
  ): Generator<[K, V], void, unknown> {
    if (text === undefined) {
      yield* entries(this._ctx, this._root, this._ctx.space.empty);
      return;
    }
    for (const { key, value } of this.allMatches(text, window)) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): Iterator<K> {
    return this.keys();
  }

  *keysWithPrefix(prefix: K): Generator<K, void, unknown> {
    for (const [key] of this.itemsWithPrefix(prefix)) yield key;
  }

  *valuesWithPrefix(prefix: K): Generator<V, void, unknown> {
    const found = descend(this._ctx, this._root, prefix);
    if (found !== undefined) yield* values(found.node);
  }

  *itemsWithPrefix(prefix: K): Generator<[K, V], void, unknown> {
    const found = descend(this._ctx, this._root, prefix);
    if (found !== undefined) yield* entries(this._ctx, found.node, found.path);
  }

  isPrefix(seq: K): boolean {
    return descend(this._ctx, this._root, seq) !== undefined;
  }

  // ---- Scanning API ----

  private _window(text: K, window?: ScanWindow): ResolvedWindow {
    return resolveWindow(this._ctx.space.length(text), window);
  }

  allMatches(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown> {
    return allMatches(this._ctx, this._root, text, this._window(text, window));
  }

  scanLongest(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown> {
    return scanLongest(this._ctx, this._root, text, this._window(text, window));
  }

  scanAll(
    text: K,
    window?: ScanWindow,
  ): Generator<PrefixMatch<K, V>, void, unknown> {
    return scanAll(this._ctx, this._root, text, this._window(text, window));
  }

  /**
   * The longest stored key that is a prefix of the window. An empty-key
   * value always matches, with length zero.
   */
  longestMatch<D>(
    text: K,
    options: ScanOptions<D>,
  ): PrefixMatch<K, V> | DefaultMatch<D>;
  longestMatch(text: K, options?: ScanWindow): PrefixMatch<K, V>;
  longestMatch<D>(
    text: K,
    options: ScanWindow | ScanOptions<D> = {},
  ): PrefixMatch<K, V> | DefaultMatch<D> {
    return this._longest(text, options);
  }

  item<D>(text: K, options: ScanOptions<D>): [K, V] | [null, D];
  item(text: K, options?: ScanWindow): [K, V];
  item<D>(
    text: K,
    options: ScanWindow | ScanOptions<D> = {},
  ): [K, V] | [null, D] {
    return this._item(text, options);
  }

  key<D>(text: K, options: ScanOptions<D>): K | null;
  key(text: K, options?: ScanWindow): K;
  key<D>(text: K, options: ScanWindow | ScanOptions<D> = {}): K | null {
    return this._item(text, options)[0];
  }

  value<D>(text: K, options: ScanOptions<D>): V | D;
  value(text: K, options?: ScanWindow): V;
  value<D>(text: K, options: ScanWindow | ScanOptions<D> = {}): V | D {
    return this._item(text, options)[1];
  }

  private _longest<D>(
    text: K,
    options: ScanWindow | ScanOptions<D>,
  ): PrefixMatch<K, V> | DefaultMatch<D> {
    const window = this._window(text, options);
    const { match, reached } = longestMatch(this._ctx, this._root, text, window);
    if (match !== undefined) return match;

    if ("default" in options) {
      return {
        key: null,
        value: options.default,
        start: window.start,
        end: window.start,
      };
    }
    const matched = this._ctx.space.slice(text, window.start, reached);
    throw new KeyNotFoundError(matched, matched, window.start);
  }

  private _item<D>(
    text: K,
    options: ScanWindow | ScanOptions<D>,
  ): [K, V] | [null, D] {
    const found = this._longest(text, options);
    return isDefaultMatch(found)
      ? [null, found.value]
      : [found.key, found.value];
  }

  toString(): string {
    const { space } = this._ctx;
    const body = Array.from(
      this.items(),
      ([key, value]) => `${space.inspect(key)}: ${inspect(value)}`,
    ).join(", ");
    return `${this.constructor.name}({${body}})`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

interface IPatriciaTrieOptions<V>
  extends Omit<ITrieOptions<string, V>, "entries"> {
  entries?: Iterable<readonly [string, V]> | Readonly<Record<string, V>>;
}

export type IPatriciaTrieConfig<V> =
  | IPatriciaTrieOptions<V>
  | (IPatriciaTrieOptions<V> & { value: V });

const isIterable = <T>(obj: Iterable<T> | object): obj is Iterable<T> =>
  Symbol.iterator in obj;

/** Trie over strings, one symbol per UTF-16 code unit. */
export class PatriciaTrie<V> extends Trie<string, V> {
  constructor(config: IPatriciaTrieConfig<V> = {}) {
    const { entries } = config;
    super(StringSymbols, {
      ...config,
      entries:
        entries === undefined || isIterable(entries)
          ? entries
          : Object.entries(entries),
    });
  }

  static from<V>(
    entries: Iterable<readonly [string, V]> | Readonly<Record<string, V>>,
    config: IPatriciaTrieConfig<V> = {},
  ): PatriciaTrie<V> {
    return new PatriciaTrie<V>({ ...config, entries });
  }
}

/** Trie over integer sequences such as bytes or code points. */
export class SequenceTrie<V> extends Trie<readonly number[], V> {
  constructor(config: ITrieConfig<readonly number[], V> = {}) {
    super(SequenceSymbols, config);
  }

  static from<V>(
    entries: Iterable<readonly [readonly number[], V]>,
    config: ITrieConfig<readonly number[], V> = {},
  ): SequenceTrie<V> {
    return new SequenceTrie<V>({ ...config, entries });
  }
}
