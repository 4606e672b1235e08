/**
 * A symbol space describes how keys of type `K` decompose into atomic
 * symbols. Every symbol is reduced to an integer so that a node can index
 * its edges by their leading symbol.
 */
export interface ISymbolSpace<K> {
  /** The empty key. */
  readonly empty: K;

  length(seq: K): number;

  /** Integer form of the symbol at `index`. */
  symbolAt(seq: K, index: number): number;

  slice(seq: K, start: number, end?: number): K;

  concat(parts: readonly K[]): K;

  /**
   * Number of leading symbols `label` shares with `seq[offset..end)`.
   */
  commonPrefixLength(label: K, seq: K, offset: number, end: number): number;

  /**
   * True when the whole of `label` fits inside `seq[offset..end)` and
   * equals it there.
   */
  matchesAt(seq: K, offset: number, end: number, label: K): boolean;

  /** Debug rendering of a key. */
  inspect(seq: K): string;
}
