import { inspect } from "node:util";

/**
 * Raised when an exact key is absent, or when no stored key is a prefix of
 * a scanned window and no default was supplied.
 */
export class KeyNotFoundError<K = unknown> extends Error {
  override readonly name = "KeyNotFoundError";

  /** Window offset of a failed scan; undefined for exact-key lookups. */
  readonly start: number | undefined;

  /**
   * @param key the queried key; for a failed scan, the matched prefix of
   *   the window
   * @param matched the longest prefix of `key` consumed by the tree before
   *   the lookup stopped
   */
  constructor(
    readonly key: K,
    readonly matched: K,
    start?: number,
  ) {
    super(
      start === undefined
        ? `Key not found: ${inspect(key)} (matched ${inspect(matched)})`
        : `No key matches at offset ${start} (matched ${inspect(matched)})`,
    );
    this.start = start;
  }
}
