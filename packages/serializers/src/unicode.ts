/**
 * Converts text to and from symbol sequences so sequence tries can be keyed
 * by code points or UTF-8 bytes instead of UTF-16 code units.
 */
export class Unicode {
  /**
   * Convert a text string into an array of Unicode codepoints
   * Each codepoint is a number that represents one logical character
   */
  static fromString(text: string): number[] {
    const codepoints: number[] = [];
    for (const char of text) {
      const cp = char.codePointAt(0);
      if (cp !== undefined) codepoints.push(cp);
    }
    return codepoints;
  }

  /**
   * Convert an array of Unicode codepoints back to a string
   */
  static toString(codepoints: readonly number[]): string {
    let out = "";
    // chunked to stay under the engine's argument limit on long sequences
    for (let i = 0; i < codepoints.length; i += 4096) {
      out += String.fromCodePoint(...codepoints.slice(i, i + 4096));
    }
    return out;
  }

  /** UTF-8 bytes of `text`. */
  static toUtf8Bytes(text: string): number[] {
    return Array.from(new TextEncoder().encode(text));
  }

  static fromUtf8Bytes(bytes: readonly number[]): string {
    return new TextDecoder().decode(Uint8Array.from(bytes));
  }
}
