import { inspect } from "node:util";
import type { ISymbolSpace } from "./symbols.domain";

/** Strings, one symbol per UTF-16 code unit. */
export const StringSymbols: ISymbolSpace<string> = {
  empty: "",

  length: (seq) => seq.length,

  symbolAt: (seq, index) => seq.charCodeAt(index),

  slice: (seq, start, end) => seq.slice(start, end),

  concat: (parts) => parts.join(""),

  commonPrefixLength: (label, seq, offset, end) => {
    const limit = Math.min(label.length, end - offset);
    let k = 0;
    while (k < limit && label.charCodeAt(k) === seq.charCodeAt(offset + k)) {
      k++;
    }
    return k;
  },

  matchesAt: (seq, offset, end, label) =>
    offset + label.length <= end && seq.startsWith(label, offset),

  inspect: (seq) => inspect(seq),
};

// SameValueZero, the equality `Map` uses for edge keys.
const sameSymbol = (a: number, b: number): boolean =>
  a === b || (Number.isNaN(a) && Number.isNaN(b));

/** Integer sequences: bytes, code points or any other numeric alphabet. */
export const SequenceSymbols: ISymbolSpace<readonly number[]> = {
  empty: [],

  length: (seq) => seq.length,

  symbolAt: (seq, index) => seq[index],

  slice: (seq, start, end) => seq.slice(start, end),

  concat: (parts) => parts.flat(),

  commonPrefixLength: (label, seq, offset, end) => {
    const limit = Math.min(label.length, end - offset);
    let k = 0;
    while (k < limit && sameSymbol(label[k], seq[offset + k])) k++;
    return k;
  },

  matchesAt: (seq, offset, end, label) => {
    const L = label.length;
    if (offset + L > end) return false;
    for (let j = 0; j < L; j++) {
      if (!sameSymbol(label[j], seq[offset + j])) return false;
    }
    return true;
  },

  inspect: (seq) => inspect(seq),
};
