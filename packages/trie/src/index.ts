export { Trie, PatriciaTrie, SequenceTrie } from "./trie";
export type { IPatriciaTrieConfig } from "./trie";
export { KeyNotFoundError } from "./errors";
export { TrieMonitor, NoOpTrieMonitor } from "./monitor";
export { counterTypes } from "./monitor.domain";
export type {
  CounterType,
  IStats,
  ITrieMonitor,
  ITrieMonitorConfig,
  MonitorMode,
} from "./monitor.domain";
export { StringSymbols, SequenceSymbols } from "./symbols";
export type { ISymbolSpace } from "./symbols.domain";
export type {
  DefaultMatch,
  ITrie,
  ITrieConfig,
  ITrieOptions,
  PrefixMatch,
  ScanOptions,
  ScanWindow,
} from "./trie.domain";
