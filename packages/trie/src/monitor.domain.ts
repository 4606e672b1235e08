export type MonitorMode = "disabled" | "basic" | "extended";

export const counterTypes = [
  "inserts",
  "overwrites",
  "splits",
  "leavesCreated",
  "deletes",
  "lookups",
  "misses",
  "scans",
  "matches",
  "nodesVisited",
] as const;

export type CounterType = (typeof counterTypes)[number];

export interface ITrieMonitorConfig {
  mode?: MonitorMode;
}

export interface IStats {
  durationMS: number;
  counters: Record<CounterType, number>;
  // Share of new keys that had to split an existing edge
  splitRate: number;
  // Share of exact lookups (get, contains, delete) that found nothing
  missRate: number;
}

/**
 * Counts trie operations. Implementations must be synchronous and cheap:
 * `increment` sits on every mutation and, in extended mode, every edge hop.
 */
export interface ITrieMonitor {
  readonly mode: MonitorMode;

  increment(counter: CounterType, amount?: number): void;

  getCounters(): Record<CounterType, number>;

  reset(): void;

  /** Null until the first counted operation. */
  readonly stats: IStats | null;
}

export function isITrieMonitor(
  obj: ITrieMonitor | ITrieMonitorConfig,
): obj is ITrieMonitor {
  return "increment" in obj && typeof obj.increment === "function";
}
