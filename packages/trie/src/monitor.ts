import {
  counterTypes,
  type CounterType,
  type IStats,
  type ITrieMonitor,
  type ITrieMonitorConfig,
  type MonitorMode,
} from "./monitor.domain";

const zeroCounters = (): Record<CounterType, number> => ({
  inserts: 0,
  overwrites: 0,
  splits: 0,
  leavesCreated: 0,
  deletes: 0,
  lookups: 0,
  misses: 0,
  scans: 0,
  matches: 0,
  nodesVisited: 0,
});

// Tracked only in extended mode
const traversalCounters: ReadonlySet<CounterType> = new Set(["nodesVisited"]);

export class TrieMonitor implements ITrieMonitor {
  readonly mode: MonitorMode;
  private _counters = zeroCounters();
  private _timeStart: number | null = null;

  constructor({ mode = "basic" }: ITrieMonitorConfig = {}) {
    this.mode = mode;
  }

  increment(counter: CounterType, amount = 1): void {
    if (this.mode === "disabled") return;
    if (this.mode !== "extended" && traversalCounters.has(counter)) return;

    if (this._timeStart === null) this._timeStart = performance.now();
    this._counters[counter] += amount;
  }

  getCounters(): Record<CounterType, number> {
    return { ...this._counters };
  }

  reset(): void {
    for (const counter of counterTypes) this._counters[counter] = 0;
    this._timeStart = null;
  }

  get stats(): IStats | null {
    if (this._timeStart === null) return null;
    const counters = this.getCounters();
    const newKeys = counters.inserts;
    const exactLookups = counters.lookups;

    return {
      durationMS: performance.now() - this._timeStart,
      counters,
      splitRate: newKeys ? counters.splits / newKeys : 0,
      missRate: exactLookups ? counters.misses / exactLookups : 0,
    };
  }
}

export class NoOpTrieMonitor implements ITrieMonitor {
  readonly mode: MonitorMode = "disabled";

  increment(_counter: CounterType, _amount = 1): void {
    // No-op for maximum performance
  }

  getCounters(): Record<CounterType, number> {
    return zeroCounters();
  }

  reset(): void {
    // No-op
  }

  get stats(): IStats | null {
    return null;
  }
}
