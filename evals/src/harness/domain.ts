import type { IStats, ITrieMonitorConfig } from "@patricia-scan/trie";

export type ScanMode = "longest" | "all";

export interface Sample {
  content: string;
  mode: ScanMode;
  /** Sum of the values of every reported match */
  expected: number;
}

export interface JobConfig {
  metadata: { name: string; description: string };
  entries: Readonly<Record<string, number>>;
  samples: Sample[];
  monitor?: ITrieMonitorConfig;
  rounds?: number;
}

export interface SampleResult {
  content: string;
  mode: ScanMode;
  matches: number;
  total: number;
}

export interface JobResult {
  metadata: JobConfig["metadata"];
  rounds: number;
  durationMS: number;
  samples: SampleResult[];
  stats: IStats | null;
}

export interface IJobRunner {
  run(config: JobConfig): JobResult;
}
