import { createStructuredLogger } from "@patricia-scan/shared";
import { PatriciaTrie, type PrefixMatch } from "@patricia-scan/trie";
import { variables } from "../environment";
import type {
  IJobRunner,
  JobConfig,
  JobResult,
  Sample,
  SampleResult,
} from "./domain";

const log = createStructuredLogger("bench");

const scan = (
  trie: PatriciaTrie<number>,
  sample: Sample,
): Generator<PrefixMatch<string, number>, void, unknown> =>
  sample.mode === "longest"
    ? trie.scanLongest(sample.content)
    : trie.scanAll(sample.content);

export const processSample = (
  trie: PatriciaTrie<number>,
  sample: Sample,
): SampleResult => {
  let matches = 0;
  let total = 0;
  for (const { value } of scan(trie, sample)) {
    matches++;
    total += value;
  }
  return { content: sample.content, mode: sample.mode, matches, total };
};

export class JobRunner implements IJobRunner {
  private _rounds?: number;

  constructor(rounds?: number) {
    this._rounds = rounds;
  }

  run = (config: JobConfig): JobResult => {
    const rounds = config.rounds ?? this._rounds ?? variables.BENCH_ROUNDS;
    log.info("Starting job", { ...config.metadata, rounds });

    const trie = PatriciaTrie.from(config.entries, {
      monitor: config.monitor ?? { mode: "basic" },
    });

    // First pass checks the totals, the timed rounds only repeat the work.
    const samples = config.samples.map((sample) => {
      const result = processSample(trie, sample);
      if (result.total !== sample.expected) {
        throw new Error(
          `Sample "${sample.content}" (${sample.mode}) summed to ${result.total}, expected ${sample.expected}`,
        );
      }
      return result;
    });

    trie.monitor.reset();
    const startTime = performance.now();
    log.timed(
      `${rounds} rounds of ${config.metadata.name}`,
      () => {
        for (let round = 0; round < rounds; round++) {
          for (const sample of config.samples) processSample(trie, sample);
        }
      },
      { samples: config.samples.length },
    );

    const result: JobResult = {
      metadata: config.metadata,
      rounds,
      durationMS: performance.now() - startTime,
      samples,
      stats: trie.stats,
    };
    logJobResult(result);
    return result;
  };
}

export function logJobResult(result: JobResult) {
  log.info("Job completed", {
    name: result.metadata.name,
    rounds: result.rounds,
    durationMS: Math.round(result.durationMS * 100) / 100,
    perRoundUS:
      Math.round((result.durationMS / result.rounds) * 1000 * 100) / 100,
  });

  for (const sample of result.samples) {
    log.debug("Sample", { ...sample });
  }

  if (result.stats) {
    log.info("Trie stats", {
      ...result.stats.counters,
      splitRate: result.stats.splitRate,
      missRate: result.stats.missRate,
    });
  }
}
