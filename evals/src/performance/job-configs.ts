import { readFileSync } from "node:fs";
import { z } from "zod";
import type { JobConfig } from "../harness";

const numberWords = z
  .record(z.string(), z.number())
  .parse(
    JSON.parse(
      readFileSync(new URL("./number-words.json", import.meta.url), "utf8"),
    ),
  );

export const PERFORMANCE_JOBS: JobConfig[] = [
  {
    metadata: {
      name: "Greedy",
      description: "Leftmost-longest segmentation of number words.",
    },
    entries: numberWords,
    samples: [
      { content: "seventeen cats met forty two dogs", mode: "longest", expected: 59 },
      { content: "thirteen hundred", mode: "longest", expected: 113 },
    ],
  },
  {
    metadata: {
      name: "All matches",
      description: "Every number word at every offset, overlaps included.",
    },
    entries: numberWords,
    samples: [
      { content: "eighteen hundred", mode: "all", expected: 126 },
      { content: "sixteen", mode: "all", expected: 22 },
    ],
  },
  {
    metadata: {
      name: "Extended monitor",
      description: "Greedy segmentation with per-node visit counting.",
    },
    entries: numberWords,
    monitor: { mode: "extended" },
    samples: [
      { content: "ninety nine thousand", mode: "longest", expected: 1099 },
    ],
  },
];
