import { describe, expect, test } from "vitest";
import {
  createStructuredLogger,
  getLogMetrics,
  logger,
  loggerOptions,
} from "../logs";

type Sample = {
  labels: Record<string, string | number | undefined>;
  value: number;
};

const valueOf = (samples: Sample[], labels: Record<string, string>) =>
  samples.find((sample) =>
    Object.entries(labels).every(([k, v]) => sample.labels[k] === v),
  )?.value ?? 0;

const totalFor = async (labels: Record<string, string>) =>
  valueOf((await getLogMetrics().totalLogs.get()).values, labels);

const errorsFor = async (labels: Record<string, string>) =>
  valueOf((await getLogMetrics().errorLogs.get()).values, labels);

describe("logger", () => {
  test("counts messages by namespace and level", async () => {
    const before = await totalFor({ namespace: "trie", level: "warn" });

    logger.trie.warn("first");
    logger.trie.warn("second", { key: "foo" });

    expect(await totalFor({ namespace: "trie", level: "warn" })).toBe(
      before + 2,
    );
  });

  test("counts errors by type", async () => {
    const before = await errorsFor({ namespace: "bench", error_type: "RangeError" });

    logger.bench.error("boom", {}, new RangeError("out of range"));

    expect(
      await errorsFor({ namespace: "bench", error_type: "RangeError" }),
    ).toBe(before + 1);
  });
});

describe("StructuredLogger", () => {
  test("timed returns the result of the operation", () => {
    const log = createStructuredLogger("bench");
    expect(log.timed("sum", () => 2 + 3)).toBe(5);
  });

  test("timed rethrows and records the failure", async () => {
    const log = createStructuredLogger("bench");
    const before = await errorsFor({ namespace: "bench", error_type: "TypeError" });

    expect(() =>
      log.timed("explode", () => {
        throw new TypeError("bad input");
      }),
    ).toThrow("bad input");

    expect(
      await errorsFor({ namespace: "bench", error_type: "TypeError" }),
    ).toBe(before + 1);
  });
});

describe("loggerOptions", () => {
  test("logs plainly at info when NODE_ENV is unset", () => {
    expect(loggerOptions({})).toEqual({ level: "info", transport: undefined });
  });

  test("pretty-prints at debug only in development", () => {
    expect(loggerOptions({ NODE_ENV: "development" })).toMatchObject({
      level: "debug",
      transport: { target: "pino-pretty" },
    });
    expect(loggerOptions({ NODE_ENV: "production" }).transport).toBeUndefined();
  });

  test("is silent under test unless LOG_LEVEL says otherwise", () => {
    expect(loggerOptions({ NODE_ENV: "test" }).level).toBe("silent");
    expect(loggerOptions({ NODE_ENV: "test", LOG_LEVEL: "warn" }).level).toBe(
      "warn",
    );
  });
});
