import { z } from "zod";
import { buildDynamic, lazilyValidate } from "@patricia-scan/shared";

const environmentSchema = z.object({
  BENCH_ROUNDS: z.number().int().positive().default(1000),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
