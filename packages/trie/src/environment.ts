import { z } from "zod";
import { buildDynamic, lazilyValidate } from "@patricia-scan/shared";

const environmentSchema = z.object({
  TRIE_MONITOR: z.enum(["disabled", "basic", "extended"]).default("disabled"),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
