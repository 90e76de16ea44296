import { z } from "zod";
import { buildDynamic, lazilyValidate } from "@sfx/shared";
import { MAX_ADDRESSABLE_STATES } from "./arena";

const environmentSchema = z.object({
  SFX_MAX_STATES: z
    .number()
    .int()
    .positive()
    .max(MAX_ADDRESSABLE_STATES)
    .default(MAX_ADDRESSABLE_STATES),
  SFX_QUERY_CACHE_SIZE: z.number().int().nonnegative().default(1024),
  SFX_MONITOR_MODE: z
    .enum(["disabled", "performance-only", "extended"])
    .default("disabled"),
  SFX_MONITOR_BATCH_SIZE: z.number().int().positive().default(1000),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema)
);
