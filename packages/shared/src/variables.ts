import { z } from "zod";
import { buildDynamic, lazilyValidate } from "./environment";

const pinoLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const environmentSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z.enum(pinoLevels).optional(),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema)
);
