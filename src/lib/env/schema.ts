import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

export const envSchema = v.object({
  // Runtime
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "production"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),
});

export type Env = v.InferOutput<typeof envSchema>;
