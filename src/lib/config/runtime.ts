import { getEnv } from "../env/env";
import type { LogLevel } from "../logger/schema";

export interface RuntimeConfig {
  nodeEnv: "development" | "production" | "test";
  logging: {
    level: LogLevel;
  };
}

/**
 * Process-level settings derived from the environment.
 */
export const getRuntimeConfig = (): RuntimeConfig => {
  const env = getEnv();
  return {
    nodeEnv: env.NODE_ENV,
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
  };
};
