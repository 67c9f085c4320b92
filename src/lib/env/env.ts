import * as v from "valibot";

import { ConfigError } from "../errors/errors";

import { type Env, envSchema } from "./schema";

export type EnvSource = Record<string, string | undefined>;

export const parseEnv = (source: EnvSource = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    throw new ConfigError(
      "Environment variable validation failed",
      result.issues.map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`),
    );
  }
  return result.output;
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

/** Drops the cached environment so the next getEnv() parses process.env again. */
export const resetEnv = (): void => {
  cachedEnv = undefined;
};

// Re-export types
export type { Env } from "./schema";
