import * as v from "valibot";

import { type Env, envSchema } from "./schema";

export const parseEnv = (): Env => {
  try {
    return v.parse(envSchema, process.env);
  } catch (error) {
    if (v.isValiError(error)) {
      console.error("Environment variable validation failed:");
      for (const issue of error.issues) {
        const path = issue.path?.map((item) => String(item.key)).join(".") ?? "(root)";
        console.error(`  - ${path}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

/** Drop the cached environment so the next `getEnv` re-reads `process.env`. */
export const resetEnv = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
