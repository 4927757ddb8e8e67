export { getEnv, parseEnv, resetEnv } from "./env";
export type { Env } from "./env";
