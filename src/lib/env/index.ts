export { getEnv, parseEnv, resetEnv, type Env, type EnvSource } from "./env";
