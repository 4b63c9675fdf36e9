export { parseEnv, envSchema, DEFAULT_NO_RESULTS_SENTINEL } from "./env.js";
