/**
 * Property names that carry backend credentials. Search, embedding and
 * rerank clients all log their configuration at startup.
 */
const SECRET_KEYS = [
  "apiKey",
  "api_key",
  "token",
  "authorization",
  "tavilyApiKey",
  "qdrantApiKey",
] as const;

/**
 * Paths for pino's `redact` option: each key at the top level and one level down
 * (e.g. `cohere.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [...SECRET_KEYS, ...SECRET_KEYS.map((key) => `*.${key}`)];

export const REDACTED = "[REDACTED]";
