import { config as loadDotenv } from "dotenv";
import { parseEnv } from "@recall-rerank/config";
import { createRetrievalEngine } from "@recall-rerank/core";
import { ValidationError } from "@recall-rerank/errors";
import { createLogger } from "@recall-rerank/logger";
import { TavilySearchProvider } from "@recall-rerank/search";
import { runResearch } from "./research.js";

loadDotenv();

interface CliArgs {
  query: string;
  reset: boolean;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const reset = argv.includes("--reset");
  const query = argv
    .filter((arg) => arg !== "--reset")
    .join(" ")
    .trim();

  if (query === "") {
    throw new ValidationError("Usage: research [--reset] <query>", { query: "required" });
  }
  return { query, reset };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "researcher" });

  if (!config.search.tavilyApiKey) {
    throw new ValidationError("TAVILY_API_KEY is required", { TAVILY_API_KEY: "required" });
  }

  const engine = await createRetrievalEngine(config, logger);
  const searchProvider = new TavilySearchProvider({
    apiKey: config.search.tavilyApiKey,
    searchDepth: config.search.searchDepth,
    maxResults: config.search.maxResults,
    maxRetries: config.search.maxRetries,
    logger,
  });

  if (args.reset) {
    await engine.reset();
  }

  const result = await runResearch(args.query, { searchProvider, engine, logger });
  logger.info({ searched: result.searched, inserted: result.inserted }, "Research complete");
  process.stdout.write(`${result.context}\n`);
}

main().catch((err: unknown) => {
  console.error("[researcher] Fatal error:", err);
  process.exit(1);
});
