import type { RerankerType } from "@recall-rerank/types";
import type { IReranker } from "./reranker.interface.js";
import { CohereReranker } from "./cohere-reranker.js";
import type { CohereRerankerConfig } from "./cohere-reranker.js";
import { BgeReranker } from "./bge-reranker.js";
import type { BgeRerankerConfig } from "./bge-reranker.js";

export interface RerankerFactoryConfig {
  provider: RerankerType;
  cohere?: CohereRerankerConfig;
  bge?: BgeRerankerConfig;
}

export function createReranker(config: RerankerFactoryConfig): IReranker {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when reranker is 'cohere'");
      }
      return new CohereReranker(config.cohere);
    case "bge":
      if (!config.bge) {
        throw new Error("BGE config is required when reranker is 'bge'");
      }
      return new BgeReranker(config.bge);
    default:
      throw new Error(`Unknown reranker: ${String(config.provider)}`);
  }
}
