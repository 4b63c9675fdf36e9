import type { EmbeddingProviderType } from "@recall-rerank/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  /** Vector size shared by whichever provider is selected; the collection is bound to it. */
  dimensions?: number;
  cohere?: Omit<CohereProviderConfig, "dimensions">;
  bgeM3Url?: string;
}

type ProviderBuilder = (config: EmbeddingFactoryConfig) => IEmbeddingProvider;

const builders: Record<EmbeddingProviderType, ProviderBuilder> = {
  cohere: ({ cohere, dimensions }) => {
    if (!cohere?.apiKey) {
      throw new Error("A Cohere API key is required for the 'cohere' embedding provider");
    }
    return new CohereEmbeddingProvider({ ...cohere, dimensions });
  },
  "bge-m3": ({ bgeM3Url, dimensions }) => {
    if (!bgeM3Url) {
      throw new Error("bgeM3Url is required for the 'bge-m3' embedding provider");
    }
    return new BgeM3EmbeddingProvider({ baseUrl: bgeM3Url, dimensions });
  },
};

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const build = Object.hasOwn(builders, config.provider) ? builders[config.provider] : undefined;
  if (!build) {
    throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
  return build(config);
}
