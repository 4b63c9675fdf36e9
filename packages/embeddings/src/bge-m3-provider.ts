import { z } from "zod";
import type { EmbeddingResult } from "@recall-rerank/types";
import { ExternalServiceError } from "@recall-rerank/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative(),
});

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP. The model is symmetric, so
 * documents and queries are embedded the same way.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }

    const parsed = bgeM3ResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("BGE-M3 returned a malformed embedding response", this.name, {
        cause: parsed.error,
      });
    }

    const { embeddings, tokens_used: tokensUsed } = parsed.data;
    if (embeddings.length !== texts.length) {
      throw new ExternalServiceError(
        `BGE-M3 returned ${String(embeddings.length)} embeddings for ${String(texts.length)} texts`,
        this.name,
      );
    }

    return {
      embeddings,
      model: "bge-m3",
      tokensUsed,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
