import fetch from "node-fetch";
import { HttpStatusError } from "../shared/errors";
import type { EmbeddingModel } from "../shared/types/model.types";

export interface EmbeddingsClientOptions {
  baseUrl: string;
  apiKey?: string;
  model: string;
}

export class EmbeddingsClient implements EmbeddingModel {
  readonly modelName: string;

  constructor(private readonly options: EmbeddingsClientOptions) {
    this.modelName = options.model;
  }

  async embed(inputs: ReadonlyArray<string>, signal?: AbortSignal): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(`${trimTrailingSlash(this.options.baseUrl)}/embeddings`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: this.options.model,
        input: inputs,
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpStatusError("Embeddings", response.status, body);
    }

    const vectors = parseEmbeddingsResponse(await response.json());
    if (vectors.length !== inputs.length) {
      throw new Error(
        `Embeddings API returned ${vectors.length} vectors for ${inputs.length} inputs.`,
      );
    }
    return vectors;
  }
}

function parseEmbeddingsResponse(body: unknown): number[][] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new Error("Embeddings API returned malformed response.");
  }

  const rows = body.data.map((item: unknown, position: number) => {
    if (!isRecord(item) || !isNumberArray(item.embedding) || item.embedding.length === 0) {
      throw new Error("Embeddings API returned empty vector.");
    }
    const index = typeof item.index === "number" ? item.index : position;
    return { index, embedding: item.embedding };
  });

  return rows.sort((a, b) => a.index - b.index).map((row) => row.embedding);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number" && Number.isFinite(item));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
