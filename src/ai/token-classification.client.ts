import fetch from "node-fetch";
import { HttpStatusError } from "../shared/errors";
import type { TokenClassifier, TokenPrediction } from "../shared/types/model.types";

export interface TokenClassificationClientOptions {
  endpointUrl: string;
  apiKey?: string;
  maxInputChars: number;
}

export class TokenClassificationClient implements TokenClassifier {
  readonly modelName: string;
  readonly maxInputChars: number;

  constructor(private readonly options: TokenClassificationClientOptions) {
    this.modelName = modelNameFromUrl(options.endpointUrl);
    this.maxInputChars = options.maxInputChars;
  }

  async classify(text: string, signal?: AbortSignal): Promise<TokenPrediction[]> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(this.options.endpointUrl, {
      method: "POST",
      headers,
      body: JSON.stringify({
        inputs: text,
        parameters: { aggregation_strategy: "none" },
        options: { wait_for_model: true },
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpStatusError("Token classification", response.status, body);
    }

    return parsePredictions(await response.json());
  }
}

export function parsePredictions(body: unknown): TokenPrediction[] {
  if (!Array.isArray(body)) {
    throw new Error("Token classification API returned malformed response.");
  }

  const predictions: TokenPrediction[] = [];
  for (const item of body) {
    if (!isRecord(item)) {
      continue;
    }
    const label = typeof item.entity === "string" ? item.entity : item.entity_group;
    if (
      typeof label !== "string" ||
      typeof item.score !== "number" ||
      typeof item.word !== "string" ||
      typeof item.start !== "number" ||
      typeof item.end !== "number"
    ) {
      continue;
    }
    predictions.push({
      label,
      score: item.score,
      word: item.word,
      start: item.start,
      end: item.end,
    });
  }
  return predictions;
}

function modelNameFromUrl(url: string): string {
  const match = url.match(/\/models\/(.+?)\/?$/);
  return match?.[1] ?? url;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
