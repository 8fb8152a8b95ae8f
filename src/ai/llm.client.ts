import fetch from "node-fetch";
import { errorMessage, Logger } from "../config/logger";
import { HttpStatusError } from "../shared/errors";
import { CAREER_COACH_SYSTEM_PROMPT } from "./system/career-coach.system";

const EXECUTION_SYSTEM_PROMPT = [
  "Universal execution rules.",
  "Be specific and concise.",
  "Avoid generic phrasing and repetitive templates.",
  "If output requires strict JSON, return JSON only and follow schema exactly.",
].join(" ");

export interface LlmClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface LlmCallOptions {
  promptName?: string;
  signal?: AbortSignal;
}

export class LlmClient {
  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    if (!CAREER_COACH_SYSTEM_PROMPT.trim()) {
      throw new Error("CAREER_COACH_SYSTEM_PROMPT is empty. Refusing to start.");
    }
  }

  getModelName(): string {
    return this.options.model;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens);
    try {
      const response = await fetch(`${this.options.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
        signal: options?.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new HttpStatusError("OpenAI", response.status, body);
      }

      const content = readMessageContent(await response.json());
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        prompt_name: promptName,
        model_name: this.options.model,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        promptChars: prompt.length,
        outputChars: content.length,
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        prompt_name: promptName,
        model_name: this.options.model,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.options.model,
      temperature: 0.2,
      messages: [
        {
          role: "system",
          content: CAREER_COACH_SYSTEM_PROMPT,
        },
        {
          role: "system",
          content: EXECUTION_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.options.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function readMessageContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return undefined;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return undefined;
  }
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
