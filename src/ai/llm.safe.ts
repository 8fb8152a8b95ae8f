import { errorMessage, Logger } from "../config/logger";
import { AttemptTimeoutError } from "../shared/errors";
import { abortReason, linkSignalWithTimeout, raceWithSignal } from "../shared/utils/abort";
import type { LlmCallOptions } from "./llm.client";
import { CircuitBreaker } from "./resilience/circuit-breaker";
import { classifyFailure, RetryPolicy } from "./resilience/retry.policy";

export interface StructuredJsonClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export interface JsonSafeCallArgs<T> {
  llmClient: StructuredJsonClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  breaker: CircuitBreaker;
  retry: RetryPolicy;
  attemptTimeoutMs: number;
  budgetMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  parse: (value: unknown) => T | null;
}

export type SafeJsonErrorCode =
  | "circuit_open"
  | "aborted"
  | "budget_exhausted"
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

// Kept free at the end of a budget, and the shortest attempt worth starting.
const BUDGET_MARGIN_MS = 100;
const MIN_ATTEMPT_MS = 100;

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const modelName = args.llmClient.getModelName?.();
  const budgetEndsAt = args.budgetMs === undefined ? Infinity : Date.now() + args.budgetMs - BUDGET_MARGIN_MS;
  const fitsBudget = (waitMs: number): boolean => Date.now() + waitMs + MIN_ATTEMPT_MS <= budgetEndsAt;
  const attemptTimeout = (): number => Math.max(1, Math.min(args.attemptTimeoutMs, budgetEndsAt - Date.now()));
  if (!fitsBudget(0)) {
    args.logger?.warn("llm.safe.budget_exhausted", {
      prompt_name: args.promptName,
      model_name: modelName,
      budgetMs: args.budgetMs,
      attempt: 0,
    });
    return { ok: false, error_code: "budget_exhausted" };
  }

  const permit = args.breaker.tryAcquire();
  if (!permit.allowed) {
    args.logger?.warn("llm.safe.circuit_open", {
      prompt_name: args.promptName,
      model_name: modelName,
      retryAfterMs: permit.retryAfterMs,
    });
    return { ok: false, error_code: "circuit_open" };
  }

  let raw: string;
  const stop = { byBudget: false };
  try {
    raw = await args.retry.run((attempt) => attemptJsonCall(args, attempt, attemptTimeout()), {
      signal: args.signal,
      canRetry: (event) => {
        stop.byBudget = !fitsBudget(event.delayMs);
        if (stop.byBudget) {
          args.logger?.warn("llm.safe.budget_exhausted", {
            prompt_name: args.promptName,
            model_name: modelName,
            budgetMs: args.budgetMs,
            attempt: event.attempt,
          });
        }
        return !stop.byBudget;
      },
      onRetry: (event) => {
        args.logger?.warn("llm.safe.retry", {
          prompt_name: args.promptName,
          model_name: modelName,
          attempt: event.attempt,
          delayMs: event.delayMs,
          kind: event.kind,
          error: errorMessage(event.error),
        });
      },
    });
  } catch (error) {
    if (args.signal?.aborted) {
      args.breaker.release(permit);
      return { ok: false, error_code: "aborted" };
    }
    if (stop.byBudget) {
      args.breaker.release(permit);
      return { ok: false, error_code: "budget_exhausted" };
    }
    args.breaker.recordFailure(permit);
    const kind = classifyFailure(error);
    return {
      ok: false,
      error_code: kind === "timeout" ? "timeout" : kind === "transient" ? "transient_failure" : "llm_failure",
    };
  }
  args.breaker.recordSuccess(permit);

  const parsed = extractJsonObject(raw);
  if (!parsed) {
    return { ok: false, error_code: "json_parse_failed", raw };
  }
  const data = args.parse(parsed);
  if (data === null) {
    return { ok: false, error_code: "schema_invalid", raw };
  }
  return { ok: true, data };
}

async function attemptJsonCall<T>(args: JsonSafeCallArgs<T>, attempt: number, timeoutMs: number): Promise<string> {
  const linked = linkSignalWithTimeout(args.signal, timeoutMs);
  try {
    return await raceWithSignal(
      args.llmClient.generateStructuredJson(args.prompt, args.maxTokens, {
        promptName: attempt > 1 ? `${args.promptName}_attempt_${attempt}` : args.promptName,
        signal: linked.signal,
      }),
      linked.signal,
    );
  } catch (error) {
    if (args.signal?.aborted) {
      throw abortReason(args.signal);
    }
    if (linked.timedOut()) {
      throw new AttemptTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    linked.dispose();
  }
}

export function extractJsonObject(raw: string): Record<string, unknown> | null {
  for (let start = raw.indexOf("{"); start >= 0; start = raw.indexOf("{", start + 1)) {
    const end = findBalancedEnd(raw, start);
    if (end < 0) {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(raw.slice(start, end + 1));
      if (isJsonObject(parsed)) {
        return parsed;
      }
    } catch {
      continue;
    }
  }
  return null;
}

function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
