import { AttemptTimeoutError, HttpStatusError } from "../../shared/errors";
import { abortReason, sleep } from "../../shared/utils/abort";

export type FailureKind = "timeout" | "transient" | "permanent";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  kind: FailureKind;
  error: unknown;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  canRetry?: (event: RetryEvent) => boolean;
  onRetry?: (event: RetryEvent) => void;
}

const TRANSIENT_STATUS = new Set([408, 429]);
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "ENETUNREACH",
  "EHOSTUNREACH",
]);

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof AttemptTimeoutError) {
    return "timeout";
  }
  if (error instanceof HttpStatusError) {
    if (error.status === 429 && error.body.includes("insufficient_quota")) {
      return "permanent";
    }
    return TRANSIENT_STATUS.has(error.status) || error.status >= 500 ? "transient" : "permanent";
  }
  if (!(error instanceof Error)) {
    return "permanent";
  }
  const code = readErrorCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return "transient";
  }
  const message = error.message.toLowerCase();
  if (
    error.name === "FetchError" ||
    message.includes("socket hang up") ||
    message.includes("network") ||
    message.includes("econnreset")
  ) {
    return "transient";
  }
  return "permanent";
}

export class RetryPolicy {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: RetryPolicyOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  async run<T>(operation: (attempt: number) => Promise<T>, runOptions?: RetryRunOptions): Promise<T> {
    const signal = runOptions?.signal;
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw abortReason(signal);
        }
        const kind = classifyFailure(error);
        if (kind === "permanent" || attempt >= this.options.maxAttempts) {
          throw error;
        }
        const event: RetryEvent = {
          attempt,
          delayMs: backoffDelayMs(attempt, this.options.baseDelayMs, this.options.maxDelayMs),
          kind,
          error,
        };
        if (runOptions?.canRetry && !runOptions.canRetry(event)) {
          throw error;
        }
        runOptions?.onRetry?.(event);
        await this.sleep(event.delayMs, signal);
      }
    }
  }
}

function readErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
