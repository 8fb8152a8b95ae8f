import type { PipelineErrorKind, PipelineStage } from "./types/pipeline.types";

export class PipelineStageError extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly kind: PipelineErrorKind,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PipelineStageError";
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${service} API error: HTTP ${status} - ${body.slice(0, 300)}`);
    this.name = "HttpStatusError";
  }
}

export class DeadlineExceededError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`Pipeline deadline of ${deadlineMs}ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timeout after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}
