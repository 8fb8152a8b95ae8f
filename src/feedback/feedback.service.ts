import { callJsonPromptSafe, SafeJsonErrorCode, StructuredJsonClient } from "../ai/llm.safe";
import {
  buildResumeFeedbackV1Prompt,
  RESUME_FEEDBACK_V1_PROMPT_NAME,
} from "../ai/prompts/feedback/resume-feedback.v1.prompt";
import { CircuitBreaker } from "../ai/resilience/circuit-breaker";
import { RetryPolicy } from "../ai/resilience/retry.policy";
import { parseFeedbackReport } from "../ai/schemas/feedback.schema";
import type { Logger } from "../config/logger";
import type { ResumeProfile } from "../shared/types/entity.types";
import type { FeedbackFallbackReason, FeedbackOutcome } from "../shared/types/feedback.types";
import type { JobContext } from "../shared/types/pipeline.types";
import type { CompatibilityScore } from "../shared/types/scoring.types";
import { buildFallbackFeedback } from "./fallback-feedback";

export interface FeedbackServiceOptions {
  attemptTimeoutMs: number;
  maxTokens?: number;
}

const DEFAULT_MAX_TOKENS = 1200;

export class FeedbackService {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly breaker: CircuitBreaker,
    private readonly retry: RetryPolicy,
    private readonly options: FeedbackServiceOptions,
    private readonly logger: Logger,
  ) {}

  async generate(
    resume: ResumeProfile,
    score: CompatibilityScore,
    job: JobContext,
    signal?: AbortSignal,
    budgetMs?: number,
  ): Promise<FeedbackOutcome> {
    const prompt = buildResumeFeedbackV1Prompt({
      jobTitle: job.title,
      jobDescription: job.description,
      entities: resume.entities,
      experienceYears: resume.experienceYears,
      score,
    });

    const result = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt,
      maxTokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
      promptName: RESUME_FEEDBACK_V1_PROMPT_NAME,
      breaker: this.breaker,
      retry: this.retry,
      attemptTimeoutMs: this.options.attemptTimeoutMs,
      budgetMs,
      signal,
      logger: this.logger,
      parse: parseFeedbackReport,
    });

    if (result.ok) {
      this.logger.info("feedback.generated", {
        prompt_name: RESUME_FEEDBACK_V1_PROMPT_NAME,
        items: result.data.items.length,
      });
      return { kind: "ai", report: result.data };
    }

    const reason = fallbackReason(result.error_code);
    this.logger.warn("feedback.fallback.used", {
      prompt_name: RESUME_FEEDBACK_V1_PROMPT_NAME,
      error_code: result.error_code,
      reason,
    });
    return this.fallback(reason, score);
  }

  fallback(reason: FeedbackFallbackReason, score: CompatibilityScore): FeedbackOutcome {
    return { kind: "fallback", reason, report: buildFallbackFeedback(score) };
  }
}

function fallbackReason(code: SafeJsonErrorCode): FeedbackFallbackReason {
  switch (code) {
    case "circuit_open":
      return "circuit_open";
    case "budget_exhausted":
      return "deadline_budget";
    case "json_parse_failed":
    case "schema_invalid":
      return "invalid_response";
    default:
      return "service_unavailable";
  }
}
