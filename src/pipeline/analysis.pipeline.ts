import { errorMessage, logContext, Logger, LoggerContext } from "../config/logger";
import type { DocumentIngestionService } from "../documents/document.service";
import type { EntityExtractionService } from "../entities/entity-extraction.service";
import type { FeedbackService } from "../feedback/feedback.service";
import type { SemanticScoringService } from "../matching/semantic-scoring.service";
import { DeadlineExceededError, PipelineStageError } from "../shared/errors";
import type { ExtractedText } from "../shared/types/document.types";
import type { EntityExtractionOutcome } from "../shared/types/entity.types";
import type { FeedbackOutcome } from "../shared/types/feedback.types";
import type {
  AnalysisResult,
  JobContext,
  PipelineError,
  PipelineErrorKind,
  PipelineInput,
  PipelineOutcome,
  PipelineStage,
  StageReport,
} from "../shared/types/pipeline.types";
import type { CompatibilityScore } from "../shared/types/scoring.types";
import { Deadline, linkAbortController, raceWithSignal } from "../shared/utils/abort";
import { PipelineStateMachine } from "../state/state-machine";

export interface AnalysisPipelineSettings {
  deadlineMs: number;
  feedbackMinBudgetMs: number;
}

export interface AnalysisPipelineDeps {
  ingestion: DocumentIngestionService;
  entities: EntityExtractionService;
  semantics: SemanticScoringService;
  feedback: FeedbackService;
  settings: AnalysisPipelineSettings;
  logger: Logger;
  now?: () => number;
}

const STAGE_ORDER: ReadonlyArray<PipelineStage> = ["ingestion", "semantics", "entities", "feedback"];

class RunTracker {
  readonly stages: Partial<Record<PipelineStage, StageReport>> = {};
  readonly timings: Partial<Record<PipelineStage, number>> = {};
  private readonly inFlight = new Set<PipelineStage>();
  private readonly startedAt = new Map<PipelineStage, number>();

  constructor(
    private readonly logger: Logger,
    private readonly context: LoggerContext,
    private readonly now: () => number,
  ) {}

  start(stage: PipelineStage): void {
    this.inFlight.add(stage);
    this.startedAt.set(stage, this.now());
  }

  complete(stage: PipelineStage, report: StageReport): void {
    this.inFlight.delete(stage);
    const latency = this.now() - (this.startedAt.get(stage) ?? this.now());
    this.timings[stage] = latency;
    this.stages[stage] = report;
    logContext(
      this.logger,
      report.status === "success" ? "info" : "warn",
      "pipeline.stage.completed",
      { ...this.context, stage, status: report.status, latency_ms: latency },
      report.reason ? { reason: report.reason, detail: report.detail } : undefined,
    );
  }

  activeStage(): PipelineStage | undefined {
    return STAGE_ORDER.find((stage) => this.inFlight.has(stage));
  }

  failInFlight(kind: PipelineErrorKind, detail: string): PipelineStage {
    const active = STAGE_ORDER.filter((stage) => this.inFlight.has(stage));
    for (const stage of active) {
      this.complete(stage, { status: "failed", reason: kind, detail });
    }
    return active[0] ?? "feedback";
  }
}

export class AnalysisPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: AnalysisPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  async run(input: PipelineInput): Promise<PipelineOutcome> {
    const deadline = new Deadline(input.deadlineMs ?? this.deps.settings.deadlineMs, this.now);
    const machine = new PipelineStateMachine();
    const context: LoggerContext = { request_id: input.requestId };
    const tracker = new RunTracker(this.deps.logger, context, this.now);
    const job: JobContext = { description: input.jobDescription, title: input.jobTitle };

    logContext(this.deps.logger, "info", "pipeline.started", { ...context, state: machine.state }, {
      deadlineMs: deadline.timeoutMs,
    });

    try {
      tracker.start("ingestion");
      const extracted = await raceWithSignal(this.ingest(input, deadline.signal), deadline.signal);
      tracker.complete("ingestion", { status: "success" });
      machine.transition("EXTRACTING");

      const [entityOutcome, score] = await this.extractInParallel(extracted.text, job, deadline, tracker);
      machine.transition("FEEDBACK");

      const feedback = await this.generateFeedback(entityOutcome, score, job, deadline, tracker);
      machine.transition("DONE");

      const result: AnalysisResult = {
        ...(input.requestId ? { requestId: input.requestId } : {}),
        ...(input.jobTitle ? { jobTitle: input.jobTitle } : {}),
        ingestion: {
          method: extracted.method,
          confidence: extracted.confidence,
          characters: extracted.characters,
          ...(extracted.pageCount !== undefined ? { pageCount: extracted.pageCount } : {}),
          ...(extracted.encoding !== undefined ? { encoding: extracted.encoding } : {}),
        },
        entities: entityOutcome.entities,
        entitySource: entityOutcome.kind === "model" ? "model" : "rules",
        ...(entityOutcome.experienceYears !== undefined ? { experienceYears: entityOutcome.experienceYears } : {}),
        score,
        feedback: feedback.report,
        feedbackSource: feedback.kind,
        ...(feedback.kind === "fallback" ? { feedbackFallbackReason: feedback.reason } : {}),
        stages: {
          ingestion: tracker.stages.ingestion ?? { status: "success" },
          entities: tracker.stages.entities ?? { status: "success" },
          semantics: tracker.stages.semantics ?? { status: "success" },
          feedback: tracker.stages.feedback ?? { status: "success" },
        },
        timings: {
          totalMs: deadline.elapsedMs(),
          stages: { ...tracker.timings },
        },
      };

      logContext(this.deps.logger, "info", "pipeline.completed", {
        ...context,
        state: machine.state,
        latency_ms: result.timings.totalMs,
        ok: true,
      });
      return { ok: true, result };
    } catch (error) {
      const pipelineError = this.toPipelineError(error, input, deadline, tracker);
      machine.abort();
      deadline.cancel(error instanceof Error ? error : new Error(pipelineError.message));
      logContext(this.deps.logger, "warn", "pipeline.failed", {
        ...context,
        state: machine.state,
        stage: pipelineError.stage,
        error_code: pipelineError.kind,
        latency_ms: pipelineError.elapsedMs,
        ok: false,
      });
      return { ok: false, error: pipelineError };
    } finally {
      deadline.dispose();
    }
  }

  private async ingest(input: PipelineInput, signal: AbortSignal): Promise<ExtractedText> {
    if ("document" in input) {
      return this.deps.ingestion.ingest(input.document, signal);
    }
    return this.deps.ingestion.fromDirectText(input.resumeText);
  }

  private async extractInParallel(
    text: string,
    job: JobContext,
    deadline: Deadline,
    tracker: RunTracker,
  ): Promise<[EntityExtractionOutcome, CompatibilityScore]> {
    const linked = linkAbortController(deadline.signal);
    const signal = linked.controller.signal;
    tracker.start("entities");
    tracker.start("semantics");

    const entities = this.deps.entities.extract(text, signal).then((outcome) => {
      tracker.complete(
        "entities",
        outcome.kind === "model"
          ? { status: "success" }
          : { status: "degraded", reason: outcome.reason, detail: outcome.detail },
      );
      return outcome;
    });
    const semantics = this.deps.semantics.score(text, job.description, signal).then(
      (score) => {
        tracker.complete("semantics", { status: "success" });
        return score;
      },
      (error: unknown) => {
        linked.controller.abort(error instanceof Error ? error : new Error(errorMessage(error)));
        throw error;
      },
    );

    try {
      return await raceWithSignal(Promise.all([entities, semantics]), deadline.signal);
    } finally {
      linked.dispose();
    }
  }

  private async generateFeedback(
    entityOutcome: EntityExtractionOutcome,
    score: CompatibilityScore,
    job: JobContext,
    deadline: Deadline,
    tracker: RunTracker,
  ): Promise<FeedbackOutcome> {
    tracker.start("feedback");
    const remainingMs = deadline.remainingMs();
    let outcome: FeedbackOutcome;
    if (remainingMs < this.deps.settings.feedbackMinBudgetMs) {
      this.deps.logger.warn("feedback.budget.insufficient", {
        remainingMs,
        feedbackMinBudgetMs: this.deps.settings.feedbackMinBudgetMs,
      });
      outcome = this.deps.feedback.fallback("deadline_budget", score);
    } else {
      outcome = await raceWithSignal(
        this.deps.feedback.generate(entityOutcome, score, job, deadline.signal, remainingMs),
        deadline.signal,
      );
    }

    tracker.complete(
      "feedback",
      outcome.kind === "ai"
        ? { status: "success" }
        : { status: "degraded", reason: "AI_SERVICE_UNAVAILABLE", detail: outcome.reason },
    );
    return outcome;
  }

  private toPipelineError(
    error: unknown,
    input: PipelineInput,
    deadline: Deadline,
    tracker: RunTracker,
  ): PipelineError {
    const timedOut =
      error instanceof DeadlineExceededError || deadline.signal.reason instanceof DeadlineExceededError;

    let kind: PipelineErrorKind;
    let message: string;
    let details: Record<string, unknown> | undefined;
    let stage: PipelineStage;
    if (timedOut) {
      kind = "TIMEOUT";
      message = `Analysis did not finish within ${deadline.timeoutMs}ms.`;
      details = { deadlineMs: deadline.timeoutMs };
      stage = tracker.failInFlight(kind, message);
    } else if (error instanceof PipelineStageError) {
      kind = error.kind;
      message = error.message;
      details = error.details;
      tracker.failInFlight(kind, message);
      stage = error.stage;
    } else {
      message = errorMessage(error);
      kind = tracker.activeStage() === "ingestion" ? "INSUFFICIENT_TEXT" : "SEMANTIC_ANALYSIS_FAILED";
      stage = tracker.failInFlight(kind, message);
    }

    return {
      ...(input.requestId ? { requestId: input.requestId } : {}),
      stage,
      kind,
      message,
      ...(details ? { details } : {}),
      stages: { ...tracker.stages },
      elapsedMs: deadline.elapsedMs(),
    };
  }
}
