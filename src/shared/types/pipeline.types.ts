import type { ExtractionMethod, RawDocument } from "./document.types";
import type { Entity, EntitySource } from "./entity.types";
import type { FeedbackFallbackReason, FeedbackReport } from "./feedback.types";
import type { CompatibilityScore } from "./scoring.types";

export type PipelineStage = "ingestion" | "entities" | "semantics" | "feedback";

export type PipelineState = "INGESTING" | "EXTRACTING" | "FEEDBACK" | "DONE" | "ABORTED";

export type PipelineErrorKind =
  | "UNSUPPORTED_FORMAT"
  | "FILE_TOO_LARGE"
  | "INSUFFICIENT_TEXT"
  | "MODEL_UNAVAILABLE"
  | "SEMANTIC_ANALYSIS_FAILED"
  | "AI_SERVICE_UNAVAILABLE"
  | "TIMEOUT";

export type StageStatus = "success" | "degraded" | "failed";

export interface StageReport {
  readonly status: StageStatus;
  readonly reason?: PipelineErrorKind;
  readonly detail?: string;
}

export type StageReports = Partial<Record<PipelineStage, StageReport>>;

export type PipelineInput =
  | {
      document: RawDocument;
      jobDescription: string;
      jobTitle?: string;
      requestId?: string;
      deadlineMs?: number;
    }
  | {
      resumeText: string;
      jobDescription: string;
      jobTitle?: string;
      requestId?: string;
      deadlineMs?: number;
    };

export interface JobContext {
  readonly description: string;
  readonly title?: string;
}

export interface IngestionSummary {
  readonly method: ExtractionMethod;
  readonly confidence: number;
  readonly characters: number;
  readonly pageCount?: number;
  readonly encoding?: string;
}

export interface PipelineTimings {
  readonly totalMs: number;
  readonly stages: Partial<Record<PipelineStage, number>>;
}

export interface AnalysisResult {
  readonly requestId?: string;
  readonly jobTitle?: string;
  readonly ingestion: IngestionSummary;
  readonly entities: ReadonlyArray<Entity>;
  readonly entitySource: EntitySource;
  readonly experienceYears?: number;
  readonly score: CompatibilityScore;
  readonly feedback: FeedbackReport;
  readonly feedbackSource: "ai" | "fallback";
  readonly feedbackFallbackReason?: FeedbackFallbackReason;
  readonly stages: Record<PipelineStage, StageReport>;
  readonly timings: PipelineTimings;
}

export interface PipelineError {
  readonly requestId?: string;
  readonly stage: PipelineStage;
  readonly kind: PipelineErrorKind;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly stages: StageReports;
  readonly elapsedMs: number;
}

export type PipelineOutcome =
  | {
      ok: true;
      result: AnalysisResult;
    }
  | {
      ok: false;
      error: PipelineError;
    };
