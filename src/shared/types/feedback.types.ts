export type FeedbackCategory =
  | "skills"
  | "experience"
  | "keywords"
  | "formatting"
  | "education"
  | "achievements"
  | "general";

export type FeedbackPriority = "high" | "medium" | "low";

export interface FeedbackItem {
  readonly category: FeedbackCategory;
  readonly priority: FeedbackPriority;
  readonly suggestion: string;
  readonly impact?: string;
}

export interface FeedbackReport {
  readonly overallAssessment: string;
  readonly strengths: ReadonlyArray<string>;
  readonly priorityImprovements: ReadonlyArray<string>;
  readonly items: ReadonlyArray<FeedbackItem>;
}

export type FeedbackFallbackReason =
  | "circuit_open"
  | "service_unavailable"
  | "invalid_response"
  | "deadline_budget";

export type FeedbackOutcome =
  | {
      kind: "ai";
      report: FeedbackReport;
    }
  | {
      kind: "fallback";
      reason: FeedbackFallbackReason;
      report: FeedbackReport;
    };
