import { sortFeedbackItems } from "../ai/schemas/feedback.schema";
import type { FeedbackItem, FeedbackReport } from "../shared/types/feedback.types";
import type { CompatibilityScore } from "../shared/types/scoring.types";

const MAX_KEYWORDS_IN_SUGGESTION = 5;

export function buildFallbackFeedback(score: CompatibilityScore): FeedbackReport {
  const items: FeedbackItem[] = [];
  if (score.missingKeywords.length > 0) {
    items.push({
      category: "keywords",
      priority: "high",
      suggestion: `Add the missing job keywords you can honestly claim: ${score.missingKeywords
        .slice(0, MAX_KEYWORDS_IN_SUGGESTION)
        .join(", ")}.`,
      impact: "Keyword coverage is what most applicant tracking systems rank on first.",
    });
  }
  items.push(
    {
      category: "skills",
      priority: "medium",
      suggestion: "Move the skills most relevant to this role into a dedicated skills section near the top.",
      impact: "Recruiters and parsers find the required skills without reading every role.",
    },
    {
      category: "achievements",
      priority: "medium",
      suggestion: "Quantify achievements in your recent roles with concrete numbers such as latency, revenue or team size.",
      impact: "Measured results read as evidence instead of claims.",
    },
    {
      category: "formatting",
      priority: "low",
      suggestion: "Use standard section headings and a single-column layout.",
      impact: "Applicant tracking systems parse every section reliably.",
    },
  );

  const sorted = sortFeedbackItems(items);
  return {
    overallAssessment:
      `Your resume shows a ${score.similarity.toFixed(1)}% match with this role (${score.matchQuality}). ` +
      "Detailed coaching is unavailable right now, so these are general recommendations.",
    strengths:
      score.matchedKeywords.length > 0
        ? [`Covers ${score.matchedKeywords.length} of the job's key terms, including ${score.matchedKeywords
            .slice(0, 3)
            .join(", ")}.`]
        : [],
    priorityImprovements: sorted.slice(0, 3).map((item) => item.suggestion),
    items: sorted,
  };
}
