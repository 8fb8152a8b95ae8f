import type {
  FeedbackCategory,
  FeedbackItem,
  FeedbackPriority,
  FeedbackReport,
} from "../../shared/types/feedback.types";

const MAX_TEXT = 600;
const MAX_LIST_ITEMS = 10;
const MAX_PRIORITY_IMPROVEMENTS = 3;

const PRIORITY_RANK: Record<FeedbackPriority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

const CATEGORY_ALIASES: Record<string, FeedbackCategory> = {
  skill: "skills",
  skills: "skills",
  "technical skills": "skills",
  experience: "experience",
  experiences: "experience",
  "work experience": "experience",
  keyword: "keywords",
  keywords: "keywords",
  ats: "keywords",
  format: "formatting",
  formatting: "formatting",
  structure: "formatting",
  layout: "formatting",
  education: "education",
  certifications: "education",
  achievement: "achievements",
  achievements: "achievements",
  impact: "achievements",
  general: "general",
  other: "general",
};

export function parseFeedbackReport(value: unknown): FeedbackReport | null {
  if (!isRecord(value)) {
    return null;
  }
  const overallAssessment = toText(value.overall_assessment);
  if (!overallAssessment || !Array.isArray(value.strengths) || !Array.isArray(value.priority_improvements)) {
    return null;
  }

  const items = value.priority_improvements
    .map((item: unknown) => toFeedbackItem(item))
    .filter((item): item is FeedbackItem => item !== null);
  if (items.length === 0) {
    return null;
  }

  const sorted = sortFeedbackItems(items);
  return {
    overallAssessment,
    strengths: toStringArray(value.strengths),
    priorityImprovements: sorted.slice(0, MAX_PRIORITY_IMPROVEMENTS).map((item) => item.suggestion),
    items: sorted,
  };
}

export function sortFeedbackItems(items: ReadonlyArray<FeedbackItem>): FeedbackItem[] {
  return items
    .map((item, order) => ({ item, order }))
    .sort((a, b) => PRIORITY_RANK[a.item.priority] - PRIORITY_RANK[b.item.priority] || a.order - b.order)
    .map((entry) => entry.item);
}

function toFeedbackItem(value: unknown): FeedbackItem | null {
  if (!isRecord(value)) {
    return null;
  }
  const priority = toPriority(value.priority);
  const suggestion = toText(value.suggestion) || toText(value.recommendation);
  if (!priority || !suggestion) {
    return null;
  }
  const impact = toText(value.impact);
  return {
    category: toCategory(value.category),
    priority,
    suggestion,
    ...(impact ? { impact } : {}),
  };
}

function toPriority(value: unknown): FeedbackPriority | null {
  const normalized = toText(value).toLowerCase();
  if (normalized === "high" || normalized === "medium" || normalized === "low") {
    return normalized;
  }
  return null;
}

function toCategory(value: unknown): FeedbackCategory {
  return CATEGORY_ALIASES[toText(value).toLowerCase()] ?? "general";
}

function toText(value: unknown): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim().slice(0, MAX_TEXT);
}

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => toText(item))
    .filter((item) => Boolean(item))
    .slice(0, MAX_LIST_ITEMS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
