import type { Entity, EntityType } from "../../../shared/types/entity.types";
import type { CompatibilityScore } from "../../../shared/types/scoring.types";

export const RESUME_FEEDBACK_V1_PROMPT_NAME = "resume_feedback_v1";

const MAX_ENTITIES_PER_TYPE = 15;
const MAX_KEYWORDS = 20;
const MAX_JOB_DESCRIPTION_CHARS = 4000;

const ENTITY_SECTIONS: ReadonlyArray<{ type: EntityType; title: string }> = [
  { type: "skill", title: "Skills" },
  { type: "job_title", title: "Job titles" },
  { type: "company", title: "Companies" },
  { type: "education", title: "Education" },
];

export interface ResumeFeedbackV1PromptInput {
  jobTitle?: string;
  jobDescription: string;
  entities: ReadonlyArray<Entity>;
  experienceYears?: number;
  score: CompatibilityScore;
}

export function buildResumeFeedbackV1Prompt(input: ResumeFeedbackV1PromptInput): string {
  return [
    "Review this resume against the target job and produce prioritized improvement feedback.",
    "",
    "ANALYSIS CONTEXT",
    `Target role: ${input.jobTitle?.trim() || "Not specified"}`,
    `Match score: ${input.score.similarity.toFixed(1)}% (${input.score.matchQuality})`,
    `Keyword coverage: ${input.score.keywordCoverage.toFixed(1)}%`,
    `Years of experience: ${input.experienceYears ?? "Not stated"}`,
    ...ENTITY_SECTIONS.map(
      (section) =>
        `${section.title}: ${formatList(
          input.entities.filter((entity) => entity.type === section.type).map((entity) => entity.text),
          MAX_ENTITIES_PER_TYPE,
        )}`,
    ),
    `Matched keywords: ${formatList(input.score.matchedKeywords, MAX_KEYWORDS)}`,
    `Missing keywords: ${formatList(input.score.missingKeywords, MAX_KEYWORDS)}`,
    "",
    "Job description:",
    truncate(input.jobDescription.trim(), MAX_JOB_DESCRIPTION_CHARS),
    "",
    "ANALYSIS INSTRUCTIONS",
    "Think step by step (chain-of-thought) before answering, but output only the final JSON.",
    "1. Compare the resume entities with what the job description asks for.",
    "2. Decide which missing keywords matter most for this role and which are noise.",
    "3. Identify strengths the candidate should keep or move higher.",
    "4. Produce 3 to 6 concrete improvements ordered by impact.",
    "- Use only the data above. Do not invent experience.",
    "- Each suggestion must name the exact change, not a general principle.",
    "- A missing keyword becomes a suggestion only if the candidate plausibly has that skill.",
    "",
    "OUTPUT REQUIREMENTS",
    "Return exactly this JSON shape:",
    "{",
    '  "overall_assessment": "2 to 3 sentences on fit and the biggest lever",',
    '  "strengths": ["short strength"],',
    '  "priority_improvements": [',
    "    {",
    '      "category": "skills | experience | keywords | formatting | education | achievements | general",',
    '      "priority": "high | medium | low",',
    '      "suggestion": "specific change to make",',
    '      "impact": "expected effect on ATS ranking or recruiter read"',
    "    }",
    "  ]",
    "}",
    "",
    "Return ONLY valid JSON.",
    "No markdown.",
    "No commentary.",
  ].join("\n");
}

function formatList(values: ReadonlyArray<string>, max: number): string {
  if (values.length === 0) {
    return "None detected";
  }
  const shown = values.slice(0, max).join(", ");
  return values.length > max ? `${shown} (+${values.length - max} more)` : shown;
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}
