import type { ContactField, Entity, EntityType } from "../shared/types/entity.types";
import type { TokenPrediction } from "../shared/types/model.types";

interface LabelTarget {
  type: EntityType;
  contactField?: ContactField;
}

export interface TokenGroup {
  label: string;
  start: number;
  end: number;
  confidence: number;
}

export interface TextChunk {
  text: string;
  offset: number;
}

const LABEL_TARGETS: Record<string, LabelTarget> = {
  PERSON: { type: "contact", contactField: "name" },
  PER: { type: "contact", contactField: "name" },
  NAME: { type: "contact", contactField: "name" },
  EMAIL: { type: "contact", contactField: "email" },
  EMAIL_ADDRESS: { type: "contact", contactField: "email" },
  PHONE: { type: "contact", contactField: "phone" },
  LINKEDIN: { type: "contact", contactField: "profile_url" },
  SKILL: { type: "skill" },
  SKILLS: { type: "skill" },
  JOB_TITLE: { type: "job_title" },
  DESIGNATION: { type: "job_title" },
  TITLE: { type: "job_title" },
  COMPANY: { type: "company" },
  ORGANIZATION: { type: "company" },
  ORG: { type: "company" },
  COMPANIES_WORKED_AT: { type: "company" },
  EDUCATION: { type: "education" },
  DEGREE: { type: "education" },
  UNIVERSITY: { type: "education" },
  COLLEGE_NAME: { type: "education" },
};

const EXPERIENCE_LABELS: ReadonlySet<string> = new Set(["EXPERIENCE", "YEARS_OF_EXPERIENCE", "EXPERIENCE_YEARS"]);
const YEARS_PATTERN = /(\d{1,2})\s*\+?\s*(?:years?|yrs?)\b/i;

const MAX_TOKEN_GAP = 2;

export function mapEntityLabel(label: string): LabelTarget | undefined {
  return LABEL_TARGETS[stripBioPrefix(label).toUpperCase()];
}

export function groupTokenPredictions(predictions: ReadonlyArray<TokenPrediction>): TokenGroup[] {
  const groups: TokenGroup[] = [];
  let current: TokenGroup | null = null;

  const sorted = [...predictions].sort((a, b) => a.start - b.start);
  for (const prediction of sorted) {
    const label = stripBioPrefix(prediction.label).toUpperCase();
    if (label === "O") {
      current = null;
      continue;
    }

    const startsNew = /^B-/i.test(prediction.label);
    const isSubword = prediction.word.startsWith("##");
    if (
      current &&
      !startsNew &&
      current.label === label &&
      (isSubword || prediction.start - current.end <= MAX_TOKEN_GAP)
    ) {
      current.end = Math.max(current.end, prediction.end);
      current.confidence = Math.min(current.confidence, prediction.score);
      continue;
    }

    current = {
      label,
      start: prediction.start,
      end: prediction.end,
      confidence: prediction.score,
    };
    groups.push(current);
  }

  return groups;
}

export function groupsToEntities(text: string, groups: ReadonlyArray<TokenGroup>): Entity[] {
  const entities: Entity[] = [];
  for (const group of groups) {
    const target = mapEntityLabel(group.label);
    const surface = cleanEntityText(text.slice(group.start, group.end));
    if (!target || !surface) {
      continue;
    }
    entities.push({
      type: target.type,
      text: surface,
      confidence: group.confidence,
      source: "model",
      ...(target.contactField ? { contactField: target.contactField } : {}),
    });
  }
  return entities;
}

export function parseExperienceYears(value: string): number | undefined {
  const match = YEARS_PATTERN.exec(value);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}

export function experienceYearsFromGroups(
  text: string,
  groups: ReadonlyArray<TokenGroup>,
  threshold: number,
): number | undefined {
  for (const group of groups) {
    if (group.confidence < threshold || !EXPERIENCE_LABELS.has(group.label)) {
      continue;
    }
    const years = parseExperienceYears(text.slice(group.start, group.end));
    if (years !== undefined) {
      return years;
    }
  }
  return undefined;
}

export function filterAndDeduplicate(entities: ReadonlyArray<Entity>, threshold: number): Entity[] {
  const byKey = new Map<string, Entity>();
  for (const entity of entities) {
    if (entity.confidence < threshold) {
      continue;
    }
    const key = `${entity.type}:${entity.text.toLowerCase()}`;
    const existing = byKey.get(key);
    if (!existing || entity.confidence > existing.confidence) {
      byKey.set(key, entity);
    }
  }
  return [...byKey.values()];
}

export function splitForModel(text: string, maxChars: number): TextChunk[] {
  const chunks: TextChunk[] = [];
  let start = 0;
  while (start < text.length) {
    while (start < text.length && /\s/.test(text.charAt(start))) {
      start += 1;
    }
    if (start >= text.length) {
      break;
    }
    let end = Math.min(text.length, start + maxChars);
    if (end < text.length) {
      const window = text.slice(start, end + 1);
      const lastSpace = window.search(/\s\S*$/);
      if (lastSpace > 0) {
        end = start + lastSpace;
      }
    }
    chunks.push({ text: text.slice(start, end), offset: start });
    start = end;
  }
  return chunks;
}

function stripBioPrefix(label: string): string {
  return label.replace(/^[BI]-/i, "");
}

function cleanEntityText(value: string): string {
  return value.replace(/\s+/g, " ").replace(/^[\s,;:|•-]+|[\s,;:|•-]+$/g, "").trim();
}
