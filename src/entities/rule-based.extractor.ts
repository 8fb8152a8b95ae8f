import { SkillsVocabulary } from "../nlp/skills-vocabulary";
import type { Entity, EntityType } from "../shared/types/entity.types";

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const PHONE_PATTERN = /(?:\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const PROFILE_URL_PATTERN =
  /(?:https?:\/\/)?(?:www\.)?(?:linkedin\.com\/in|github\.com)\/[A-Za-z0-9_-]+\/?/gi;

const JOB_TITLE_KEYWORDS = [
  "engineer", "developer", "programmer", "analyst", "manager", "director", "lead", "principal",
  "architect", "consultant", "specialist", "coordinator", "administrator", "technician", "designer",
  "scientist", "researcher", "intern", "associate", "executive", "officer",
];

const EDUCATION_KEYWORDS = [
  "university", "college", "school", "institute", "academy", "bachelor", "bachelors", "master",
  "masters", "phd", "doctorate", "degree", "diploma", "bs", "ba", "ms", "ma", "mba", "bsc", "msc",
  "beng", "meng",
];

const COMPANY_INDICATORS = [
  "inc", "corp", "corporation", "ltd", "llc", "gmbh", "company", "technologies", "systems", "solutions",
  "labs", "group",
];

const CONFIDENCE = {
  email: 0.95,
  profileUrl: 0.95,
  phone: 0.85,
  skill: 0.85,
  line: 0.8,
} as const;

const MAX_LINE_ENTITIES = 5;

// "5+ years of experience", "3 yrs backend experience"
const EXPERIENCE_YEARS_PATTERN = /\b(\d{1,2})\s*\+?\s*(?:years?|yrs?)\b[^.\n]{0,40}?\bexperience\b/gi;

interface LineRule {
  type: EntityType;
  keywords: ReadonlyArray<string>;
  clean: RegExp;
  minLength: number;
  maxLength: number;
}

const LINE_RULES: ReadonlyArray<LineRule> = [
  { type: "job_title", keywords: JOB_TITLE_KEYWORDS, clean: /[^\w\s]/g, minLength: 6, maxLength: 99 },
  { type: "education", keywords: EDUCATION_KEYWORDS, clean: /[^\w\s.-]/g, minLength: 6, maxLength: 149 },
  { type: "company", keywords: COMPANY_INDICATORS, clean: /[^\w\s.-]/g, minLength: 4, maxLength: 99 },
];

export class RuleBasedEntityExtractor {
  constructor(private readonly vocabulary: SkillsVocabulary) {}

  // Largest stated figure; per-skill counts never exceed the total.
  experienceYears(text: string): number | undefined {
    let years: number | undefined;
    for (const match of text.matchAll(EXPERIENCE_YEARS_PATTERN)) {
      const value = Number(match[1]);
      years = years === undefined ? value : Math.max(years, value);
    }
    return years;
  }

  extract(text: string): Entity[] {
    return [
      ...this.extractContacts(text),
      ...this.extractSkills(text),
      ...LINE_RULES.flatMap((rule) => extractLines(text, rule)),
    ];
  }

  private extractContacts(text: string): Entity[] {
    const entities: Entity[] = [];
    for (const match of text.match(EMAIL_PATTERN) ?? []) {
      entities.push({ type: "contact", contactField: "email", text: match, confidence: CONFIDENCE.email, source: "rules" });
    }
    for (const match of text.match(PHONE_PATTERN) ?? []) {
      if (match.replace(/[^\d]/g, "").length >= 10) {
        entities.push({ type: "contact", contactField: "phone", text: match.trim(), confidence: CONFIDENCE.phone, source: "rules" });
      }
    }
    for (const match of text.match(PROFILE_URL_PATTERN) ?? []) {
      entities.push({
        type: "contact",
        contactField: "profile_url",
        text: match,
        confidence: CONFIDENCE.profileUrl,
        source: "rules",
      });
    }
    return entities;
  }

  private extractSkills(text: string): Entity[] {
    return this.vocabulary.findMatches(text).map((match): Entity => ({
      type: "skill",
      text: match.display,
      confidence: CONFIDENCE.skill,
      source: "rules",
    }));
  }
}

function extractLines(text: string, rule: LineRule): Entity[] {
  const found: string[] = [];
  for (const line of text.split("\n")) {
    const words = new Set(line.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
    if (!rule.keywords.some((keyword) => words.has(keyword))) {
      continue;
    }
    const cleaned = line.replace(rule.clean, " ").replace(/\s+/g, " ").trim();
    if (cleaned.length >= rule.minLength && cleaned.length <= rule.maxLength && !found.includes(cleaned)) {
      found.push(cleaned);
    }
    if (found.length >= MAX_LINE_ENTITIES) {
      break;
    }
  }
  return found.map((value): Entity => ({
    type: rule.type,
    text: value,
    confidence: CONFIDENCE.line,
    source: "rules",
  }));
}
