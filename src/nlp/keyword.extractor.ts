import nlp from "compromise";
import stopwordList from "../data/keyword-stopwords.json";
import { SkillsVocabulary } from "./skills-vocabulary";

export interface KeywordStat {
  readonly key: string;
  readonly display: string;
  readonly count: number;
  readonly firstIndex: number;
}

export type KeywordIndex = ReadonlyMap<string, KeywordStat>;

interface TermView {
  text: string;
  post: string;
  normal: string;
  tags: ReadonlyArray<string>;
  start: number;
  end: number;
}

const MAX_PHRASE_TERMS = 3;
const PHRASE_BREAK = /[,.;:!?()[\]{}|/\\•·]|\n/;

export class KeywordExtractor {
  private readonly stopwords: ReadonlySet<string>;

  constructor(
    private readonly vocabulary: SkillsVocabulary,
    stopwords: ReadonlyArray<string> = stopwordList,
  ) {
    this.stopwords = new Set(stopwords.map((word) => word.toLowerCase()));
  }

  extract(text: string): KeywordIndex {
    const index = new Map<string, { key: string; display: string; count: number; firstIndex: number }>();
    const record = (key: string, display: string, position: number): void => {
      const existing = index.get(key);
      if (existing) {
        existing.count += 1;
        existing.firstIndex = Math.min(existing.firstIndex, position);
        return;
      }
      index.set(key, { key, display, count: 1, firstIndex: position });
    };

    const vocabularyMatches = this.vocabulary.findMatches(text);
    for (const match of vocabularyMatches) {
      record(match.canonical, match.display, match.index);
    }

    const covered = vocabularyMatches.map((match): [number, number] => [
      match.index,
      match.index + match.surface.length,
    ]);

    for (const phrase of this.nounPhrases(text, covered)) {
      const key = this.vocabulary.canonicalize(phrase.key);
      if (this.stopwords.has(key)) {
        continue;
      }
      record(key, this.vocabulary.displayFor(key) ?? phrase.display, phrase.start);
    }

    return index;
  }

  private nounPhrases(
    text: string,
    covered: ReadonlyArray<[number, number]>,
  ): Array<{ key: string; display: string; start: number }> {
    const phrases: Array<{ key: string; display: string; start: number }> = [];
    let run: TermView[] = [];

    const flush = (): void => {
      if (run.some((term) => term.tags.includes("Noun"))) {
        const keyParts = run.map((term) => this.normalizeTerm(term));
        if (keyParts.every((part) => part.length > 0)) {
          phrases.push({
            key: keyParts.join(" "),
            display: run.map((term) => term.text).join(" "),
            start: run[0]?.start ?? 0,
          });
        }
      }
      run = [];
    };

    for (const term of readTerms(text)) {
      const isCovered = covered.some(([start, end]) => term.start < end && term.end > start);
      const eligible =
        !isCovered &&
        !this.stopwords.has(cleanWord(term.normal)) &&
        cleanWord(term.normal).length > 1 &&
        !/^\d+$/.test(cleanWord(term.normal)) &&
        (term.tags.includes("Noun") || (term.tags.includes("Adjective") && !run.some(isNoun)));

      if (!eligible) {
        flush();
        continue;
      }

      run.push(term);
      if (run.length >= MAX_PHRASE_TERMS || PHRASE_BREAK.test(term.post)) {
        flush();
      }
    }
    flush();

    return phrases;
  }

  private normalizeTerm(term: TermView): string {
    if (/^[A-Z][A-Z0-9]+s$/.test(term.text)) {
      return cleanWord(term.text.slice(0, -1));
    }
    const word = cleanWord(term.normal);
    if (!term.tags.includes("Plural") || this.vocabulary.displayFor(word) !== undefined) {
      return word;
    }
    const singular = cleanWord(nlp(word).nouns().toSingular().text("normal"));
    return singular || word;
  }
}

function isNoun(term: TermView): boolean {
  return term.tags.includes("Noun");
}

function cleanWord(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9+#.\-\s]/g, "")
    .replace(/\.+$/, "")
    .trim();
}

function readTerms(text: string): TermView[] {
  const sentences: unknown = nlp(text).json();
  if (!Array.isArray(sentences)) {
    return [];
  }

  const terms: TermView[] = [];
  let cursor = 0;
  for (const sentence of sentences) {
    if (!isRecord(sentence) || !Array.isArray(sentence.terms)) {
      continue;
    }
    for (const term of sentence.terms) {
      if (!isRecord(term) || typeof term.text !== "string" || !term.text) {
        continue;
      }
      const start = text.indexOf(term.text, cursor);
      if (start < 0) {
        continue;
      }
      cursor = start + term.text.length;
      terms.push({
        text: term.text,
        post: typeof term.post === "string" ? term.post : "",
        normal: typeof term.normal === "string" ? term.normal : term.text.toLowerCase(),
        tags: Array.isArray(term.tags) ? term.tags.filter((tag): tag is string => typeof tag === "string") : [],
        start,
        end: cursor,
      });
    }
  }
  return terms;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function orderByFrequency(stats: Iterable<KeywordStat>): KeywordStat[] {
  return [...stats].sort((a, b) => b.count - a.count || a.firstIndex - b.firstIndex);
}
