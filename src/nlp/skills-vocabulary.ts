import skillCategories from "../data/technical-skills.json";
import synonymTable from "../data/keyword-synonyms.json";

export interface VocabularyMatch {
  readonly canonical: string;
  readonly display: string;
  readonly surface: string;
  readonly index: number;
}

interface VocabularyPattern {
  canonical: string;
  display: string;
  term: string;
  regex: RegExp;
}

export class SkillsVocabulary {
  private readonly displayByCanonical = new Map<string, string>();
  private readonly synonyms = new Map<string, string>();
  private readonly patterns: VocabularyPattern[] = [];

  constructor(
    categories: Record<string, ReadonlyArray<string>> = skillCategories,
    synonyms: Record<string, string> = synonymTable,
  ) {
    for (const skills of Object.values(categories)) {
      for (const display of skills) {
        const canonical = normalizeTerm(display);
        if (canonical && !this.displayByCanonical.has(canonical)) {
          this.displayByCanonical.set(canonical, display);
          this.patterns.push(buildPattern(canonical, display, display));
        }
      }
    }

    for (const [alias, target] of Object.entries(synonyms)) {
      const normalizedAlias = normalizeTerm(alias);
      const canonical = normalizeTerm(target);
      this.synonyms.set(normalizedAlias, canonical);
      const display = this.displayByCanonical.get(canonical);
      if (display && normalizedAlias !== canonical) {
        this.patterns.push(buildPattern(canonical, display, alias));
      }
    }

    for (const [canonical, display] of this.displayByCanonical) {
      for (const variant of numberVariants(display)) {
        const alias = normalizeTerm(variant);
        if (this.synonyms.has(alias) || this.displayByCanonical.has(alias)) {
          continue;
        }
        this.synonyms.set(alias, canonical);
        this.patterns.push(buildPattern(canonical, display, variant));
      }
    }

    this.patterns.sort((a, b) => b.term.length - a.term.length);
  }

  get size(): number {
    return this.displayByCanonical.size;
  }

  canonicalize(term: string): string {
    const normalized = normalizeTerm(term);
    return this.synonyms.get(normalized) ?? normalized;
  }

  displayFor(canonical: string): string | undefined {
    return this.displayByCanonical.get(canonical);
  }

  findMatches(text: string): VocabularyMatch[] {
    const taken: Array<[number, number]> = [];
    const matches: VocabularyMatch[] = [];

    for (const pattern of this.patterns) {
      pattern.regex.lastIndex = 0;
      for (const found of text.matchAll(pattern.regex)) {
        const index = found.index ?? 0;
        const end = index + found[0].length;
        if (taken.some(([start, stop]) => index < stop && end > start)) {
          continue;
        }
        taken.push([index, end]);
        matches.push({
          canonical: pattern.canonical,
          display: pattern.display,
          surface: found[0],
          index,
        });
      }
    }

    return matches.sort((a, b) => a.index - b.index);
  }
}

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, " ");
}

// Singular/plural surface forms of the last word; "Microservices" also answers to "microservice".
function numberVariants(display: string): string[] {
  const last = display.split(/\s+/).pop() ?? "";
  if (/^[A-Z][A-Z0-9]+$/.test(last)) {
    return [`${display}s`];
  }
  if (!/^[A-Za-z]*[a-z]{3}$/.test(last)) {
    return [];
  }
  if (/[^su]s$/.test(last) && !/is$/.test(last)) {
    return [display.slice(0, -1)];
  }
  if (/(s|x|z|sh|ch|y)$/.test(last)) {
    return [];
  }
  return [`${display}s`];
}

function buildPattern(canonical: string, display: string, term: string): VocabularyPattern {
  const body = escapeRegExp(term.trim()).replace(/\s+/g, "\\s+");
  return {
    canonical,
    display,
    term,
    regex: new RegExp(`(?<![A-Za-z0-9+#])${body}(?![A-Za-z0-9+#])`, "gi"),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}
