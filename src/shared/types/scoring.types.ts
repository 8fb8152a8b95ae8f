export type MatchQuality = "excellent" | "good" | "fair" | "poor";

export interface CompatibilityScore {
  readonly similarity: number;
  readonly cosine: number;
  readonly matchedKeywords: ReadonlyArray<string>;
  readonly missingKeywords: ReadonlyArray<string>;
  readonly keywordCoverage: number;
  readonly matchQuality: MatchQuality;
}
