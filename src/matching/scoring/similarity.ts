import type { MatchQuality } from "../../shared/types/scoring.types";
import { clampToRange, round2 } from "../../shared/utils/text";

export function cosineSimilarity(left: ReadonlyArray<number>, right: ReadonlyArray<number>): number {
  if (left.length !== right.length) {
    throw new Error(`Embedding dimension mismatch: ${left.length} vs ${right.length}`);
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let i = 0; i < left.length; i += 1) {
    const a = left[i] ?? 0;
    const b = right[i] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return clampToRange(dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm)), -1, 1);
}

export function toSimilarityScore(cosine: number): number {
  return round2(clampToRange(((cosine + 1) / 2) * 100, 0, 100));
}

export function classifyMatchQuality(similarity: number): MatchQuality {
  if (similarity >= 80) {
    return "excellent";
  }
  if (similarity >= 65) {
    return "good";
  }
  if (similarity >= 50) {
    return "fair";
  }
  return "poor";
}
