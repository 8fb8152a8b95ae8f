import { KeywordIndex, orderByFrequency } from "../nlp/keyword.extractor";
import { round1 } from "../shared/utils/text";

export interface KeywordGap {
  matched: string[];
  missing: string[];
  coverage: number;
}

export function analyzeKeywordGap(resume: KeywordIndex, job: KeywordIndex): KeywordGap {
  const matched: string[] = [];
  const missing: string[] = [];
  const seenDisplays = new Set<string>();

  for (const stat of orderByFrequency(job.values())) {
    const displayKey = stat.display.toLowerCase();
    if (seenDisplays.has(displayKey)) {
      continue;
    }
    seenDisplays.add(displayKey);
    if (resume.has(stat.key)) {
      matched.push(stat.display);
    } else {
      missing.push(stat.display);
    }
  }

  const total = matched.length + missing.length;
  return {
    matched,
    missing,
    coverage: total === 0 ? 0 : round1((matched.length / total) * 100),
  };
}
