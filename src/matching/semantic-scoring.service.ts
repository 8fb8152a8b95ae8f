import { errorMessage, Logger } from "../config/logger";
import { KeywordExtractor } from "../nlp/keyword.extractor";
import { PipelineStageError } from "../shared/errors";
import type { EmbeddingModel } from "../shared/types/model.types";
import type { CompatibilityScore } from "../shared/types/scoring.types";
import { abortReason } from "../shared/utils/abort";
import { analyzeKeywordGap } from "./keyword-gap";
import { classifyMatchQuality, cosineSimilarity, toSimilarityScore } from "./scoring/similarity";
import { ChunkingOptions, chunkByWords, meanPool } from "./text-chunker";

export class SemanticScoringService {
  constructor(
    private readonly embeddings: EmbeddingModel,
    private readonly keywords: KeywordExtractor,
    private readonly chunking: ChunkingOptions,
    private readonly logger: Logger,
  ) {}

  async score(resumeText: string, jobText: string, signal?: AbortSignal): Promise<CompatibilityScore> {
    const resumeChunks = chunkByWords(resumeText, this.chunking);
    const jobChunks = chunkByWords(jobText, this.chunking);

    let cosine: number;
    try {
      const vectors = await this.embeddings.embed([...resumeChunks, ...jobChunks], signal);
      const resumeVector = meanPool(vectors.slice(0, resumeChunks.length));
      const jobVector = meanPool(vectors.slice(resumeChunks.length));
      cosine = cosineSimilarity(resumeVector, jobVector);
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      this.logger.warn("semantics.embedding.failed", {
        model_name: this.embeddings.modelName,
        error: errorMessage(error),
      });
      throw new PipelineStageError(
        "semantics",
        "SEMANTIC_ANALYSIS_FAILED",
        "Semantic analysis failed.",
        { model_name: this.embeddings.modelName, error: errorMessage(error) },
      );
    }

    const gap = analyzeKeywordGap(this.keywords.extract(resumeText), this.keywords.extract(jobText));
    const similarity = toSimilarityScore(cosine);

    this.logger.debug("semantics.scored", {
      similarity,
      resumeChunks: resumeChunks.length,
      jobChunks: jobChunks.length,
      matched: gap.matched.length,
      missing: gap.missing.length,
    });

    return {
      similarity,
      cosine,
      matchedKeywords: gap.matched,
      missingKeywords: gap.missing,
      keywordCoverage: gap.coverage,
      matchQuality: classifyMatchQuality(similarity),
    };
  }
}
