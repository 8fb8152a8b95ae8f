import { LlmClient } from "./ai/llm.client";
import type { StructuredJsonClient } from "./ai/llm.safe";
import { loadModels } from "./ai/model-registry";
import { CircuitBreaker } from "./ai/resilience/circuit-breaker";
import { RetryPolicy } from "./ai/resilience/retry.policy";
import type { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import {
  createDocumentExtractors,
  DocumentExtractors,
  DocumentIngestionService,
} from "./documents/document.service";
import { OcrExtractor } from "./documents/extractors/ocr.extractor";
import { EntityExtractionService } from "./entities/entity-extraction.service";
import { RuleBasedEntityExtractor } from "./entities/rule-based.extractor";
import { FeedbackService } from "./feedback/feedback.service";
import { SemanticScoringService } from "./matching/semantic-scoring.service";
import { KeywordExtractor } from "./nlp/keyword.extractor";
import { SkillsVocabulary } from "./nlp/skills-vocabulary";
import { AnalysisPipeline } from "./pipeline/analysis.pipeline";
import type { ModelRegistry } from "./shared/types/model.types";

export interface PipelineContext {
  pipeline: AnalysisPipeline;
  models: ModelRegistry;
  breaker: CircuitBreaker;
  logger: Logger;
}

export interface PipelineOverrides {
  llmClient?: StructuredJsonClient;
  extractors?: DocumentExtractors;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function buildAnalysisPipeline(
  env: EnvConfig,
  models: ModelRegistry,
  logger: Logger,
  overrides?: PipelineOverrides,
): PipelineContext {
  const vocabulary = new SkillsVocabulary();
  const extractors =
    overrides?.extractors ??
    createDocumentExtractors(
      new OcrExtractor(
        {
          pdftoppmPath: env.ocrPdftoppmPath,
          tesseractPath: env.ocrTesseractPath,
          dpi: env.ocrDpi,
          language: env.ocrLanguage,
        },
        logger,
      ),
    );

  const llmClient =
    overrides?.llmClient ??
    new LlmClient(
      {
        apiKey: env.openaiApiKey,
        baseUrl: env.openaiBaseUrl,
        model: env.openaiChatModel,
      },
      logger,
    );

  const breaker = new CircuitBreaker({
    name: "feedback-llm",
    failureThreshold: env.circuitFailureThreshold,
    windowMs: env.circuitWindowMs,
    cooldownMs: env.circuitCooldownMs,
    now: overrides?.now,
    logger,
  });
  const retry = new RetryPolicy({
    maxAttempts: env.llmMaxAttempts,
    baseDelayMs: env.llmBackoffBaseMs,
    maxDelayMs: env.llmBackoffMaxMs,
    sleep: overrides?.sleep,
  });

  const pipeline = new AnalysisPipeline({
    ingestion: new DocumentIngestionService(
      {
        maxUploadBytes: env.maxUploadBytes,
        minExtractedChars: env.minExtractedChars,
        minDirectTextChars: env.minDirectTextChars,
      },
      extractors,
      logger,
    ),
    entities: new EntityExtractionService(
      models.tokenClassifier,
      new RuleBasedEntityExtractor(vocabulary),
      env.entityConfidenceThreshold,
      logger,
    ),
    semantics: new SemanticScoringService(
      models.embeddings,
      new KeywordExtractor(vocabulary),
      {
        chunkWords: env.embeddingChunkWords,
        overlapWords: env.embeddingChunkOverlapWords,
      },
      logger,
    ),
    feedback: new FeedbackService(
      llmClient,
      breaker,
      retry,
      { attemptTimeoutMs: env.llmAttemptTimeoutMs },
      logger,
    ),
    settings: {
      deadlineMs: env.pipelineDeadlineMs,
      feedbackMinBudgetMs: env.feedbackMinBudgetMs,
    },
    logger,
    now: overrides?.now,
  });

  return { pipeline, models, breaker, logger };
}

export async function createAnalysisPipeline(env: EnvConfig, logger?: Logger): Promise<PipelineContext> {
  const appLogger = logger ?? createLogger({ minLevel: env.logLevel });
  const models = await loadModels(env, appLogger);
  return buildAnalysisPipeline(env, models, appLogger);
}
