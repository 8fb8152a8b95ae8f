import dotenv from "dotenv";
import type { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  maxUploadBytes: number;
  minExtractedChars: number;
  minDirectTextChars: number;
  ocrPdftoppmPath: string;
  ocrTesseractPath: string;
  ocrDpi: number;
  ocrLanguage: string;
  nerEndpointUrl?: string;
  nerApiKey?: string;
  nerMaxInputChars: number;
  entityConfidenceThreshold: number;
  embeddingsBaseUrl: string;
  embeddingsApiKey?: string;
  embeddingsModel: string;
  embeddingChunkWords: number;
  embeddingChunkOverlapWords: number;
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiChatModel: string;
  llmAttemptTimeoutMs: number;
  llmMaxAttempts: number;
  llmBackoffBaseMs: number;
  llmBackoffMaxMs: number;
  circuitFailureThreshold: number;
  circuitWindowMs: number;
  circuitCooldownMs: number;
  pipelineDeadlineMs: number;
  feedbackMinBudgetMs: number;
}

type EnvSource = Record<string, string | undefined>;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const ocrDpiRaw = source.OCR_DPI ?? "300";
  const ocrDpi = Number(ocrDpiRaw);
  const thresholdRaw = source.ENTITY_CONFIDENCE_THRESHOLD ?? "0.8";
  const entityConfidenceThreshold = Number(thresholdRaw);
  const chunkWords = readPositiveInteger(source, "EMBEDDING_CHUNK_WORDS", 512);
  const chunkOverlapRaw = source.EMBEDDING_CHUNK_OVERLAP_WORDS ?? "50";
  const chunkOverlap = Number(chunkOverlapRaw);

  if (!Number.isInteger(ocrDpi) || ocrDpi < 72 || ocrDpi > 600) {
    throw new Error(`Invalid OCR_DPI value: ${ocrDpiRaw}`);
  }
  if (
    !Number.isFinite(entityConfidenceThreshold) ||
    entityConfidenceThreshold < 0 ||
    entityConfidenceThreshold > 1
  ) {
    throw new Error(
      `Invalid ENTITY_CONFIDENCE_THRESHOLD value: ${thresholdRaw}. Expected number between 0 and 1.`,
    );
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkWords) {
    throw new Error(`Invalid EMBEDDING_CHUNK_OVERLAP_WORDS value: ${chunkOverlapRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel(logLevelRaw),
    maxUploadBytes: readPositiveInteger(source, "MAX_UPLOAD_BYTES", 10 * 1024 * 1024),
    minExtractedChars: readPositiveInteger(source, "MIN_EXTRACTED_CHARS", 200),
    minDirectTextChars: readPositiveInteger(source, "MIN_DIRECT_TEXT_CHARS", 50),
    ocrPdftoppmPath: getOptionalTrimmed(source, "OCR_PDFTOPPM_PATH") ?? "pdftoppm",
    ocrTesseractPath: getOptionalTrimmed(source, "OCR_TESSERACT_PATH") ?? "tesseract",
    ocrDpi,
    ocrLanguage: getOptionalTrimmed(source, "OCR_LANGUAGE") ?? "eng",
    nerEndpointUrl: getOptionalTrimmed(source, "NER_ENDPOINT_URL"),
    nerApiKey: getOptionalTrimmed(source, "NER_API_KEY"),
    nerMaxInputChars: readPositiveInteger(source, "NER_MAX_INPUT_CHARS", 2000),
    entityConfidenceThreshold,
    embeddingsBaseUrl: getRequiredString(source, "EMBEDDINGS_BASE_URL"),
    embeddingsApiKey: getOptionalTrimmed(source, "EMBEDDINGS_API_KEY"),
    embeddingsModel: getOptionalTrimmed(source, "EMBEDDINGS_MODEL") ?? "sentence-transformers/all-MiniLM-L6-v2",
    embeddingChunkWords: chunkWords,
    embeddingChunkOverlapWords: chunkOverlap,
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiBaseUrl: getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1",
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    llmAttemptTimeoutMs: readPositiveInteger(source, "LLM_ATTEMPT_TIMEOUT_MS", 20_000),
    llmMaxAttempts: readPositiveInteger(source, "LLM_MAX_ATTEMPTS", 3),
    llmBackoffBaseMs: readPositiveInteger(source, "LLM_BACKOFF_BASE_MS", 4_000),
    llmBackoffMaxMs: readPositiveInteger(source, "LLM_BACKOFF_MAX_MS", 10_000),
    circuitFailureThreshold: readPositiveInteger(source, "CIRCUIT_FAILURE_THRESHOLD", 5),
    circuitWindowMs: readPositiveInteger(source, "CIRCUIT_WINDOW_MS", 120_000),
    circuitCooldownMs: readPositiveInteger(source, "CIRCUIT_COOLDOWN_MS", 60_000),
    pipelineDeadlineMs: readPositiveInteger(source, "PIPELINE_DEADLINE_MS", 30_000),
    feedbackMinBudgetMs: readPositiveInteger(source, "FEEDBACK_MIN_BUDGET_MS", 5_000),
  };
}

function readPositiveInteger(source: EnvSource, name: string, fallback: number): number {
  const raw = source[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
