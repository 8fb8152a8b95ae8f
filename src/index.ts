export { buildAnalysisPipeline, createAnalysisPipeline } from "./app";
export type { PipelineContext, PipelineOverrides } from "./app";
export { loadEnv } from "./config/env";
export type { EnvConfig } from "./config/env";
export { createLogger } from "./config/logger";
export type { Logger, LogLevel } from "./config/logger";
export { AnalysisPipeline } from "./pipeline/analysis.pipeline";
export { HttpStatusError, PipelineStageError } from "./shared/errors";
export { SUPPORTED_MIME_TYPES } from "./shared/types/document.types";
export type * from "./shared/types/document.types";
export type * from "./shared/types/entity.types";
export type * from "./shared/types/feedback.types";
export type * from "./shared/types/pipeline.types";
export type * from "./shared/types/scoring.types";
