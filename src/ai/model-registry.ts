import type { EnvConfig } from "../config/env";
import { errorMessage, Logger } from "../config/logger";
import type { EmbeddingModel, ModelRegistry, TokenClassifier } from "../shared/types/model.types";
import { EmbeddingsClient } from "./embeddings.client";
import { TokenClassificationClient } from "./token-classification.client";

const PROBE_TEXT = "Senior software engineer with Python experience.";

export interface ModelFactories {
  createEmbeddings(config: EnvConfig): EmbeddingModel;
  createTokenClassifier(config: EnvConfig): TokenClassifier | null;
}

export const defaultModelFactories: ModelFactories = {
  createEmbeddings: (config) =>
    new EmbeddingsClient({
      baseUrl: config.embeddingsBaseUrl,
      apiKey: config.embeddingsApiKey,
      model: config.embeddingsModel,
    }),
  createTokenClassifier: (config) =>
    config.nerEndpointUrl
      ? new TokenClassificationClient({
          endpointUrl: config.nerEndpointUrl,
          apiKey: config.nerApiKey,
          maxInputChars: config.nerMaxInputChars,
        })
      : null,
};

export async function loadModels(
  config: EnvConfig,
  logger: Logger,
  factories: ModelFactories = defaultModelFactories,
): Promise<ModelRegistry> {
  const embeddings = factories.createEmbeddings(config);
  try {
    await embeddings.embed([PROBE_TEXT]);
  } catch (error) {
    throw new Error(
      `Embedding model ${embeddings.modelName} is unavailable: ${errorMessage(error)}`,
    );
  }
  logger.info("models.embeddings.loaded", { model_name: embeddings.modelName });

  let tokenClassifier = factories.createTokenClassifier(config);
  if (!tokenClassifier) {
    logger.warn("models.ner.not_configured", {});
  } else {
    try {
      await tokenClassifier.classify(PROBE_TEXT);
      logger.info("models.ner.loaded", { model_name: tokenClassifier.modelName });
    } catch (error) {
      logger.warn("models.ner.unavailable", {
        model_name: tokenClassifier.modelName,
        error: errorMessage(error),
      });
      tokenClassifier = null;
    }
  }

  return Object.freeze({ embeddings, tokenClassifier });
}
