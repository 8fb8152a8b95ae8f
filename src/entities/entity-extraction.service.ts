import { errorMessage, Logger } from "../config/logger";
import type { EntityExtractionOutcome } from "../shared/types/entity.types";
import type { TokenClassifier, TokenPrediction } from "../shared/types/model.types";
import { abortReason } from "../shared/utils/abort";
import {
  experienceYearsFromGroups,
  filterAndDeduplicate,
  groupsToEntities,
  groupTokenPredictions,
  splitForModel,
} from "./entity.post-processor";
import { RuleBasedEntityExtractor } from "./rule-based.extractor";

export class EntityExtractionService {
  constructor(
    private readonly classifier: TokenClassifier | null,
    private readonly rules: RuleBasedEntityExtractor,
    private readonly confidenceThreshold: number,
    private readonly logger: Logger,
  ) {}

  async extract(text: string, signal?: AbortSignal): Promise<EntityExtractionOutcome> {
    if (!this.classifier) {
      return this.fallback(text, "Token classification model is not loaded");
    }

    try {
      const predictions = await this.classify(this.classifier, text, signal);
      const groups = groupTokenPredictions(predictions);
      const entities = filterAndDeduplicate(groupsToEntities(text, groups), this.confidenceThreshold);
      const experienceYears =
        experienceYearsFromGroups(text, groups, this.confidenceThreshold) ?? this.rules.experienceYears(text);
      this.logger.debug("entities.model.completed", {
        model_name: this.classifier.modelName,
        predictions: predictions.length,
        entities: entities.length,
      });
      return { kind: "model", entities, ...withExperience(experienceYears) };
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      return this.fallback(text, errorMessage(error));
    }
  }

  private async classify(
    classifier: TokenClassifier,
    text: string,
    signal?: AbortSignal,
  ): Promise<TokenPrediction[]> {
    const predictions: TokenPrediction[] = [];
    for (const chunk of splitForModel(text, classifier.maxInputChars)) {
      const chunkPredictions = await classifier.classify(chunk.text, signal);
      for (const prediction of chunkPredictions) {
        predictions.push({
          ...prediction,
          start: prediction.start + chunk.offset,
          end: prediction.end + chunk.offset,
        });
      }
    }
    return predictions;
  }

  private fallback(text: string, detail: string): EntityExtractionOutcome {
    const entities = filterAndDeduplicate(this.rules.extract(text), this.confidenceThreshold);
    this.logger.warn("entities.fallback.used", {
      entity_source: "rules",
      reason: "MODEL_UNAVAILABLE",
      detail,
      entities: entities.length,
    });
    return {
      kind: "rules",
      reason: "MODEL_UNAVAILABLE",
      detail,
      entities,
      ...withExperience(this.rules.experienceYears(text)),
    };
  }
}

function withExperience(years: number | undefined): { experienceYears?: number } {
  return years === undefined ? {} : { experienceYears: years };
}
