import assert from "node:assert/strict";
import { test } from "node:test";
import { EntityExtractionService } from "../../entities/entity-extraction.service";
import { RuleBasedEntityExtractor } from "../../entities/rule-based.extractor";
import { SkillsVocabulary } from "../../nlp/skills-vocabulary";
import type { TokenClassifier, TokenPrediction } from "../../shared/types/model.types";
import { noopLogger } from "../helpers/fakes";

const rules = new RuleBasedEntityExtractor(new SkillsVocabulary());

function skillClassifier(maxInputChars: number, seen: string[]): TokenClassifier {
  return {
    modelName: "fake-ner",
    maxInputChars,
    async classify(text: string): Promise<TokenPrediction[]> {
      seen.push(text);
      const predictions: TokenPrediction[] = [];
      for (const word of ["Python", "Docker"]) {
        const start = text.indexOf(word);
        if (start >= 0) {
          predictions.push({ label: "B-SKILL", score: 0.93, word, start, end: start + word.length });
        }
      }
      return predictions;
    },
  };
}

test("uses rules when no classifier is loaded", async () => {
  const service = new EntityExtractionService(null, rules, 0.8, noopLogger);
  const outcome = await service.extract("Jane Doe\njane.doe@example.com\nSkills: Python, Docker\n");

  assert.equal(outcome.kind, "rules");
  assert.deepEqual(outcome.entities, [
    { type: "contact", contactField: "email", text: "jane.doe@example.com", confidence: 0.95, source: "rules" },
    { type: "skill", text: "Python", confidence: 0.85, source: "rules" },
    { type: "skill", text: "Docker", confidence: 0.85, source: "rules" },
  ]);
});

test("falls back to rules with the classifier error as detail", async () => {
  const failing: TokenClassifier = {
    modelName: "fake-ner",
    maxInputChars: 1000,
    async classify(): Promise<TokenPrediction[]> {
      throw new Error("model endpoint returned 503");
    },
  };
  const service = new EntityExtractionService(failing, rules, 0.8, noopLogger);
  const outcome = await service.extract("Knows Kubernetes");

  assert.equal(outcome.kind, "rules");
  if (outcome.kind === "rules") {
    assert.equal(outcome.reason, "MODEL_UNAVAILABLE");
    assert.equal(outcome.detail, "model endpoint returned 503");
  }
  assert.deepEqual(
    outcome.entities.map((entity) => entity.text),
    ["Kubernetes"],
  );
});

test("classifies long text in chunks and maps spans back to the full text", async () => {
  const seen: string[] = [];
  const service = new EntityExtractionService(skillClassifier(18, seen), rules, 0.8, noopLogger);
  const outcome = await service.extract("Python developer. Knows Docker well");

  assert.deepEqual(seen, ["Python developer.", "Knows Docker well"]);
  assert.equal(outcome.kind, "model");
  assert.deepEqual(outcome.entities, [
    { type: "skill", text: "Python", confidence: 0.93, source: "model" },
    { type: "skill", text: "Docker", confidence: 0.93, source: "model" },
  ]);
});

test("an aborted extraction rejects instead of falling back", async () => {
  const controller = new AbortController();
  const hanging: TokenClassifier = {
    modelName: "fake-ner",
    maxInputChars: 1000,
    classify(_text: string, signal?: AbortSignal): Promise<TokenPrediction[]> {
      return new Promise((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
      });
    },
  };
  const service = new EntityExtractionService(hanging, rules, 0.8, noopLogger);
  const pending = service.extract("Python developer", controller.signal);
  controller.abort(new Error("deadline reached"));

  await assert.rejects(pending, /deadline reached/);
});

function experienceClassifier(score: number): TokenClassifier {
  return {
    modelName: "fake-ner",
    maxInputChars: 1000,
    async classify(text: string): Promise<TokenPrediction[]> {
      const start = text.indexOf("7 years");
      return [{ label: "B-EXPERIENCE", score, word: "7 years", start, end: start + "7 years".length }];
    },
  };
}

test("reads years of experience from an experience label", async () => {
  const service = new EntityExtractionService(experienceClassifier(0.9), rules, 0.8, noopLogger);
  const outcome = await service.extract("Backend engineer with 7 years in payments");

  assert.equal(outcome.kind, "model");
  assert.equal(outcome.experienceYears, 7);
  assert.deepEqual(outcome.entities, []);
});

test("falls back to the stated years when the label is below the threshold", async () => {
  const service = new EntityExtractionService(experienceClassifier(0.5), rules, 0.8, noopLogger);
  const outcome = await service.extract("Had 7 years in payments. 4+ years of experience with Go.");

  assert.equal(outcome.experienceYears, 4);
});

test("rules take the largest stated years of experience", async () => {
  const service = new EntityExtractionService(null, rules, 0.8, noopLogger);

  const stated = await service.extract("Summary: 5+ years of experience shipping APIs.\n12 yrs overall experience");
  assert.equal(stated.experienceYears, 12);

  const silent = await service.extract("Skills: Python");
  assert.equal(silent.experienceYears, undefined);
  assert.equal("experienceYears" in silent, false);
});
