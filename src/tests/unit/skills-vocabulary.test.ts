import assert from "node:assert/strict";
import { test } from "node:test";
import { SkillsVocabulary } from "../../nlp/skills-vocabulary";

const vocabulary = new SkillsVocabulary();

test("matches aliases and punctuated skill names", () => {
  const matches = vocabulary.findMatches("Ran k8s clusters with Node.js and C++ services");
  assert.deepEqual(
    matches.map((match) => [match.display, match.surface, match.index]),
    [
      ["Kubernetes", "k8s", 4],
      ["Node.js", "Node.js", 22],
      ["C++", "C++", 34],
    ],
  );
});

test("does not match a skill inside a longer word", () => {
  const matches = vocabulary.findMatches("JavaScript and TypeScript");
  assert.deepEqual(
    matches.map((match) => match.display),
    ["JavaScript", "TypeScript"],
  );
});

test("prefers the longest overlapping skill", () => {
  const matches = vocabulary.findMatches("Built apps with React Native");
  assert.deepEqual(
    matches.map((match) => match.display),
    ["React Native"],
  );
});

test("canonicalizes aliases", () => {
  assert.equal(vocabulary.canonicalize("JS"), "javascript");
  assert.equal(vocabulary.canonicalize("  Amazon   Web Services "), "aws");
  assert.equal(vocabulary.canonicalize("Haskell"), "haskell");
  assert.equal(vocabulary.displayFor("aws"), "AWS");
});

test("accepts custom tables", () => {
  const custom = new SkillsVocabulary({ languages: ["Elm"] }, { elmlang: "elm" });
  assert.equal(custom.size, 1);
  assert.deepEqual(
    custom.findMatches("elmlang and Elm").map((match) => match.canonical),
    ["elm", "elm"],
  );
});

test("registers the other grammatical number of each skill", () => {
  assert.equal(vocabulary.canonicalize("microservice"), "microservices");
  assert.equal(vocabulary.canonicalize("LLMs"), "llm");
  assert.deepEqual(
    vocabulary.findMatches("Wrote a microservice").map((match) => [match.display, match.surface]),
    [["Microservices", "microservice"]],
  );
});
