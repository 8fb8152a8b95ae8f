import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyMatchQuality, cosineSimilarity, toSimilarityScore } from "../../matching/scoring/similarity";
import { chunkByWords, meanPool } from "../../matching/text-chunker";

test("chunks long text with overlapping windows", () => {
  const words = Array.from({ length: 520 }, (_, i) => `w${i}`);
  const chunks = chunkByWords(words.join(" "), { chunkWords: 512, overlapWords: 50 });

  assert.equal(chunks.length, 2);
  assert.equal(chunks[0]?.split(" ").length, 512);
  assert.equal(chunks[1]?.split(" ").length, 58);
  assert.equal(chunks[1]?.split(" ")[0], "w462");
});

test("short text stays a single chunk", () => {
  assert.deepEqual(chunkByWords("  Python\n developer ", { chunkWords: 512, overlapWords: 50 }), [
    "Python developer",
  ]);
});

test("mean pools vectors of the same dimension", () => {
  assert.deepEqual(meanPool([[1, 2], [3, 4]]), [2, 3]);
  assert.throws(() => meanPool([]), /empty set/);
  assert.throws(() => meanPool([[1, 2], [3]]), /dimension mismatch/);
});

test("rescales cosine similarity to a 0-100 score", () => {
  assert.equal(cosineSimilarity([1, 0], [2, 0]), 1);
  assert.equal(cosineSimilarity([1, 0], [-1, 0]), -1);
  assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.equal(cosineSimilarity([0, 0], [1, 1]), 0);
  assert.equal(toSimilarityScore(1), 100);
  assert.equal(toSimilarityScore(-1), 0);
  assert.equal(toSimilarityScore(0), 50);
  assert.equal(toSimilarityScore(0.45), 72.5);
  assert.throws(() => cosineSimilarity([1], [1, 2]), /dimension mismatch/);
});

test("labels match quality by score band", () => {
  assert.equal(classifyMatchQuality(80), "excellent");
  assert.equal(classifyMatchQuality(79.99), "good");
  assert.equal(classifyMatchQuality(65), "good");
  assert.equal(classifyMatchQuality(50), "fair");
  assert.equal(classifyMatchQuality(49.99), "poor");
});
