import assert from "node:assert/strict";
import { test } from "node:test";
import type { StructuredJsonClient } from "../../ai/llm.safe";
import { CircuitBreaker } from "../../ai/resilience/circuit-breaker";
import { RetryPolicy } from "../../ai/resilience/retry.policy";
import { parseFeedbackReport } from "../../ai/schemas/feedback.schema";
import { FeedbackService } from "../../feedback/feedback.service";
import type { ResumeProfile } from "../../shared/types/entity.types";
import {
  failingLlm,
  noopLogger,
  recordingSleep,
  sampleScore,
  scriptedLlm,
  validFeedbackJson,
} from "../helpers/fakes";

const resume: ResumeProfile = {
  entities: [
    { type: "skill", text: "Python", confidence: 0.95, source: "model" },
    { type: "job_title", text: "Backend Developer", confidence: 0.9, source: "model" },
  ],
  experienceYears: 6,
};
const job = { title: "Platform Engineer", description: "We run Python services on Docker and Kubernetes." };

function service(llm: StructuredJsonClient, breaker?: CircuitBreaker): FeedbackService {
  return new FeedbackService(
    llm,
    breaker ?? new CircuitBreaker({ name: "test-llm", failureThreshold: 5, windowMs: 120_000, cooldownMs: 60_000 }),
    new RetryPolicy({ maxAttempts: 3, baseDelayMs: 4_000, maxDelayMs: 10_000, sleep: recordingSleep().sleep }),
    { attemptTimeoutMs: 1_000 },
    noopLogger,
  );
}

test("returns model feedback sorted by priority", async () => {
  const llm = scriptedLlm(() => validFeedbackJson);
  const outcome = await service(llm).generate(resume, sampleScore, job);

  assert.equal(outcome.kind, "ai");
  assert.equal(outcome.report.overallAssessment, "Strong Python background; container tooling is the main gap.");
  assert.deepEqual(outcome.report.strengths, ["Production Python services"]);
  assert.deepEqual(outcome.report.priorityImprovements, [
    "Mention the Docker images you built for the billing service.",
    "Describe the scale of the APIs you owned.",
  ]);
  assert.deepEqual(
    outcome.report.items.map((item) => [item.category, item.priority]),
    [
      ["keywords", "high"],
      ["experience", "medium"],
    ],
  );
});

test("sends the analysis context in the prompt", async () => {
  const llm = scriptedLlm(() => validFeedbackJson);
  await service(llm).generate(resume, sampleScore, job);

  const lines = (llm.prompts[0] ?? "").split("\n");
  assert.ok(lines.includes("Target role: Platform Engineer"));
  assert.ok(lines.includes("Match score: 72.5% (good)"));
  assert.ok(lines.includes("Keyword coverage: 33.3%"));
  assert.ok(lines.includes("Years of experience: 6"));
  assert.ok(lines.includes("Skills: Python"));
  assert.ok(lines.includes("Job titles: Backend Developer"));
  assert.ok(lines.includes("Companies: None detected"));
  assert.ok(lines.includes("Matched keywords: Python"));
  assert.ok(lines.includes("Missing keywords: Docker, Kubernetes"));
  assert.ok(lines.includes("We run Python services on Docker and Kubernetes."));
});

test("falls back with a generic report when the response is not usable", async () => {
  const outcome = await service(scriptedLlm(() => "Sorry, I can't do that.")).generate(resume, sampleScore, job);

  assert.equal(outcome.kind, "fallback");
  if (outcome.kind !== "fallback") {
    return;
  }
  assert.equal(outcome.reason, "invalid_response");
  assert.equal(
    outcome.report.overallAssessment,
    "Your resume shows a 72.5% match with this role (good). Detailed coaching is unavailable right now, so these are general recommendations.",
  );
  assert.deepEqual(outcome.report.strengths, ["Covers 1 of the job's key terms, including Python."]);
  assert.deepEqual(
    outcome.report.items.map((item) => [item.category, item.priority]),
    [
      ["keywords", "high"],
      ["skills", "medium"],
      ["achievements", "medium"],
      ["formatting", "low"],
    ],
  );
  assert.equal(
    outcome.report.priorityImprovements[0],
    "Add the missing job keywords you can honestly claim: Docker, Kubernetes.",
  );
  assert.equal(outcome.report.priorityImprovements.length, 3);
});

test("maps service failures and open circuits to fallback reasons", async () => {
  const unavailable = await service(failingLlm(503)).generate(resume, sampleScore, job);
  assert.equal(unavailable.kind === "fallback" ? unavailable.reason : unavailable.kind, "service_unavailable");

  const breaker = new CircuitBreaker({ name: "test-llm", failureThreshold: 1, windowMs: 120_000, cooldownMs: 60_000 });
  breaker.recordFailure(breaker.tryAcquire());
  const llm = scriptedLlm(() => validFeedbackJson);
  const open = await service(llm, breaker).generate(resume, sampleScore, job);
  assert.equal(open.kind === "fallback" ? open.reason : open.kind, "circuit_open");
  assert.equal(llm.calls, 0);
});

test("fallback feedback without matched keywords has no strengths", () => {
  const outcome = service(scriptedLlm(() => validFeedbackJson)).fallback("deadline_budget", {
    ...sampleScore,
    matchedKeywords: [],
    missingKeywords: [],
  });
  assert.deepEqual(outcome.report.strengths, []);
  assert.deepEqual(
    outcome.report.items.map((item) => item.category),
    ["skills", "achievements", "formatting"],
  );
});

test("normalizes categories and drops items without a valid priority", () => {
  const report = parseFeedbackReport({
    overall_assessment: "  Good   fit. ",
    strengths: ["Python", 3, ""],
    priority_improvements: [
      { category: "Layout", priority: "low", suggestion: "Use one column." },
      { category: "ATS", priority: "HIGH", recommendation: "Add Docker." },
      { category: "vibes", priority: "medium", suggestion: "Tighten the summary." },
      { category: "skills", priority: "urgent", suggestion: "Learn Rust." },
    ],
  });

  assert.deepEqual(report, {
    overallAssessment: "Good fit.",
    strengths: ["Python"],
    priorityImprovements: ["Add Docker.", "Tighten the summary.", "Use one column."],
    items: [
      { category: "keywords", priority: "high", suggestion: "Add Docker." },
      { category: "general", priority: "medium", suggestion: "Tighten the summary." },
      { category: "formatting", priority: "low", suggestion: "Use one column." },
    ],
  });
  assert.equal(parseFeedbackReport({ overall_assessment: "x", strengths: [], priority_improvements: [] }), null);
  assert.equal(parseFeedbackReport([]), null);
});

test("states when the resume gives no years of experience", async () => {
  const llm = scriptedLlm(() => validFeedbackJson);
  await service(llm).generate({ entities: resume.entities }, sampleScore, job);

  assert.ok((llm.prompts[0] ?? "").split("\n").includes("Years of experience: Not stated"));
});
