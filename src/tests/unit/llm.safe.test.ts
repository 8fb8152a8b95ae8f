import assert from "node:assert/strict";
import { test } from "node:test";
import { callJsonPromptSafe, extractJsonObject, StructuredJsonClient } from "../../ai/llm.safe";
import { CircuitBreaker } from "../../ai/resilience/circuit-breaker";
import { RetryPolicy } from "../../ai/resilience/retry.policy";
import { failingLlm, noopLogger, recordingSleep, scriptedLlm } from "../helpers/fakes";

function setup(sleep = recordingSleep().sleep): { breaker: CircuitBreaker; retry: RetryPolicy } {
  return {
    breaker: new CircuitBreaker({ name: "test-llm", failureThreshold: 5, windowMs: 120_000, cooldownMs: 60_000 }),
    retry: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 4_000, maxDelayMs: 10_000, sleep }),
  };
}

function call(llmClient: StructuredJsonClient, deps: { breaker: CircuitBreaker; retry: RetryPolicy }, signal?: AbortSignal) {
  return callJsonPromptSafe({
    llmClient,
    prompt: "Return JSON",
    maxTokens: 200,
    promptName: "test_prompt",
    breaker: deps.breaker,
    retry: deps.retry,
    attemptTimeoutMs: 20,
    signal,
    logger: noopLogger,
    parse: (value) => (typeof value === "object" && value !== null && "answer" in value ? value : null),
  });
}

test("extracts the first JSON object from surrounding prose", () => {
  assert.deepEqual(extractJsonObject('Sure! Here it is:\n{"a": "brace } inside", "b": {"c": 1}}\nThanks'), {
    a: "brace } inside",
    b: { c: 1 },
  });
  assert.deepEqual(extractJsonObject('{not json} then {"ok": true}'), { ok: true });
  assert.equal(extractJsonObject("[1, 2, 3]"), null);
  assert.equal(extractJsonObject("no json here"), null);
});

test("returns parsed data and closes the loop on success", async () => {
  const deps = setup();
  const llm = scriptedLlm(() => 'Result:\n```json\n{"answer": 42}\n```');
  const result = await call(llm, deps);

  assert.deepEqual(result, { ok: true, data: { answer: 42 } });
  assert.equal(llm.calls, 1);
});

test("reports unparseable output without opening the circuit", async () => {
  const deps = setup();
  const llm = scriptedLlm(() => "I cannot help with that.");
  for (let i = 0; i < 6; i += 1) {
    const result = await call(llm, deps);
    assert.deepEqual(result, { ok: false, error_code: "json_parse_failed", raw: "I cannot help with that." });
  }
  assert.equal(deps.breaker.getState(), "CLOSED");
});

test("reports output that fails the schema", async () => {
  const result = await call(scriptedLlm(() => '{"question": "?"}'), setup());
  assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: '{"question": "?"}' });
});

test("retries transient failures and counts one breaker failure per call", async () => {
  const recorder = recordingSleep();
  const deps = setup(recorder.sleep);
  const llm = failingLlm(503);
  const result = await call(llm, deps);

  assert.deepEqual(result, { ok: false, error_code: "transient_failure" });
  assert.equal(llm.calls, 3);
  assert.deepEqual(recorder.delays, [4_000, 8_000]);
  assert.equal(deps.breaker.getState(), "CLOSED");
});

test("opens the circuit after five failed calls and stops calling the model", async () => {
  const deps = setup();
  const llm = failingLlm(400, "invalid request");
  for (let i = 0; i < 5; i += 1) {
    assert.deepEqual(await call(llm, deps), { ok: false, error_code: "llm_failure" });
  }

  assert.deepEqual(await call(llm, deps), { ok: false, error_code: "circuit_open" });
  assert.equal(llm.calls, 5);
  assert.equal(deps.breaker.getState(), "OPEN");
});

test("times out each attempt that does not answer", async () => {
  const deps = setup();
  const llm = scriptedLlm(
    (_call, _prompt, options) =>
      new Promise<string>((_resolve, reject) => {
        options?.signal?.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
      }),
  );
  const result = await call(llm, deps);

  assert.deepEqual(result, { ok: false, error_code: "timeout" });
  assert.equal(llm.calls, 3);
});

test("caller aborts release the permit instead of counting a failure", async () => {
  const deps = setup();
  const controller = new AbortController();
  controller.abort(new Error("deadline reached"));
  const llm = scriptedLlm(() => '{"answer": 1}');

  for (let i = 0; i < 6; i += 1) {
    assert.deepEqual(await call(llm, deps, controller.signal), { ok: false, error_code: "aborted" });
  }
  assert.equal(deps.breaker.getState(), "CLOSED");
});

test("does not start a call when the budget cannot fit one attempt", async () => {
  const deps = setup();
  const llm = scriptedLlm(() => '{"answer": 1}');
  const result = await callJsonPromptSafe({
    llmClient: llm,
    prompt: "Return JSON",
    maxTokens: 200,
    promptName: "test_prompt",
    breaker: deps.breaker,
    retry: deps.retry,
    attemptTimeoutMs: 20,
    budgetMs: 150,
    logger: noopLogger,
    parse: (value) => value,
  });

  assert.deepEqual(result, { ok: false, error_code: "budget_exhausted" });
  assert.equal(llm.calls, 0);
});

test("stops retrying when the backoff no longer fits the budget", async () => {
  const sleeper = recordingSleep();
  const deps = setup(sleeper.sleep);
  const llm = failingLlm(503);
  const result = await callJsonPromptSafe({
    llmClient: llm,
    prompt: "Return JSON",
    maxTokens: 200,
    promptName: "test_prompt",
    breaker: deps.breaker,
    retry: deps.retry,
    attemptTimeoutMs: 20,
    budgetMs: 3_000,
    logger: noopLogger,
    parse: (value) => value,
  });

  assert.deepEqual(result, { ok: false, error_code: "budget_exhausted" });
  assert.equal(llm.calls, 1);
  assert.deepEqual(sleeper.delays, []);
});
