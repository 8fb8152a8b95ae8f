import assert from "node:assert/strict";
import { test } from "node:test";
import { CircuitBreaker } from "../../ai/resilience/circuit-breaker";

function fakeClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

function breakerWith(clock: { now: () => number }): CircuitBreaker {
  return new CircuitBreaker({
    name: "test-llm",
    failureThreshold: 5,
    windowMs: 120_000,
    cooldownMs: 60_000,
    now: clock.now,
  });
}

function fail(breaker: CircuitBreaker, times: number): void {
  for (let i = 0; i < times; i += 1) {
    breaker.recordFailure(breaker.tryAcquire());
  }
}

test("opens after five failures inside the window", () => {
  const clock = fakeClock();
  const breaker = breakerWith(clock);

  fail(breaker, 4);
  assert.equal(breaker.getState(), "CLOSED");
  fail(breaker, 1);
  assert.equal(breaker.getState(), "OPEN");

  assert.deepEqual(breaker.tryAcquire(), { allowed: false, retryAfterMs: 60_000 });
  clock.advance(30_000);
  assert.deepEqual(breaker.tryAcquire(), { allowed: false, retryAfterMs: 30_000 });
});

test("failures older than the window do not count", () => {
  const clock = fakeClock();
  const breaker = breakerWith(clock);

  for (let i = 0; i < 4; i += 1) {
    fail(breaker, 1);
    clock.advance(1_000);
  }
  clock.advance(120_001);
  fail(breaker, 1);
  assert.equal(breaker.getState(), "CLOSED");
});

test("a success while closed resets the failure count", () => {
  const breaker = breakerWith(fakeClock());
  fail(breaker, 4);
  breaker.recordSuccess(breaker.tryAcquire());
  fail(breaker, 4);
  assert.equal(breaker.getState(), "CLOSED");
});

test("admits a single probe after the cooldown and closes on success", () => {
  const clock = fakeClock();
  const breaker = breakerWith(clock);
  fail(breaker, 5);

  clock.advance(60_000);
  assert.equal(breaker.getState(), "HALF_OPEN");
  const probe = breaker.tryAcquire();
  assert.deepEqual(probe, { allowed: true, probe: true });
  assert.deepEqual(breaker.tryAcquire(), { allowed: false, retryAfterMs: 0 });

  breaker.recordSuccess(probe);
  assert.equal(breaker.getState(), "CLOSED");
  assert.deepEqual(breaker.tryAcquire(), { allowed: true, probe: false });
});

test("a failed probe reopens the circuit for another cooldown", () => {
  const clock = fakeClock();
  const breaker = breakerWith(clock);
  fail(breaker, 5);

  clock.advance(60_000);
  breaker.recordFailure(breaker.tryAcquire());
  assert.equal(breaker.getState(), "OPEN");
  assert.deepEqual(breaker.tryAcquire(), { allowed: false, retryAfterMs: 60_000 });
});

test("releasing a probe lets the next caller probe", () => {
  const clock = fakeClock();
  const breaker = breakerWith(clock);
  fail(breaker, 5);
  clock.advance(60_000);

  breaker.release(breaker.tryAcquire());
  assert.equal(breaker.getState(), "HALF_OPEN");
  assert.deepEqual(breaker.tryAcquire(), { allowed: true, probe: true });
});
